import { Layers, ListCollapse } from 'lucide-react';
import { useState } from 'react';
import {
  Page,
  PageContent,
  PageHeader,
  PageHeaderTitle,
} from '~/components/page';
import { Button } from '~/components/ui/button';

import { createContainerStyle } from './card-stack-animation';
import { type CardStackConfig, getCardStackConfig } from './card-stack-config';
import { getKnownHeight } from './height-table';
import { type MessageCard, createSampleMessageCards } from './message-card';
import { MessageCardItem } from './message-card-item';
import { useCardStack } from './use-card-stack';

type StackingCardsProps = {
  cards: readonly MessageCard[];
  config: CardStackConfig;
};

/**
 * Renders the cards at the positions computed by the layout engine,
 * plus the button that switches between the stacked and unstacked modes.
 */
export function StackingCards({ cards, config }: StackingCardsProps) {
  const { mode, heightTable, layout, isTransitioning, toggleMode, reportHeight } =
    useCardStack(cards, { config });
  const isStacked = mode === 'stacked';

  return (
    <div className="flex w-full flex-col gap-4">
      <div className="flex justify-end">
        <Button
          variant="secondary"
          size="sm"
          aria-pressed={isStacked}
          onClick={toggleMode}
        >
          {isStacked ? <ListCollapse /> : <Layers />}
          {isStacked ? 'Unstack' : 'Stack'}
        </Button>
      </div>

      <section
        aria-label="Messages"
        aria-busy={isTransitioning}
        className="relative w-full"
        style={createContainerStyle(layout.containerHeight, config.animation)}
      >
        {cards.map((card, index) => (
          <MessageCardItem
            key={card.id}
            card={card}
            layout={layout.cards[index]}
            naturalHeight={getKnownHeight(heightTable, card.id)}
            animation={config.animation}
            onHeightChange={reportHeight}
          />
        ))}
      </section>
    </div>
  );
}

/**
 * The stacking cards screen with a fixed set of sample messages.
 */
export function StackingCardsView() {
  // Created once so card ids stay stable for the lifetime of the screen
  const [cards] = useState(createSampleMessageCards);
  const [config] = useState(getCardStackConfig);

  return (
    <Page>
      <PageHeader>
        <PageHeaderTitle>Notifications</PageHeaderTitle>
      </PageHeader>
      <PageContent className="overflow-y-auto">
        <StackingCards cards={cards} config={config} />
      </PageContent>
    </Page>
  );
}
