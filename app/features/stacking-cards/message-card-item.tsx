import { useRef } from 'react';
import { useResizeObserver } from 'usehooks-ts';
import { cn } from '~/lib/utils';

import { createCardStyle } from './card-stack-animation';
import type { CardStackAnimation } from './card-stack-config';
import type { CardLayout } from './card-stack-layout';
import type { CardColor, MessageCard } from './message-card';

const CARD_COLOR_CLASSES: Record<CardColor, string> = {
  blue: 'bg-blue-500',
  green: 'bg-green-500',
  orange: 'bg-orange-500',
  pink: 'bg-pink-500',
  purple: 'bg-purple-500',
  red: 'bg-red-500',
  teal: 'bg-teal-500',
  yellow: 'bg-yellow-500 text-black',
};

type MessageCardItemProps = {
  card: MessageCard;
  layout: CardLayout;
  /** Last measured content height, used while the layout leaves the height free */
  naturalHeight: number | undefined;
  animation: CardStackAnimation;
  onHeightChange: (itemId: string, height: number) => void;
};

/**
 * A single message card positioned by the stack layout.
 * The content is measured on every resize and reported back by card id.
 */
export function MessageCardItem({
  card,
  layout,
  naturalHeight,
  animation,
  onHeightChange,
}: MessageCardItemProps) {
  const contentRef = useRef<HTMLDivElement>(null);

  useResizeObserver({
    ref: contentRef,
    box: 'border-box',
    onResize: ({ height }) => {
      if (height !== undefined) {
        onHeightChange(card.id, height);
      }
    },
  });

  return (
    <article
      data-card-id={card.id}
      className={cn(
        'absolute top-0 rounded-2xl text-white shadow-md',
        CARD_COLOR_CLASSES[card.color],
      )}
      style={createCardStyle(layout, naturalHeight, animation)}
    >
      <div ref={contentRef} className="px-4 py-3">
        <p className="text-sm leading-snug">{card.message}</p>
      </div>
    </article>
  );
}
