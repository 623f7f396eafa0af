import { sum } from '~/lib/utils';

import {
  type CardStackLayoutConfig,
  DEFAULT_CARD_STACK_LAYOUT,
} from './card-stack-config';
import { type HeightTable, getKnownHeight } from './height-table';
import type { MessageCard } from './message-card';

/**
 * Card stack modes:
 * - stacked: cards overlap and collapse to the first card's height
 * - unstacked: cards are laid out one below another at their own height
 */
export type StackMode = 'stacked' | 'unstacked';

export type CardLayout = {
  id: string;
  offsetY: number;
  leadingInset: number;
  trailingInset: number;
  /** Absent when the card should keep its natural content height */
  fixedHeight?: number;
  clip: boolean;
  /** Higher values are drawn above lower ones */
  zOrder: number;
  /** Delay in ms applied to the offset and inset transitions */
  animationDelay: number;
};

export type CardStackLayout = {
  cards: CardLayout[];
  containerHeight: number;
};

type CardIdentity = Pick<MessageCard, 'id'>;

/**
 * Leading inset of the card at `index` while stacked.
 * The last card's value is the uniform inset used everywhere else.
 */
export const getStackedInset = (index: number, insetStep: number): number =>
  index * insetStep + insetStep;

/**
 * Computes where every card sits for the given mode.
 *
 * Heights that have not been reported yet count as 0 for unstacked offsets and the
 * unstacked container height, so the layout can be short until all cards are measured.
 */
export function computeLayout(
  items: readonly CardIdentity[],
  heightTable: HeightTable,
  mode: StackMode,
  config: CardStackLayoutConfig = DEFAULT_CARD_STACK_LAYOUT,
): CardStackLayout {
  const { stackStep, insetStep, spacing, staggerMs } = config;
  const itemCount = items.length;
  const isStacked = mode === 'stacked';

  const firstHeight =
    itemCount > 0 ? getKnownHeight(heightTable, items[0].id) : undefined;
  const collapsedHeight = isStacked ? firstHeight : undefined;
  const maxInset = getStackedInset(itemCount - 1, insetStep);

  const cards: CardLayout[] = [];
  let unstackedOffset = 0;

  items.forEach((item, index) => {
    const card: CardLayout = {
      id: item.id,
      offsetY: isStacked ? index * stackStep : unstackedOffset,
      leadingInset: isStacked ? getStackedInset(index, insetStep) : maxInset,
      trailingInset: maxInset,
      clip: collapsedHeight !== undefined,
      zOrder: itemCount - index,
      animationDelay: index * staggerMs,
    };
    if (collapsedHeight !== undefined) {
      card.fixedHeight = collapsedHeight;
    }
    cards.push(card);

    unstackedOffset += (getKnownHeight(heightTable, item.id) ?? 0) + spacing;
  });

  return {
    cards,
    containerHeight: getContainerHeight(items, heightTable, mode, config),
  };
}

function getContainerHeight(
  items: readonly CardIdentity[],
  heightTable: HeightTable,
  mode: StackMode,
  { stackStep, spacing, fallbackContainerHeight }: CardStackLayoutConfig,
): number {
  const gaps = Math.max(items.length - 1, 0);

  if (mode === 'stacked') {
    const firstHeight =
      items.length > 0 ? getKnownHeight(heightTable, items[0].id) : undefined;
    return firstHeight !== undefined
      ? firstHeight + gaps * stackStep
      : fallbackContainerHeight;
  }

  const knownHeights = items
    .map((item) => getKnownHeight(heightTable, item.id))
    .filter((height): height is number => height !== undefined);
  const totalHeight = sum(knownHeights);

  if (knownHeights.length > 0 && totalHeight > 0) {
    return totalHeight + gaps * spacing;
  }

  return fallbackContainerHeight;
}
