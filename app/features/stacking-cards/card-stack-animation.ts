import type { CSSProperties } from 'react';

import type { CardStackAnimation } from './card-stack-config';
import type { CardLayout } from './card-stack-layout';

/**
 * Create CSS transform string from a vertical offset
 */
export const toTranslateY = (offsetY: number): string =>
  `translateY(${offsetY}px)`;

/**
 * Create the CSS transition for a card.
 * Offset and insets wait for the card's cascade delay; height starts right away
 * so that newly measured content is not held back by the stagger.
 */
export function createCardTransition(
  card: Pick<CardLayout, 'animationDelay'>,
  { durationMs, easing }: CardStackAnimation,
): string {
  const delayed = `${durationMs}ms ${easing} ${card.animationDelay}ms`;
  const immediate = `${durationMs}ms ${easing} 0ms`;

  return [
    `transform ${delayed}`,
    `left ${delayed}`,
    `right ${delayed}`,
    `height ${immediate}`,
  ].join(', ');
}

/**
 * Create the styles that place a card at its target position.
 *
 * `naturalHeight` is the card's last measured content height. It stands in for
 * "auto" when the layout leaves the height free, because CSS cannot transition
 * between a fixed height and `auto`.
 */
export function createCardStyle(
  card: CardLayout,
  naturalHeight: number | undefined,
  animation: CardStackAnimation,
): CSSProperties {
  return {
    transform: toTranslateY(card.offsetY),
    left: card.leadingInset,
    right: card.trailingInset,
    height: card.fixedHeight ?? naturalHeight ?? 'auto',
    overflow: card.clip ? 'hidden' : 'visible',
    zIndex: card.zOrder,
    transition: createCardTransition(card, animation),
  };
}

/**
 * Create the styles for the element that contains the cards.
 */
export function createContainerStyle(
  containerHeight: number,
  { durationMs, easing }: CardStackAnimation,
): CSSProperties {
  return {
    height: containerHeight,
    transition: `height ${durationMs}ms ${easing}`,
  };
}

/**
 * Time from a toggle until the last card has finished moving.
 */
export function getTotalTransitionMs(
  cardCount: number,
  staggerMs: number,
  { durationMs }: CardStackAnimation,
): number {
  return durationMs + Math.max(cardCount - 1, 0) * staggerMs;
}
