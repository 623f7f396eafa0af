import { describe, expect, it } from 'vitest';

import {
  createCardStyle,
  createCardTransition,
  createContainerStyle,
  getTotalTransitionMs,
  toTranslateY,
} from './card-stack-animation';
import type { CardLayout } from './card-stack-layout';

const animation = { durationMs: 400, easing: 'ease-out' };

const stackedCard: CardLayout = {
  id: 'a',
  offsetY: 12,
  leadingInset: 12,
  trailingInset: 16,
  fixedHeight: 100,
  clip: true,
  zOrder: 2,
  animationDelay: 100,
};

const unstackedCard: CardLayout = {
  id: 'a',
  offsetY: 274,
  leadingInset: 16,
  trailingInset: 16,
  clip: false,
  zOrder: 2,
  animationDelay: 100,
};

describe('toTranslateY', () => {
  it('creates a pixel translation', () => {
    expect(toTranslateY(274)).toBe('translateY(274px)');
  });
});

describe('createCardTransition', () => {
  it('delays position and insets but not height', () => {
    expect(createCardTransition({ animationDelay: 100 }, animation)).toBe(
      'transform 400ms ease-out 100ms, left 400ms ease-out 100ms, right 400ms ease-out 100ms, height 400ms ease-out 0ms',
    );
  });
});

describe('createCardStyle', () => {
  it('uses the fixed height and clips while stacked', () => {
    expect(createCardStyle(stackedCard, 180, animation)).toEqual({
      transform: 'translateY(12px)',
      left: 12,
      right: 16,
      height: 100,
      overflow: 'hidden',
      zIndex: 2,
      transition:
        'transform 400ms ease-out 100ms, left 400ms ease-out 100ms, right 400ms ease-out 100ms, height 400ms ease-out 0ms',
    });
  });

  it('uses the measured height when the layout leaves it free', () => {
    const style = createCardStyle(unstackedCard, 180, animation);

    expect(style.height).toBe(180);
    expect(style.overflow).toBe('visible');
    expect(style.transform).toBe('translateY(274px)');
  });

  it('sizes to content before the card is measured', () => {
    expect(createCardStyle(unstackedCard, undefined, animation).height).toBe(
      'auto',
    );
  });
});

describe('createContainerStyle', () => {
  it('animates the container height without delay', () => {
    expect(createContainerStyle(566, animation)).toEqual({
      height: 566,
      transition: 'height 400ms ease-out',
    });
  });
});

describe('getTotalTransitionMs', () => {
  it('adds the stagger of every card after the first', () => {
    expect(getTotalTransitionMs(4, 50, animation)).toBe(550);
  });

  it('is the plain duration for one card or none', () => {
    expect(getTotalTransitionMs(1, 50, animation)).toBe(400);
    expect(getTotalTransitionMs(0, 50, animation)).toBe(400);
  });
});
