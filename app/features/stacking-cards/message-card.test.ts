// @vitest-environment node
import { describe, expect, it } from 'vitest';

import {
  CARD_COLORS,
  createMessageCard,
  createSampleMessageCards,
} from './message-card';

describe('createMessageCard', () => {
  it('keeps the given color and message', () => {
    const card = createMessageCard('teal', 'Hello');

    expect(card.color).toBe('teal');
    expect(card.message).toBe('Hello');
  });

  it('gives every card its own id', () => {
    const first = createMessageCard('blue', 'Same text');
    const second = createMessageCard('blue', 'Same text');

    expect(first.id).not.toBe(second.id);
  });
});

describe('createSampleMessageCards', () => {
  it('creates cards with unique ids and known colors', () => {
    const cards = createSampleMessageCards();
    const ids = new Set(cards.map((card) => card.id));

    expect(cards).toHaveLength(5);
    expect(ids.size).toBe(5);
    for (const card of cards) {
      expect(CARD_COLORS).toContain(card.color);
    }
  });

  it('creates fresh ids on every call', () => {
    const [first] = createSampleMessageCards();
    const [again] = createSampleMessageCards();

    expect(first.message).toBe(again.message);
    expect(first.id).not.toBe(again.id);
  });
});
