export const CARD_COLORS = [
  'blue',
  'green',
  'orange',
  'pink',
  'purple',
  'red',
  'teal',
  'yellow',
] as const;

export type CardColor = (typeof CARD_COLORS)[number];

/**
 * A single entry in the card stack.
 * Only `id` is read by the layout engine; `color` and `message` are display-only.
 */
export type MessageCard = {
  id: string;
  color: CardColor;
  message: string;
};

export function createMessageCard(
  color: CardColor,
  message: string,
): MessageCard {
  return { id: crypto.randomUUID(), color, message };
}

const SAMPLE_MESSAGES: [CardColor, string][] = [
  ['blue', 'Your order has shipped and is on its way.'],
  [
    'green',
    'Reminder: team sync moved to 3:30 PM. Bring the notes from last week so we can close out the open action items before the release.',
  ],
  ['orange', 'Battery at 20%.'],
  [
    'purple',
    'New comment on your post: "This is exactly what I was looking for, thanks for writing it up! Do you have a follow-up planned on the animation timing?"',
  ],
  ['pink', 'Ana shared an album with you.'],
];

/**
 * Creates the cards shown on first load. Each call generates fresh ids.
 */
export function createSampleMessageCards(): MessageCard[] {
  return SAMPLE_MESSAGES.map(([color, message]) =>
    createMessageCard(color, message),
  );
}
