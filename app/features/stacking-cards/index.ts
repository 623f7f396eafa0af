export * from './card-stack-config';
export * from './card-stack-layout';
export * from './height-table';
export * from './message-card';
export { StackingCards, StackingCardsView } from './stacking-cards';
export { useCardStack } from './use-card-stack';
