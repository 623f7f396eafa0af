// ============================================================================
// Animation Timing
// ============================================================================

export const ANIMATION_DURATION_MS = 400;
export const CASCADE_DELAY_PER_CARD_MS = 50;
/** Overshoots slightly before settling, close to a damped spring */
export const SPRING_TIMING = 'cubic-bezier(0.34, 1.15, 0.64, 1)';

// ============================================================================
// Layout Dimensions
// ============================================================================

/** Vertical offset between cards in the stacked state */
export const STACK_STEP = 6;

/** Horizontal indentation added per card index in the stacked state */
export const INSET_STEP = 4;

/** Vertical gap between cards in the unstacked state */
export const CARD_SPACING = 12;

/** Container height used before any card has been measured */
export const FALLBACK_CONTAINER_HEIGHT = 200;
