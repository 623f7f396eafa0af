import { z } from 'zod';

import {
  ANIMATION_DURATION_MS,
  CARD_SPACING,
  CASCADE_DELAY_PER_CARD_MS,
  FALLBACK_CONTAINER_HEIGHT,
  INSET_STEP,
  SPRING_TIMING,
  STACK_STEP,
} from './card-stack.constants';

export type CardStackLayoutConfig = {
  stackStep: number;
  insetStep: number;
  spacing: number;
  staggerMs: number;
  fallbackContainerHeight: number;
};

export const DEFAULT_CARD_STACK_LAYOUT: CardStackLayoutConfig = {
  stackStep: STACK_STEP,
  insetStep: INSET_STEP,
  spacing: CARD_SPACING,
  staggerMs: CASCADE_DELAY_PER_CARD_MS,
  fallbackContainerHeight: FALLBACK_CONTAINER_HEIGHT,
};

export type CardStackAnimation = {
  durationMs: number;
  /** CSS timing function */
  easing: string;
};

export const DEFAULT_CARD_STACK_ANIMATION: CardStackAnimation = {
  durationMs: ANIMATION_DURATION_MS,
  easing: SPRING_TIMING,
};

export type CardStackConfig = {
  layout: CardStackLayoutConfig;
  animation: CardStackAnimation;
};

const dimension = z.number().finite().nonnegative();

export const CardStackConfigSchema = z
  .object({
    stackStep: dimension,
    insetStep: dimension,
    spacing: dimension,
    staggerMs: dimension,
    fallbackContainerHeight: dimension,
    durationMs: dimension,
    easing: z.string().min(1),
  })
  .partial()
  .strict();

export const JsonCardStackConfigSchema = z
  .string()
  .transform((str, ctx) => {
    try {
      return JSON.parse(str);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid JSON' });
      return z.NEVER;
    }
  })
  .pipe(CardStackConfigSchema);

export type CardStackConfigOverrides = z.infer<typeof CardStackConfigSchema>;

/**
 * Applies validated overrides on top of the default layout and animation settings.
 */
export function createCardStackConfig(
  overrides: CardStackConfigOverrides = {},
): CardStackConfig {
  const { durationMs, easing, ...layout } = overrides;

  return {
    layout: { ...DEFAULT_CARD_STACK_LAYOUT, ...layout },
    animation: {
      durationMs: durationMs ?? DEFAULT_CARD_STACK_ANIMATION.durationMs,
      easing: easing ?? DEFAULT_CARD_STACK_ANIMATION.easing,
    },
  };
}

/**
 * Reads overrides from a JSON string, e.g. the `VITE_CARD_STACK_CONFIG` env variable.
 * Falls back to the defaults when the value is missing or invalid.
 */
export function parseCardStackConfig(json: string | undefined): CardStackConfig {
  if (!json) {
    return createCardStackConfig();
  }

  const result = JsonCardStackConfigSchema.safeParse(json);

  if (result.success) {
    return createCardStackConfig(result.data);
  }

  console.error('Invalid card stack config', { json, error: result.error });

  return createCardStackConfig();
}

export function getCardStackConfig(): CardStackConfig {
  return parseCardStackConfig(import.meta.env.VITE_CARD_STACK_CONFIG);
}
