import { useCallback, useEffect, useMemo, useRef, useState } from 'react';

import { getTotalTransitionMs } from './card-stack-animation';
import {
  type CardStackConfig,
  createCardStackConfig,
} from './card-stack-config';
import {
  type CardStackLayout,
  type StackMode,
  computeLayout,
} from './card-stack-layout';
import {
  type HeightTable,
  createHeightTable,
  reportHeight as mergeHeight,
} from './height-table';
import type { MessageCard } from './message-card';

type CardStackState = {
  mode: StackMode;
  heightTable: HeightTable;
  layout: CardStackLayout;
  /** True from a toggle until the last card's cascade has finished */
  isTransitioning: boolean;
  /** Time from a toggle until the last card settles */
  transitionDurationMs: number;
  toggleMode: () => void;
  reportHeight: (itemId: string, height: number) => void;
};

type UseCardStackOptions = {
  initialMode?: StackMode;
  config?: CardStackConfig;
};

const DEFAULT_CONFIG = createCardStackConfig();

/**
 * Owns the stack mode and the measured heights, and derives the layout from them.
 * Toggling has no guard: a toggle during a running transition simply retargets the cards.
 */
export function useCardStack(
  items: readonly MessageCard[],
  { initialMode = 'stacked', config = DEFAULT_CONFIG }: UseCardStackOptions = {},
): CardStackState {
  const [mode, setMode] = useState<StackMode>(initialMode);
  const [heightTable, setHeightTable] = useState<HeightTable>(() =>
    createHeightTable(),
  );

  // Id of the running transition - null once the last card has settled
  const [transitionId, setTransitionId] = useState<number | null>(null);
  const previousMode = useRef(mode);

  const transitionDurationMs = getTotalTransitionMs(
    items.length,
    config.layout.staggerMs,
    config.animation,
  );

  useEffect(() => {
    if (previousMode.current === mode) return;
    previousMode.current = mode;
    console.debug('Card stack mode changed', {
      mode,
      itemCount: items.length,
    });
  }, [mode, items.length]);

  // Every toggle restarts the settle timer; the cleanup drops the previous one.
  useEffect(() => {
    if (transitionId === null) return;

    const timeoutId = setTimeout(() => {
      setTransitionId(null);
    }, transitionDurationMs);

    return () => clearTimeout(timeoutId);
  }, [transitionId, transitionDurationMs]);

  const toggleMode = useCallback(() => {
    setMode((current) => (current === 'stacked' ? 'unstacked' : 'stacked'));
    setTransitionId((id) => (id ?? 0) + 1);
  }, []);

  const reportHeight = useCallback((itemId: string, height: number) => {
    setHeightTable((table) => mergeHeight(table, itemId, height));
  }, []);

  const layout = useMemo(
    () => computeLayout(items, heightTable, mode, config.layout),
    [items, heightTable, mode, config.layout],
  );

  return {
    mode,
    heightTable,
    layout,
    isTransitioning: transitionId !== null,
    transitionDurationMs,
    toggleMode,
    reportHeight,
  };
}
