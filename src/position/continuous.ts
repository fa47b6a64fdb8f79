/**
 * rotary-scrollbar - Continuous Position Tracker
 * Tracks a scroll offset in pixels.
 */

import type { OffsetSource } from "../types";
import { createTracker, type PositionTracker } from "./tracker";

export const createContinuousTracker = (
  source: OffsetSource,
): PositionTracker => {
  const maxExtent = (): number =>
    Math.max(0, source.getMetrics()?.maxExtent ?? 0);

  return createTracker({
    model: "continuous",
    readMetrics: () => source.getMetrics(),
    currentPosition: () => source.getMetrics()?.offset ?? 0,
    clamp: (target) => Math.min(maxExtent(), Math.max(0, target)),
    moveTo: (target, animation) => source.animateTo(target, animation),
    subscribe: (listener) => source.subscribe(listener),
  });
};
