/**
 * rotary-scrollbar - Value Animator
 * A 0..1 progress value driven forward or in reverse over a fixed duration.
 *
 * Changing direction mid-flight continues from the current value, so an
 * interrupted animation never jumps.
 */

import type { FrameScheduler } from "../types";

// =============================================================================
// Types
// =============================================================================

/** Where the animation is */
export type AnimationStatus = "dismissed" | "forward" | "completed" | "reverse";

/** Value animator configuration */
export interface ValueAnimatorConfig {
  /** Time to travel the full 0..1 range, in milliseconds */
  duration: number;

  /** Frame source */
  frames: FrameScheduler;

  /** Starting value (default: 0) */
  initialValue?: number;

  /** Called on every value change */
  onUpdate?: (value: number) => void;

  /** Called on every status change */
  onStatus?: (status: AnimationStatus) => void;
}

/** Value animator instance */
export interface ValueAnimator {
  /** Current linear progress in [0, 1] */
  getValue: () => number;

  getStatus: () => AnimationStatus;

  /** True while moving in either direction */
  isAnimating: () => boolean;

  /** Animate toward 1. No-op if already moving forward or completed. */
  forward: () => void;

  /** Animate toward 0. No-op if already reversing or dismissed. */
  reverse: () => void;

  /** Cancel any pending frame */
  destroy: () => void;
}

// =============================================================================
// Factory
// =============================================================================

export const createValueAnimator = (
  config: ValueAnimatorConfig,
): ValueAnimator => {
  const { duration, frames, initialValue = 0, onUpdate, onStatus } = config;

  let value = Math.min(1, Math.max(0, initialValue));
  let status: AnimationStatus = value >= 1 ? "completed" : "dismissed";
  let direction: 1 | -1 = 1;
  let startValue = value;
  let startTime = 0;
  let frameId: number | null = null;

  const setStatus = (next: AnimationStatus): void => {
    if (next === status) return;
    status = next;
    onStatus?.(status);
  };

  const setValue = (next: number): void => {
    if (next === value) return;
    value = next;
    onUpdate?.(value);
  };

  const isAnimating = (): boolean =>
    status === "forward" || status === "reverse";

  const settle = (): void => {
    setStatus(direction > 0 ? "completed" : "dismissed");
  };

  const tick = (now: number): void => {
    frameId = null;

    const delta = Math.max(0, now - startTime) / duration;
    const next =
      direction > 0
        ? Math.min(1, startValue + delta)
        : Math.max(0, startValue - delta);
    setValue(next);

    if (next === (direction > 0 ? 1 : 0)) {
      settle();
    } else {
      frameId = frames.request(tick);
    }
  };

  const run = (nextDirection: 1 | -1): void => {
    const target = nextDirection > 0 ? 1 : 0;
    if (isAnimating() && direction === nextDirection) return;

    direction = nextDirection;

    if (value === target) {
      if (frameId !== null) {
        frames.cancel(frameId);
        frameId = null;
      }
      settle();
      return;
    }

    startValue = value;
    startTime = frames.now();
    setStatus(nextDirection > 0 ? "forward" : "reverse");

    if (duration <= 0) {
      if (frameId !== null) {
        frames.cancel(frameId);
        frameId = null;
      }
      setValue(target);
      settle();
      return;
    }

    if (frameId === null) {
      frameId = frames.request(tick);
    }
  };

  const destroy = (): void => {
    if (frameId !== null) {
      frames.cancel(frameId);
      frameId = null;
    }
  };

  return {
    getValue: () => value,
    getStatus: () => status,
    isAnimating,
    forward: () => run(1),
    reverse: () => run(-1),
    destroy,
  };
};
