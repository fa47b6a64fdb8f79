/**
 * rotary-scrollbar - Visibility Controller
 * Show/hide state machine for the round scrollbar.
 *
 * States:
 * - hidden        opacity 0
 * - appearing     animating 0 → 1
 * - visible       opacity 1, hide timer armed (when auto-hide is on)
 * - disappearing  animating 1 → 0
 *
 * Activity reveals the scrollbar and re-arms the hide timer. Every timer
 * carries a generation number; a timer that fires after a newer activity
 * cancelled it does nothing.
 */

import type { Curve, FrameScheduler } from "../types";
import {
  DEFAULT_AUTO_HIDE,
  DEFAULT_AUTO_HIDE_DELAY,
  DEFAULT_OPACITY_ANIMATION_DURATION,
} from "../constants";
import { easeInOut } from "../animation/easing";
import { assertCurve, assertNonNegative } from "../validate";
import { getDefaultFrameScheduler } from "../animation/frames";
import {
  createValueAnimator,
  type AnimationStatus,
} from "../animation/animator";

// =============================================================================
// Types
// =============================================================================

export type VisibilityPhase =
  | "hidden"
  | "appearing"
  | "visible"
  | "disappearing";

/** Visibility controller configuration */
export interface VisibilityControllerConfig {
  /** Hide automatically after inactivity (default: true) */
  autoHide?: boolean;

  /** Inactivity window before hiding, in milliseconds (default: 3000) */
  autoHideDelay?: number;

  /** Show/hide animation duration in milliseconds (default: 250) */
  duration?: number;

  /** Curve applied to the animation progress (default: easeInOut) */
  curve?: Curve;

  /** Frame source (default: requestAnimationFrame when available) */
  frames?: FrameScheduler;

  /** Whether the content starts out scrollable (default: false) */
  scrollable?: boolean;

  /** Called with the eased opacity whenever it changes */
  onOpacity?: (opacity: number) => void;
}

/** Visibility controller instance */
export interface VisibilityController {
  /**
   * Report activity: reveal and re-arm the hide timer.
   * Returns false when suppressed because the content is not scrollable.
   */
  notifyActivity: () => boolean;

  /** Start hiding now, cancelling the hide timer */
  hide: () => void;

  /** Update scrollability; losing it hides the scrollbar */
  setScrollable: (scrollable: boolean) => void;

  isScrollable: () => boolean;

  getPhase: () => VisibilityPhase;

  /** Eased opacity in [0, 1] */
  getOpacity: () => number;

  /** Linear animation progress in [0, 1] */
  getProgress: () => number;

  /** Whether a hide timer is pending */
  isHideScheduled: () => boolean;

  /** Cancel timers and frames */
  destroy: () => void;
}

const PHASE_BY_STATUS: Record<AnimationStatus, VisibilityPhase> = {
  dismissed: "hidden",
  forward: "appearing",
  completed: "visible",
  reverse: "disappearing",
};

// =============================================================================
// Factory
// =============================================================================

export const createVisibilityController = (
  config: VisibilityControllerConfig = {},
): VisibilityController => {
  assertNonNegative("autoHideDelay", config.autoHideDelay);
  assertNonNegative("duration", config.duration);
  assertCurve("curve", config.curve);

  const {
    autoHide = DEFAULT_AUTO_HIDE,
    autoHideDelay = DEFAULT_AUTO_HIDE_DELAY,
    duration = DEFAULT_OPACITY_ANIMATION_DURATION,
    curve = easeInOut,
    frames = getDefaultFrameScheduler(),
    onOpacity,
  } = config;

  let scrollable = config.scrollable ?? false;
  let destroyed = false;
  let hideTimer: ReturnType<typeof setTimeout> | null = null;
  let hideGeneration = 0;

  const animator = createValueAnimator({
    duration,
    frames,
    onUpdate: (value) => onOpacity?.(curve(value)),
  });

  // ===========================================================================
  // Hide timer
  // ===========================================================================

  const cancelHideTimer = (): void => {
    hideGeneration++;
    if (hideTimer !== null) {
      clearTimeout(hideTimer);
      hideTimer = null;
    }
  };

  const scheduleHide = (): void => {
    cancelHideTimer();
    if (!autoHide) return;

    const generation = hideGeneration;
    hideTimer = setTimeout(() => {
      if (generation !== hideGeneration) return;
      hideTimer = null;
      animator.reverse();
    }, autoHideDelay);
  };

  // ===========================================================================
  // Transitions
  // ===========================================================================

  const notifyActivity = (): boolean => {
    if (destroyed || !scrollable) return false;

    animator.forward();
    scheduleHide();
    return true;
  };

  const hide = (): void => {
    if (destroyed) return;
    cancelHideTimer();
    animator.reverse();
  };

  const setScrollable = (next: boolean): void => {
    if (next === scrollable) return;
    scrollable = next;
    if (!scrollable) {
      hide();
    }
  };

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;
    cancelHideTimer();
    animator.destroy();
  };

  return {
    notifyActivity,
    hide,
    setScrollable,
    isScrollable: () => scrollable,
    getPhase: () => PHASE_BY_STATUS[animator.getStatus()],
    getOpacity: () => curve(animator.getValue()),
    getProgress: () => animator.getValue(),
    isHideScheduled: () => hideTimer !== null,
    destroy,
  };
};
