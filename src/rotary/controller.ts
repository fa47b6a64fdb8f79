/**
 * rotary-scrollbar - Rotary Input Controller
 * Turns rotary ticks into animated moves with haptic confirmation.
 *
 * Per tick:
 * 1. Direction → +1 (clockwise) / -1 (counter-clockwise)
 * 2. Edge check. At an edge the first tick arms a one second cooldown and
 *    still produces a bump; further edge ticks inside the cooldown are dropped.
 *    The estimate reaching the limit also counts as the edge, so a burst
 *    of ticks hits the cooldown before the scrollable has caught up
 * 3. next = clamp(estimate ± magnitude), magnitude being one page (paged) or
 *    the configured scroll magnitude (continuous)
 * 4. Start the move under a new epoch. Only the completion of the latest
 *    epoch clears the animating flag
 * 5. The estimate jumps to `next` right away so bursts of ticks accumulate
 * 6. Haptic pulse
 *
 * While no rotary move is in flight, the estimate follows the tracker, so
 * a touch scroll between ticks is picked up.
 */

import type {
  Curve,
  HapticActuator,
  MoveAnimation,
  RotaryEvent,
  RotaryEventSource,
  Unsubscribe,
} from "../types";
import {
  DEFAULT_HAPTIC_FEEDBACK,
  DEFAULT_PAGE_TRANSITION_DURATION,
  DEFAULT_SCROLL_ANIMATION_DURATION,
  DEFAULT_SCROLL_MAGNITUDE,
  EDGE_COOLDOWN,
  EDGE_TOLERANCE,
  VIBRATION_AMPLITUDE,
  VIBRATION_DURATION,
} from "../constants";
import { easeInOutCirc, linear } from "../animation/easing";
import type { PositionTracker } from "../position/tracker";
import { assertCurve, assertNonNegative, assertPositive } from "../validate";
import { listenRotary } from "./source";

// =============================================================================
// Types
// =============================================================================

/** Rotary input controller configuration */
export interface RotaryInputControllerConfig {
  /** Tick source to subscribe to; ticks can also be fed with `handleTick` */
  rotarySource?: RotaryEventSource | null;

  /** Vibration motor; null disables pulses */
  haptics?: HapticActuator | null;

  /** Vibrate on each accepted tick (default: true) */
  hapticFeedback?: boolean;

  /** Pixels per tick in continuous mode (default: 50) */
  scrollMagnitude?: number;

  /** Continuous move duration in ms (default: 100) */
  scrollAnimationDuration?: number;

  /** Continuous move curve (default: linear) */
  scrollAnimationCurve?: Curve;

  /** Page transition duration in ms (default: 250) */
  pageTransitionDuration?: number;

  /** Page transition curve (default: easeInOutCirc) */
  pageTransitionCurve?: Curve;

  /** Called with the target of every accepted tick */
  onMove?: (target: number) => void;

  /** Trace ticks to the console (default: false) */
  debug?: boolean;
}

/** Rotary input controller instance */
export interface RotaryInputController {
  /** Process one tick. Returns false when the tick was dropped. */
  handleTick: (event: RotaryEvent) => boolean;

  /** Position the next tick starts from */
  getPositionEstimate: () => number;

  /** Number of moves issued so far */
  getEpoch: () => number;

  /** Whether a rotary move is in flight */
  isAnimating: () => boolean;

  /** Whether edge bumps are currently suppressed */
  isEdgeCooldownActive: () => boolean;

  /** Release the rotary source, tracker listeners and timers */
  destroy: () => void;
}

// =============================================================================
// Factory
// =============================================================================

export const createRotaryInputController = (
  tracker: PositionTracker,
  config: RotaryInputControllerConfig = {},
): RotaryInputController => {
  assertPositive("scrollMagnitude", config.scrollMagnitude);
  assertNonNegative("scrollAnimationDuration", config.scrollAnimationDuration);
  assertNonNegative("pageTransitionDuration", config.pageTransitionDuration);
  assertCurve("scrollAnimationCurve", config.scrollAnimationCurve);
  assertCurve("pageTransitionCurve", config.pageTransitionCurve);

  const {
    rotarySource = null,
    haptics = null,
    hapticFeedback = DEFAULT_HAPTIC_FEEDBACK,
    scrollMagnitude = DEFAULT_SCROLL_MAGNITUDE,
    scrollAnimationDuration = DEFAULT_SCROLL_ANIMATION_DURATION,
    scrollAnimationCurve = linear,
    pageTransitionDuration = DEFAULT_PAGE_TRANSITION_DURATION,
    pageTransitionCurve = easeInOutCirc,
    onMove,
    debug = false,
  } = config;

  const log = (...args: unknown[]): void => {
    if (debug) console.debug("[rotary-scrollbar/rotary]", ...args);
  };

  // Step size and animation are fixed by the position model
  const magnitude = tracker.model === "paged" ? 1 : scrollMagnitude;
  const animation: MoveAnimation =
    tracker.model === "paged"
      ? { duration: pageTransitionDuration, curve: pageTransitionCurve }
      : { duration: scrollAnimationDuration, curve: scrollAnimationCurve };

  // State
  let estimate = tracker.currentPosition();
  let epoch = 0;
  let animating = false;
  let edgeCooldownActive = false;
  let edgeGeneration = 0;
  let edgeTimer: ReturnType<typeof setTimeout> | null = null;
  let destroyed = false;

  // ===========================================================================
  // Passive tracking
  // ===========================================================================

  const resync = (): void => {
    if (animating || destroyed) return;
    estimate = tracker.currentPosition();
  };

  const trackerSubscriptions: Unsubscribe[] = [
    tracker.on("scroll", resync),
    tracker.on("metrics", resync),
  ];

  // ===========================================================================
  // Edge handling
  // ===========================================================================

  const isAtEdge = (sign: 1 | -1): boolean =>
    sign > 0
      ? tracker.extentAfter() <= EDGE_TOLERANCE ||
        estimate >= tracker.maxPosition()
      : tracker.extentBefore() <= EDGE_TOLERANCE || estimate <= 0;

  const armEdgeCooldown = (): void => {
    edgeCooldownActive = true;
    const generation = ++edgeGeneration;
    edgeTimer = setTimeout(() => {
      if (generation !== edgeGeneration) return;
      edgeTimer = null;
      edgeCooldownActive = false;
    }, EDGE_COOLDOWN);
  };

  // ===========================================================================
  // Moves
  // ===========================================================================

  const finishMove = (moveEpoch: number): void => {
    if (moveEpoch !== epoch) return;
    animating = false;
  };

  const startMove = (target: number): void => {
    epoch++;
    const moveEpoch = epoch;
    animating = true;

    void tracker.moveTo(target, animation).then(
      () => finishMove(moveEpoch),
      (error: unknown) => {
        console.error("[rotary-scrollbar] Rotary move failed:", error);
        finishMove(moveEpoch);
      },
    );
  };

  const handleTick = (event: RotaryEvent): boolean => {
    if (destroyed) return false;

    const sign = event.direction === "clockwise" ? 1 : -1;

    if (isAtEdge(sign)) {
      if (edgeCooldownActive) {
        log("edge tick dropped", event.direction);
        return false;
      }
      armEdgeCooldown();
      log("edge bump", event.direction);
    }

    const next = tracker.clamp(estimate + sign * magnitude);
    startMove(next);
    estimate = next;

    if (hapticFeedback && haptics) {
      haptics.vibrate(VIBRATION_DURATION, VIBRATION_AMPLITUDE);
    }

    log("move", { direction: event.direction, target: next, epoch });
    onMove?.(next);
    return true;
  };

  const unsubscribeRotary = rotarySource
    ? listenRotary(rotarySource, handleTick)
    : null;

  // ===========================================================================
  // Cleanup
  // ===========================================================================

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;

    unsubscribeRotary?.();
    trackerSubscriptions.forEach((unsubscribe) => unsubscribe());

    edgeGeneration++;
    if (edgeTimer !== null) {
      clearTimeout(edgeTimer);
      edgeTimer = null;
    }
  };

  return {
    handleTick,
    getPositionEstimate: () => estimate,
    getEpoch: () => epoch,
    isAnimating: () => animating,
    isEdgeCooldownActive: () => edgeCooldownActive,
    destroy,
  };
};
