/**
 * rotary-scrollbar - Scrollbar Configuration
 * Config interfaces and construction-time validation.
 */

import type {
  Curve,
  FrameScheduler,
  HapticActuator,
  RenderSurface,
  RotaryEventSource,
  ScrollbarTheme,
} from "../types";
import type { ScrollbarColors } from "../render/style";
import { assertCurve, assertNonNegative, assertPositive } from "../validate";

// =============================================================================
// Types
// =============================================================================

/** Round scrollbar configuration */
export interface RoundScrollbarConfig extends ScrollbarColors {
  /** Padding between the container edge and the track in px (default: 8) */
  padding?: number;

  /** Track and thumb stroke width in px (default: 8) */
  strokeWidth?: number;

  /** Hide automatically when inactive (default: true) */
  autoHide?: boolean;

  /** How long the scrollbar stays visible after activity, in ms (default: 3000) */
  autoHideDelay?: number;

  /** Show/hide animation duration in ms (default: 250) */
  opacityAnimationDuration?: number;

  /** Show/hide animation curve (default: easeInOut) */
  opacityAnimationCurve?: Curve;

  /** Theme colors used when no override is given */
  theme?: ScrollbarTheme;

  /** CSS class prefix of the SVG overlay (default: 'round-scrollbar') */
  classPrefix?: string;

  /** Frame source (default: requestAnimationFrame when available) */
  frames?: FrameScheduler;

  /** Surface to paint on (default: an SVG overlay inside the container) */
  surface?: RenderSurface;
}

/** Rotary scrollbar configuration */
export interface RotaryScrollbarConfig extends RoundScrollbarConfig {
  /**
   * Rotary tick source. Left out: the browser's `rotarydetent` events.
   * null: no rotary input, touch scrolling only.
   */
  rotarySource?: RotaryEventSource | null;

  /**
   * Vibration motor. Left out: the Vibration API when available.
   * null: no haptics.
   */
  haptics?: HapticActuator | null;

  /** Vibrate on each rotary tick (default: true) */
  hapticFeedback?: boolean;

  /** Page transition duration in ms (default: 250) */
  pageTransitionDuration?: number;

  /** Page transition curve (default: easeInOutCirc) */
  pageTransitionCurve?: Curve;

  /** Continuous rotary scroll duration in ms (default: 100) */
  scrollAnimationDuration?: number;

  /** Continuous rotary scroll curve (default: linear) */
  scrollAnimationCurve?: Curve;

  /** Pixels scrolled per tick; higher means bigger jumps (default: 50) */
  scrollMagnitude?: number;

  /** Trace rotary ticks to the console (default: false) */
  debug?: boolean;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Reject invalid configuration before anything is created
 */
export const validateScrollbarConfig = (
  config: RotaryScrollbarConfig,
): void => {
  assertNonNegative("padding", config.padding);
  assertNonNegative("strokeWidth", config.strokeWidth);
  assertNonNegative("autoHideDelay", config.autoHideDelay);
  assertNonNegative("opacityAnimationDuration", config.opacityAnimationDuration);
  assertNonNegative("pageTransitionDuration", config.pageTransitionDuration);
  assertNonNegative("scrollAnimationDuration", config.scrollAnimationDuration);
  assertPositive("scrollMagnitude", config.scrollMagnitude);
  assertCurve("opacityAnimationCurve", config.opacityAnimationCurve);
  assertCurve("pageTransitionCurve", config.pageTransitionCurve);
  assertCurve("scrollAnimationCurve", config.scrollAnimationCurve);
};
