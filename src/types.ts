/**
 * rotary-scrollbar - Core Types
 * Shared interfaces between geometry, position, rotary and rendering
 */

// =============================================================================
// Events
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Animation
// =============================================================================

/** Easing curve: maps linear progress in [0, 1] to eased progress */
export type Curve = (t: number) => number;

/** How an animated move should run */
export interface MoveAnimation {
  /** Duration in milliseconds */
  duration: number;
  curve: Curve;
}

/** Source of animation frames and of the clock they are stamped with */
export interface FrameScheduler {
  /** Current time in milliseconds, on the same clock passed to callbacks */
  now: () => number;

  /** Schedule a callback for the next frame */
  request: (callback: (now: number) => void) => number;

  /** Cancel a scheduled frame */
  cancel: (id: number) => void;
}

// =============================================================================
// Position Models
// =============================================================================

/**
 * Continuous scroll position.
 * `maxExtent` is the largest valid offset (content size minus viewport size).
 */
export interface ScrollMetrics {
  offset: number;
  viewportExtent: number;
  maxExtent: number;
}

/**
 * Discrete page position.
 * `currentPage` may be fractional while a page transition is in flight.
 */
export interface PageMetrics {
  currentPage: number;
  pageCount: number;
}

/** A scrollable addressed by a continuous offset */
export interface OffsetSource {
  readonly kind: "offset";

  /** Current metrics, or null while the scrollable has no viewport yet */
  getMetrics: () => ScrollMetrics | null;

  /** Animate to an offset; resolves when the animation ends or is interrupted */
  animateTo: (offset: number, animation: MoveAnimation) => Promise<void>;

  /** Observe position and metrics changes */
  subscribe: (listener: () => void) => Unsubscribe;
}

/** A scrollable addressed by page index */
export interface PageSource {
  readonly kind: "page";

  /** Current page metrics, or null while the scrollable has no viewport yet */
  getPage: () => PageMetrics | null;

  /** Animate to a page; resolves when the animation ends or is interrupted */
  animateToPage: (page: number, animation: MoveAnimation) => Promise<void>;

  /** Observe position and metrics changes */
  subscribe: (listener: () => void) => Unsubscribe;
}

/** Any supported scrollable */
export type PositionSource = OffsetSource | PageSource;

// =============================================================================
// Rotary Input & Haptics
// =============================================================================

/** Rotation direction of one rotary tick */
export type RotaryDirection = "clockwise" | "counterClockwise";

/** One discrete rotary input event */
export interface RotaryEvent {
  direction: RotaryDirection;
}

/** Asynchronous sequence of rotary ticks */
export type RotaryEventSource = AsyncIterable<RotaryEvent>;

/** Vibration motor */
export interface HapticActuator {
  /** Fire-and-forget vibration; amplitude is 1-255 where supported */
  vibrate: (durationMs: number, amplitude: number) => void;
}

// =============================================================================
// Geometry & Rendering
// =============================================================================

/** One arc of the scrollbar, angles in radians */
export interface ArcSegment {
  startAngle: number;
  length: number;

  /** Multiplier applied to the animated opacity when painting (0-1) */
  colorAlphaScale: number;
}

/** RGBA color, channels 0-255 and alpha 0-1 */
export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** An arc segment together with the color it is painted with */
export interface ArcPaint {
  segment: ArcSegment;
  color: RgbaColor | null;
}

/** Everything a surface needs to paint one frame */
export interface ArcFrame {
  track: ArcPaint;
  thumb: ArcPaint;
  opacity: number;
  strokeWidth: number;
  padding: number;
}

/** Paints arc frames */
export interface RenderSurface {
  paint: (frame: ArcFrame) => void;
  destroy: () => void;
}

/** Theme colors the scrollbar falls back to */
export interface ScrollbarTheme {
  trackColor?: RgbaColor;
  thumbColor?: RgbaColor;
  highlightColor: RgbaColor;
}
