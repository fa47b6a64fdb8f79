/**
 * rotary-scrollbar - Constants
 * All default values and magic numbers in one place
 */

// =============================================================================
// Arc Geometry
// =============================================================================

/** Track start angle in radians: the 2 o'clock marker on an analog clock */
export const TRACK_START_ANGLE = Math.PI * (-1 / 2 + 1 / 3);

/** Track length in radians (60°), finishing at the 4 o'clock marker */
export const TRACK_LENGTH = Math.PI / 3;

// =============================================================================
// Layout
// =============================================================================

/** Default CSS class prefix */
export const DEFAULT_CLASS_PREFIX = "round-scrollbar";

/** Padding between the screen edge and the track, in pixels */
export const DEFAULT_PADDING = 8;

/** Stroke width of the track and thumb, in pixels */
export const DEFAULT_STROKE_WIDTH = 8;

// =============================================================================
// Visibility
// =============================================================================

/** Default auto-hide behavior */
export const DEFAULT_AUTO_HIDE = true;

/** How long the scrollbar stays visible after the last activity (ms) */
export const DEFAULT_AUTO_HIDE_DELAY = 3000;

/** Duration of the show/hide opacity animation (ms) */
export const DEFAULT_OPACITY_ANIMATION_DURATION = 250;

// =============================================================================
// Rotary Input
// =============================================================================

/** Default haptic feedback behavior */
export const DEFAULT_HAPTIC_FEEDBACK = true;

/** Duration of a page transition triggered by a rotary tick (ms) */
export const DEFAULT_PAGE_TRANSITION_DURATION = 250;

/** Duration of a scroll animation triggered by a rotary tick (ms) */
export const DEFAULT_SCROLL_ANIMATION_DURATION = 100;

/**
 * Distance scrolled per rotary tick in continuous mode (px).
 * A higher value means bigger jumps between rotary scrolls.
 */
export const DEFAULT_SCROLL_MAGNITUDE = 50;

/** Vibration length of a rotary haptic pulse (ms) */
export const VIBRATION_DURATION = 25;

/** Vibration amplitude of a rotary haptic pulse (1-255) */
export const VIBRATION_AMPLITUDE = 64;

/**
 * Edge bump cooldown (ms).
 * Prevents the boundary bump from firing more than once per second.
 */
export const EDGE_COOLDOWN = 1000;

/**
 * Remaining extent (in position units) under which the position counts as
 * sitting on an edge. Browsers report fractional scroll offsets at the end
 * of an element, so half a pixel is allowed.
 */
export const EDGE_TOLERANCE = 0.5;

/** Accumulated wheel delta (px) that makes one rotary tick */
export const DEFAULT_WHEEL_TICK_THRESHOLD = 40;

// =============================================================================
// Frames
// =============================================================================

/** Frame interval of the timeout-based frame scheduler (ms) */
export const TIMEOUT_FRAME_INTERVAL = 16;

// =============================================================================
// Theme
// =============================================================================

/** Fallback highlight color, used when neither overrides nor theme colors exist */
export const DEFAULT_HIGHLIGHT_COLOR = { r: 188, g: 188, b: 188, a: 0.4 };
