/**
 * rotary-scrollbar - Round Scrollbar
 * Circular scrollbar for round screens, driven by touch scrolling.
 *
 * Wires:
 * - Position tracking: thumb geometry follows scroll and metrics changes
 * - Visibility: scrolling reveals the scrollbar, inactivity hides it
 * - Style: colors are resolved against the theme whenever it changes
 * - Painting: frames reach the surface only when something changed
 */

import type {
  ArcFrame,
  ArcSegment,
  PositionSource,
  ScrollbarTheme,
} from "../types";
import { DEFAULT_PADDING, DEFAULT_STROKE_WIDTH } from "../constants";
import { easeInOut } from "../animation/easing";
import { getDefaultFrameScheduler } from "../animation/frames";
import { mapThumbForMetrics, mapTrack } from "../geometry/arc";
import { createPositionTracker } from "../position/create";
import type { PositionTracker } from "../position/tracker";
import {
  createVisibilityController,
  type VisibilityPhase,
} from "../visibility/controller";
import { shouldRepaint } from "../render/paint";
import {
  DEFAULT_THEME,
  resolveScrollbarStyle,
  type ScrollbarColors,
} from "../render/style";
import { createSvgArcSurface } from "../render/svg";
import { validateScrollbarConfig, type RoundScrollbarConfig } from "./config";

// =============================================================================
// Types
// =============================================================================

/** Round scrollbar instance */
export interface RoundScrollbar {
  /** Painted track segment */
  getTrack: () => ArcSegment;

  /** Painted thumb segment */
  getThumb: () => ArcSegment;

  /** Current eased opacity */
  getOpacity: () => number;

  getPhase: () => VisibilityPhase;

  /** Whether any part of the scrollbar is showing */
  isVisible: () => boolean;

  /** The tracker observing the scrollable */
  getTracker: () => PositionTracker;

  /** Reveal the scrollbar as if the user scrolled */
  show: () => void;

  /** Start hiding now */
  hide: () => void;

  /** Replace the theme and recompute colors */
  setTheme: (theme: ScrollbarTheme) => void;

  /** Change color overrides and recompute colors */
  setColors: (colors: ScrollbarColors) => void;

  /** Release the scrollable, timers and the overlay */
  destroy: () => void;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a round scrollbar over `container`, observing `source`
 *
 * ```ts
 * const source = createElementScrollSource(list)
 * const scrollbar = createRoundScrollbar(screen, source, { autoHideDelay: 2000 })
 * ```
 */
export const createRoundScrollbar = (
  container: HTMLElement,
  source: PositionSource,
  config: RoundScrollbarConfig = {},
): RoundScrollbar => {
  validateScrollbarConfig(config);

  const {
    padding = DEFAULT_PADDING,
    strokeWidth = DEFAULT_STROKE_WIDTH,
    autoHide,
    autoHideDelay,
    opacityAnimationDuration,
    opacityAnimationCurve = easeInOut,
    classPrefix,
    frames = getDefaultFrameScheduler(),
  } = config;

  // State
  let colors: ScrollbarColors = {
    trackColor: config.trackColor,
    thumbColor: config.thumbColor,
  };
  let theme = config.theme ?? DEFAULT_THEME;
  let style = resolveScrollbarStyle(colors, theme);
  let lastFrame: ArcFrame | null = null;
  let destroyed = false;

  const ownsSurface = config.surface === undefined;
  const surface =
    config.surface ?? createSvgArcSurface(container, { classPrefix });
  const tracker = createPositionTracker(source);
  let thumb = mapThumbForMetrics(tracker.metrics());
  let viewportExtent = tracker.metrics()?.viewportExtent ?? 0;

  // ===========================================================================
  // Painting
  // ===========================================================================

  const paintedTrack = (): ArcSegment => ({
    ...mapTrack(),
    colorAlphaScale: style.trackColor.a,
  });

  const paintedThumb = (): ArcSegment => ({
    ...thumb,
    colorAlphaScale: style.thumbColor.a,
  });

  const buildFrame = (opacity: number): ArcFrame => ({
    track: { segment: paintedTrack(), color: style.trackColor },
    thumb: { segment: paintedThumb(), color: style.thumbColor },
    opacity,
    strokeWidth,
    padding,
  });

  const repaint = (): void => {
    if (destroyed) return;
    const frame = buildFrame(visibility.getOpacity());
    if (!shouldRepaint(lastFrame, frame)) return;
    surface.paint(frame);
    lastFrame = frame;
  };

  const visibility = createVisibilityController({
    autoHide,
    autoHideDelay,
    duration: opacityAnimationDuration,
    curve: opacityAnimationCurve,
    frames,
    scrollable: tracker.isScrollable(),
    onOpacity: repaint,
  });

  // ===========================================================================
  // Tracking
  // ===========================================================================

  const updateThumb = (): void => {
    thumb = mapThumbForMetrics(tracker.metrics());
  };

  const handleScroll = (): void => {
    updateThumb();
    visibility.notifyActivity();
    repaint();
  };

  const handleMetrics = (): void => {
    updateThumb();

    const wasScrollable = visibility.isScrollable();
    const scrollable = tracker.isScrollable();
    const nextViewport = tracker.metrics()?.viewportExtent ?? 0;
    const viewportChanged = nextViewport !== viewportExtent;
    viewportExtent = nextViewport;

    visibility.setScrollable(scrollable);
    if (scrollable && (!wasScrollable || viewportChanged)) {
      visibility.notifyActivity();
    }
    repaint();
  };

  const subscriptions = [
    tracker.on("scroll", handleScroll),
    tracker.on("metrics", handleMetrics),
  ];

  // ===========================================================================
  // Style
  // ===========================================================================

  const recomputeStyle = (): void => {
    style = resolveScrollbarStyle(colors, theme);
    repaint();
  };

  const setTheme = (next: ScrollbarTheme): void => {
    theme = next;
    recomputeStyle();
  };

  const setColors = (next: ScrollbarColors): void => {
    colors = { ...colors, ...next };
    recomputeStyle();
  };

  // ===========================================================================
  // Cleanup
  // ===========================================================================

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;

    subscriptions.forEach((unsubscribe) => unsubscribe());
    visibility.destroy();
    tracker.destroy();
    if (ownsSurface) {
      surface.destroy();
    }
  };

  // ===========================================================================
  // Initialize
  // ===========================================================================

  // First frame is painted hidden; scrollable content is then revealed once,
  // as after the first layout
  repaint();
  visibility.notifyActivity();

  return {
    getTrack: paintedTrack,
    getThumb: paintedThumb,
    getOpacity: visibility.getOpacity,
    getPhase: visibility.getPhase,
    isVisible: () => visibility.getOpacity() > 0,
    getTracker: () => tracker,
    show: () => {
      visibility.notifyActivity();
    },
    hide: visibility.hide,
    setTheme,
    setColors,
    destroy,
  };
};
