/**
 * rotary-scrollbar - Arc Geometry
 * Maps a linear scroll position onto the round track.
 *
 * The track is a fixed 60° arc starting at 2 o'clock. The thumb shares the
 * track's rotation origin: its length is the visible fraction of the track
 * and it advances by one thumb length per viewport scrolled.
 */

import type { ArcSegment, ScrollMetrics } from "../types";
import { TRACK_LENGTH, TRACK_START_ANGLE } from "../constants";

// =============================================================================
// Ratios
// =============================================================================

/**
 * Thumb-to-track ratio: `1 / (maxExtent / viewportExtent + 1)`.
 * Returns 1 when the content fits the viewport and 0 for a degenerate viewport.
 */
export const computeFractionVisible = (metrics: ScrollMetrics): number => {
  const { viewportExtent, maxExtent } = metrics;
  if (!(viewportExtent > 0) || !Number.isFinite(viewportExtent)) return 0;
  if (!(maxExtent > 0)) return 1;
  if (!Number.isFinite(maxExtent)) return 0;
  return 1 / (maxExtent / viewportExtent + 1);
};

/**
 * Number of viewports scrolled: `offset / viewportExtent`.
 * This is the thumb's index along the track, not `offset / maxExtent`.
 */
export const computeScrollFraction = (metrics: ScrollMetrics): number => {
  const { offset, viewportExtent } = metrics;
  if (!(viewportExtent > 0) || !Number.isFinite(offset)) return 0;
  return offset / viewportExtent;
};

/**
 * Whether the metrics describe content that can be scrolled
 */
export const isScrollable = (metrics: ScrollMetrics | null): boolean =>
  metrics !== null &&
  metrics.viewportExtent > 0 &&
  Number.isFinite(metrics.viewportExtent) &&
  metrics.maxExtent > 0;

// =============================================================================
// Segments
// =============================================================================

/** The fixed track geometry */
export const mapTrack = (): ArcSegment => ({
  startAngle: TRACK_START_ANGLE,
  length: TRACK_LENGTH,
  colorAlphaScale: 1,
});

/**
 * Thumb geometry for a visible fraction and a scroll index.
 * The index is clamped so an overscrolled list never pushes the thumb off
 * the track.
 */
export const mapThumb = (
  fractionVisible: number,
  scrollFraction: number,
): ArcSegment => {
  if (!(fractionVisible > 0) || !Number.isFinite(scrollFraction)) {
    return {
      startAngle: TRACK_START_ANGLE,
      length: 0,
      colorAlphaScale: 1,
    };
  }

  const fraction = Math.min(1, fractionVisible);
  const maxIndex = 1 / fraction - 1;
  const index = Math.min(maxIndex, Math.max(0, scrollFraction));
  const length = TRACK_LENGTH * fraction;

  return {
    startAngle: length * index + TRACK_START_ANGLE,
    length,
    colorAlphaScale: 1,
  };
};

/**
 * Thumb geometry straight from scroll metrics. A missing or zero-sized
 * viewport yields a zero-length thumb.
 */
export const mapThumbForMetrics = (
  metrics: ScrollMetrics | null,
): ArcSegment => {
  if (metrics === null) return mapThumb(0, 0);
  return mapThumb(
    computeFractionVisible(metrics),
    computeScrollFraction(metrics),
  );
};

/** Compare two segments for a repaint */
export const segmentsEqual = (a: ArcSegment, b: ArcSegment): boolean =>
  a.startAngle === b.startAngle &&
  a.length === b.length &&
  a.colorAlphaScale === b.colorAlphaScale;
