/**
 * rotary-scrollbar - Painting Helpers
 */

import type { ArcFrame, ArcPaint } from "../types";
import { segmentsEqual } from "../geometry/arc";
import { colorsEqual } from "./style";

// =============================================================================
// Repaint Check
// =============================================================================

const paintsEqual = (a: ArcPaint, b: ArcPaint): boolean =>
  segmentsEqual(a.segment, b.segment) && colorsEqual(a.color, b.color);

/**
 * Whether `next` differs from the previously painted frame
 */
export const shouldRepaint = (
  previous: ArcFrame | null,
  next: ArcFrame,
): boolean =>
  previous === null ||
  previous.opacity !== next.opacity ||
  previous.strokeWidth !== next.strokeWidth ||
  previous.padding !== next.padding ||
  !paintsEqual(previous.track, next.track) ||
  !paintsEqual(previous.thumb, next.thumb);

// =============================================================================
// Arc Paths
// =============================================================================

/** Painting box */
export interface ArcBox {
  width: number;
  height: number;
}

const round = (value: number): number => {
  const rounded = Number(value.toFixed(3));
  return rounded === 0 ? 0 : rounded;
};

/**
 * SVG path of an arc on the ellipse inscribed in `box`, inset by
 * `padding + strokeWidth / 2` so the stroke stays inside the box.
 * Angles are in radians, clockwise from 3 o'clock. Empty for a zero-length
 * arc or a box too small to hold the ellipse.
 */
export const describeArcPath = (
  box: ArcBox,
  padding: number,
  strokeWidth: number,
  startAngle: number,
  length: number,
): string => {
  const rx = (box.width - padding * 2 - strokeWidth) / 2;
  const ry = (box.height - padding * 2 - strokeWidth) / 2;
  if (!(rx > 0) || !(ry > 0) || length === 0 || !Number.isFinite(length)) {
    return "";
  }

  const cx = box.width / 2;
  const cy = box.height / 2;
  const endAngle = startAngle + length;

  const x0 = round(cx + rx * Math.cos(startAngle));
  const y0 = round(cy + ry * Math.sin(startAngle));
  const x1 = round(cx + rx * Math.cos(endAngle));
  const y1 = round(cy + ry * Math.sin(endAngle));
  const largeArc = Math.abs(length) > Math.PI ? 1 : 0;
  const sweep = length > 0 ? 1 : 0;

  return `M ${x0} ${y0} A ${round(rx)} ${round(ry)} 0 ${largeArc} ${sweep} ${x1} ${y1}`;
};
