/**
 * rotary-scrollbar - Easing Curves
 * Cubic Bézier curves matching the usual material motion presets.
 */

import type { Curve } from "../types";

// =============================================================================
// Cubic Bézier
// =============================================================================

const NEWTON_ITERATIONS = 8;
const BISECTION_ITERATIONS = 40;
const SOLVE_PRECISION = 1e-7;
const MIN_SLOPE = 1e-6;

/**
 * Build a curve from the control points of a cubic Bézier running from
 * (0, 0) to (1, 1), the same shape CSS `cubic-bezier()` describes.
 */
export const cubicBezier = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
): Curve => {
  // Polynomial coefficients, pre-multiplied for Horner evaluation
  const cx = 3 * x1;
  const bx = 3 * (x2 - x1) - cx;
  const ax = 1 - cx - bx;
  const cy = 3 * y1;
  const by = 3 * (y2 - y1) - cy;
  const ay = 1 - cy - by;

  const sampleX = (t: number): number => ((ax * t + bx) * t + cx) * t;
  const sampleY = (t: number): number => ((ay * t + by) * t + cy) * t;
  const sampleSlopeX = (t: number): number => (3 * ax * t + 2 * bx) * t + cx;

  /** Find the curve parameter whose x equals `x` */
  const solveX = (x: number): number => {
    let t = x;
    for (let i = 0; i < NEWTON_ITERATIONS; i++) {
      const error = sampleX(t) - x;
      if (Math.abs(error) < SOLVE_PRECISION) return t;
      const slope = sampleSlopeX(t);
      if (Math.abs(slope) < MIN_SLOPE) break;
      t -= error / slope;
    }

    // Newton did not converge - fall back to bisection
    let lo = 0;
    let hi = 1;
    t = x;
    for (let i = 0; i < BISECTION_ITERATIONS; i++) {
      const value = sampleX(t);
      if (Math.abs(value - x) < SOLVE_PRECISION) return t;
      if (x > value) lo = t;
      else hi = t;
      t = (lo + hi) / 2;
    }
    return t;
  };

  return (t: number): number => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return sampleY(solveX(t));
  };
};

// =============================================================================
// Presets
// =============================================================================

export const linear: Curve = (t) => Math.min(1, Math.max(0, t));

export const ease = cubicBezier(0.25, 0.1, 0.25, 1.0);

export const easeIn = cubicBezier(0.42, 0.0, 1.0, 1.0);

export const easeOut = cubicBezier(0.0, 0.0, 0.58, 1.0);

/** Default curve of the show/hide opacity animation */
export const easeInOut = cubicBezier(0.42, 0.0, 0.58, 1.0);

/** Default curve of rotary page transitions */
export const easeInOutCirc = cubicBezier(0.785, 0.135, 0.15, 0.86);

export const fastOutSlowIn = cubicBezier(0.4, 0.0, 0.2, 1.0);

export const decelerate: Curve = (t) => {
  const clamped = Math.min(1, Math.max(0, t));
  return 1 - (1 - clamped) * (1 - clamped);
};
