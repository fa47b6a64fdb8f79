/**
 * rotary-scrollbar - Easing Tests
 */

import { describe, it, expect } from "vitest";
import {
  cubicBezier,
  linear,
  easeInOut,
  easeInOutCirc,
  decelerate,
} from "../../src/animation";

describe("cubicBezier", () => {
  it("should pin both ends of the curve", () => {
    const curve = cubicBezier(0.42, 0, 0.58, 1);
    expect(curve(0)).toBe(0);
    expect(curve(1)).toBe(1);
    expect(curve(-0.5)).toBe(0);
    expect(curve(1.5)).toBe(1);
  });

  it("should reduce to a straight line for linear control points", () => {
    const curve = cubicBezier(0.25, 0.25, 0.75, 0.75);
    expect(curve(0.3)).toBeCloseTo(0.3, 5);
    expect(curve(0.8)).toBeCloseTo(0.8, 5);
  });

  it("should be symmetric for symmetric control points", () => {
    expect(easeInOut(0.5)).toBeCloseTo(0.5, 5);
    expect(easeInOut(0.25) + easeInOut(0.75)).toBeCloseTo(1, 5);
  });

  it("should be monotonic", () => {
    let previous = 0;
    for (let i = 1; i <= 20; i++) {
      const value = easeInOutCirc(i / 20);
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
  });

  it("should start slowly for an ease-in-out curve", () => {
    expect(easeInOut(0.1)).toBeLessThan(0.1);
    expect(easeInOut(0.9)).toBeGreaterThan(0.9);
  });
});

describe("presets", () => {
  it("should clamp linear", () => {
    expect(linear(0.4)).toBe(0.4);
    expect(linear(-1)).toBe(0);
    expect(linear(2)).toBe(1);
  });

  it("should decelerate quadratically", () => {
    expect(decelerate(0.5)).toBe(0.75);
    expect(decelerate(1)).toBe(1);
  });
});
