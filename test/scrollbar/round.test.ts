/**
 * rotary-scrollbar - Round Scrollbar Tests
 * Tracking, visibility and painting wired together
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createRoundScrollbar } from "../../src/scrollbar";
import { createOffsetModel } from "../../src/position";
import { createTimeoutFrameScheduler } from "../../src/animation";
import { TRACK_LENGTH, TRACK_START_ANGLE } from "../../src/constants";
import type { ArcFrame, RenderSurface } from "../../src/types";

// =============================================================================
// Helpers
// =============================================================================

const createSurface = () => {
  const paint = vi.fn<(frame: ArcFrame) => void>();
  const destroy = vi.fn();
  const surface: RenderSurface = { paint, destroy };
  const lastFrame = (): ArcFrame | undefined => paint.mock.calls.at(-1)?.[0];
  return { surface, paint, destroy, lastFrame };
};

const setup = (maxExtent = 2000) => {
  const container = document.createElement("div");
  const model = createOffsetModel({ viewportExtent: 500, maxExtent });
  const painted = createSurface();
  const scrollbar = createRoundScrollbar(container, model, {
    autoHideDelay: 1000,
    opacityAnimationDuration: 100,
    frames: createTimeoutFrameScheduler(10),
    surface: painted.surface,
  });
  return { container, model, scrollbar, ...painted };
};

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

// =============================================================================
// Geometry
// =============================================================================

describe("geometry", () => {
  it("should paint the fixed track", () => {
    const { scrollbar } = setup();

    expect(scrollbar.getTrack()).toEqual({
      startAngle: TRACK_START_ANGLE,
      length: TRACK_LENGTH,
      colorAlphaScale: 0.4,
    });
  });

  it("should size the thumb from the metrics", () => {
    const { scrollbar } = setup();

    expect(scrollbar.getThumb()).toEqual({
      startAngle: TRACK_START_ANGLE,
      length: TRACK_LENGTH * 0.2,
      colorAlphaScale: 1,
    });
  });

  it("should move the thumb with the scroll offset", () => {
    const { model, scrollbar } = setup();

    model.jumpTo(1000);

    const length = TRACK_LENGTH * 0.2;
    expect(scrollbar.getThumb().startAngle).toBe(length * 2 + TRACK_START_ANGLE);
    expect(scrollbar.getTracker().currentPosition()).toBe(1000);
  });
});

// =============================================================================
// Visibility
// =============================================================================

describe("visibility", () => {
  it("should reveal scrollable content once after mount", () => {
    const { scrollbar } = setup();

    expect(scrollbar.getPhase()).toBe("appearing");

    vi.advanceTimersByTime(100);
    expect(scrollbar.getOpacity()).toBe(1);
    expect(scrollbar.isVisible()).toBe(true);
  });

  it("should hide after inactivity and reappear on scroll", () => {
    const { model, scrollbar } = setup();

    vi.advanceTimersByTime(1100);
    expect(scrollbar.getPhase()).toBe("hidden");
    expect(scrollbar.isVisible()).toBe(false);

    model.jumpTo(100);
    expect(scrollbar.getPhase()).toBe("appearing");
  });

  it("should never show when nothing scrolls", () => {
    const { model, scrollbar } = setup(0);

    scrollbar.show();
    model.setMetrics({ viewportExtent: 400 });
    vi.advanceTimersByTime(5000);

    expect(scrollbar.getPhase()).toBe("hidden");
    expect(scrollbar.getOpacity()).toBe(0);
    expect(scrollbar.getThumb().length).toBe(TRACK_LENGTH);
  });

  it("should fade out when content stops being scrollable", () => {
    const { model, scrollbar } = setup();

    vi.advanceTimersByTime(100);
    model.setMetrics({ maxExtent: 0 });

    expect(scrollbar.getPhase()).toBe("disappearing");
    vi.advanceTimersByTime(100);
    expect(scrollbar.getPhase()).toBe("hidden");
  });

  it("should reveal content that becomes scrollable", () => {
    const { model, scrollbar } = setup(0);

    model.setMetrics({ maxExtent: 300 });

    expect(scrollbar.getPhase()).toBe("appearing");
  });

  it("should hide on request", () => {
    const { scrollbar } = setup();

    vi.advanceTimersByTime(100);
    scrollbar.hide();

    expect(scrollbar.getPhase()).toBe("disappearing");
  });
});

// =============================================================================
// Painting
// =============================================================================

describe("painting", () => {
  it("should paint the initial hidden frame", () => {
    const { paint } = setup();

    expect(paint.mock.calls[0]?.[0].opacity).toBe(0);
  });

  it("should paint the opacity animation", () => {
    const { lastFrame } = setup();

    vi.advanceTimersByTime(100);

    expect(lastFrame()?.opacity).toBe(1);
    expect(lastFrame()?.strokeWidth).toBe(8);
    expect(lastFrame()?.padding).toBe(8);
  });

  it("should not repaint an unchanged frame", () => {
    const { scrollbar, paint } = setup();

    vi.advanceTimersByTime(100);
    const count = paint.mock.calls.length;
    scrollbar.show();

    expect(paint).toHaveBeenCalledTimes(count);
  });

  it("should recompute colors when the theme changes", () => {
    const { scrollbar, lastFrame } = setup();
    const highlightColor = { r: 0, g: 0, b: 255, a: 0.5 };

    scrollbar.setTheme({ highlightColor });

    expect(lastFrame()?.track.color).toEqual(highlightColor);
    expect(lastFrame()?.thumb.color).toEqual({ r: 0, g: 0, b: 255, a: 1 });
    expect(scrollbar.getTrack().colorAlphaScale).toBe(0.5);
  });

  it("should apply color overrides over the theme", () => {
    const { scrollbar, lastFrame } = setup();
    const thumbColor = { r: 255, g: 0, b: 0, a: 0.8 };

    scrollbar.setColors({ thumbColor });

    expect(lastFrame()?.thumb.color).toEqual(thumbColor);
    expect(lastFrame()?.thumb.segment.colorAlphaScale).toBe(0.8);
    expect(lastFrame()?.track.color).toEqual({ r: 188, g: 188, b: 188, a: 0.4 });
  });
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("lifecycle", () => {
  it("should reject invalid configuration", () => {
    const container = document.createElement("div");
    const model = createOffsetModel({ viewportExtent: 500 });

    expect(() =>
      createRoundScrollbar(container, model, { padding: -1 }),
    ).toThrow("[rotary-scrollbar] padding must be a non-negative number");
  });

  it("should release the source but not an injected surface", () => {
    const { model, scrollbar, destroy, paint } = setup();

    scrollbar.destroy();
    const count = paint.mock.calls.length;
    model.jumpTo(500);
    vi.advanceTimersByTime(2000);

    expect(model.listenerCount()).toBe(0);
    expect(destroy).not.toHaveBeenCalled();
    expect(paint).toHaveBeenCalledTimes(count);
  });

  it("should own and remove its SVG overlay", () => {
    const container = document.createElement("div");
    const model = createOffsetModel({ viewportExtent: 500, maxExtent: 1000 });
    const scrollbar = createRoundScrollbar(container, model, {
      frames: createTimeoutFrameScheduler(10),
      classPrefix: "dial",
    });

    expect(container.querySelector("svg.dial")).not.toBeNull();

    scrollbar.destroy();
    expect(container.querySelector("svg")).toBeNull();
  });
});
