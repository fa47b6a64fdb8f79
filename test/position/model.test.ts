/**
 * rotary-scrollbar - In-Memory Position Source Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createOffsetModel, createPageModel } from "../../src/position";
import { createTimeoutFrameScheduler, linear } from "../../src/animation";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

const animation = { duration: 100, curve: linear };

describe("createOffsetModel", () => {
  it("should animate to the clamped target", async () => {
    const model = createOffsetModel({
      viewportExtent: 100,
      maxExtent: 400,
      frames: createTimeoutFrameScheduler(10),
    });

    const done = model.animateTo(1000, animation);
    vi.advanceTimersByTime(50);
    expect(model.getMetrics()?.offset).toBe(200);

    vi.advanceTimersByTime(50);
    await done;
    expect(model.getMetrics()?.offset).toBe(400);
  });

  it("should interrupt a running seek with a new one", async () => {
    const model = createOffsetModel({
      viewportExtent: 100,
      maxExtent: 1000,
      frames: createTimeoutFrameScheduler(10),
    });

    const first = model.animateTo(1000, animation);
    vi.advanceTimersByTime(50);
    const second = model.animateTo(0, animation);

    await first;
    vi.advanceTimersByTime(50);
    expect(model.getMetrics()?.offset).toBe(250);

    vi.advanceTimersByTime(50);
    await second;
    expect(model.getMetrics()?.offset).toBe(0);
  });

  it("should notify listeners on jumps but not on no-op jumps", () => {
    const model = createOffsetModel({ viewportExtent: 100, maxExtent: 300 });
    const listener = vi.fn();
    model.subscribe(listener);

    model.jumpTo(50);
    model.jumpTo(50);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("should clamp the offset when the content shrinks", () => {
    const model = createOffsetModel({
      viewportExtent: 100,
      maxExtent: 300,
      offset: 250,
    });

    model.setMetrics({ maxExtent: 200 });

    expect(model.getMetrics()).toEqual({
      offset: 200,
      viewportExtent: 100,
      maxExtent: 200,
    });
  });
});

describe("createPageModel", () => {
  it("should clamp the initial page", () => {
    const model = createPageModel({ pageCount: 3, initialPage: 9 });
    expect(model.getPage()).toEqual({ currentPage: 2, pageCount: 3 });
  });

  it("should pass through fractional pages while animating", async () => {
    const model = createPageModel({
      pageCount: 4,
      frames: createTimeoutFrameScheduler(10),
    });

    const done = model.animateToPage(2, animation);
    vi.advanceTimersByTime(50);
    expect(model.getPage().currentPage).toBe(1);

    vi.advanceTimersByTime(20);
    expect(model.getPage().currentPage).toBeCloseTo(1.4, 10);

    vi.advanceTimersByTime(30);
    await done;
    expect(model.getPage().currentPage).toBe(2);
  });

  it("should keep the page in range when pages are removed", () => {
    const model = createPageModel({ pageCount: 5, initialPage: 4 });
    const listener = vi.fn();
    model.subscribe(listener);

    model.setPageCount(2);

    expect(model.getPage()).toEqual({ currentPage: 1, pageCount: 2 });
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("should stop notifying after unsubscribe", () => {
    const model = createPageModel({ pageCount: 3 });
    const listener = vi.fn();
    const unsubscribe = model.subscribe(listener);

    unsubscribe();
    model.jumpToPage(1);

    expect(listener).not.toHaveBeenCalled();
    expect(model.listenerCount()).toBe(0);
  });
});
