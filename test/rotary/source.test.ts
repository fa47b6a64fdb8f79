/**
 * rotary-scrollbar - Rotary Source Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  createRotaryEventStream,
  listenRotary,
  readDetentDirection,
  createDetentRotarySource,
  createWheelRotarySource,
} from "../../src/rotary";
import type { RotaryEvent } from "../../src/types";
import { flushPromises } from "../helpers/sources";

const clockwise: RotaryEvent = { direction: "clockwise" };
const counterClockwise: RotaryEvent = { direction: "counterClockwise" };

// =============================================================================
// Push Stream
// =============================================================================

describe("createRotaryEventStream", () => {
  it("should yield queued ticks in order", async () => {
    const stream = createRotaryEventStream();
    const iterator = stream[Symbol.asyncIterator]();

    stream.push(clockwise);
    stream.push(counterClockwise);

    expect(await iterator.next()).toEqual({ done: false, value: clockwise });
    expect(await iterator.next()).toEqual({
      done: false,
      value: counterClockwise,
    });
  });

  it("should deliver every tick to every iterator", async () => {
    const stream = createRotaryEventStream();
    const first = stream[Symbol.asyncIterator]();
    const second = stream[Symbol.asyncIterator]();

    const pending = first.next();
    stream.push(clockwise);

    expect(await pending).toEqual({ done: false, value: clockwise });
    expect(await second.next()).toEqual({ done: false, value: clockwise });
  });

  it("should finish after queued ticks once closed", async () => {
    const stream = createRotaryEventStream();
    const iterator = stream[Symbol.asyncIterator]();

    stream.push(clockwise);
    stream.close();
    stream.push(counterClockwise);

    expect(stream.isClosed()).toBe(true);
    expect(await iterator.next()).toEqual({ done: false, value: clockwise });
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
  });

  it("should end a waiting iterator on close", async () => {
    const stream = createRotaryEventStream();
    const pending = stream[Symbol.asyncIterator]().next();

    stream.close();

    expect(await pending).toEqual({ done: true, value: undefined });
  });

  it("should end only the returned iterator", async () => {
    const stream = createRotaryEventStream();
    const first = stream[Symbol.asyncIterator]();
    const second = stream[Symbol.asyncIterator]();

    await first.return?.();
    stream.push(clockwise);

    expect(await first.next()).toEqual({ done: true, value: undefined });
    expect(await second.next()).toEqual({ done: false, value: clockwise });
  });
});

// =============================================================================
// listenRotary
// =============================================================================

describe("listenRotary", () => {
  it("should call the handler for each tick until unsubscribed", async () => {
    const stream = createRotaryEventStream();
    const handler = vi.fn();

    const unsubscribe = listenRotary(stream, handler);
    stream.push(clockwise);
    await flushPromises();
    unsubscribe();
    stream.push(counterClockwise);
    await flushPromises();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(clockwise);
  });

  it("should keep listening after a handler throws", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const stream = createRotaryEventStream();
    const failure = new Error("handler failed");
    const handler = vi.fn(() => {
      throw failure;
    });

    listenRotary(stream, handler);
    stream.push(clockwise);
    stream.push(clockwise);
    await flushPromises();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(consoleError).toHaveBeenCalledWith(
      "[rotary-scrollbar] Error in rotary handler:",
      failure,
    );
  });
});

// =============================================================================
// Browser Adapters
// =============================================================================

describe("readDetentDirection", () => {
  it("should map detent directions", () => {
    const detent = (direction: string) =>
      new CustomEvent("rotarydetent", { detail: { direction } });

    expect(readDetentDirection(detent("CW"))).toBe("clockwise");
    expect(readDetentDirection(detent("CCW"))).toBe("counterClockwise");
    expect(readDetentDirection(detent("UP"))).toBeNull();
    expect(readDetentDirection(new Event("rotarydetent"))).toBeNull();
  });
});

describe("createDetentRotarySource", () => {
  it("should turn detent events into ticks", async () => {
    const target = new EventTarget();
    const source = createDetentRotarySource(target);
    const handler = vi.fn();

    listenRotary(source, handler);
    target.dispatchEvent(
      new CustomEvent("rotarydetent", { detail: { direction: "CCW" } }),
    );
    await flushPromises();

    expect(handler).toHaveBeenCalledWith(counterClockwise);
  });

  it("should stop listening on destroy", async () => {
    const target = new EventTarget();
    const source = createDetentRotarySource(target);
    const handler = vi.fn();

    listenRotary(source, handler);
    source.destroy();
    target.dispatchEvent(
      new CustomEvent("rotarydetent", { detail: { direction: "CW" } }),
    );
    await flushPromises();

    expect(handler).not.toHaveBeenCalled();
  });
});

describe("createWheelRotarySource", () => {
  it("should emit one tick per threshold of wheel delta", async () => {
    const target = document.createElement("div");
    const source = createWheelRotarySource(target);
    const handler = vi.fn();

    listenRotary(source, handler);
    target.dispatchEvent(new WheelEvent("wheel", { deltaY: 100 }));
    target.dispatchEvent(new WheelEvent("wheel", { deltaY: -70 }));
    await flushPromises();

    expect(handler.mock.calls.map(([event]) => event)).toEqual([
      clockwise,
      clockwise,
      counterClockwise,
    ]);
  });

  it("should cancel the native scroll by default", () => {
    const target = document.createElement("div");
    createWheelRotarySource(target);
    const event = new WheelEvent("wheel", { deltaY: 10, cancelable: true });

    target.dispatchEvent(event);

    expect(event.defaultPrevented).toBe(true);
  });

  it("should leave the native scroll alone when asked", () => {
    const target = document.createElement("div");
    createWheelRotarySource(target, { preventDefault: false, threshold: 5 });
    const event = new WheelEvent("wheel", { deltaY: 10, cancelable: true });

    target.dispatchEvent(event);

    expect(event.defaultPrevented).toBe(false);
  });
});
