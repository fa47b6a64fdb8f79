/**
 * rotary-scrollbar - Rotary Event Sources
 * Asynchronous sequences of rotary ticks and the browser adapters that
 * produce them.
 */

import type {
  RotaryDirection,
  RotaryEvent,
  RotaryEventSource,
  Unsubscribe,
} from "../types";
import { DEFAULT_WHEEL_TICK_THRESHOLD } from "../constants";

// =============================================================================
// Push Stream
// =============================================================================

/** Push-based rotary event sequence */
export interface RotaryEventStream extends RotaryEventSource {
  /** Deliver a tick to every active iterator */
  push: (event: RotaryEvent) => void;

  /** End every iterator once its queued ticks are consumed */
  close: () => void;

  isClosed: () => boolean;
}

interface StreamConsumer {
  queue: RotaryEvent[];
  waiting: ((result: IteratorResult<RotaryEvent, undefined>) => void) | null;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Create a push stream. Each iterator receives the ticks pushed after it
 * was created.
 */
export const createRotaryEventStream = (): RotaryEventStream => {
  const consumers = new Set<StreamConsumer>();
  let closed = false;

  const push = (event: RotaryEvent): void => {
    if (closed) return;
    consumers.forEach((consumer) => {
      const waiting = consumer.waiting;
      if (waiting) {
        consumer.waiting = null;
        waiting({ done: false, value: event });
      } else {
        consumer.queue.push(event);
      }
    });
  };

  const close = (): void => {
    if (closed) return;
    closed = true;
    consumers.forEach((consumer) => {
      const waiting = consumer.waiting;
      if (waiting) {
        consumer.waiting = null;
        consumers.delete(consumer);
        waiting(DONE);
      }
    });
  };

  const iterate = (): AsyncIterator<RotaryEvent, undefined> => {
    const consumer: StreamConsumer = { queue: [], waiting: null };
    consumers.add(consumer);

    const end = (): Promise<IteratorResult<RotaryEvent, undefined>> => {
      consumers.delete(consumer);
      consumer.queue.length = 0;
      const waiting = consumer.waiting;
      consumer.waiting = null;
      waiting?.(DONE);
      return Promise.resolve(DONE);
    };

    return {
      next: () => {
        const queued = consumer.queue.shift();
        if (queued) {
          const result: IteratorYieldResult<RotaryEvent> = {
            done: false,
            value: queued,
          };
          return Promise.resolve(result);
        }
        if (closed || !consumers.has(consumer)) return Promise.resolve(DONE);
        return new Promise<IteratorResult<RotaryEvent, undefined>>(
          (resolve) => {
            consumer.waiting = resolve;
          },
        );
      },
      return: end,
    };
  };

  return {
    [Symbol.asyncIterator]: iterate,
    push,
    close,
    isClosed: () => closed,
  };
};

// =============================================================================
// Consumption
// =============================================================================

/**
 * Consume a rotary source until unsubscribed or until it ends.
 * A throwing handler is reported and does not end the subscription.
 */
export const listenRotary = (
  source: RotaryEventSource,
  handler: (event: RotaryEvent) => void,
): Unsubscribe => {
  const iterator = source[Symbol.asyncIterator]();
  let active = true;

  const pump = async (): Promise<void> => {
    while (active) {
      const result = await iterator.next();
      if (result.done || !active) return;
      try {
        handler(result.value);
      } catch (error) {
        console.error("[rotary-scrollbar] Error in rotary handler:", error);
      }
    }
  };

  void pump().catch((error: unknown) => {
    console.error("[rotary-scrollbar] Rotary event source failed:", error);
  });

  return () => {
    if (!active) return;
    active = false;
    void iterator.return?.()?.catch((error: unknown) => {
      console.error("[rotary-scrollbar] Failed to close rotary source:", error);
    });
  };
};

// =============================================================================
// Browser Adapters
// =============================================================================

/** Rotary source bound to DOM listeners */
export interface DomRotarySource extends RotaryEventSource {
  /** Remove listeners and end the sequence */
  destroy: () => void;
}

/** Read the direction out of a `rotarydetent` event's detail */
export const readDetentDirection = (event: Event): RotaryDirection | null => {
  if (!(event instanceof CustomEvent)) return null;
  const detail: unknown = event.detail;
  if (typeof detail !== "object" || detail === null || !("direction" in detail))
    return null;
  if (detail.direction === "CW") return "clockwise";
  if (detail.direction === "CCW") return "counterClockwise";
  return null;
};

/**
 * Ticks from `rotarydetent` events, dispatched by round-screen web runtimes
 * for each bezel detent (`detail.direction` is "CW" or "CCW").
 */
export const createDetentRotarySource = (
  target: EventTarget,
): DomRotarySource => {
  const stream = createRotaryEventStream();

  const handleDetent = (event: Event): void => {
    const direction = readDetentDirection(event);
    if (direction) {
      stream.push({ direction });
    }
  };

  target.addEventListener("rotarydetent", handleDetent);

  return {
    [Symbol.asyncIterator]: stream[Symbol.asyncIterator],
    destroy: () => {
      target.removeEventListener("rotarydetent", handleDetent);
      stream.close();
    },
  };
};

/** Wheel source options */
export interface WheelRotaryOptions {
  /** Accumulated delta (px) per tick (default: 40) */
  threshold?: number;

  /** Cancel the native wheel scroll (default: true) */
  preventDefault?: boolean;
}

/**
 * Ticks from wheel events, for platforms that deliver the crown as a wheel.
 * Deltas accumulate until they cross the threshold; positive deltas turn
 * clockwise.
 */
export const createWheelRotarySource = (
  target: EventTarget,
  options: WheelRotaryOptions = {},
): DomRotarySource => {
  const { threshold = DEFAULT_WHEEL_TICK_THRESHOLD, preventDefault = true } =
    options;
  const stream = createRotaryEventStream();
  let accumulated = 0;

  const handleWheel = (event: Event): void => {
    if (!(event instanceof WheelEvent)) return;
    if (preventDefault) event.preventDefault();

    accumulated += event.deltaY;
    while (Math.abs(accumulated) >= threshold) {
      const sign = accumulated > 0 ? 1 : -1;
      stream.push({ direction: sign > 0 ? "clockwise" : "counterClockwise" });
      accumulated -= sign * threshold;
    }
  };

  target.addEventListener("wheel", handleWheel, { passive: !preventDefault });

  return {
    [Symbol.asyncIterator]: stream[Symbol.asyncIterator],
    destroy: () => {
      target.removeEventListener("wheel", handleWheel);
      stream.close();
    },
  };
};

/**
 * The rotary source a browser host offers, or null outside a browser
 */
export const getDefaultRotarySource = (): DomRotarySource | null =>
  typeof window === "undefined" ? null : createDetentRotarySource(window);
