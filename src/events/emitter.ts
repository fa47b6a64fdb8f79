/**
 * rotary-scrollbar - Event Emitter
 * Typed publish/subscribe used by trackers and position models
 */

import type { EventHandler, Unsubscribe, EventMap } from "../types";

type HandlerSets<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Create a typed emitter.
 * A handler that throws is reported and the remaining handlers still run.
 */
export const createEmitter = <T extends EventMap>() => {
  let sets: HandlerSets<T> = {};

  const on = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    const set = sets[event] ?? new Set<EventHandler<T[K]>>();
    sets[event] = set;
    set.add(handler);

    return () => {
      set.delete(handler);
    };
  };

  const emit = <K extends keyof T>(event: K, payload: T[K]): void => {
    sets[event]?.forEach((handler) => {
      try {
        handler(payload);
      } catch (error) {
        console.error(
          `[rotary-scrollbar] Error in event handler for "${String(event)}":`,
          error,
        );
      }
    });
  };

  /** Drop every handler of every event */
  const clear = (): void => {
    sets = {};
  };

  const listenerCount = <K extends keyof T>(event: K): number =>
    sets[event]?.size ?? 0;

  return { on, emit, clear, listenerCount };
};

/** Event emitter type */
export type Emitter<T extends EventMap> = ReturnType<typeof createEmitter<T>>;
