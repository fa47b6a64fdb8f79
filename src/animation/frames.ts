/**
 * rotary-scrollbar - Frame Schedulers
 * Animation frame sources for browsers and for hosts without frames.
 */

import type { FrameScheduler } from "../types";
import { TIMEOUT_FRAME_INTERVAL } from "../constants";

/**
 * Frames from `requestAnimationFrame`, stamped on the `performance.now()` clock
 */
export const createAnimationFrameScheduler = (): FrameScheduler => ({
  now: () => performance.now(),
  request: (callback) => requestAnimationFrame(callback),
  cancel: (id) => cancelAnimationFrame(id),
});

/**
 * Frames from `setTimeout`, stamped on the `Date.now()` clock.
 * Used where no rendering loop exists (Node, workers) and by tests that
 * drive time with fake timers.
 */
export const createTimeoutFrameScheduler = (
  interval = TIMEOUT_FRAME_INTERVAL,
): FrameScheduler => {
  const pending = new Map<number, ReturnType<typeof setTimeout>>();
  let nextId = 1;

  return {
    now: () => Date.now(),
    request: (callback) => {
      const id = nextId++;
      pending.set(
        id,
        setTimeout(() => {
          pending.delete(id);
          callback(Date.now());
        }, interval),
      );
      return id;
    },
    cancel: (id) => {
      const handle = pending.get(id);
      if (handle !== undefined) {
        clearTimeout(handle);
        pending.delete(id);
      }
    },
  };
};

/** Pick the best scheduler the current host offers */
export const getDefaultFrameScheduler = (): FrameScheduler =>
  typeof requestAnimationFrame === "function"
    ? createAnimationFrameScheduler()
    : createTimeoutFrameScheduler();
