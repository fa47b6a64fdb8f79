/**
 * rotary-scrollbar - Haptics
 */

import type { HapticActuator } from "../types";

/**
 * Haptic actuator over the Vibration API, or null where it is missing.
 * The Vibration API has no amplitude control; only the duration is used.
 */
export const createNavigatorHaptics = (): HapticActuator | null => {
  if (typeof navigator === "undefined") return null;
  if (typeof navigator.vibrate !== "function") return null;

  return {
    vibrate: (durationMs) => {
      navigator.vibrate(durationMs);
    },
  };
};
