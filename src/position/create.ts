/**
 * rotary-scrollbar - Position Tracker Factory
 */

import type { PositionSource } from "../types";
import type { PositionTracker } from "./tracker";
import { createContinuousTracker } from "./continuous";
import { createPagedTracker } from "./paged";

/**
 * Create the tracker matching the source's position model.
 * The choice is made here, once; nothing downstream branches on it.
 */
export const createPositionTracker = (
  source: PositionSource,
): PositionTracker =>
  source.kind === "page"
    ? createPagedTracker(source)
    : createContinuousTracker(source);
