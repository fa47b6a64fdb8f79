/**
 * rotary-scrollbar - Position Tracker
 * Uniform view over the two position models.
 *
 * - continuous: backed by a scroll offset (`OffsetSource`)
 * - paged:      backed by a page index (`PageSource`)
 *
 * The variant is chosen once, from `source.kind`, when the tracker is
 * created. Positions, extents and move targets are all expressed in the
 * model's own unit: pixels for continuous, pages for paged.
 */

import type {
  EventMap,
  MoveAnimation,
  ScrollMetrics,
  Unsubscribe,
} from "../types";
import { createEmitter, type Emitter } from "../events/emitter";

// =============================================================================
// Types
// =============================================================================

export type PositionModel = "continuous" | "paged";

/** Tracker events */
export interface PositionEvents extends EventMap {
  /** The position moved */
  scroll: ScrollMetrics;

  /** Viewport or content extent changed (null when the viewport went away) */
  metrics: ScrollMetrics | null;
}

/** Position tracker instance */
export interface PositionTracker {
  readonly model: PositionModel;

  /**
   * Thumb index for the geometry mapper.
   * continuous: viewports scrolled (`offset / viewportExtent`)
   * paged: the current page, fractional while a transition runs
   */
  currentFraction: () => number;

  /** Position in move units (paged: the nearest whole page) */
  currentPosition: () => number;

  /** Distance left before the current position */
  extentBefore: () => number;

  /** Distance left after the current position */
  extentAfter: () => number;

  /** Largest valid move target */
  maxPosition: () => number;

  /** Bring a move target into the valid range */
  clamp: (target: number) => number;

  /**
   * Normalized metrics. Paged models report one page as the viewport and
   * `pageCount - 1` as the max extent.
   */
  metrics: () => ScrollMetrics | null;

  isScrollable: () => boolean;

  /** Animate to a target; resolves when the move ends or is superseded */
  moveTo: (target: number, animation: MoveAnimation) => Promise<void>;

  /** Subscribe to tracker events */
  on: Emitter<PositionEvents>["on"];

  /** Stop observing the source */
  destroy: () => void;
}

/** What a variant provides on top of the shared observation logic */
export interface TrackerVariant {
  model: PositionModel;
  readMetrics: () => ScrollMetrics | null;
  currentPosition: () => number;
  clamp: (target: number) => number;
  moveTo: (target: number, animation: MoveAnimation) => Promise<void>;
  subscribe: (listener: () => void) => Unsubscribe;
}

// =============================================================================
// Shared Tracker
// =============================================================================

const sameExtents = (
  a: ScrollMetrics | null,
  b: ScrollMetrics | null,
): boolean => {
  if (a === null || b === null) return a === b;
  return a.viewportExtent === b.viewportExtent && a.maxExtent === b.maxExtent;
};

/**
 * Build a tracker from a variant: observe the source, diff metrics between
 * notifications and derive extents from the variant's position.
 */
export const createTracker = (variant: TrackerVariant): PositionTracker => {
  const emitter = createEmitter<PositionEvents>();
  let last = variant.readMetrics();
  let destroyed = false;

  const handleSourceChange = (): void => {
    if (destroyed) return;

    const next = variant.readMetrics();
    const previous = last;
    last = next;

    if (!sameExtents(previous, next)) {
      emitter.emit("metrics", next);
    }
    if (
      next !== null &&
      (previous === null || previous.offset !== next.offset)
    ) {
      emitter.emit("scroll", next);
    }
  };

  const unsubscribe = variant.subscribe(handleSourceChange);

  const maxPosition = (): number => variant.clamp(Number.POSITIVE_INFINITY);

  const metrics = (): ScrollMetrics | null => variant.readMetrics();

  const currentFraction = (): number => {
    const current = metrics();
    if (current === null || !(current.viewportExtent > 0)) return 0;
    return current.offset / current.viewportExtent;
  };

  const isScrollable = (): boolean => {
    const current = metrics();
    return (
      current !== null && current.viewportExtent > 0 && current.maxExtent > 0
    );
  };

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;
    unsubscribe();
    emitter.clear();
  };

  return {
    model: variant.model,
    currentFraction,
    currentPosition: variant.currentPosition,
    extentBefore: () => Math.max(0, variant.currentPosition()),
    extentAfter: () => Math.max(0, maxPosition() - variant.currentPosition()),
    maxPosition,
    clamp: variant.clamp,
    metrics,
    isScrollable,
    moveTo: (target, animation) =>
      variant.moveTo(variant.clamp(target), animation),
    on: emitter.on,
    destroy,
  };
};
