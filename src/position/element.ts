/**
 * rotary-scrollbar - Element Position Sources
 * Adapt a scrollable DOM element to the offset and page source contracts.
 *
 * Native `scroll` events report position changes; a ResizeObserver (where
 * available) reports viewport changes. Animated seeks tween the element's
 * scroll offset and cancel the seek before them. A finger or pointer
 * landing on the element cancels a running seek.
 */

import type {
  FrameScheduler,
  MoveAnimation,
  OffsetSource,
  PageMetrics,
  PageSource,
  ScrollMetrics,
  Unsubscribe,
} from "../types";
import { getDefaultFrameScheduler } from "../animation/frames";
import { runTween, type Tween } from "../animation/tween";

// =============================================================================
// Types
// =============================================================================

/** Element source options */
export interface ElementSourceOptions {
  /** Track the horizontal axis instead of the vertical one (default: false) */
  horizontal?: boolean;

  /** Frame source for animated seeks */
  frames?: FrameScheduler;
}

/** Offset source over an element */
export interface ElementScrollSource extends OffsetSource {
  /** Cancel any running seek and stop watching for user scrolls */
  destroy: () => void;
}

/** Page source over an element, one viewport per page */
export interface ElementPageSource extends PageSource {
  /** Cancel any running transition and stop watching for user scrolls */
  destroy: () => void;
}

/** Events that start a user-driven scroll */
const USER_SCROLL_EVENTS = ["touchstart", "pointerdown"] as const;

// =============================================================================
// Shared Scroller
// =============================================================================

const createElementScroller = (
  element: HTMLElement,
  options: ElementSourceOptions,
) => {
  const { horizontal = false, frames = getDefaultFrameScheduler() } = options;
  let tween: Tween | null = null;

  const readMetrics = (): ScrollMetrics | null => {
    const viewportExtent = horizontal
      ? element.clientWidth
      : element.clientHeight;
    if (!(viewportExtent > 0)) return null;

    const contentExtent = horizontal
      ? element.scrollWidth
      : element.scrollHeight;

    return {
      offset: horizontal ? element.scrollLeft : element.scrollTop,
      viewportExtent,
      maxExtent: Math.max(0, contentExtent - viewportExtent),
    };
  };

  const cancelSeek = (): void => {
    tween?.cancel();
    tween = null;
  };

  for (const type of USER_SCROLL_EVENTS) {
    element.addEventListener(type, cancelSeek, { passive: true });
  }

  const writeOffset = (offset: number): void => {
    if (horizontal) {
      element.scrollLeft = offset;
    } else {
      element.scrollTop = offset;
    }
  };

  const animateOffset = (
    target: number,
    animation: MoveAnimation,
  ): Promise<void> => {
    tween?.cancel();

    const metrics = readMetrics();
    if (metrics === null) {
      tween = null;
      return Promise.resolve();
    }

    tween = runTween({
      from: metrics.offset,
      to: Math.min(metrics.maxExtent, Math.max(0, target)),
      duration: animation.duration,
      curve: animation.curve,
      frames,
      onFrame: writeOffset,
    });
    return tween.finished;
  };

  const subscribe = (listener: () => void): Unsubscribe => {
    element.addEventListener("scroll", listener, { passive: true });

    const observer =
      typeof ResizeObserver === "function"
        ? new ResizeObserver(() => listener())
        : null;
    observer?.observe(element);

    return () => {
      element.removeEventListener("scroll", listener);
      observer?.disconnect();
    };
  };

  const destroy = (): void => {
    for (const type of USER_SCROLL_EVENTS) {
      element.removeEventListener(type, cancelSeek);
    }
    cancelSeek();
  };

  return { readMetrics, animateOffset, subscribe, destroy };
};

// =============================================================================
// Factories
// =============================================================================

/**
 * Offset source over a scrollable element
 */
export const createElementScrollSource = (
  element: HTMLElement,
  options: ElementSourceOptions = {},
): ElementScrollSource => {
  const scroller = createElementScroller(element, options);

  return {
    kind: "offset",
    getMetrics: scroller.readMetrics,
    animateTo: scroller.animateOffset,
    subscribe: scroller.subscribe,
    destroy: scroller.destroy,
  };
};

/**
 * Page source over a scrollable element whose pages are one viewport long
 * (a scroll-snapping pager)
 */
export const createElementPageSource = (
  element: HTMLElement,
  options: ElementSourceOptions = {},
): ElementPageSource => {
  const scroller = createElementScroller(element, options);

  const getPage = (): PageMetrics | null => {
    const metrics = scroller.readMetrics();
    if (metrics === null) return null;
    return {
      currentPage: metrics.offset / metrics.viewportExtent,
      pageCount: Math.round(
        (metrics.maxExtent + metrics.viewportExtent) / metrics.viewportExtent,
      ),
    };
  };

  const animateToPage = (
    page: number,
    animation: MoveAnimation,
  ): Promise<void> => {
    const metrics = scroller.readMetrics();
    if (metrics === null) return Promise.resolve();
    return scroller.animateOffset(page * metrics.viewportExtent, animation);
  };

  return {
    kind: "page",
    getPage,
    animateToPage,
    subscribe: scroller.subscribe,
    destroy: scroller.destroy,
  };
};
