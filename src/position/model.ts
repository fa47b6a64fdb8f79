/**
 * rotary-scrollbar - In-Memory Position Sources
 * Scroll state owned by the host rather than by a DOM element: canvas UIs,
 * custom renderers and tests.
 */

import type {
  EventMap,
  FrameScheduler,
  MoveAnimation,
  OffsetSource,
  PageMetrics,
  PageSource,
  ScrollMetrics,
  Unsubscribe,
} from "../types";
import { createEmitter } from "../events/emitter";
import { getDefaultFrameScheduler } from "../animation/frames";
import { runTween, type Tween } from "../animation/tween";

// =============================================================================
// Change Notification
// =============================================================================

/** Both models raise a single event for any position or extent change */
interface ModelEvents extends EventMap {
  change: void;
}

const createChangeNotifier = () => {
  const emitter = createEmitter<ModelEvents>();

  return {
    subscribe: (listener: () => void): Unsubscribe =>
      emitter.on("change", listener),
    notify: (): void => emitter.emit("change", undefined),
    size: (): number => emitter.listenerCount("change"),
  };
};

// =============================================================================
// Offset Model
// =============================================================================

/** Offset model configuration */
export interface OffsetModelConfig {
  /** Viewport length; leave out until layout is known */
  viewportExtent?: number;

  /** Largest scroll offset (default: 0) */
  maxExtent?: number;

  /** Initial offset (default: 0) */
  offset?: number;

  /** Frame source for animated seeks */
  frames?: FrameScheduler;
}

/** Continuous scroll state with programmatic control */
export interface OffsetModel extends OffsetSource {
  /** Move without animation, interrupting any running seek */
  jumpTo: (offset: number) => void;

  /** Update viewport or content extent */
  setMetrics: (
    metrics: Partial<Pick<ScrollMetrics, "viewportExtent" | "maxExtent">>,
  ) => void;

  /** Number of subscribed listeners */
  listenerCount: () => number;
}

export const createOffsetModel = (
  config: OffsetModelConfig = {},
): OffsetModel => {
  const { frames = getDefaultFrameScheduler() } = config;
  const listeners = createChangeNotifier();

  let viewportExtent: number | null = config.viewportExtent ?? null;
  let maxExtent = config.maxExtent ?? 0;
  let offset = config.offset ?? 0;
  let tween: Tween | null = null;

  const clampOffset = (value: number): number =>
    Math.min(Math.max(0, maxExtent), Math.max(0, value));

  const setOffset = (value: number): void => {
    if (value === offset) return;
    offset = value;
    listeners.notify();
  };

  const getMetrics = (): ScrollMetrics | null =>
    viewportExtent === null ? null : { offset, viewportExtent, maxExtent };

  const animateTo = (
    target: number,
    animation: MoveAnimation,
  ): Promise<void> => {
    tween?.cancel();
    tween = runTween({
      from: offset,
      to: clampOffset(target),
      duration: animation.duration,
      curve: animation.curve,
      frames,
      onFrame: setOffset,
    });
    return tween.finished;
  };

  const jumpTo = (value: number): void => {
    tween?.cancel();
    tween = null;
    setOffset(clampOffset(value));
  };

  const setMetrics: OffsetModel["setMetrics"] = (metrics) => {
    viewportExtent = metrics.viewportExtent ?? viewportExtent;
    maxExtent = metrics.maxExtent ?? maxExtent;
    offset = clampOffset(offset);
    listeners.notify();
  };

  return {
    kind: "offset",
    getMetrics,
    animateTo,
    subscribe: listeners.subscribe,
    jumpTo,
    setMetrics,
    listenerCount: listeners.size,
  };
};

// =============================================================================
// Page Model
// =============================================================================

/** Page model configuration */
export interface PageModelConfig {
  pageCount: number;

  /** Initial page (default: 0) */
  initialPage?: number;

  /** Frame source for animated page transitions */
  frames?: FrameScheduler;
}

/** Paged state with programmatic control */
export interface PageModel extends PageSource {
  /** Current page metrics; a page model always has them */
  getPage: () => PageMetrics;

  /** Change page without animation, interrupting any running transition */
  jumpToPage: (page: number) => void;

  /** Change the number of pages, keeping the current page in range */
  setPageCount: (pageCount: number) => void;

  /** Number of subscribed listeners */
  listenerCount: () => number;
}

export const createPageModel = (config: PageModelConfig): PageModel => {
  const { frames = getDefaultFrameScheduler() } = config;
  const listeners = createChangeNotifier();

  let pageCount = Math.max(0, Math.floor(config.pageCount));
  let currentPage = config.initialPage ?? 0;
  let tween: Tween | null = null;

  const clampPage = (page: number): number =>
    Math.min(Math.max(0, pageCount - 1), Math.max(0, Math.round(page)));

  currentPage = clampPage(currentPage);

  const setPage = (page: number): void => {
    if (page === currentPage) return;
    currentPage = page;
    listeners.notify();
  };

  const getPage = (): PageMetrics => ({ currentPage, pageCount });

  const animateToPage = (
    page: number,
    animation: MoveAnimation,
  ): Promise<void> => {
    tween?.cancel();
    tween = runTween({
      from: currentPage,
      to: clampPage(page),
      duration: animation.duration,
      curve: animation.curve,
      frames,
      onFrame: setPage,
    });
    return tween.finished;
  };

  const jumpToPage = (page: number): void => {
    tween?.cancel();
    tween = null;
    setPage(clampPage(page));
  };

  const setPageCount = (count: number): void => {
    pageCount = Math.max(0, Math.floor(count));
    currentPage = clampPage(currentPage);
    listeners.notify();
  };

  return {
    kind: "page",
    getPage,
    animateToPage,
    subscribe: listeners.subscribe,
    jumpToPage,
    setPageCount,
    listenerCount: listeners.size,
  };
};
