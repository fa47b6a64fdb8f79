/**
 * rotary-scrollbar - Paged Position Tracker
 * Tracks a page index. Each page counts as one viewport.
 */

import type { PageSource, ScrollMetrics } from "../types";
import { createTracker, type PositionTracker } from "./tracker";

export const createPagedTracker = (source: PageSource): PositionTracker => {
  const lastPage = (): number =>
    Math.max(0, Math.floor(source.getPage()?.pageCount ?? 0) - 1);

  const readMetrics = (): ScrollMetrics | null => {
    const page = source.getPage();
    if (page === null) return null;
    return {
      offset: page.currentPage,
      viewportExtent: 1,
      maxExtent: lastPage(),
    };
  };

  const clamp = (target: number): number =>
    Math.min(lastPage(), Math.max(0, Math.round(target)));

  return createTracker({
    model: "paged",
    readMetrics,
    currentPosition: () => clamp(source.getPage()?.currentPage ?? 0),
    clamp,
    moveTo: (target, animation) => source.animateToPage(target, animation),
    subscribe: (listener) => source.subscribe(listener),
  });
};
