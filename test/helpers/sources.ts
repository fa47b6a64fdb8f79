/**
 * rotary-scrollbar - Test Sources
 * Position sources whose moves resolve only when the test says so
 */

import type {
  MoveAnimation,
  OffsetSource,
  PageSource,
  ScrollMetrics,
} from "../../src/types";

export interface PendingMove {
  target: number;
  animation: MoveAnimation;
  resolve: () => void;
  reject: (error: unknown) => void;
}

interface ListenerHost {
  listeners: Set<() => void>;
  notify: () => void;
}

const createListenerHost = (): ListenerHost => {
  const listeners = new Set<() => void>();
  return {
    listeners,
    notify: () => listeners.forEach((listener) => listener()),
  };
};

const deferMove = (
  moves: PendingMove[],
  target: number,
  animation: MoveAnimation,
): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    moves.push({ target, animation, resolve: () => resolve(), reject });
  });

// =============================================================================
// Offset
// =============================================================================

export interface ManualOffsetSource extends OffsetSource {
  moves: PendingMove[];

  /** Change the offset and notify subscribers */
  scrollTo: (offset: number) => void;
}

export const createManualOffsetSource = (
  initial: ScrollMetrics,
): ManualOffsetSource => {
  const host = createListenerHost();
  const moves: PendingMove[] = [];
  let metrics = { ...initial };

  return {
    kind: "offset",
    moves,
    getMetrics: () => metrics,
    animateTo: (target, animation) => deferMove(moves, target, animation),
    subscribe: (listener) => {
      host.listeners.add(listener);
      return () => {
        host.listeners.delete(listener);
      };
    },
    scrollTo: (offset) => {
      metrics = { ...metrics, offset };
      host.notify();
    },
  };
};

// =============================================================================
// Page
// =============================================================================

export interface ManualPageSource extends PageSource {
  moves: PendingMove[];

  /** Change the page and notify subscribers */
  showPage: (page: number) => void;
}

export const createManualPageSource = (
  pageCount: number,
  currentPage = 0,
): ManualPageSource => {
  const host = createListenerHost();
  const moves: PendingMove[] = [];
  let page = currentPage;

  return {
    kind: "page",
    moves,
    getPage: () => ({ currentPage: page, pageCount }),
    animateToPage: (target, animation) => deferMove(moves, target, animation),
    subscribe: (listener) => {
      host.listeners.add(listener);
      return () => {
        host.listeners.delete(listener);
      };
    },
    showPage: (next) => {
      page = next;
      host.notify();
    },
  };
};

/** Let pending promise callbacks run */
export const flushPromises = async (): Promise<void> => {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve();
  }
};
