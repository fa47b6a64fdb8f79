/**
 * rotary-scrollbar - Rotary Scrollbar
 * Round scrollbar that also scrolls its content from a rotating bezel or
 * crown, with a haptic pulse per tick.
 *
 * Works with both position models: an offset source scrolls by
 * `scrollMagnitude` pixels per tick, a page source moves one page per tick.
 * Without a rotary source it behaves exactly like the round scrollbar.
 */

import type { PositionSource } from "../types";
import {
  createRotaryInputController,
  type RotaryInputController,
} from "../rotary/controller";
import { getDefaultRotarySource } from "../rotary/source";
import { createNavigatorHaptics } from "../rotary/haptics";
import type { RotaryScrollbarConfig } from "./config";
import { createRoundScrollbar, type RoundScrollbar } from "./round";

/** Rotary scrollbar instance */
export interface RotaryScrollbar extends RoundScrollbar {
  /** The rotary controller, or null when no rotary source is available */
  getRotaryController: () => RotaryInputController | null;
}

/**
 * Create a rotary scrollbar over `container`, controlling `source`
 *
 * ```ts
 * const pages = createElementPageSource(pager)
 * const scrollbar = createRotaryScrollbar(screen, pages, {
 *   rotarySource: createDetentRotarySource(window),
 * })
 * ```
 */
export const createRotaryScrollbar = (
  container: HTMLElement,
  source: PositionSource,
  config: RotaryScrollbarConfig = {},
): RotaryScrollbar => {
  const round = createRoundScrollbar(container, source, config);

  const defaultSource =
    config.rotarySource === undefined ? getDefaultRotarySource() : null;
  const rotarySource =
    config.rotarySource === undefined ? defaultSource : config.rotarySource;
  const haptics =
    config.haptics === undefined ? createNavigatorHaptics() : config.haptics;

  const controller = rotarySource
    ? createRotaryInputController(round.getTracker(), {
        rotarySource,
        haptics,
        hapticFeedback: config.hapticFeedback,
        scrollMagnitude: config.scrollMagnitude,
        scrollAnimationDuration: config.scrollAnimationDuration,
        scrollAnimationCurve: config.scrollAnimationCurve,
        pageTransitionDuration: config.pageTransitionDuration,
        pageTransitionCurve: config.pageTransitionCurve,
        debug: config.debug,
        onMove: round.show,
      })
    : null;

  const destroy = (): void => {
    controller?.destroy();
    defaultSource?.destroy();
    round.destroy();
  };

  return {
    ...round,
    getRotaryController: () => controller,
    destroy,
  };
};
