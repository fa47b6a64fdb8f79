/**
 * rotary-scrollbar - Tween
 * One-shot eased interpolation between two numbers.
 */

import type { Curve, FrameScheduler } from "../types";

/** Tween configuration */
export interface TweenConfig {
  from: number;
  to: number;

  /** Duration in milliseconds */
  duration: number;

  curve: Curve;
  frames: FrameScheduler;

  /** Receives every interpolated value, ending with `to` */
  onFrame: (value: number) => void;
}

/** Running tween */
export interface Tween {
  /** Resolves when the tween reaches `to` or is cancelled */
  finished: Promise<void>;

  /** Stop at the current value and resolve `finished` */
  cancel: () => void;

  isRunning: () => boolean;
}

export const runTween = (config: TweenConfig): Tween => {
  const { from, to, duration, curve, frames, onFrame } = config;

  let running = true;
  let frameId: number | null = null;
  let resolveFinished: () => void = () => {};
  const finished = new Promise<void>((resolve) => {
    resolveFinished = resolve;
  });

  const finish = (): void => {
    running = false;
    frameId = null;
    resolveFinished();
  };

  const cancel = (): void => {
    if (!running) return;
    if (frameId !== null) {
      frames.cancel(frameId);
    }
    finish();
  };

  if (duration <= 0 || from === to) {
    onFrame(to);
    finish();
    return { finished, cancel, isRunning: () => running };
  }

  const startTime = frames.now();

  const tick = (now: number): void => {
    const t = Math.min(1, Math.max(0, (now - startTime) / duration));
    if (t >= 1) {
      onFrame(to);
      finish();
      return;
    }
    onFrame(from + (to - from) * curve(t));
    frameId = frames.request(tick);
  };

  frameId = frames.request(tick);

  return { finished, cancel, isRunning: () => running };
};
