/**
 * rotary-scrollbar - Animation Domain
 * Easing curves, frame schedulers, progress animator and tweens
 */

export {
  cubicBezier,
  linear,
  ease,
  easeIn,
  easeOut,
  easeInOut,
  easeInOutCirc,
  fastOutSlowIn,
  decelerate,
} from "./easing";

export {
  createAnimationFrameScheduler,
  createTimeoutFrameScheduler,
  getDefaultFrameScheduler,
} from "./frames";

export {
  createValueAnimator,
  type ValueAnimator,
  type ValueAnimatorConfig,
  type AnimationStatus,
} from "./animator";

export { runTween, type Tween, type TweenConfig } from "./tween";
