/**
 * rotary-scrollbar
 * Circular, auto-hiding scrollbar for round screens, driven by touch
 * scrolling or by rotary input with haptic feedback.
 */

// Scrollbars
export {
  createRoundScrollbar,
  createRotaryScrollbar,
  validateScrollbarConfig,
  type RoundScrollbar,
  type RotaryScrollbar,
  type RoundScrollbarConfig,
  type RotaryScrollbarConfig,
} from "./scrollbar";

// Geometry
export {
  computeFractionVisible,
  computeScrollFraction,
  isScrollable,
  mapTrack,
  mapThumb,
  mapThumbForMetrics,
  segmentsEqual,
} from "./geometry";

// Visibility
export {
  createVisibilityController,
  type VisibilityController,
  type VisibilityControllerConfig,
  type VisibilityPhase,
} from "./visibility";

// Position
export {
  createPositionTracker,
  createContinuousTracker,
  createPagedTracker,
  createOffsetModel,
  createPageModel,
  createElementScrollSource,
  createElementPageSource,
  type PositionTracker,
  type PositionEvents,
  type PositionModel,
  type OffsetModel,
  type OffsetModelConfig,
  type PageModel,
  type PageModelConfig,
  type ElementScrollSource,
  type ElementPageSource,
  type ElementSourceOptions,
} from "./position";

// Rotary
export {
  createRotaryInputController,
  createRotaryEventStream,
  listenRotary,
  createDetentRotarySource,
  createWheelRotarySource,
  getDefaultRotarySource,
  createNavigatorHaptics,
  type RotaryInputController,
  type RotaryInputControllerConfig,
  type RotaryEventStream,
  type DomRotarySource,
  type WheelRotaryOptions,
} from "./rotary";

// Rendering
export {
  createSvgArcSurface,
  describeArcPath,
  shouldRepaint,
  parseHexColor,
  resolveScrollbarStyle,
  DEFAULT_THEME,
  type SvgArcSurface,
  type SvgArcSurfaceOptions,
  type ScrollbarColors,
  type ResolvedStyle,
} from "./render";

// Animation
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
  createAnimationFrameScheduler,
  createTimeoutFrameScheduler,
  runTween,
  type Tween,
} from "./animation";

// Events
export { createEmitter, type Emitter } from "./events";

// Types
export type {
  ArcFrame,
  ArcPaint,
  ArcSegment,
  Curve,
  EventHandler,
  FrameScheduler,
  HapticActuator,
  MoveAnimation,
  OffsetSource,
  PageMetrics,
  PageSource,
  PositionSource,
  RenderSurface,
  RgbaColor,
  RotaryDirection,
  RotaryEvent,
  RotaryEventSource,
  ScrollbarTheme,
  ScrollMetrics,
  Unsubscribe,
} from "./types";
