/**
 * rotary-scrollbar - Position Domain
 * Position trackers and the position sources they observe
 */

export { createPositionTracker } from "./create";

export {
  createTracker,
  type PositionTracker,
  type PositionEvents,
  type PositionModel,
  type TrackerVariant,
} from "./tracker";

export { createContinuousTracker } from "./continuous";
export { createPagedTracker } from "./paged";

export {
  createOffsetModel,
  createPageModel,
  type OffsetModel,
  type OffsetModelConfig,
  type PageModel,
  type PageModelConfig,
} from "./model";

export {
  createElementScrollSource,
  createElementPageSource,
  type ElementScrollSource,
  type ElementPageSource,
  type ElementSourceOptions,
} from "./element";
