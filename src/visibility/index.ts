/**
 * rotary-scrollbar - Visibility Domain
 */

export {
  createVisibilityController,
  type VisibilityController,
  type VisibilityControllerConfig,
  type VisibilityPhase,
} from "./controller";
