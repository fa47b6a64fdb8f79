/**
 * rotary-scrollbar - Rotary Domain
 * Rotary tick handling, tick sources and haptics
 */

export {
  createRotaryInputController,
  type RotaryInputController,
  type RotaryInputControllerConfig,
} from "./controller";

export {
  createRotaryEventStream,
  listenRotary,
  readDetentDirection,
  createDetentRotarySource,
  createWheelRotarySource,
  getDefaultRotarySource,
  type RotaryEventStream,
  type DomRotarySource,
  type WheelRotaryOptions,
} from "./source";

export { createNavigatorHaptics } from "./haptics";
