/**
 * rotary-scrollbar - Scrollbar Domain
 */

export { createRoundScrollbar, type RoundScrollbar } from "./round";
export { createRotaryScrollbar, type RotaryScrollbar } from "./rotary";
export {
  validateScrollbarConfig,
  type RoundScrollbarConfig,
  type RotaryScrollbarConfig,
} from "./config";
