/**
 * rotary-scrollbar - Events Domain
 */

export { createEmitter, type Emitter } from "./emitter";
