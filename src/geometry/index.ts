/**
 * rotary-scrollbar - Geometry Domain
 */

export {
  computeFractionVisible,
  computeScrollFraction,
  isScrollable,
  mapTrack,
  mapThumb,
  mapThumbForMetrics,
  segmentsEqual,
} from "./arc";
