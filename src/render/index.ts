/**
 * rotary-scrollbar - Render Domain
 * Styles, repaint checks and the SVG surface
 */

export {
  parseHexColor,
  toCssRgb,
  colorsEqual,
  resolveScrollbarStyle,
  DEFAULT_THEME,
  type ScrollbarColors,
  type ResolvedStyle,
} from "./style";

export { shouldRepaint, describeArcPath, type ArcBox } from "./paint";

export {
  createSvgArcSurface,
  type SvgArcSurface,
  type SvgArcSurfaceOptions,
} from "./svg";
