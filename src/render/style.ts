/**
 * rotary-scrollbar - Scrollbar Style
 * Color helpers and resolution of track/thumb colors against a theme.
 */

import type { RgbaColor, ScrollbarTheme } from "../types";
import { DEFAULT_HIGHLIGHT_COLOR } from "../constants";

// =============================================================================
// Types
// =============================================================================

/** Per-instance color overrides */
export interface ScrollbarColors {
  trackColor?: RgbaColor;
  thumbColor?: RgbaColor;
}

/** Colors actually painted */
export interface ResolvedStyle {
  trackColor: RgbaColor;
  thumbColor: RgbaColor;
}

export const DEFAULT_THEME: ScrollbarTheme = {
  highlightColor: DEFAULT_HIGHLIGHT_COLOR,
};

// =============================================================================
// Colors
// =============================================================================

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse `#rgb`, `#rrggbb` or `#rrggbbaa`
 */
export const parseHexColor = (hex: string): RgbaColor | null => {
  const match = HEX_PATTERN.exec(hex.trim());
  const digits = match?.[1];
  if (!digits) return null;

  const expanded =
    digits.length === 3
      ? digits
          .split("")
          .map((digit) => digit + digit)
          .join("")
      : digits;

  const channel = (index: number): number =>
    parseInt(expanded.slice(index * 2, index * 2 + 2), 16);

  return {
    r: channel(0),
    g: channel(1),
    b: channel(2),
    a: expanded.length === 8 ? channel(3) / 255 : 1,
  };
};

/** CSS color without alpha; alpha is painted separately */
export const toCssRgb = (color: RgbaColor): string =>
  `rgb(${color.r}, ${color.g}, ${color.b})`;

export const colorsEqual = (
  a: RgbaColor | null,
  b: RgbaColor | null,
): boolean => {
  if (a === null || b === null) return a === b;
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
};

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve painted colors.
 * track: override, then theme track color, then the highlight color
 * thumb: override, then theme thumb color, then the opaque highlight color
 */
export const resolveScrollbarStyle = (
  overrides: ScrollbarColors,
  theme: ScrollbarTheme = DEFAULT_THEME,
): ResolvedStyle => ({
  trackColor: overrides.trackColor ?? theme.trackColor ?? theme.highlightColor,
  thumbColor: overrides.thumbColor ?? theme.thumbColor ?? {
    ...theme.highlightColor,
    a: 1,
  },
});
