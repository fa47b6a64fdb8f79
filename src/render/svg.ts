/**
 * rotary-scrollbar - SVG Surface
 * Paints the track and thumb as two round-capped stroked arcs in an SVG
 * overlay laid over the scrollable content.
 *
 * The overlay ignores pointer events, so touches reach the content below.
 */

import type { ArcFrame, ArcPaint, RenderSurface } from "../types";
import { DEFAULT_CLASS_PREFIX } from "../constants";
import { describeArcPath, type ArcBox } from "./paint";
import { toCssRgb } from "./style";

const SVG_NS = "http://www.w3.org/2000/svg";

/** SVG surface options */
export interface SvgArcSurfaceOptions {
  /** CSS class prefix (default: 'round-scrollbar') */
  classPrefix?: string;
}

/** SVG surface instance */
export interface SvgArcSurface extends RenderSurface {
  /** The overlay element */
  readonly element: SVGSVGElement;

  /** Number of frames painted so far */
  getPaintCount: () => number;
}

/**
 * Create an SVG overlay inside `container`
 */
export const createSvgArcSurface = (
  container: HTMLElement,
  options: SvgArcSurfaceOptions = {},
): SvgArcSurface => {
  const { classPrefix = DEFAULT_CLASS_PREFIX } = options;

  const svg = document.createElementNS(SVG_NS, "svg");
  const track = document.createElementNS(SVG_NS, "path");
  const thumb = document.createElementNS(SVG_NS, "path");

  let lastFrame: ArcFrame | null = null;
  let paintCount = 0;

  // ===========================================================================
  // DOM Setup
  // ===========================================================================

  svg.setAttribute("class", classPrefix);
  svg.setAttribute("aria-hidden", "true");
  svg.style.position = "absolute";
  svg.style.top = "0";
  svg.style.left = "0";
  svg.style.width = "100%";
  svg.style.height = "100%";
  svg.style.pointerEvents = "none";

  track.setAttribute("class", `${classPrefix}-track`);
  thumb.setAttribute("class", `${classPrefix}-thumb`);
  for (const path of [track, thumb]) {
    path.setAttribute("fill", "none");
    path.setAttribute("stroke-linecap", "round");
    svg.appendChild(path);
  }

  container.appendChild(svg);

  // ===========================================================================
  // Painting
  // ===========================================================================

  const paintPart = (
    path: SVGPathElement,
    part: ArcPaint,
    box: ArcBox,
    frame: ArcFrame,
  ): void => {
    const { segment, color } = part;
    path.setAttribute(
      "d",
      describeArcPath(
        box,
        frame.padding,
        frame.strokeWidth,
        segment.startAngle,
        segment.length,
      ),
    );
    path.setAttribute("stroke", color ? toCssRgb(color) : "none");
    path.setAttribute(
      "stroke-opacity",
      String(segment.colorAlphaScale * frame.opacity),
    );
    path.setAttribute("stroke-width", String(frame.strokeWidth));
  };

  const paint = (frame: ArcFrame): void => {
    const box: ArcBox = {
      width: container.clientWidth,
      height: container.clientHeight,
    };

    svg.setAttribute("viewBox", `0 0 ${box.width} ${box.height}`);
    paintPart(track, frame.track, box, frame);
    paintPart(thumb, frame.thumb, box, frame);

    lastFrame = frame;
    paintCount++;
  };

  // Container resizes change the arc radius without changing the frame
  const resizeObserver =
    typeof ResizeObserver === "function"
      ? new ResizeObserver(() => {
          if (lastFrame) paint(lastFrame);
        })
      : null;
  resizeObserver?.observe(container);

  // ===========================================================================
  // Cleanup
  // ===========================================================================

  const destroy = (): void => {
    resizeObserver?.disconnect();
    if (svg.parentNode) {
      svg.parentNode.removeChild(svg);
    }
  };

  return {
    element: svg,
    paint,
    destroy,
    getPaintCount: () => paintCount,
  };
};
