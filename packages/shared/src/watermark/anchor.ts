import type { Anchor, Point } from "./watermark.types";

export const ANCHOR_MARGIN = 16;

/**
 * Top-left corner of a layer placed on a canvas by one of the nine anchors.
 * Edge anchors keep {@link ANCHOR_MARGIN} px from their edges, centred axes
 * split the free space (floored). Anything that is not a known anchor lands
 * bottom-right. Results are not clamped: callers may push the layer off-canvas.
 */
export function resolveAnchor(
  canvasW: number,
  canvasH: number,
  layerW: number,
  layerH: number,
  anchor: Anchor | string
): Point {
  const m = ANCHOR_MARGIN;

  const left = m;
  const centerX = Math.floor((canvasW - layerW) / 2);
  const right = canvasW - layerW - m;

  const top = m;
  const middleY = Math.floor((canvasH - layerH) / 2);
  const bottom = canvasH - layerH - m;

  switch (anchor) {
    case "top-left": return { x: left, y: top };
    case "top-center": return { x: centerX, y: top };
    case "top-right": return { x: right, y: top };
    case "middle-left": return { x: left, y: middleY };
    case "center": return { x: centerX, y: middleY };
    case "middle-right": return { x: right, y: middleY };
    case "bottom-left": return { x: left, y: bottom };
    case "bottom-center": return { x: centerX, y: bottom };
    case "bottom-right":
    default:
      return { x: right, y: bottom };
  }
}
