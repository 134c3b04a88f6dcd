import { resolveAnchor } from "./anchor";
import type {
  Anchor,
  PixelOffset,
  PlacementOffset,
  RatioOffset,
  Size,
} from "./watermark.types";

// Offsets dragged on the (downscaled) preview canvas are kept as a fraction of
// the canvas so they can be replayed on a canvas of any other resolution.
// The layer itself does not scale with the canvas (font size is in px), so the
// replay keeps the relative inset, not the exact visual relation to the layer.

export function toRatioOffset(offset: { dx: number; dy: number }, canvas: Size): RatioOffset {
  return {
    kind: "ratio",
    rx: canvas.width > 0 ? offset.dx / canvas.width : 0,
    ry: canvas.height > 0 ? offset.dy / canvas.height : 0,
  };
}

// rounded, not truncated: rx * W must give back dx when W did not change
export function toPixelOffset(offset: { rx: number; ry: number }, canvas: Size): PixelOffset {
  return {
    kind: "pixel",
    dx: Math.round(offset.rx * canvas.width),
    dy: Math.round(offset.ry * canvas.height),
  };
}

/**
 * Ratio of the user's placement on the preview canvas, measured from the anchor
 * base the layer had on that canvas.
 */
export function captureRatioOffset(
  previewCanvas: Size,
  previewLayer: Size,
  anchor: Anchor,
  pixelOffset: { dx: number; dy: number }
): RatioOffset {
  const base = resolveAnchor(
    previewCanvas.width,
    previewCanvas.height,
    previewLayer.width,
    previewLayer.height,
    anchor
  );
  const actualX = base.x + pixelOffset.dx;
  const actualY = base.y + pixelOffset.dy;

  return toRatioOffset({ dx: actualX - base.x, dy: actualY - base.y }, previewCanvas);
}

/** Pixel offset to apply on `canvas`. Pixel offsets are taken as measured on it. */
export function resolveOffsetPixels(offset: PlacementOffset, canvas: Size): { dx: number; dy: number } {
  if (offset.kind === "pixel") {
    return { dx: Math.round(offset.dx), dy: Math.round(offset.dy) };
  }
  const px = toPixelOffset(offset, canvas);
  return { dx: px.dx, dy: px.dy };
}

/** Normalises any offset to a ratio against the canvas it was measured on. */
export function normalizeToRatio(offset: PlacementOffset, measuredOn: Size): RatioOffset {
  return offset.kind === "ratio" ? offset : toRatioOffset(offset, measuredOn);
}
