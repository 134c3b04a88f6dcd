import type { ResizeSettings, Size } from "./watermark.types";

export const PREVIEW_MAX_W = 900;
export const PREVIEW_MAX_H = 700;

// truncation that does not drop a pixel to float noise (x.9999999)
const truncPx = (v: number) => Math.max(1, Math.trunc(v + 1e-9));

/**
 * Preview canvas size: uniform scale to fit maxW x maxH, never upscaled.
 * Dimensions are truncated and kept at least 1 px.
 */
export function fitPreviewSize(
  width: number,
  height: number,
  maxW: number = PREVIEW_MAX_W,
  maxH: number = PREVIEW_MAX_H
): Size & { scale: number } {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    return { width: 1, height: 1, scale: 1 };
  }

  const scale = Math.min(maxW / width, maxH / height, 1);
  if (scale >= 1) return { width, height, scale: 1 };

  return {
    width: truncPx(width * scale),
    height: truncPx(height * scale),
    scale,
  };
}

// target size of the export resize step; null = keep as is
export function computeResizeSize(width: number, height: number, resize?: ResizeSettings): Size | null {
  if (!resize) return null;

  const v = Math.trunc(resize.value);
  if (!Number.isFinite(v) || v <= 0) return null;

  switch (resize.mode) {
    case "width":
      return { width: v, height: truncPx((height * v) / width) };
    case "height":
      return { width: truncPx((width * v) / height), height: v };
    case "percent": {
      const r = v / 100;
      return {
        width: truncPx(width * r),
        height: truncPx(height * r),
      };
    }
    default:
      return null;
  }
}
