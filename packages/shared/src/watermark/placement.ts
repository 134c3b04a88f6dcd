import { clamp } from "../utils/math";
import type { PlacementOffset, Size, WatermarkLayerSpec, WatermarkSpec } from "./watermark.types";

export type DragDelta = { dx: number; dy: number };

export function normalizeRotation(deg: number) {
  if (!Number.isFinite(deg)) return 0;
  return clamp(Math.round(deg), -180, 180);
}

// drag deltas are measured on `canvas`; ratio offsets stay ratios
export function applyDragDelta(offset: PlacementOffset, delta: DragDelta, canvas: Size): PlacementOffset {
  if (offset.kind === "pixel") {
    return { kind: "pixel", dx: offset.dx + delta.dx, dy: offset.dy + delta.dy };
  }

  return {
    kind: "ratio",
    rx: offset.rx + (canvas.width > 0 ? delta.dx / canvas.width : 0),
    ry: offset.ry + (canvas.height > 0 ? delta.dy / canvas.height : 0),
  };
}

/**
 * Swaps text <-> image watermark. Anchor, offset and rotation are kept as is;
 * the next render reinterprets the offset against the new layer's box.
 */
export function switchWatermarkLayer(spec: WatermarkSpec, layer: WatermarkLayerSpec): WatermarkSpec {
  return { ...spec, layer };
}
