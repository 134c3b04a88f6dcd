import type { Canvas } from "@napi-rs/canvas";
import {
  captureRatioOffset,
  resolveAnchor,
  resolveOffsetPixels,
  type Point,
  type RatioOffset,
  type Size,
  type WatermarkSpec,
} from "@photomark/shared";
import { compose } from "./compose";
import { DEFAULT_PREVIEW_CAP, loadBaseImage, type PreviewCap } from "./imageLoader";
import type { LayerRenderer } from "./layerRenderer";

export type ComposedWatermark = {
  image: Canvas;
  canvas: Size;
  layer: Size;
  position: Point;
};

export type PreviewResult = ComposedWatermark & {
  // placement as a fraction of the preview canvas, ready for export
  ratioOffset: RatioOffset;
};

/**
 * Renders the layer against `base`, places it by anchor + offset and composes.
 * Preview and export both go through here.
 */
export async function composeWatermark(
  base: Canvas,
  spec: WatermarkSpec,
  renderer: LayerRenderer
): Promise<ComposedWatermark> {
  const canvas = { width: base.width, height: base.height };
  const layer = await renderer.render(spec.layer, canvas.width, spec.rotationDegrees);

  const anchor = resolveAnchor(canvas.width, canvas.height, layer.width, layer.height, spec.anchor);
  const offset = resolveOffsetPixels(spec.offset, canvas);
  const position = { x: anchor.x + offset.dx, y: anchor.y + offset.dy };

  return {
    image: compose(base, layer, position),
    canvas,
    layer: { width: layer.width, height: layer.height },
    position,
  };
}

/** Live preview of one source image on the capped preview canvas. */
export async function renderPreview(
  sourcePath: string,
  spec: WatermarkSpec,
  renderer: LayerRenderer,
  cap: PreviewCap = DEFAULT_PREVIEW_CAP
): Promise<PreviewResult> {
  const base = await loadBaseImage(sourcePath, "preview", cap);
  const composed = await composeWatermark(base, spec, renderer);

  const ratioOffset = captureRatioOffset(
    composed.canvas,
    composed.layer,
    spec.anchor,
    resolveOffsetPixels(spec.offset, composed.canvas)
  );

  return { ...composed, ratioOffset };
}
