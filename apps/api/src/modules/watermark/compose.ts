import { createCanvas, type Canvas } from "@napi-rs/canvas";
import type { Point } from "@photomark/shared";
import { copyCanvas } from "../../lib/bitmap";
import type { RenderedLayer } from "./layerRenderer";

/**
 * The one compositing step used by both preview and export.
 *
 * The layer is pasted onto a transparent canvas of the base size (anything
 * outside the base is clipped), then that canvas is drawn over a copy of the
 * base with source-over. `base` is left untouched.
 */
export function compose(base: Canvas, layer: RenderedLayer, position: Point): Canvas {
  const W = base.width;
  const H = base.height;

  // integer placement: no resampling of the layer
  const x = Math.round(position.x);
  const y = Math.round(position.y);

  const scratch = createCanvas(W, H);
  scratch.getContext("2d").drawImage(layer.bitmap, x, y);

  const out = copyCanvas(base);
  const ctx = out.getContext("2d");
  ctx.globalCompositeOperation = "source-over";
  ctx.drawImage(scratch, 0, 0);

  return out;
}
