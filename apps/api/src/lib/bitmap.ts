// Works with Canvas (@napi-rs/canvas) as the RGBA bitmap type of the engine

import { createCanvas, type Canvas } from "@napi-rs/canvas";

export type RawRgba = { data: Buffer; width: number; height: number };

export function rgbaToCanvas(raw: RawRgba): Canvas {
  const { data, width, height } = raw;
  if (data.length !== width * height * 4) {
    throw new Error(`RGBA buffer size mismatch: ${data.length} bytes for ${width}x${height}`);
  }

  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext("2d");
  const imageData = ctx.createImageData(width, height);
  imageData.data.set(data);
  ctx.putImageData(imageData, 0, 0);
  return canvas;
}

export function canvasToRgba(canvas: Canvas): RawRgba {
  const { width, height } = canvas;
  const pixels = canvas.getContext("2d").getImageData(0, 0, width, height).data;
  return {
    data: Buffer.from(pixels.buffer, pixels.byteOffset, pixels.byteLength),
    width,
    height,
  };
}

export function copyCanvas(src: Canvas): Canvas {
  const out = createCanvas(src.width, src.height);
  out.getContext("2d").drawImage(src, 0, 0);
  return out;
}

// 1x1 fully transparent bitmap: the invisible watermark
export function transparentPixel(): Canvas {
  return createCanvas(1, 1);
}
