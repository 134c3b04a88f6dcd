import fs from "fs";
import os from "os";
import path from "path";
import sharp from "sharp";
import { createCanvas, type Canvas } from "@napi-rs/canvas";

export type Rgba = { r: number; g: number; b: number; alpha?: number };

export function makeTempDir(prefix = "photomark-") {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export async function writeSolidImage(filePath: string, width: number, height: number, color: Rgba) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const img = sharp({
    create: { width, height, channels: 4, background: { r: color.r, g: color.g, b: color.b, alpha: color.alpha ?? 1 } },
  });

  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".jpg" || ext === ".jpeg") await img.jpeg({ quality: 95 }).toFile(filePath);
  else if (ext === ".tif" || ext === ".tiff") await img.tiff().toFile(filePath);
  else await img.png().toFile(filePath);

  return filePath;
}

// 24-bit uncompressed BMP, bottom-up rows padded to 4 bytes
export function writeSolidBmp(filePath: string, width: number, height: number, color: Rgba) {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const buf = Buffer.alloc(54 + pixelBytes);

  buf.write("BM", 0, "ascii");
  buf.writeUInt32LE(buf.length, 2);
  buf.writeUInt32LE(54, 10);
  buf.writeUInt32LE(40, 14);
  buf.writeInt32LE(width, 18);
  buf.writeInt32LE(height, 22);
  buf.writeUInt16LE(1, 26);
  buf.writeUInt16LE(24, 28);
  buf.writeUInt32LE(0, 30);
  buf.writeUInt32LE(pixelBytes, 34);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const o = 54 + y * rowSize + x * 3;
      buf[o] = color.b;
      buf[o + 1] = color.g;
      buf[o + 2] = color.r;
    }
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, buf);
  return filePath;
}

export async function readRgba(filePath: string) {
  const { data, info } = await sharp(filePath).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

export function solidCanvas(width: number, height: number, css: string): Canvas {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext("2d");
  ctx.fillStyle = css;
  ctx.fillRect(0, 0, width, height);
  return canvas;
}

export function pixelAt(canvas: Canvas, x: number, y: number): [number, number, number, number] {
  const d = canvas.getContext("2d").getImageData(x, y, 1, 1).data;
  return [d[0], d[1], d[2], d[3]];
}

export function alphaChannel(canvas: Canvas): number[] {
  const d = canvas.getContext("2d").getImageData(0, 0, canvas.width, canvas.height).data;
  const out: number[] = [];
  for (let i = 3; i < d.length; i += 4) out.push(d[i]);
  return out;
}
