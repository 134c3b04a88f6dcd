import path from "path";
import fs from "fs";
import fsp from "fs/promises";
import sharp from "sharp";
import { createCanvas, loadImage, type Canvas } from "@napi-rs/canvas";
import { fitPreviewSize, PREVIEW_MAX_H, PREVIEW_MAX_W, type BaseResolution } from "@photomark/shared";
import { rgbaToCanvas } from "../../lib/bitmap";
import { toWatermarkError } from "./watermark.errors";

export const SUPPORTED_EXT = new Set([".jpg", ".jpeg", ".png", ".bmp", ".tif", ".tiff"]);

export type PreviewCap = { maxW: number; maxH: number };

export const DEFAULT_PREVIEW_CAP: PreviewCap = { maxW: PREVIEW_MAX_W, maxH: PREVIEW_MAX_H };

export function isSupportedImagePath(p: string) {
  return SUPPORTED_EXT.has(path.extname(p).toLowerCase());
}

// libvips has no BMP loader, skia does
async function decodeBmp(filePath: string): Promise<Canvas> {
  const img = await loadImage(await fsp.readFile(filePath));
  const canvas = createCanvas(img.width, img.height);
  canvas.getContext("2d").drawImage(img, 0, 0);
  return canvas;
}

async function decodeWithSharp(filePath: string): Promise<Canvas> {
  const { data, info } = await sharp(filePath)
    .rotate() // EXIF orientation
    .toColourspace("srgb")
    .ensureAlpha()
    .raw({ depth: "uchar" })
    .toBuffer({ resolveWithObject: true });

  return rgbaToCanvas({ data, width: info.width, height: info.height });
}

/** Decodes an image file at full resolution into an RGBA canvas. */
export async function decodeImageFile(filePath: string): Promise<Canvas> {
  try {
    if (path.extname(filePath).toLowerCase() === ".bmp") return await decodeBmp(filePath);
    return await decodeWithSharp(filePath);
  } catch (err) {
    throw toWatermarkError(err, "LOAD_FAILURE", `Cannot load image ${filePath}`);
  }
}

async function downscale(full: Canvas, width: number, height: number): Promise<Canvas> {
  const src = full.getContext("2d").getImageData(0, 0, full.width, full.height).data;

  const { data, info } = await sharp(Buffer.from(src.buffer, src.byteOffset, src.byteLength), {
    raw: { width: full.width, height: full.height, channels: 4 },
  })
    .resize(width, height, { kernel: sharp.kernel.lanczos3, fit: "fill" })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return rgbaToCanvas({ data, width: info.width, height: info.height });
}

/**
 * Base image for composition. "preview" applies the on-screen preview cap
 * (uniform, never upscaled); "original" keeps the decoded resolution.
 */
export async function loadBaseImage(
  filePath: string,
  resolution: BaseResolution = "preview",
  cap: PreviewCap = DEFAULT_PREVIEW_CAP
): Promise<Canvas> {
  const full = await decodeImageFile(filePath);
  if (resolution === "original") return full;

  const target = fitPreviewSize(full.width, full.height, cap.maxW, cap.maxH);
  if (target.scale >= 1) return full;

  try {
    return await downscale(full, target.width, target.height);
  } catch (err) {
    throw toWatermarkError(err, "LOAD_FAILURE", `Cannot scale image ${filePath}`);
  }
}

/**
 * Expands files and folders (recursively) into supported image paths,
 * keeping the input order and dropping duplicates.
 */
export function collectImagePaths(inputs: readonly string[]): string[] {
  const found: string[] = [];

  const walk = (dir: string) => {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => a.name.localeCompare(b.name));

    for (const e of entries) {
      const abs = path.join(dir, e.name);
      if (e.isDirectory()) walk(abs);
      else if (e.isFile() && isSupportedImagePath(abs)) found.push(abs);
    }
  };

  for (const p of inputs) {
    if (!fs.existsSync(p)) continue;

    const stat = fs.statSync(p);
    if (stat.isDirectory()) walk(p);
    else if (stat.isFile() && isSupportedImagePath(p)) found.push(p);
  }

  return [...new Set(found)];
}
