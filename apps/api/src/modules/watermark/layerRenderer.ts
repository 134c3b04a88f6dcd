import path from "path";
import { createCanvas, GlobalFonts, type Canvas } from "@napi-rs/canvas";
import {
  clamp,
  clamp01,
  degToRad,
  normalizeRotation,
  type ImageLayerSpec,
  type RgbColor,
  type TextLayerSpec,
  type WatermarkLayerSpec,
} from "@photomark/shared";
import { transparentPixel } from "../../lib/bitmap";
import { decodeImageFile } from "./imageLoader";

export const MIN_FONT_SIZE = 6;
export const MAX_FONT_SIZE = 400;
export const DEFAULT_FONT_FAMILY = "sans-serif";

/** Transparent bitmap holding only the watermark, sized to its own content. */
export type RenderedLayer = {
  bitmap: Canvas;
  width: number;
  height: number;
};

function layerOf(bitmap: Canvas): RenderedLayer {
  return { bitmap, width: bitmap.width, height: bitmap.height };
}

function emptyLayer(): RenderedLayer {
  return layerOf(transparentPixel());
}

function rgba(c: RgbColor, alpha: number) {
  return `rgba(${c.r}, ${c.g}, ${c.b}, ${clamp01(alpha)})`;
}

function wrapFontFamily(name: string) {
  const generic = ["serif", "sans-serif", "monospace", "cursive", "fantasy", "system-ui"];
  return generic.includes(name) ? name : `"${name.replace(/"/g, "")}"`;
}

// trims float noise so 90deg does not grow the box by a pixel
function ceilPx(v: number) {
  return Math.max(1, Math.ceil(Number(v.toFixed(6))));
}

/**
 * Renders watermark layers. Owns the decoded watermark-image cache (by path)
 * and the registered-font cache (by font file path); one instance is created
 * by the caller and passed to preview and export alike.
 */
export class LayerRenderer {
  private readonly images = new Map<string, Canvas>();
  private readonly fonts = new Map<string, string>();

  async render(layer: WatermarkLayerSpec, baseWidth: number, rotationDegrees = 0): Promise<RenderedLayer> {
    const flat = layer.kind === "text"
      ? this.renderText(layer)
      : await this.renderImage(layer, baseWidth);

    return this.rotate(flat, rotationDegrees);
  }

  renderText(spec: TextLayerSpec): RenderedLayer {
    const text = spec.content;
    if (!text) return emptyLayer();

    const size = clamp(Math.round(spec.fontSize), MIN_FONT_SIZE, MAX_FONT_SIZE);
    const family = this.resolveFontFamily(spec);
    const font = `${size}px ${wrapFontFamily(family)}`;

    const probe = createCanvas(1, 1).getContext("2d");
    probe.font = font;
    const metrics = probe.measureText(text);

    const ascent = metrics.fontBoundingBoxAscent ?? size * 0.8;
    const descent = metrics.fontBoundingBoxDescent ?? size * 0.2;

    const w = Math.ceil(metrics.width);
    const h = Math.ceil(ascent + descent);
    if (!(w > 0) || !(h > 0)) return emptyLayer();

    const canvas = createCanvas(w, h);
    const ctx = canvas.getContext("2d");
    ctx.font = font;
    ctx.textBaseline = "alphabetic";
    // opacity goes into the fill colour, glyph edges are blended once
    ctx.fillStyle = rgba(spec.color, spec.opacity);
    ctx.fillText(text, 0, ascent);

    return layerOf(canvas);
  }

  async renderImage(spec: ImageLayerSpec, baseWidth: number): Promise<RenderedLayer> {
    const src = await this.getWatermarkBitmap(spec.sourcePath);

    const pct = clamp(spec.scalePercent, 1, 400);
    const w = Math.max(1, Math.round((pct / 100) * baseWidth));
    const h = Math.max(1, Math.round((src.height * w) / src.width));

    const canvas = createCanvas(w, h);
    const ctx = canvas.getContext("2d");
    ctx.imageSmoothingEnabled = true;
    ctx.imageSmoothingQuality = "high";

    const opacity = clamp01(spec.opacity);
    if (opacity < 1) ctx.globalAlpha = opacity;
    ctx.drawImage(src, 0, 0, w, h);

    return layerOf(canvas);
  }

  /** Rotates around the centre; the box grows to hold the rotated corners. */
  rotate(layer: RenderedLayer, degrees: number): RenderedLayer {
    const deg = normalizeRotation(degrees);
    if (deg === 0) return layer;

    const theta = degToRad(deg);
    const cos = Math.abs(Math.cos(theta));
    const sin = Math.abs(Math.sin(theta));
    const { width: w, height: h } = layer;

    const outW = ceilPx(w * cos + h * sin);
    const outH = ceilPx(w * sin + h * cos);

    const canvas = createCanvas(outW, outH);
    const ctx = canvas.getContext("2d");
    ctx.imageSmoothingEnabled = true;
    ctx.imageSmoothingQuality = "high";
    ctx.translate(outW / 2, outH / 2);
    ctx.rotate(theta);
    ctx.drawImage(layer.bitmap, -w / 2, -h / 2);

    return layerOf(canvas);
  }

  async getWatermarkBitmap(sourcePath: string): Promise<Canvas> {
    const key = path.resolve(sourcePath);
    const cached = this.images.get(key);
    if (cached) return cached;

    const bitmap = await decodeImageFile(key);
    this.images.set(key, bitmap);
    return bitmap;
  }

  /** Call when the user reselects a watermark file. */
  forgetImage(sourcePath: string) {
    this.images.delete(path.resolve(sourcePath));
  }

  clear() {
    this.images.clear();
    this.fonts.clear();
  }

  /**
   * Registers a font file with the canvas host once and returns its family.
   * Returns null when the host rejects the file.
   */
  registerFont(fontPath: string): string | null {
    const key = path.resolve(fontPath);
    const known = this.fonts.get(key);
    if (known) return known;

    const family = `pm-${path.basename(key, path.extname(key))}`;
    const ok = GlobalFonts.registerFromPath(key, family);
    if (!ok) {
      console.warn("[fonts] registerFromPath returned false:", key);
      return null;
    }

    this.fonts.set(key, family);
    return family;
  }

  private resolveFontFamily(spec: TextLayerSpec): string {
    if (spec.fontPath) {
      const family = this.registerFont(spec.fontPath);
      if (family) return family;
    }
    return spec.fontFamily ?? DEFAULT_FONT_FAMILY;
  }
}
