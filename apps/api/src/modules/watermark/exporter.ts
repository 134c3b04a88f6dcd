import fsp from "fs/promises";
import sharp from "sharp";
import type { Canvas } from "@napi-rs/canvas";
import {
  computeResizeSize,
  normalizeToRatio,
  type ExportBatchResult,
  type ExportSettings,
  type ExportSettingsInput,
  type Size,
  type WatermarkSpec,
  type WatermarkSpecInput,
} from "@photomark/shared";
import { canvasToRgba } from "../../lib/bitmap";
import { composeWatermark } from "./composeWatermark";
import { DEFAULT_PREVIEW_CAP, loadBaseImage, type PreviewCap } from "./imageLoader";
import type { LayerRenderer } from "./layerRenderer";
import { buildOutputName, resolveCollisionFreePath } from "./naming";
import { parseExportSettings, parseWatermarkSpec } from "./watermark.schemas";
import { toWatermarkError, WatermarkError } from "./watermark.errors";

export type ExportItemResult =
  | { sourcePath: string; ok: true; outputPath: string }
  | { sourcePath: string; ok: false; error: WatermarkError };

export type ExportBatchOptions = {
  previewCap?: PreviewCap;
  // canvas a pixel offset was measured on (the preview the user dragged on)
  measuredOn?: Size;
  // per-file detail for callers that want more than the counts
  onItem?: (item: ExportItemResult) => void;
};

/**
 * Spec as replayed on every export canvas: a pixel offset only holds on the
 * canvas it was measured on, so it becomes a ratio of that canvas.
 * A zero pixel offset needs no canvas.
 */
export function toExportSpec(spec: WatermarkSpec, measuredOn?: Size): WatermarkSpec {
  const { offset } = spec;
  if (offset.kind === "ratio") return spec;

  if (offset.dx === 0 && offset.dy === 0) {
    return { ...spec, offset: { kind: "ratio", rx: 0, ry: 0 } };
  }

  if (!measuredOn || measuredOn.width <= 0 || measuredOn.height <= 0) {
    throw new WatermarkError(
      "INVALID_PARAMETER",
      "A pixel offset needs the canvas it was measured on",
      { details: { offset } }
    );
  }

  return { ...spec, offset: normalizeToRatio(offset, measuredOn) };
}

async function writeImage(image: Canvas, settings: ExportSettings, outPath: string) {
  const raw = canvasToRgba(image);

  let pipeline = sharp(raw.data, {
    raw: { width: raw.width, height: raw.height, channels: 4 },
  });

  const target = computeResizeSize(raw.width, raw.height, settings.resize);
  if (target) {
    pipeline = pipeline.resize(target.width, target.height, { kernel: sharp.kernel.lanczos3, fit: "fill" });
  }

  // blending is already baked into the pixels, dropping alpha for JPEG is safe
  pipeline = settings.format === "png"
    ? pipeline.png()
    : pipeline.removeAlpha().jpeg({ quality: settings.jpegQuality });

  await pipeline.toFile(outPath);
}

async function exportOne(
  sourcePath: string,
  spec: WatermarkSpec,
  settings: ExportSettings,
  renderer: LayerRenderer,
  cap: PreviewCap
): Promise<string> {
  const base = await loadBaseImage(sourcePath, settings.baseResolution, cap);
  const { image } = await composeWatermark(base, spec, renderer);

  const fileName = buildOutputName(sourcePath, settings.naming, settings.format);
  const outPath = resolveCollisionFreePath(settings.outputDir, fileName);

  try {
    await writeImage(image, settings, outPath);
  } catch (err) {
    throw toWatermarkError(err, "WRITE_FAILURE", `Cannot write ${outPath}`);
  }

  return outPath;
}

/**
 * Watermarks every source image and writes it to `settings.outputDir`.
 *
 * Spec and settings are validated up front (INVALID_PARAMETER is thrown before
 * any file is touched); a pixel offset is turned into a ratio of `measuredOn`.
 * After that a failing image is logged and counted, and the batch moves on.
 */
export async function exportBatch(
  sourcePaths: readonly string[],
  specInput: WatermarkSpecInput,
  settingsInput: ExportSettingsInput,
  renderer: LayerRenderer,
  opts: ExportBatchOptions = {}
): Promise<ExportBatchResult> {
  const spec = toExportSpec(parseWatermarkSpec(specInput), opts.measuredOn);
  const settings = parseExportSettings(settingsInput);
  const cap = opts.previewCap ?? DEFAULT_PREVIEW_CAP;

  try {
    await fsp.mkdir(settings.outputDir, { recursive: true });
  } catch (err) {
    throw toWatermarkError(err, "WRITE_FAILURE", `Cannot create output dir ${settings.outputDir}`);
  }

  let successCount = 0;
  let failureCount = 0;

  for (const sourcePath of sourcePaths) {
    let item: ExportItemResult;

    try {
      const outputPath = await exportOne(sourcePath, spec, settings, renderer, cap);
      successCount++;
      item = { sourcePath, ok: true, outputPath };
    } catch (err) {
      failureCount++;
      const error = toWatermarkError(err, "WRITE_FAILURE", `Cannot export ${sourcePath}`);
      console.warn("[export] failed:", sourcePath, error.code, error.message);
      item = { sourcePath, ok: false, error };
    }

    opts.onItem?.(item);
  }

  console.log("[export] done:", { successCount, failureCount, outputDir: settings.outputDir });

  return { successCount, failureCount };
}
