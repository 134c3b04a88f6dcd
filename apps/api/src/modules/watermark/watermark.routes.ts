import { Router, type Response } from "express";
import path from "path";
import { uploadWatermarkImage } from "@/lib/uploads";
import { getErrorMessage } from "@/lib/getErrorMessage";
import { renderPreview } from "./composeWatermark";
import { exportBatch } from "./exporter";
import { collectImagePaths, type PreviewCap } from "./imageLoader";
import type { LayerRenderer } from "./layerRenderer";
import { CollectBodySchema, ExportBodySchema, PreviewBodySchema } from "./watermark.schemas";
import { WatermarkError } from "./watermark.errors";

type UploadWatermarkResponse = { path: string };

/** Source file whose folder is the output folder, if any. */
export function findSourceDirConflict(sourcePaths: readonly string[], outputDir: string): string | null {
  const out = path.resolve(outputDir);
  return sourcePaths.find((p) => path.dirname(path.resolve(p)) === out) ?? null;
}

function sendError(res: Response, tag: string, err: unknown) {
  if (err instanceof WatermarkError) {
    return res.status(err.status).json({ error: err.message, code: err.code, details: err.details });
  }
  console.error(`[${tag}] error`, err);
  return res.status(500).json({ error: "Internal server error", details: getErrorMessage(err) });
}

export function createWatermarkRouter(deps: { renderer: LayerRenderer; previewCap: PreviewCap }) {
  const { renderer, previewCap } = deps;
  const router = Router();

  router.post("/preview", async (req, res) => {
    const parsed = PreviewBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid body", code: "INVALID_PARAMETER", details: parsed.error.issues });
    }

    try {
      const { sourcePath, spec } = parsed.data;
      const preview = await renderPreview(sourcePath, spec, renderer, previewCap);
      const png = await preview.image.encode("png");

      res.setHeader("X-Canvas-Width", String(preview.canvas.width));
      res.setHeader("X-Canvas-Height", String(preview.canvas.height));
      res.setHeader("X-Offset-Ratio", `${preview.ratioOffset.rx},${preview.ratioOffset.ry}`);
      return res.type("png").send(png);
    } catch (err) {
      return sendError(res, "POST /watermark/preview", err);
    }
  });

  router.post("/export", async (req, res) => {
    const parsed = ExportBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid body", code: "INVALID_PARAMETER", details: parsed.error.issues });
    }

    const { sourcePaths, spec, settings, previewCanvas } = parsed.data;

    const conflict = findSourceDirConflict(sourcePaths, settings.outputDir);
    if (conflict) {
      return res.status(400).json({
        error: "Output dir must differ from the source image folder",
        code: "OUTPUT_DIR_IS_SOURCE_DIR",
        details: conflict,
      });
    }

    try {
      const result = await exportBatch(sourcePaths, spec, settings, renderer, {
        previewCap,
        measuredOn: previewCanvas,
      });
      return res.json(result);
    } catch (err) {
      return sendError(res, "POST /watermark/export", err);
    }
  });

  router.post("/collect", (req, res) => {
    const parsed = CollectBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid body", code: "INVALID_PARAMETER", details: parsed.error.issues });
    }

    try {
      return res.json({ items: collectImagePaths(parsed.data.inputs) });
    } catch (err) {
      return sendError(res, "POST /watermark/collect", err);
    }
  });

  router.post("/images", uploadWatermarkImage("file"), (req, res) => {
    const f = req.file;
    if (!f) return res.status(400).json({ error: "No file uploaded" });

    const body: UploadWatermarkResponse = { path: f.path };
    return res.json(body);
  });

  return router;
}
