import z from "zod";
import {
  ExportSettingsSchema,
  WatermarkSpecSchema,
  type ExportSettings,
  type WatermarkSpec,
} from "@photomark/shared";
import { WatermarkError } from "./watermark.errors";

export const CanvasSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const PreviewBodySchema = z.object({
  sourcePath: z.string().min(1),
  spec: WatermarkSpecSchema,
});

export const ExportBodySchema = z
  .object({
    sourcePaths: z.array(z.string().min(1)).min(1),
    spec: WatermarkSpecSchema,
    settings: ExportSettingsSchema,
    // canvas a pixel offset was dragged on; turns it into a ratio before the batch
    previewCanvas: CanvasSizeSchema.optional(),
  })
  .superRefine((body, ctx) => {
    const { offset } = body.spec;
    if (offset.kind === "pixel" && (offset.dx !== 0 || offset.dy !== 0) && !body.previewCanvas) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["previewCanvas"],
        message: "Required with a pixel offset",
      });
    }
  });

export const CollectBodySchema = z.object({
  inputs: z.array(z.string().min(1)).min(1),
});

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new WatermarkError("INVALID_PARAMETER", `Invalid ${what}`, { details: parsed.error.issues });
  }
  return parsed.data;
}

export function parseWatermarkSpec(input: unknown): WatermarkSpec {
  return parseOrThrow(WatermarkSpecSchema, input, "watermark spec");
}

export function parseExportSettings(input: unknown): ExportSettings {
  return parseOrThrow(ExportSettingsSchema, input, "export settings");
}
