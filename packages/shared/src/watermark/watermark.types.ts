import { z } from "zod";

export const ANCHORS = [
  "top-left",
  "top-center",
  "top-right",
  "middle-left",
  "center",
  "middle-right",
  "bottom-left",
  "bottom-center",
  "bottom-right",
] as const;

export const AnchorSchema = z.enum(ANCHORS);
export type Anchor = z.infer<typeof AnchorSchema>;

export type Size = { width: number; height: number };
export type Point = { x: number; y: number };

export const RgbColorSchema = z.object({
  r: z.number().int().min(0).max(255),
  g: z.number().int().min(0).max(255),
  b: z.number().int().min(0).max(255),
});
export type RgbColor = z.infer<typeof RgbColorSchema>;

export const TextLayerSpecSchema = z.object({
  kind: z.literal("text"),
  content: z.string(),
  fontSize: z.number().min(6).max(400),
  color: RgbColorSchema,
  opacity: z.number().min(0).max(1),
  fontFamily: z.string().min(1).optional(),
  // .ttf/.otf to register before drawing; its family wins over fontFamily
  fontPath: z.string().min(1).optional(),
});
export type TextLayerSpec = z.infer<typeof TextLayerSpecSchema>;

export const ImageLayerSpecSchema = z.object({
  kind: z.literal("image"),
  sourcePath: z.string().min(1),
  // percent of the base image width
  scalePercent: z.number().min(1).max(400),
  opacity: z.number().min(0).max(1),
});
export type ImageLayerSpec = z.infer<typeof ImageLayerSpecSchema>;

export const WatermarkLayerSpecSchema = z.discriminatedUnion("kind", [
  TextLayerSpecSchema,
  ImageLayerSpecSchema,
]);
export type WatermarkLayerSpec = z.infer<typeof WatermarkLayerSpecSchema>;

export const PixelOffsetSchema = z.object({
  kind: z.literal("pixel"),
  dx: z.number().finite(),
  dy: z.number().finite(),
});
export type PixelOffset = z.infer<typeof PixelOffsetSchema>;

export const RatioOffsetSchema = z.object({
  kind: z.literal("ratio"),
  rx: z.number().finite(),
  ry: z.number().finite(),
});
export type RatioOffset = z.infer<typeof RatioOffsetSchema>;

export const PlacementOffsetSchema = z.discriminatedUnion("kind", [
  PixelOffsetSchema,
  RatioOffsetSchema,
]);
export type PlacementOffset = z.infer<typeof PlacementOffsetSchema>;

export const WatermarkSpecSchema = z.object({
  anchor: AnchorSchema,
  offset: PlacementOffsetSchema.default({ kind: "pixel", dx: 0, dy: 0 }),
  rotationDegrees: z.number().int().min(-180).max(180).default(0),
  layer: WatermarkLayerSpecSchema,
});
export type WatermarkSpec = z.infer<typeof WatermarkSpecSchema>;
export type WatermarkSpecInput = z.input<typeof WatermarkSpecSchema>;

export const ExportFormatSchema = z.enum(["png", "jpeg"]);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const NamingRuleSchema = z.object({
  rule: z.enum(["keep", "prefix", "suffix"]).default("keep"),
  prefix: z.string().default(""),
  suffix: z.string().default(""),
});
export type NamingRule = z.infer<typeof NamingRuleSchema>;

export const ResizeSettingsSchema = z.object({
  mode: z.enum(["width", "height", "percent"]),
  value: z.number().int().positive(),
});
export type ResizeSettings = z.infer<typeof ResizeSettingsSchema>;

// "preview" re-derives every export from the preview-capped image (what the user approved);
// "original" composes at full resolution through the ratio offset
export const BaseResolutionSchema = z.enum(["preview", "original"]);
export type BaseResolution = z.infer<typeof BaseResolutionSchema>;

export const ExportSettingsSchema = z.object({
  outputDir: z.string().min(1),
  format: ExportFormatSchema.default("png"),
  naming: NamingRuleSchema.default({}),
  jpegQuality: z.number().int().min(1).max(100).default(90),
  resize: ResizeSettingsSchema.optional(),
  baseResolution: BaseResolutionSchema.default("preview"),
});
export type ExportSettings = z.infer<typeof ExportSettingsSchema>;
export type ExportSettingsInput = z.input<typeof ExportSettingsSchema>;

export type ExportBatchResult = {
  successCount: number;
  failureCount: number;
};
