export * from "./watermark/watermark.types";
export * from "./watermark/anchor";
export * from "./watermark/offsetRatio";
export * from "./watermark/placement";
export * from "./watermark/sizing";
export * from "./watermark/coalesce";
export * from "./utils/math";
