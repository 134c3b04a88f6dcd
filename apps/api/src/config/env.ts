import path from "path";
import z from "zod";
import { PREVIEW_MAX_H, PREVIEW_MAX_W } from "@photomark/shared";

const DEFAULT_CORS_ORIGINS = [
  "http://127.0.0.1:3000",
  "http://localhost:3000",
  "http://127.0.0.1:5173",
  "http://localhost:5173",
];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4010),
  // preview/export read server paths, so stay on loopback unless told otherwise
  HOST: z.string().trim().default("127.0.0.1"),
  FONTS_DIR: z.string().trim().optional(),
  PREVIEW_MAX_W: z.coerce.number().int().positive().default(PREVIEW_MAX_W),
  PREVIEW_MAX_H: z.coerce.number().int().positive().default(PREVIEW_MAX_H),
  CORS_ORIGINS: z.string().optional(),
});

export type AppConfig = {
  port: number;
  host: string;
  fontsDir: string | null;
  previewCap: { maxW: number; maxH: number };
  corsOrigins: string[];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings behave like unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => typeof v === "string" && v.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`[config] invalid environment: ${fields}`);
  }

  const e = parsed.data;

  const corsOrigins = e.CORS_ORIGINS
    ? e.CORS_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean)
    : DEFAULT_CORS_ORIGINS;

  return {
    port: e.PORT,
    host: e.HOST,
    fontsDir: e.FONTS_DIR ? path.resolve(process.cwd(), e.FONTS_DIR) : null,
    previewCap: { maxW: e.PREVIEW_MAX_W, maxH: e.PREVIEW_MAX_H },
    corsOrigins,
  };
}
