import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import path from "path";
import fs from "fs";
import { uploadsWatermarksDir } from "./uploadsPaths";

export const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;
export const ALLOWED_IMAGE_TYPES = ["image/png", "image/jpeg", "image/bmp", "image/tiff"] as const;

export function ensureDir(absDir: string): void {
  if (!fs.existsSync(absDir)) fs.mkdirSync(absDir, { recursive: true });
}

const watermarkUpload = multer({
  storage: multer.diskStorage({
    destination: (_req, _file, cb) => cb(null, uploadsWatermarksDir),
    filename: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase() || ".png";
      const id = `wm_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
      cb(null, `${id}${ext}`);
    },
  }),
  fileFilter: (_req, file, cb) => {
    if ((ALLOWED_IMAGE_TYPES as readonly string[]).includes(file.mimetype)) cb(null, true);
    else cb(new Error("Only image files are allowed"));
  },
  limits: { fileSize: MAX_UPLOAD_BYTES },
});

type UploadErrorBody = {
  error: string;
  code?: string;
  maxBytes?: number;
  allowedTypes?: readonly string[];
  details?: string;
};

export function uploadWatermarkImage(field: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    ensureDir(uploadsWatermarksDir);
    watermarkUpload.single(field)(req, res, (err: unknown) => {
      if (!err) return next();

      if (err instanceof multer.MulterError) {
        if (err.code === "LIMIT_FILE_SIZE") {
          const body: UploadErrorBody = {
            error: "File is too large",
            code: "LIMIT_FILE_SIZE",
            maxBytes: MAX_UPLOAD_BYTES,
            allowedTypes: ALLOWED_IMAGE_TYPES,
          };
          return res.status(413).json(body);
        }
        const body: UploadErrorBody = { error: "Upload error", code: err.code, details: err.message };
        return res.status(400).json(body);
      }

      if (err instanceof Error) {
        const body: UploadErrorBody = {
          error: err.message,
          code: "UNSUPPORTED_MEDIA_TYPE",
          allowedTypes: ALLOWED_IMAGE_TYPES,
        };
        return res.status(415).json(body);
      }

      return res.status(500).json({ error: "Upload failed", code: "UNKNOWN_UPLOAD_ERROR" } satisfies UploadErrorBody);
    });
  };
}
