import path from "path";

function resolveUploadsDirAbs(): string {
  const raw = (process.env.UPLOADS_DIR_ABS || "").trim();

  if (raw) {
    // relative paths are taken from the process cwd
    return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
  }

  return path.resolve(process.cwd(), "uploads");
}

export const UPLOADS_DIR_ABS = resolveUploadsDirAbs();

export const uploadsWatermarksDir = path.join(UPLOADS_DIR_ABS, "watermarks");
