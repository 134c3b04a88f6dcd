import fs from "fs";
import path from "path";
import type { LayerRenderer } from "../modules/watermark/layerRenderer";

const FONT_EXT = new Set([".ttf", ".otf"]);

/**
 * Registers every .ttf/.otf of `fontsDir` through the renderer's font cache.
 * A missing dir is reported and skipped; the default family still renders.
 */
export function registerFontsFromDir(renderer: LayerRenderer, fontsDir: string) {
  if (!fs.existsSync(fontsDir) || !fs.statSync(fontsDir).isDirectory()) {
    console.warn("[fonts] fonts dir not found:", fontsDir);
    return { okCount: 0, failCount: 0 };
  }

  let okCount = 0;
  let failCount = 0;

  for (const f of fs.readdirSync(fontsDir)) {
    if (!FONT_EXT.has(path.extname(f).toLowerCase())) continue;

    const family = renderer.registerFont(path.join(fontsDir, f));
    if (family) okCount++;
    else failCount++;
  }

  console.log("[fonts] registered files:", okCount, "failed:", failCount);
  return { okCount, failCount };
}
