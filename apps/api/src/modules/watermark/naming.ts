import path from "path";
import fs from "fs";
import type { ExportFormat, NamingRule } from "@photomark/shared";

export function outputExtension(format: ExportFormat) {
  return format === "png" ? "png" : "jpg";
}

/** File name of an export: source stem (case kept) with prefix/suffix, new extension. */
export function buildOutputName(sourcePath: string, naming: NamingRule, format: ExportFormat): string {
  let stem = path.parse(sourcePath).name;

  if (naming.rule === "prefix" && naming.prefix) stem = `${naming.prefix}${stem}`;
  else if (naming.rule === "suffix" && naming.suffix) stem = `${stem}${naming.suffix}`;

  return `${stem}.${outputExtension(format)}`;
}

// name.ext, name_1.ext, name_2.ext, ... first one not on disk
export function resolveCollisionFreePath(
  outputDir: string,
  fileName: string,
  exists: (p: string) => boolean = fs.existsSync
): string {
  const { name, ext } = path.parse(fileName);

  let target = path.join(outputDir, fileName);
  let i = 1;
  while (exists(target)) {
    target = path.join(outputDir, `${name}_${i}${ext}`);
    i++;
  }
  return target;
}
