import path from "path";
import { describe, expect, it } from "vitest";
import type { WatermarkSpec } from "@photomark/shared";
import { findSourceDirConflict } from "../src/modules/watermark/watermark.routes";
import { ExportBodySchema } from "../src/modules/watermark/watermark.schemas";

const spec: WatermarkSpec = {
  anchor: "bottom-right",
  offset: { kind: "pixel", dx: -45, dy: 35 },
  rotationDegrees: 0,
  layer: { kind: "text", content: "(c) sample", fontSize: 24, color: { r: 255, g: 255, b: 255 }, opacity: 0.5 },
};

describe("findSourceDirConflict", () => {
  it("returns the source that lives in the output dir", () => {
    const sources = [path.join("/photos", "a", "1.jpg"), path.join("/photos", "b", "2.jpg")];
    expect(findSourceDirConflict(sources, path.join("/photos", "b"))).toBe(sources[1]);
  });

  it("compares resolved paths", () => {
    expect(findSourceDirConflict([path.join("/photos", "a", "1.jpg")], "/photos/a/../a/")).toBe(
      path.join("/photos", "a", "1.jpg")
    );
  });

  it("returns null for a separate folder", () => {
    expect(findSourceDirConflict([path.join("/photos", "a", "1.jpg")], path.join("/photos", "a", "out"))).toBeNull();
  });
});

describe("ExportBodySchema", () => {
  const body = { sourcePaths: ["/photos/a/1.jpg"], spec, settings: { outputDir: "/photos/out" } };

  it("requires the preview canvas with a pixel offset", () => {
    const parsed = ExportBodySchema.safeParse(body);

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((i) => i.path.join("."))).toEqual(["previewCanvas"]);
  });

  it("accepts a pixel offset with its preview canvas", () => {
    expect(ExportBodySchema.safeParse({ ...body, previewCanvas: { width: 900, height: 700 } }).success).toBe(true);
  });

  it("accepts ratio and zero offsets without one", () => {
    const ratio = { ...spec, offset: { kind: "ratio", rx: -0.05, ry: 0.05 } };
    const zero = { ...spec, offset: { kind: "pixel", dx: 0, dy: 0 } };

    expect(ExportBodySchema.safeParse({ ...body, spec: ratio }).success).toBe(true);
    expect(ExportBodySchema.safeParse({ ...body, spec: zero }).success).toBe(true);
  });
});
