import { describe, expect, it } from "vitest";
import { computeResizeSize, fitPreviewSize } from "../src";

describe("fitPreviewSize", () => {
  it("caps to 900x700 with one uniform scale", () => {
    expect(fitPreviewSize(4000, 3000)).toEqual({ width: 900, height: 675, scale: 0.225 });
    expect(fitPreviewSize(1000, 2000)).toEqual({ width: 350, height: 700, scale: 0.35 });
  });

  it("never upscales", () => {
    expect(fitPreviewSize(800, 600)).toEqual({ width: 800, height: 600, scale: 1 });
  });

  it("honours a custom cap", () => {
    expect(fitPreviewSize(1000, 500, 100, 100)).toEqual({ width: 100, height: 50, scale: 0.1 });
  });
});

describe("computeResizeSize", () => {
  it("scales by width, height or percent with truncation", () => {
    expect(computeResizeSize(900, 675, { mode: "width", value: 450 })).toEqual({ width: 450, height: 337 });
    expect(computeResizeSize(900, 675, { mode: "height", value: 300 })).toEqual({ width: 400, height: 300 });
    expect(computeResizeSize(900, 675, { mode: "percent", value: 50 })).toEqual({ width: 450, height: 337 });
  });

  it("keeps at least one pixel per axis", () => {
    expect(computeResizeSize(1000, 1, { mode: "width", value: 10 })).toEqual({ width: 10, height: 1 });
    expect(computeResizeSize(10, 10, { mode: "percent", value: 1 })).toEqual({ width: 1, height: 1 });
  });

  it("does nothing without resize settings", () => {
    expect(computeResizeSize(900, 675)).toBeNull();
  });
});
