import path from "path";
import { describe, expect, it } from "vitest";
import { buildOutputName, resolveCollisionFreePath } from "../src/modules/watermark/naming";

describe("buildOutputName", () => {
  const src = path.join("/photos", "Trip", "IMG_0042.JPG");

  it("keeps the stem and switches the extension", () => {
    expect(buildOutputName(src, { rule: "keep", prefix: "", suffix: "" }, "png")).toBe("IMG_0042.png");
    expect(buildOutputName(src, { rule: "keep", prefix: "", suffix: "" }, "jpeg")).toBe("IMG_0042.jpg");
  });

  it("applies prefix and suffix rules", () => {
    expect(buildOutputName(src, { rule: "prefix", prefix: "wm_", suffix: "" }, "jpeg")).toBe("wm_IMG_0042.jpg");
    expect(buildOutputName(src, { rule: "suffix", prefix: "", suffix: "_Marked" }, "png")).toBe("IMG_0042_Marked.png");
  });

  it("ignores the rule when its string is empty", () => {
    expect(buildOutputName(src, { rule: "prefix", prefix: "", suffix: "_x" }, "png")).toBe("IMG_0042.png");
  });

  it("only strips the last extension", () => {
    expect(buildOutputName("/in/my.trip.tiff", { rule: "keep", prefix: "", suffix: "" }, "png")).toBe("my.trip.png");
  });
});

describe("resolveCollisionFreePath", () => {
  const out = path.join("/out");

  it("uses the plain name when it is free", () => {
    expect(resolveCollisionFreePath(out, "a.png", () => false)).toBe(path.join(out, "a.png"));
  });

  it("appends _1, _2, ... before the extension", () => {
    const taken = new Set([path.join(out, "a.png"), path.join(out, "a_1.png")]);
    expect(resolveCollisionFreePath(out, "a.png", (p) => taken.has(p))).toBe(path.join(out, "a_2.png"));
  });
});
