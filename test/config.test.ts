import { describe, expect, it } from "vitest";
import { computeSampleSize, DEFAULT_OPTIONS, resolveOptions } from "../src/config.js";

describe("resolveOptions", () => {
  it("fills defaults and keeps valid overrides", () => {
    expect(resolveOptions()).toEqual({ ...DEFAULT_OPTIONS });
    expect(resolveOptions({ mode: "deep", headerScanRows: 5 }).headerScanRows).toBe(5);
    expect(resolveOptions({ mode: "deep" }).mode).toBe("deep");
  });

  it("falls back to defaults for out-of-range numbers", () => {
    const opts = resolveOptions({ headerScanRows: -1, acceptThreshold: 2, vatRatioTolerance: Number.NaN });
    expect(opts.headerScanRows).toBe(20);
    expect(opts.acceptThreshold).toBe(0.6);
    expect(opts.vatRatioTolerance).toBe(0.01);
  });
});

describe("computeSampleSize", () => {
  it("caps fast mode at 32 rows", () => {
    expect(computeSampleSize(100, "fast")).toBe(32);
    expect(computeSampleSize(10, "fast")).toBe(10);
  });

  it("samples a quarter of the file in deep mode, clamped to 64..256", () => {
    expect(computeSampleSize(1000, "deep")).toBe(250);
    expect(computeSampleSize(100, "deep")).toBe(64);
    expect(computeSampleSize(2000, "deep")).toBe(256);
    expect(computeSampleSize(10, "deep")).toBe(10);
  });
});
