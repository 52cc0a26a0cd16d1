import { describe, it, expect } from "vitest";
import { blendRaster, createRgbBuffer, discMask, fillRect, stampDisc, toRgb } from "@/lib/pixels";
import type { LayerRaster } from "@/types/render";

const size = { width: 2, height: 1 };

describe("toRgb", () => {
  it("converts hex strings and numbers to sRGB bytes", () => {
    expect(toRgb("#ff1493")).toEqual([255, 20, 147]);
    expect(toRgb(0x4b0082)).toEqual([75, 0, 130]);
  });
});

describe("blendRaster", () => {
  it("mixes with opacity times alpha and rounds", () => {
    const canvas = createRgbBuffer(2, 1, [100, 100, 100]);
    const raster: LayerRaster = { x: 0, y: 0, width: 2, height: 1, pixels: new Uint8Array([200, 0, 50, 200, 0, 50]), alpha: 0.5 };
    blendRaster(canvas, size, raster, 1);
    expect(Array.from(canvas)).toEqual([150, 50, 75, 150, 50, 75]);
  });

  it("weights each pixel by its coverage", () => {
    const canvas = createRgbBuffer(2, 1, [0, 0, 0]);
    const raster: LayerRaster = {
      x: 0,
      y: 0,
      width: 2,
      height: 1,
      pixels: new Uint8Array([255, 255, 255, 255, 255, 255]),
      coverage: new Uint8Array([0, 255]),
    };
    blendRaster(canvas, size, raster, 1);
    expect(Array.from(canvas)).toEqual([0, 0, 0, 255, 255, 255]);
  });

  it("replaces the canvas for an opaque full-size raster", () => {
    const canvas = createRgbBuffer(2, 1, [9, 9, 9]);
    const raster: LayerRaster = { x: 0, y: 0, width: 2, height: 1, pixels: new Uint8Array([1, 2, 3, 4, 5, 6]) };
    blendRaster(canvas, size, raster, 1);
    expect(Array.from(canvas)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("clips rasters that hang over the canvas edge", () => {
    const canvas = createRgbBuffer(2, 1);
    const raster: LayerRaster = { x: -1, y: 0, width: 2, height: 1, pixels: new Uint8Array([10, 10, 10, 20, 30, 40]) };
    blendRaster(canvas, size, raster, 1);
    expect(Array.from(canvas)).toEqual([20, 30, 40, 0, 0, 0]);
  });

  it("does nothing at zero opacity", () => {
    const canvas = createRgbBuffer(2, 1, [7, 7, 7]);
    const raster: LayerRaster = { x: 0, y: 0, width: 2, height: 1, pixels: new Uint8Array(6) };
    blendRaster(canvas, size, raster, 0);
    expect(Array.from(canvas)).toEqual([7, 7, 7, 7, 7, 7]);
  });
});

describe("fillRect", () => {
  it("fills the clipped rectangle and marks coverage", () => {
    const raster: LayerRaster = { x: 0, y: 0, width: 3, height: 1, pixels: new Uint8Array(9), coverage: new Uint8Array(3) };
    fillRect(raster, 1, 0, 10, 1, [1, 2, 3]);
    expect(Array.from(raster.pixels)).toEqual([0, 0, 0, 1, 2, 3, 1, 2, 3]);
    expect(Array.from(raster.coverage ?? [])).toEqual([0, 255, 255]);
  });
});

describe("discMask", () => {
  it("builds a plus-shaped mask for radius 1 and memoizes it", () => {
    const mask = discMask(1);
    expect(Array.from(mask)).toEqual([0, 1, 0, 1, 1, 1, 0, 1, 0]);
    expect(discMask(1)).toBe(mask);
  });
});

describe("stampDisc", () => {
  it("keeps the strongest coverage where discs overlap", () => {
    const raster: LayerRaster = { x: 0, y: 0, width: 3, height: 3, pixels: new Uint8Array(27), coverage: new Uint8Array(9) };
    stampDisc(raster, 1, 1, 1, [255, 0, 0], 1);
    stampDisc(raster, 1, 1, 1, [0, 255, 0], 0.5);
    expect(raster.coverage?.[4]).toBe(255);
    expect(Array.from(raster.pixels.subarray(12, 15))).toEqual([255, 0, 0]);
    expect(raster.coverage?.[0]).toBe(0);
  });
});
