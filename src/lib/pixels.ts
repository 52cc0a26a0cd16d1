import { Color, MathUtils, type ColorRepresentation } from "three";
import type { CanvasSize, LayerRaster } from "@/types/render";

export type Rgb = readonly [number, number, number];

export const CHANNELS = 3;

/** sRGB bytes of any three.js colour representation ("#ff1493", 0x4b0082, "hotpink"). */
export function toRgb(color: ColorRepresentation): Rgb {
  const hex = new Color(color).getHex();
  return [(hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff];
}

export function createRgbBuffer(width: number, height: number, fill?: Rgb): Uint8Array {
  const pixels = new Uint8Array(width * height * CHANNELS);
  if (fill && (fill[0] | fill[1] | fill[2]) !== 0) {
    for (let i = 0; i < pixels.length; i += CHANNELS) {
      pixels[i] = fill[0];
      pixels[i + 1] = fill[1];
      pixels[i + 2] = fill[2];
    }
  }
  return pixels;
}

/** A full-canvas raster over freshly allocated pixels, optionally with a coverage mask. */
export function createCanvasRaster(size: CanvasSize, options: { coverage?: boolean; alpha?: number } = {}): LayerRaster {
  const raster: LayerRaster = {
    x: 0,
    y: 0,
    width: size.width,
    height: size.height,
    pixels: createRgbBuffer(size.width, size.height),
  };
  if (options.coverage) raster.coverage = new Uint8Array(size.width * size.height);
  if (options.alpha !== undefined) raster.alpha = options.alpha;
  return raster;
}

/** A single-colour full-canvas tint with uniform alpha. */
export function createTintRaster(size: CanvasSize, color: Rgb, alpha: number): LayerRaster {
  return {
    x: 0,
    y: 0,
    width: size.width,
    height: size.height,
    pixels: createRgbBuffer(size.width, size.height, color),
    alpha,
  };
}

/**
 * Alpha-blend `raster` onto `canvas` in place:
 * `result = canvas * (1 - a) + layer * a`, with `a = opacity * alpha * coverage / 255`.
 * The raster rectangle is clipped to the canvas.
 */
export function blendRaster(canvas: Uint8Array, size: CanvasSize, raster: LayerRaster, opacity: number): void {
  const uniform = MathUtils.clamp(opacity * (raster.alpha ?? 1), 0, 1);
  if (uniform <= 0) return;

  const { pixels, coverage } = raster;

  if (
    uniform >= 1 &&
    !coverage &&
    raster.x === 0 &&
    raster.y === 0 &&
    raster.width === size.width &&
    raster.height === size.height
  ) {
    canvas.set(pixels.subarray(0, canvas.length));
    return;
  }

  const x0 = Math.max(0, raster.x);
  const y0 = Math.max(0, raster.y);
  const x1 = Math.min(size.width, raster.x + raster.width);
  const y1 = Math.min(size.height, raster.y + raster.height);
  if (x0 >= x1 || y0 >= y1) return;

  for (let y = y0; y < y1; y++) {
    const srcRow = (y - raster.y) * raster.width - raster.x;
    const dstRow = y * size.width;
    for (let x = x0; x < x1; x++) {
      const src = srcRow + x;
      const a = coverage ? (uniform * (coverage[src] ?? 0)) / 255 : uniform;
      if (a <= 0) continue;

      const s = src * CHANNELS;
      const d = (dstRow + x) * CHANNELS;
      if (a >= 1) {
        canvas[d] = pixels[s] ?? 0;
        canvas[d + 1] = pixels[s + 1] ?? 0;
        canvas[d + 2] = pixels[s + 2] ?? 0;
        continue;
      }
      const keep = 1 - a;
      canvas[d] = Math.round((canvas[d] ?? 0) * keep + (pixels[s] ?? 0) * a);
      canvas[d + 1] = Math.round((canvas[d + 1] ?? 0) * keep + (pixels[s + 1] ?? 0) * a);
      canvas[d + 2] = Math.round((canvas[d + 2] ?? 0) * keep + (pixels[s + 2] ?? 0) * a);
    }
  }
}

/** Fill an axis-aligned rectangle of a raster, marking it fully covered. */
export function fillRect(
  raster: LayerRaster,
  left: number,
  top: number,
  right: number,
  bottom: number,
  color: Rgb,
): void {
  const x0 = Math.max(0, Math.floor(left));
  const y0 = Math.max(0, Math.floor(top));
  const x1 = Math.min(raster.width, Math.floor(right));
  const y1 = Math.min(raster.height, Math.floor(bottom));
  if (x0 >= x1 || y0 >= y1) return;

  const { pixels, coverage } = raster;
  for (let y = y0; y < y1; y++) {
    const row = y * raster.width;
    coverage?.fill(255, row + x0, row + x1);
    for (let i = (row + x0) * CHANNELS, end = (row + x1) * CHANNELS; i < end; i += CHANNELS) {
      pixels[i] = color[0];
      pixels[i + 1] = color[1];
      pixels[i + 2] = color[2];
    }
  }
}

const discMasks = new Map<number, Uint8Array>();

/** Square (2r+1)^2 mask, 1 inside the disc of radius r. Memoized per radius. */
export function discMask(radius: number): Uint8Array {
  const cached = discMasks.get(radius);
  if (cached) return cached;

  const side = radius * 2 + 1;
  const mask = new Uint8Array(side * side);
  const r2 = radius * radius;
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      if (dx * dx + dy * dy <= r2) mask[(dy + radius) * side + dx + radius] = 1;
    }
  }
  discMasks.set(radius, mask);
  return mask;
}

/**
 * Stamp a filled disc. Coverage keeps the maximum of overlapping stamps so
 * particles drawn later never punch holes in earlier ones.
 */
export function stampDisc(
  raster: LayerRaster,
  cx: number,
  cy: number,
  radius: number,
  color: Rgb,
  strength: number,
): void {
  const coverage = raster.coverage;
  if (radius < 1 || !coverage) return;
  const mask = discMask(radius);
  const side = radius * 2 + 1;
  const level = Math.round(MathUtils.clamp(strength, 0, 1) * 255);
  if (level === 0) return;

  const left = Math.round(cx) - radius;
  const top = Math.round(cy) - radius;
  const x0 = Math.max(0, left);
  const y0 = Math.max(0, top);
  const x1 = Math.min(raster.width, left + side);
  const y1 = Math.min(raster.height, top + side);

  for (let y = y0; y < y1; y++) {
    const maskRow = (y - top) * side - left;
    const row = y * raster.width;
    for (let x = x0; x < x1; x++) {
      if (mask[maskRow + x] !== 1) continue;
      const p = row + x;
      if ((coverage[p] ?? 0) >= level) continue;
      coverage[p] = level;
      const i = p * CHANNELS;
      raster.pixels[i] = color[0];
      raster.pixels[i + 1] = color[1];
      raster.pixels[i + 2] = color[2];
    }
  }
}
