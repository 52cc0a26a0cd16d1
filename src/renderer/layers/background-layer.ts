import { MathUtils } from "three";
import { createCanvasRaster, toRgb, type Rgb } from "@/lib/pixels";
import type { CanvasSize, Layer, LayerRaster, VisualStyle } from "@/types/render";

interface BackgroundOptions {
  size: CanvasSize;
  durationSeconds: number;
  style: VisualStyle;
}

export const GRADIENT_PALETTE: readonly Rgb[] = [0x8b4513, 0xff1493, 0x4b0082, 0xff8c00, 0x32cd32].map(toRgb);

const TWO_PI = Math.PI * 2;
const byte = (value: number) => (MathUtils.clamp(value, 0, 255) | 0);

/** Evenly spaced samples over [from, to], both ends included. */
function linspace(from: number, to: number, count: number): Float32Array {
  const out = new Float32Array(count);
  const step = count > 1 ? (to - from) / (count - 1) : 0;
  for (let i = 0; i < count; i++) out[i] = from + step * i;
  return out;
}

/**
 * Diagonal sine field: `v = 0.5 + 0.5 sin(2π(1.5x + 1.2y) + 2πt/D)` over
 * normalized coordinates. sin/cos of the spatial term are tabulated once, so a
 * frame is one multiply-add per channel: sin(a + φ) = sin a cos φ + cos a sin φ.
 */
function classicRenderer({ size, durationSeconds }: BackgroundOptions) {
  const { width, height } = size;
  const xs = linspace(0, 1, width);
  const ys = linspace(0, 1, height);
  const sinBase = new Float32Array(width * height);
  const cosBase = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const angle = TWO_PI * (1.5 * (xs[x] ?? 0) + 1.2 * (ys[y] ?? 0));
      sinBase[y * width + x] = Math.sin(angle);
      cosBase[y * width + x] = Math.cos(angle);
    }
  }
  const period = Math.max(0.01, durationSeconds);

  return (t: number): LayerRaster => {
    const phase = (TWO_PI * t) / period;
    const cp = Math.cos(phase);
    const sp = Math.sin(phase);
    const raster = createCanvasRaster(size);
    const { pixels } = raster;
    for (let p = 0, i = 0; p < sinBase.length; p++, i += 3) {
      const v = 0.5 + 0.5 * ((sinBase[p] ?? 0) * cp + (cosBase[p] ?? 0) * sp);
      pixels[i] = byte(MathUtils.clamp(0.6 * v + 0.25, 0, 1) * 255);
      pixels[i + 1] = byte(MathUtils.clamp(0.25 * v + 0.05, 0, 1) * 255);
      pixels[i + 2] = byte(MathUtils.clamp(0.9 * v + 0.25, 0, 1) * 255);
    }
    return raster;
  };
}

/**
 * Interfering energy waves plus a vortex around the centre. The wave terms are
 * separable, so each frame evaluates them per row and per column only; the
 * vortex uses tabulated distance terms.
 */
function epicRenderer({ size }: BackgroundOptions) {
  const { width, height } = size;
  const scale = width / 1080;
  const X = linspace(0, 8 * Math.PI, width);
  const Y = linspace(0, 12 * Math.PI, height);
  const cx = Math.floor(width / 2);
  const cy = Math.floor(height / 2);

  const sinDist = new Float32Array(width * height);
  const cosDist = new Float32Array(width * height);
  const falloff = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const dist = Math.hypot(x - cx, y - cy);
      const p = y * width + x;
      sinDist[p] = Math.sin(dist / (50 * scale));
      cosDist[p] = Math.cos(dist / (50 * scale));
      falloff[p] = Math.exp(-dist / (200 * scale));
    }
  }

  const colA = new Float32Array(width);
  const colB = new Float32Array(width);
  const rowA = new Float32Array(height);
  const rowB = new Float32Array(height);

  return (t: number): LayerRaster => {
    for (let x = 0; x < width; x++) {
      const xv = X[x] ?? 0;
      colA[x] = Math.sin(xv + t * 3);
      colB[x] = Math.cos(xv * 3 + t * 4);
    }
    for (let y = 0; y < height; y++) {
      const yv = Y[y] ?? 0;
      rowA[y] = Math.cos(yv + t * 2.5);
      rowB[y] = Math.sin(yv * 2 + t * 3);
    }
    const c6 = Math.cos(t * 6);
    const s6 = Math.sin(t * 6);

    const raster = createCanvasRaster(size);
    const { pixels } = raster;
    for (let y = 0; y < height; y++) {
      const ra = rowA[y] ?? 0;
      const rb = rowB[y] ?? 0;
      for (let x = 0; x < width; x++) {
        const p = y * width + x;
        const energy = (colA[x] ?? 0) * ra + (colB[x] ?? 0) * rb;
        const vortex = ((sinDist[p] ?? 0) * c6 + (cosDist[p] ?? 0) * s6) * (falloff[p] ?? 0);
        const combined = (energy + vortex) / 2;
        const i = p * 3;
        pixels[i] = byte((combined + 1) * 150 + 50);
        pixels[i + 1] = byte((Math.sin(combined * TWO_PI + t * 2) + 1) * 180 + 20);
        pixels[i + 2] = byte((Math.cos(combined * Math.PI + t * 3) + 1) * 120 + 80);
      }
    }
    return raster;
  };
}

/** Palette colour at a continuous, cyclic position (one unit per palette entry). */
function paletteAt(palette: readonly Rgb[], position: number): Rgb {
  const n = palette.length;
  const wrapped = MathUtils.euclideanModulo(position, n);
  const index = Math.floor(wrapped);
  const factor = wrapped - index;
  const a = palette[index % n] ?? [0, 0, 0];
  const b = palette[(index + 1) % n] ?? a;
  return [
    MathUtils.lerp(a[0], b[0], factor),
    MathUtils.lerp(a[1], b[1], factor),
    MathUtils.lerp(a[2], b[2], factor),
  ];
}

/**
 * Vertical gradient whose top and bottom colours drift through the palette
 * once over the track. Both ends move continuously, so frames never jump.
 */
function gradientRenderer({ size, durationSeconds }: BackgroundOptions, palette: readonly Rgb[] = GRADIENT_PALETTE) {
  const { width, height } = size;
  const period = Math.max(0.01, durationSeconds);

  return (t: number): LayerRaster => {
    const position = (t / period) * palette.length;
    const top = paletteAt(palette, position);
    const bottom = paletteAt(palette, position + 1);
    const raster = createCanvasRaster(size);
    const { pixels } = raster;
    for (let y = 0; y < height; y++) {
      const ratio = height > 1 ? y / (height - 1) : 0;
      const r = byte(MathUtils.lerp(top[0], bottom[0], ratio));
      const g = byte(MathUtils.lerp(top[1], bottom[1], ratio));
      const b = byte(MathUtils.lerp(top[2], bottom[2], ratio));
      for (let i = y * width * 3, end = (y + 1) * width * 3; i < end; i += 3) {
        pixels[i] = r;
        pixels[i + 1] = g;
        pixels[i + 2] = b;
      }
    }
    return raster;
  };
}

/**
 * Opaque full-canvas background, continuous in time, for the whole track.
 */
export function createBackgroundLayer(options: BackgroundOptions): Layer {
  const render =
    options.style === "epic"
      ? epicRenderer(options)
      : options.style === "gradient"
        ? gradientRenderer(options)
        : classicRenderer(options);

  return {
    id: `background:${options.style}`,
    kind: "background",
    zIndex: 0,
    startSeconds: 0,
    durationSeconds: options.durationSeconds,
    opacity: 1,
    render,
  };
}
