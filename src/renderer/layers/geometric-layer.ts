import { Color, MathUtils } from "three";
import { createCanvasRaster, toRgb, type Rgb } from "@/lib/pixels";
import type { CanvasSize, Layer, LayerRaster } from "@/types/render";

interface GeometricOptions {
  size: CanvasSize;
  durationSeconds: number;
  shapeCount?: number;
  zIndex?: number;
}

type Point = readonly [number, number];

/** Vertices of shape `index` at time `t`: a triangle orbiting the canvas centre. */
export function shapeVertices(index: number, count: number, t: number, size: CanvasSize): [Point, Point, Point] {
  const scale = size.width / 1080;
  const orbit = (2 * Math.PI * index) / count + t * 0.5;
  const radius = 260 * scale;
  const cx = size.width / 2 + Math.cos(orbit) * radius;
  const cy = size.height / 2 + Math.sin(orbit) * radius;
  const spin = t * (1 + index * 0.2);
  const extent = 70 * scale * (1 + 0.3 * Math.sin(t * 2 + index));

  const vertex = (k: number): Point => {
    const angle = spin + (2 * Math.PI * k) / 3;
    return [cx + Math.cos(angle) * extent, cy + Math.sin(angle) * extent];
  };
  return [vertex(0), vertex(1), vertex(2)];
}

function shapeColor(index: number, count: number, t: number): Rgb {
  const hue = MathUtils.euclideanModulo(index / count + t * 0.05, 1);
  return toRgb(new Color().setHSL(hue, 0.8, 0.6));
}

const edge = (a: Point, b: Point, x: number, y: number) => (b[0] - a[0]) * (y - a[1]) - (b[1] - a[1]) * (x - a[0]);

function fillTriangle(raster: LayerRaster, [a, b, c]: readonly [Point, Point, Point], color: Rgb): void {
  const { coverage, pixels } = raster;
  if (!coverage) return;
  const area = edge(a, b, c[0], c[1]);
  if (area === 0) return;

  const x0 = Math.max(0, Math.floor(Math.min(a[0], b[0], c[0])));
  const x1 = Math.min(raster.width - 1, Math.ceil(Math.max(a[0], b[0], c[0])));
  const y0 = Math.max(0, Math.floor(Math.min(a[1], b[1], c[1])));
  const y1 = Math.min(raster.height - 1, Math.ceil(Math.max(a[1], b[1], c[1])));

  for (let y = y0; y <= y1; y++) {
    for (let x = x0; x <= x1; x++) {
      const px = x + 0.5;
      const py = y + 0.5;
      const w0 = edge(b, c, px, py) * area;
      const w1 = edge(c, a, px, py) * area;
      const w2 = edge(a, b, px, py) * area;
      if (w0 < 0 || w1 < 0 || w2 < 0) continue;
      const p = y * raster.width + x;
      coverage[p] = 255;
      pixels[p * 3] = color[0];
      pixels[p * 3 + 1] = color[1];
      pixels[p * 3 + 2] = color[2];
    }
  }
}

/**
 * Rotating triangles orbiting the centre. Motion is a synthetic function of
 * `t` alone; it does not read the audio.
 */
export function createGeometricLayer({ size, durationSeconds, shapeCount = 6, zIndex = 25 }: GeometricOptions): Layer {
  return {
    id: "geometric",
    kind: "overlay",
    zIndex,
    startSeconds: 0,
    durationSeconds,
    opacity: 0.7,
    render: (t) => {
      const raster = createCanvasRaster(size, { coverage: true });
      for (let i = 0; i < shapeCount; i++) {
        fillTriangle(raster, shapeVertices(i, shapeCount, t, size), shapeColor(i, shapeCount, t));
      }
      return raster;
    },
  };
}
