import { MathUtils } from "three";
import type { AudioAnalysis } from "@/types/audio";
import type { CanvasSize, Layer } from "@/types/render";
import { smoothEnvelopeAt } from "@/renderer/utils/audio-helpers";

interface VignetteOptions {
  size: CanvasSize;
  analysis: AudioAnalysis;
  zIndex?: number;
}

/**
 * Darkening ramp for a normalized distance from the centre (1 at the corners).
 * Louder audio pushes the ramp outwards and lightens it.
 */
export function vignetteCoverage(distance: number, level: number): number {
  const inner = 0.5 + level * 0.2;
  const depth = 0.5 - level * 0.2;
  if (distance <= inner) return 0;
  return Math.round(MathUtils.clamp((distance - inner) / (1 - inner), 0, 1) * depth * 255);
}

/**
 * Black radial vignette whose edge follows the smoothed loudness envelope.
 */
export function createVignetteLayer({ size, analysis, zIndex = 50 }: VignetteOptions): Layer {
  const { width, height } = size;
  const cx = width / 2;
  const cy = height / 2;
  const corner = Math.hypot(cx, cy) || 1;
  const distances = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      distances[y * width + x] = Math.hypot(x + 0.5 - cx, y + 0.5 - cy) / corner;
    }
  }
  const pixels = new Uint8Array(width * height * 3);

  return {
    id: "vignette",
    kind: "overlay",
    zIndex,
    startSeconds: 0,
    durationSeconds: analysis.durationSeconds,
    opacity: 1,
    render: (t) => {
      const level = MathUtils.clamp(smoothEnvelopeAt(analysis, t), 0, 1);
      const coverage = new Uint8Array(width * height);
      for (let p = 0; p < distances.length; p++) {
        coverage[p] = vignetteCoverage(distances[p] ?? 0, level);
      }
      return { x: 0, y: 0, width, height, pixels, coverage };
    },
  };
}
