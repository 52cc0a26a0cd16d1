import type { CanvasSize, Layer, LayerRaster } from "@/types/render";
import { fillRect } from "@/lib/pixels";

interface SpectrumBarsOptions {
  size: CanvasSize;
  durationSeconds: number;
  barCount?: number;
  zIndex?: number;
}

/**
 * Height of bar `index` at time `t`, in [0.2, 1]. A synthetic oscillator, not
 * an audio feature: each bar runs at its own frequency, so the result is a
 * deterministic function of (index, t).
 */
export function barIntensity(index: number, t: number): number {
  const frequency = (index + 1) * 100;
  const phase = (t * frequency) / 50 + index * 0.5;
  return Math.abs(Math.sin(phase)) * 0.8 + 0.2;
}

/**
 * Equalizer-style bars rising from the bottom 30% of the canvas.
 */
export function createSpectrumBarsLayer({ size, durationSeconds, barCount = 20, zIndex = 30 }: SpectrumBarsOptions): Layer {
  const regionHeight = Math.max(1, Math.floor(size.height * 0.3));
  const top = size.height - regionHeight;
  const barWidth = Math.max(1, Math.floor(size.width / barCount));
  const gap = barWidth > 4 ? 2 : 0;

  return {
    id: "spectrum-bars",
    kind: "overlay",
    zIndex,
    startSeconds: 0,
    durationSeconds,
    opacity: 0.8,
    render: (t) => {
      const raster: LayerRaster = {
        x: 0,
        y: top,
        width: size.width,
        height: regionHeight,
        pixels: new Uint8Array(size.width * regionHeight * 3),
        coverage: new Uint8Array(size.width * regionHeight),
      };
      for (let i = 0; i < barCount; i++) {
        const intensity = barIntensity(i, t);
        const barHeight = Math.floor(size.height * 0.3 * intensity);
        const level = Math.floor(255 * intensity);
        const left = i * barWidth;
        fillRect(raster, left, regionHeight - barHeight, left + barWidth - gap, regionHeight, [
          Math.floor(level / 3),
          Math.floor(level / 2),
          level,
        ]);
      }
      return raster;
    },
  };
}
