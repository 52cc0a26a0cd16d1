import type { AudioAnalysis } from "@/types/audio";
import type { CanvasSize, Layer, LayerRaster } from "@/types/render";
import { fillRect, type Rgb } from "@/lib/pixels";
import { envelopeIndexAt } from "@/renderer/utils/audio-helpers";

interface WaveformOptions {
  size: CanvasSize;
  analysis: AudioAnalysis;
  color?: Rgb;
}

const TRACK_COVERAGE = 60;

/**
 * Horizontal level bar in the lower part of the canvas. Driven by the real
 * loudness envelope: the filled width is `envelope[idx]` of the bar, with
 * `idx = clamp(floor(t / D * len), 0, len - 1)`.
 */
export function createWaveformLayer({ size, analysis, color = [200, 200, 255] }: WaveformOptions): Layer {
  const barWidth = Math.floor(size.width * 0.9);
  const barHeight = Math.max(1, Math.round(140 * (size.height / 1920)));
  const x = Math.floor(size.width * 0.05);
  const y = Math.floor(size.height * 0.78);
  const envelope = analysis.loudnessEnvelope;

  return {
    id: "waveform",
    kind: "overlay",
    zIndex: 40,
    startSeconds: 0,
    durationSeconds: analysis.durationSeconds,
    opacity: 1,
    render: (t) => {
      const index = envelopeIndexAt(envelope.length, analysis.durationSeconds, t);
      const level = index < 0 ? 0 : (envelope[index] ?? 0);
      const filled = Math.floor(barWidth * level);

      const raster: LayerRaster = {
        x,
        y,
        width: barWidth,
        height: barHeight,
        pixels: new Uint8Array(barWidth * barHeight * 3),
        coverage: new Uint8Array(barWidth * barHeight).fill(TRACK_COVERAGE),
      };
      fillRect(raster, 0, 0, filled, barHeight, color);
      return raster;
    },
  };
}
