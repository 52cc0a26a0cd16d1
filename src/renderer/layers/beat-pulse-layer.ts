import { createTintRaster, type Rgb } from "@/lib/pixels";
import type { CanvasSize, Layer } from "@/types/render";
import { BEAT_PULSE_WINDOW_SECONDS, getBeatPulseAtTime } from "@/renderer/utils/audio-helpers";

export const BEAT_PULSE_MAX_ALPHA = 0.35;

interface BeatPulseOptions {
  size: CanvasSize;
  durationSeconds: number;
  beatTimes: readonly number[];
  color?: Rgb;
  windowSeconds?: number;
  maxAlpha?: number;
}

/**
 * Full-canvas flash around each beat. Alpha is proportional to the pulse
 * intensity of the nearest beat, so away from beats (and for a track without
 * beats) the layer draws nothing.
 */
export function createBeatPulseLayer({
  size,
  durationSeconds,
  beatTimes,
  color = [255, 255, 255],
  windowSeconds = BEAT_PULSE_WINDOW_SECONDS,
  maxAlpha = BEAT_PULSE_MAX_ALPHA,
}: BeatPulseOptions): Layer {
  return {
    id: "beat-pulse",
    kind: "overlay",
    zIndex: 10,
    startSeconds: 0,
    durationSeconds,
    opacity: 1,
    render: (t) => {
      const { intensity } = getBeatPulseAtTime(beatTimes, t, windowSeconds);
      if (intensity <= 0) return null;
      return createTintRaster(size, color, intensity * maxAlpha);
    },
  };
}
