export const ENVELOPE_WINDOW_SECONDS = 0.02;
const EPSILON = 1e-8;

export interface LoudnessEnvelope {
  values: number[];
  windowSize: number;
  windowSeconds: number;
}

/**
 * Mean absolute magnitude over non-overlapping ~20ms windows, normalized to
 * the track's own peak (`env / (max(env) + 1e-8)`), so values stay in [0, 1]
 * whatever the input gain. A clip shorter than one window yields one value.
 */
export function loudnessEnvelope(
  samples: Float32Array,
  sampleRate: number,
  windowSeconds = ENVELOPE_WINDOW_SECONDS,
): LoudnessEnvelope {
  const windowSize = Math.max(1, Math.round(sampleRate * windowSeconds));
  const count = Math.max(1, Math.floor(samples.length / windowSize));
  const span = samples.length < windowSize ? samples.length : windowSize;

  const raw = new Array<number>(count);
  let peak = 0;
  for (let w = 0; w < count; w++) {
    let sum = 0;
    const offset = w * windowSize;
    for (let i = 0; i < span; i++) {
      sum += Math.abs(samples[offset + i] ?? 0);
    }
    const mean = span > 0 ? sum / span : 0;
    raw[w] = mean;
    if (mean > peak) peak = mean;
  }

  const values = raw.map((value) => Math.min(1, value / (peak + EPSILON)));
  return { values, windowSize, windowSeconds: windowSize / sampleRate };
}

/** RMS level of the whole signal. */
export function rmsLevel(samples: Float32Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const v = samples[i] ?? 0;
    sum += v * v;
  }
  return Math.sqrt(sum / samples.length);
}
