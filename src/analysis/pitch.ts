import { fft } from "@/analysis/fft";

export interface PitchOptions {
  minHz?: number;
  maxHz?: number;
  frameSize?: number;
  /** Normalized autocorrelation a frame needs to count as voiced. */
  voicingThreshold?: number;
}

/**
 * Average fundamental frequency over voiced frames, from the autocorrelation
 * of non-overlapping frames (computed through the power spectrum). Throws when
 * the clip is shorter than one frame or no frame is voiced.
 */
export function estimateAveragePitch(
  samples: Float32Array,
  sampleRate: number,
  options: PitchOptions = {},
): number {
  const { minHz = 50, maxHz = 1000, frameSize = 2048, voicingThreshold = 0.5 } = options;
  const minLag = Math.max(1, Math.floor(sampleRate / maxHz));
  const maxLag = Math.min(frameSize - 1, Math.ceil(sampleRate / minHz));

  if (samples.length < frameSize) {
    throw new Error(`clip too short for pitch analysis (${samples.length} < ${frameSize} samples)`);
  }

  const padded = frameSize * 2;
  const re = new Float64Array(padded);
  const im = new Float64Array(padded);
  const frameCount = Math.floor(samples.length / frameSize);

  let total = 0;
  let voiced = 0;
  for (let f = 0; f < frameCount; f++) {
    const offset = f * frameSize;
    let mean = 0;
    for (let i = 0; i < frameSize; i++) mean += samples[offset + i] ?? 0;
    mean /= frameSize;

    re.fill(0);
    im.fill(0);
    for (let i = 0; i < frameSize; i++) re[i] = (samples[offset + i] ?? 0) - mean;

    fft(re, im);
    for (let k = 0; k < padded; k++) {
      re[k] = (re[k] ?? 0) ** 2 + (im[k] ?? 0) ** 2;
      im[k] = 0;
    }
    // The power spectrum is real and symmetric, so a forward transform yields
    // the autocorrelation scaled by the padded length.
    fft(re, im);

    const energy = re[0] ?? 0;
    if (energy <= 1e-9) continue;

    let bestLag = -1;
    let bestValue = voicingThreshold;
    for (let lag = minLag; lag <= maxLag; lag++) {
      const value = (re[lag] ?? 0) / energy;
      if (value > bestValue && value >= (re[lag - 1] ?? 0) / energy && value >= (re[lag + 1] ?? 0) / energy) {
        bestValue = value;
        bestLag = lag;
      }
    }
    if (bestLag < 0) continue;

    const left = re[bestLag - 1] ?? 0;
    const centre = re[bestLag] ?? 0;
    const right = re[bestLag + 1] ?? 0;
    const denominator = left - 2 * centre + right;
    const shift = denominator !== 0 ? (0.5 * (left - right)) / denominator : 0;

    total += sampleRate / (bestLag + shift);
    voiced++;
  }

  if (voiced === 0) throw new Error("no voiced frames");
  return total / voiced;
}
