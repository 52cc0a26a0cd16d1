import type { Spectrogram } from "@/analysis/fft";

export interface BeatDetectionOptions {
  /** Minimum spacing between two onsets. */
  minGapSeconds?: number;
  /** Half-width of the moving-average threshold window. */
  thresholdWindowSeconds?: number;
  /** Added to the moving average, relative to the strongest onset. */
  delta?: number;
  /** Time of frame 0; the spectrogram reports frame centres. */
  offsetSeconds?: number;
}

/**
 * Half-wave rectified spectral flux of log-compressed magnitudes, one value
 * per spectrogram frame. The first frame has no predecessor and scores 0.
 */
export function onsetStrength(spectrogram: Spectrogram): number[] {
  const { frames } = spectrogram;
  const strength = new Array<number>(frames.length).fill(0);
  for (let f = 1; f < frames.length; f++) {
    const current = frames[f];
    const previous = frames[f - 1];
    if (!current || !previous) continue;
    let flux = 0;
    for (let k = 0; k < current.length; k++) {
      const rise = Math.log1p(current[k] ?? 0) - Math.log1p(previous[k] ?? 0);
      if (rise > 0) flux += rise;
    }
    strength[f] = flux;
  }
  return strength;
}

/**
 * Pick onset peaks above an adaptive threshold. Returns times in seconds,
 * strictly increasing and at least `minGapSeconds` apart; where two peaks are
 * closer the stronger one wins.
 */
export function pickOnsets(
  strength: readonly number[],
  secondsPerFrame: number,
  durationSeconds: number,
  options: BeatDetectionOptions = {},
): number[] {
  const { minGapSeconds = 0.1, thresholdWindowSeconds = 0.25, delta = 0.1, offsetSeconds = 0 } = options;

  let peak = 0;
  for (const value of strength) if (value > peak) peak = value;
  if (peak <= 0) return [];

  const normalized = strength.map((value) => value / peak);
  const half = Math.max(1, Math.round(thresholdWindowSeconds / secondsPerFrame));

  const prefix = new Float64Array(normalized.length + 1);
  for (let i = 0; i < normalized.length; i++) {
    prefix[i + 1] = (prefix[i] ?? 0) + (normalized[i] ?? 0);
  }

  const picked: { time: number; value: number }[] = [];
  for (let i = 0; i < normalized.length; i++) {
    const value = normalized[i] ?? 0;
    const prev = normalized[i - 1] ?? 0;
    const next = normalized[i + 1] ?? 0;
    if (value < prev || value <= next) continue;

    const lo = Math.max(0, i - half);
    const hi = Math.min(normalized.length, i + half + 1);
    const localMean = ((prefix[hi] ?? 0) - (prefix[lo] ?? 0)) / (hi - lo);
    if (value <= localMean + delta) continue;

    const time = Math.min(durationSeconds, offsetSeconds + i * secondsPerFrame);
    const last = picked[picked.length - 1];
    if (last && time - last.time < minGapSeconds) {
      if (value > last.value) picked[picked.length - 1] = { time, value };
      continue;
    }
    picked.push({ time, value });
  }

  const times: number[] = [];
  for (const { time } of picked) {
    const last = times[times.length - 1];
    if (last === undefined || time > last) times.push(time);
  }
  return times;
}

export function detectBeats(
  spectrogram: Spectrogram,
  durationSeconds: number,
  options?: BeatDetectionOptions,
): number[] {
  const secondsPerFrame = spectrogram.hopSize / spectrogram.sampleRate;
  const offsetSeconds = spectrogram.fftSize / 2 / spectrogram.sampleRate;
  return pickOnsets(onsetStrength(spectrogram), secondsPerFrame, durationSeconds, {
    offsetSeconds,
    ...options,
  });
}

/**
 * Tempo from the median inter-onset interval, folded into 60-180 BPM.
 * Throws when fewer than two onsets exist.
 */
export function estimateTempo(beatTimes: readonly number[]): number {
  if (beatTimes.length < 2) {
    throw new Error(`need at least two onsets, found ${beatTimes.length}`);
  }
  const intervals: number[] = [];
  for (let i = 1; i < beatTimes.length; i++) {
    intervals.push((beatTimes[i] ?? 0) - (beatTimes[i - 1] ?? 0));
  }
  intervals.sort((a, b) => a - b);
  const mid = Math.floor(intervals.length / 2);
  const median =
    intervals.length % 2 === 0
      ? ((intervals[mid - 1] ?? 0) + (intervals[mid] ?? 0)) / 2
      : (intervals[mid] ?? 0);
  if (median <= 0) throw new Error("onset intervals collapse to zero");

  let bpm = 60 / median;
  while (bpm < 60) bpm *= 2;
  while (bpm > 180) bpm /= 2;
  return bpm;
}
