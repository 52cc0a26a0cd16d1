import { MathUtils } from "three";
import type { AudioAnalysis, BeatPulse } from "@/types/audio";

export const BEAT_PULSE_WINDOW_SECONDS = 0.1;

/**
 * Index of the beat nearest to `time` (binary search). Ties go to the earlier
 * beat. Returns -1 for an empty list.
 */
export function nearestBeatIndex(beats: readonly number[], time: number): number {
  if (beats.length === 0) return -1;

  let lo = 0;
  let hi = beats.length - 1;
  if (time <= (beats[0] ?? 0)) return 0;
  if (time >= (beats[hi] ?? 0)) return hi;

  while (lo < hi - 1) {
    const mid = Math.floor((lo + hi) / 2);
    if ((beats[mid] ?? 0) <= time) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  const before = time - (beats[lo] ?? 0);
  const after = (beats[hi] ?? 0) - time;
  return after < before ? hi : lo;
}

/**
 * Pulse intensity around the nearest beat: 1 exactly on the beat, easing to 0
 * with a smoothstep falloff and 0 at or beyond `window` seconds away.
 */
export function getBeatPulseAtTime(
  beats: readonly number[],
  time: number,
  window = BEAT_PULSE_WINDOW_SECONDS,
): BeatPulse {
  const index = nearestBeatIndex(beats, time);
  if (index < 0) return { index, distance: Infinity, intensity: 0 };

  const distance = Math.abs(time - (beats[index] ?? 0));
  const intensity = distance >= window ? 0 : 1 - MathUtils.smoothstep(distance, 0, window);
  return { index, distance, intensity };
}

/**
 * Envelope index for `time`: `clamp(floor(t / duration * len), 0, len - 1)`.
 * Returns -1 for an empty envelope.
 */
export function envelopeIndexAt(length: number, durationSeconds: number, time: number): number {
  if (length === 0) return -1;
  const ratio = durationSeconds > 0 ? time / durationSeconds : 0;
  return MathUtils.clamp(Math.floor(ratio * length), 0, length - 1);
}

export function envelopeValueAt(analysis: AudioAnalysis, time: number): number {
  const { loudnessEnvelope } = analysis;
  const index = envelopeIndexAt(loudnessEnvelope.length, analysis.durationSeconds, time);
  return index < 0 ? 0 : (loudnessEnvelope[index] ?? 0);
}

/**
 * Interpolate a feature value at a specific time from a sampled series.
 */
export function interpolateFeature(
  times: readonly number[],
  values: readonly number[],
  targetTime: number,
): number {
  if (times.length === 0 || values.length === 0) return 0;

  // Binary search for the nearest time index
  let lo = 0;
  let hi = times.length - 1;

  if (targetTime <= (times[0] ?? 0)) return values[0] ?? 0;
  if (targetTime >= (times[hi] ?? 0)) return values[hi] ?? 0;

  while (lo < hi - 1) {
    const mid = Math.floor((lo + hi) / 2);
    if ((times[mid] ?? 0) <= targetTime) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  const t0 = times[lo] ?? 0;
  const t1 = times[hi] ?? 0;
  const v0 = values[lo] ?? 0;
  const v1 = values[hi] ?? 0;

  if (t1 === t0) return v0;
  const ratio = (targetTime - t0) / (t1 - t0);
  return v0 + (v1 - v0) * ratio;
}

/**
 * Envelope value linearly interpolated between window centres. Smoother than
 * `envelopeValueAt` for layers that should not step every 20ms.
 */
export function smoothEnvelopeAt(analysis: AudioAnalysis, time: number): number {
  const { loudnessEnvelope, envelopeWindowSeconds } = analysis;
  if (loudnessEnvelope.length === 0) return 0;
  const position = time / envelopeWindowSeconds - 0.5;
  const lo = MathUtils.clamp(Math.floor(position), 0, loudnessEnvelope.length - 1);
  const hi = Math.min(lo + 1, loudnessEnvelope.length - 1);
  const centre = (lo + 0.5) * envelopeWindowSeconds;
  return interpolateFeature(
    [centre, centre + envelopeWindowSeconds],
    [loudnessEnvelope[lo] ?? 0, loudnessEnvelope[hi] ?? 0],
    time,
  );
}
