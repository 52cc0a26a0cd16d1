import { InvalidAudioError, FeatureExtractionWarning, describeError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import type { AudioAnalysis, PcmAudio } from "@/types/audio";
import { detectBeats, estimateTempo, type BeatDetectionOptions } from "@/analysis/beats";
import { magnitudeSpectrogram, type Spectrogram } from "@/analysis/fft";
import { ENVELOPE_WINDOW_SECONDS, loudnessEnvelope, rmsLevel } from "@/analysis/loudness";
import { estimateAveragePitch } from "@/analysis/pitch";
import { estimateSpectralCentroid } from "@/analysis/spectral";

export interface ExtractOptions {
  envelopeWindowSeconds?: number;
  fftSize?: number;
  hopSize?: number;
  beats?: BeatDetectionOptions;
  logger?: Logger;
}

/** Average all channels into one. A single Float32Array is returned as is. */
export function downmix(samples: PcmAudio["samples"]): Float32Array {
  if (samples instanceof Float32Array) return samples;
  const [first, ...rest] = samples;
  if (!first) return new Float32Array(0);
  if (rest.length === 0) return first;

  const length = Math.min(first.length, ...rest.map((channel) => channel.length));
  const mono = new Float32Array(length);
  const count = samples.length;
  for (const channel of samples) {
    for (let i = 0; i < length; i++) {
      mono[i] = (mono[i] ?? 0) + (channel[i] ?? 0) / count;
    }
  }
  return mono;
}

export function validatePcm(pcm: PcmAudio): Float32Array {
  if (!Number.isFinite(pcm.sampleRate) || pcm.sampleRate <= 0) {
    throw new InvalidAudioError(`audio sample rate must be positive, got ${pcm.sampleRate}`);
  }
  const mono = downmix(pcm.samples);
  if (mono.length === 0) {
    throw new InvalidAudioError("audio track has zero duration");
  }
  return mono;
}

/**
 * Derive every feature the layers need, once, before rendering. Only input
 * validation is fatal; each estimator that fails falls back to a neutral value.
 */
export function extractAudioFeatures(pcm: PcmAudio, options: ExtractOptions = {}): AudioAnalysis {
  const log = options.logger ?? createLogger("analysis");
  const samples = validatePcm(pcm);
  const sampleRate = pcm.sampleRate;
  const durationSeconds = samples.length / sampleRate;

  const isolate = <T>(feature: string, fallback: T, estimate: () => T): T => {
    try {
      return estimate();
    } catch (err) {
      const warning = new FeatureExtractionWarning(feature, describeError(err), {
        cause: err,
      });
      log.warn(`${warning.message}; using ${JSON.stringify(fallback)}`);
      return fallback;
    }
  };

  const envelope = loudnessEnvelope(samples, sampleRate, options.envelopeWindowSeconds ?? ENVELOPE_WINDOW_SECONDS);
  const silent = rmsLevel(samples) === 0;

  const spectrogram = isolate<Spectrogram | null>("spectrogram", null, () =>
    magnitudeSpectrogram(samples, sampleRate, options.fftSize, options.hopSize),
  );

  const beatTimes = isolate<number[]>("beats", [], () => {
    if (silent || !spectrogram) return [];
    return detectBeats(spectrogram, durationSeconds, options.beats);
  });

  const tempoBpm = isolate("tempo", 0, () => estimateTempo(beatTimes));
  const averagePitchHz = isolate("pitch", 0, () => estimateAveragePitch(samples, sampleRate));
  const spectralCentroidHz = isolate("spectralCentroid", 0, () => {
    if (!spectrogram) throw new Error("no spectrogram");
    return estimateSpectralCentroid(spectrogram);
  });

  log.debug(
    `analyzed ${durationSeconds.toFixed(2)}s: ${beatTimes.length} beats, ${tempoBpm.toFixed(1)} BPM, ` +
      `${averagePitchHz.toFixed(1)} Hz pitch, ${spectralCentroidHz.toFixed(1)} Hz centroid`,
  );

  return Object.freeze({
    durationSeconds,
    sampleRate,
    beatTimes: Object.freeze(beatTimes),
    loudnessEnvelope: Object.freeze(envelope.values),
    envelopeWindowSeconds: envelope.windowSeconds,
    averagePitchHz,
    tempoBpm,
    spectralCentroidHz,
  });
}
