/**
 * Decoded audio handed to the core. Either a single mono channel or one
 * array per channel; multi-channel input is down-mixed by averaging.
 */
export interface PcmAudio {
  samples: Float32Array | readonly Float32Array[];
  sampleRate: number;
}

export interface AudioAnalysis {
  durationSeconds: number;
  sampleRate: number;
  /** Onset times in seconds, strictly increasing. May be empty. */
  beatTimes: readonly number[];
  /** Per-window mean magnitude normalized to the track's own peak, in [0, 1]. */
  loudnessEnvelope: readonly number[];
  envelopeWindowSeconds: number;
  averagePitchHz: number;
  tempoBpm: number;
  spectralCentroidHz: number;
}

export interface BeatPulse {
  /** Index into beatTimes of the nearest beat, -1 when there are none. */
  index: number;
  distance: number;
  intensity: number;
}
