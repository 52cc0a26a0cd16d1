/**
 * Error taxonomy for the render pipeline.
 *
 * Fatal: InvalidAudioError (before analysis), EncodingError (output sink),
 * ConfigError and ConceptValidationError (bad caller input).
 * Recovered locally and only logged: FeatureExtractionWarning, LayerInputMissing.
 */

export type BeatreelErrorCode =
  | "INVALID_AUDIO"
  | "FEATURE_EXTRACTION"
  | "LAYER_INPUT_MISSING"
  | "ENCODING"
  | "CONFIG"
  | "CONCEPT_VALIDATION"
  | "COMPOSITOR_STATE";

export class BeatreelError extends Error {
  constructor(
    public readonly code: BeatreelErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BeatreelError";
  }
}

export class InvalidAudioError extends BeatreelError {
  constructor(message: string) {
    super("INVALID_AUDIO", message);
    this.name = "InvalidAudioError";
  }
}

export class FeatureExtractionWarning extends BeatreelError {
  constructor(
    public readonly feature: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("FEATURE_EXTRACTION", `${feature}: ${message}`, options);
    this.name = "FeatureExtractionWarning";
  }
}

export class LayerInputMissing extends BeatreelError {
  constructor(public readonly layerId: string) {
    super("LAYER_INPUT_MISSING", `no text for layer "${layerId}"; rendering it with zero duration`);
    this.name = "LayerInputMissing";
  }
}

export class EncodingError extends BeatreelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENCODING", message, options);
    this.name = "EncodingError";
  }
}

export class ConfigError extends BeatreelError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super("CONFIG", message);
    this.name = "ConfigError";
  }
}

export class ConceptValidationError extends BeatreelError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super("CONCEPT_VALIDATION", message);
    this.name = "ConceptValidationError";
  }
}

export class CompositorStateError extends BeatreelError {
  constructor(message: string) {
    super("COMPOSITOR_STATE", message);
    this.name = "CompositorStateError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
