export * from "./types";

export { extractAudioFeatures, downmix } from "./analysis/feature-extractor";
export type { ExtractOptions } from "./analysis/feature-extractor";

export { segmentTimeline, getCurrentSegment, SEGMENT_ORDER, SEGMENT_PROPORTIONS } from "./renderer/timeline";
export { getBeatPulseAtTime, envelopeValueAt } from "./renderer/utils/audio-helpers";

export { createBackgroundLayer } from "./renderer/layers/background-layer";
export { createBeatPulseLayer } from "./renderer/layers/beat-pulse-layer";
export { createParticleLayer } from "./renderer/layers/particle-layer";
export { createWaveformLayer } from "./renderer/layers/waveform-layer";
export { createSpectrumBarsLayer } from "./renderer/layers/spectrum-bars-layer";
export { createGeometricLayer } from "./renderer/layers/geometric-layer";
export { createVignetteLayer } from "./renderer/layers/vignette-layer";
export {
  createTextLayer,
  createTypewriterLayer,
  createCaptionLayer,
  createHashtagLayer,
  TEXT_SLOTS,
} from "./renderer/layers/text-layers";
export { CanvasTextRasterizer } from "./renderer/text/canvas-rasterizer";
export { createRenderContext } from "./renderer/text/render-context";
export type { RenderContext } from "./renderer/text/render-context";
export type { TextRasterizer, TextRaster, TextStyle } from "./renderer/text/text-layout";

export { buildReelLayers } from "./renderer/compositions/reel-composition";
export { Compositor, frameCountFor, isLayerActive } from "./renderer/compositor";
export { Encoder, FfmpegMuxer, FrameReorderBuffer } from "./renderer/encoder";
export type { FrameSink, AudioSource } from "./renderer/encoder";
export { renderReel, renderReelFromFile } from "./renderer/render-reel";
export type { RenderJob, RenderReelOptions, RenderResult } from "./renderer/render-reel";

export { createRenderJobStore } from "./stores/render-store";
export type { RenderJobState, RenderJobStore } from "./stores/render-store";

export { resolveRenderConfig, renderConfigSchema } from "./lib/config";
export type { RenderConfig, RenderConfigInput, FontResource } from "./lib/config";
export { parseConcept, conceptSchema } from "./lib/concept";
export { decodeAudioFile } from "./lib/audio-decode";
export { createLogger, setLogLevel } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";
export * from "./lib/errors";
