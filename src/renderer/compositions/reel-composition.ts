/**
 * Layer set for one reel.
 *
 * Every style shares the same skeleton: an opaque background, a beat pulse,
 * the title typewriter, one static layer per story beat in its timeline
 * segment, and the hashtag strip. Styles differ in background and in the
 * overlays drawn between background and text. `enhancedEffects` only adds
 * layers; it never changes the ones a style already has.
 */

import type { AudioAnalysis } from "@/types/audio";
import type { Concept } from "@/types/concept";
import type { Layer, Timeline, VisualStyle } from "@/types/render";
import { createBackgroundLayer } from "@/renderer/layers/background-layer";
import { createBeatPulseLayer } from "@/renderer/layers/beat-pulse-layer";
import { createGeometricLayer } from "@/renderer/layers/geometric-layer";
import { createParticleLayer } from "@/renderer/layers/particle-layer";
import { createSpectrumBarsLayer } from "@/renderer/layers/spectrum-bars-layer";
import {
  createCaptionLayer,
  createHashtagLayer,
  createTextLayer,
  createTypewriterLayer,
  TEXT_SLOTS,
} from "@/renderer/layers/text-layers";
import { createVignetteLayer } from "@/renderer/layers/vignette-layer";
import { createWaveformLayer } from "@/renderer/layers/waveform-layer";
import type { RenderContext } from "@/renderer/text/render-context";
import { SEGMENT_ORDER } from "@/renderer/timeline";

export const TITLE_REVEAL_SECONDS = 2.8;

export interface ReelCompositionOptions {
  enhancedEffects?: boolean;
  /** Spoken or sung text for the caption layer. Only used with enhanced effects. */
  transcript?: string;
}

type OverlayFactory = (analysis: AudioAnalysis, context: RenderContext) => Layer;

const particles: OverlayFactory = (analysis, { size, seed }) => createParticleLayer({ size, analysis, seed });
const spectrumBars: OverlayFactory = (analysis, { size }) =>
  createSpectrumBarsLayer({ size, durationSeconds: analysis.durationSeconds });
const geometric: OverlayFactory = (analysis, { size }) =>
  createGeometricLayer({ size, durationSeconds: analysis.durationSeconds });
const vignette: OverlayFactory = (analysis, { size }) => createVignetteLayer({ size, analysis });

const STYLE_OVERLAYS: Record<VisualStyle, { base: OverlayFactory[]; enhanced: OverlayFactory[] }> = {
  classic: { base: [], enhanced: [particles, vignette] },
  epic: { base: [particles, spectrumBars, vignette], enhanced: [geometric] },
  gradient: { base: [geometric], enhanced: [spectrumBars, vignette] },
};

function storyLayers(concept: Concept, timeline: Timeline, context: RenderContext): Layer[] {
  return SEGMENT_ORDER.map((segment) => {
    const range = timeline[segment];
    return createTextLayer({
      id: `story:${segment}`,
      context,
      text: concept.story?.[segment],
      startSeconds: range.startSeconds,
      durationSeconds: range.endSeconds - range.startSeconds,
      slot: TEXT_SLOTS.story,
    });
  });
}

export function buildReelLayers(
  style: VisualStyle,
  concept: Concept,
  analysis: AudioAnalysis,
  timeline: Timeline,
  context: RenderContext,
  options: ReelCompositionOptions = {},
): Layer[] {
  const { size } = context;
  const duration = analysis.durationSeconds;
  const overlays = STYLE_OVERLAYS[style];

  const layers: Layer[] = [
    createBackgroundLayer({ size, durationSeconds: duration, style }),
    createBeatPulseLayer({ size, durationSeconds: duration, beatTimes: analysis.beatTimes }),
    ...overlays.base.map((factory) => factory(analysis, context)),
    createTypewriterLayer({
      id: "title",
      context,
      text: concept.title,
      startSeconds: 0,
      durationSeconds: Math.min(TITLE_REVEAL_SECONDS, duration),
      slot: TEXT_SLOTS.title,
    }),
    ...storyLayers(concept, timeline, context),
    createHashtagLayer(context, concept.hashtags, duration),
  ];

  if (options.enhancedEffects) {
    layers.push(
      createWaveformLayer({ size, analysis }),
      ...overlays.enhanced.map((factory) => factory(analysis, context)),
      createCaptionLayer({
        id: "captions",
        context,
        text: options.transcript,
        startSeconds: 0,
        durationSeconds: duration,
        slot: TEXT_SLOTS.caption,
      }),
    );
  }

  context.logger.debug(`built ${layers.length} layers for style "${style}"`, {
    enhanced: Boolean(options.enhancedEffects),
  });
  return layers;
}
