import { extractAudioFeatures } from "@/analysis/feature-extractor";
import { decodeAudioFile } from "@/lib/audio-decode";
import { parseConcept } from "@/lib/concept";
import { resolveRenderConfig, type RenderConfigInput } from "@/lib/config";
import { describeError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import type { RenderJobStore } from "@/stores/render-store";
import type { AudioAnalysis, PcmAudio } from "@/types/audio";
import type { ExportPreset } from "@/types/render";
import { buildReelLayers } from "@/renderer/compositions/reel-composition";
import { Compositor } from "@/renderer/compositor";
import { Encoder, FfmpegMuxer, type FrameSink } from "@/renderer/encoder";
import { createRenderContext } from "@/renderer/text/render-context";
import type { TextRasterizer } from "@/renderer/text/text-layout";
import { segmentTimeline } from "@/renderer/timeline";

export interface RenderJob {
  audio: PcmAudio;
  /** Validated with `parseConcept`; `undefined` renders without text. */
  concept?: unknown;
  /** Text for captions when enhanced effects are on. */
  transcript?: string;
  outputPath: string;
  config?: RenderConfigInput;
  preset?: ExportPreset;
  /** Mux this file's audio instead of the decoded PCM. */
  audioPath?: string;
}

export interface RenderReelOptions {
  /** Replaces the ffmpeg muxer. */
  sink?: FrameSink;
  rasterizer?: TextRasterizer;
  logger?: Logger;
  store?: RenderJobStore;
  signal?: AbortSignal;
  env?: Record<string, string | undefined>;
}

export interface RenderResult {
  outputPath: string;
  framesWritten: number;
  totalFrames: number;
  /** False when the job was cancelled before the last frame. */
  complete: boolean;
  analysis: AudioAnalysis;
}

const yieldToEventLoop = () => new Promise<void>((resolve) => setImmediate(resolve));

interface FrameLoopOptions {
  concurrency: number;
  signal?: AbortSignal;
  onProgress: (framesWritten: number) => void;
}

/**
 * Cooperative workers pull frame indices in order and submit what they render
 * to the encoder, which puts frames back in order.
 */
async function renderFrames(compositor: Compositor, encoder: Encoder, options: FrameLoopOptions): Promise<void> {
  const total = compositor.frameCount;
  let nextIndex = 0;

  const worker = async () => {
    while (nextIndex < total && !options.signal?.aborted) {
      const index = nextIndex++;
      await yieldToEventLoop();
      await encoder.submit(compositor.renderFrame(index));
      options.onProgress(encoder.framesWritten);
    }
  };

  const workers = Math.max(1, Math.min(options.concurrency, total));
  await Promise.all(Array.from({ length: workers }, worker));
}

/**
 * Analyze the audio, build the layer stack for the configured style and
 * encode every frame. Anything wrong with the audio surfaces before the sink
 * is opened.
 */
export async function renderReel(job: RenderJob, options: RenderReelOptions = {}): Promise<RenderResult> {
  const config = resolveRenderConfig(job.config, { preset: job.preset, env: options.env });
  const logger = options.logger ?? createLogger("reel", config.logLevel);
  const { store, signal } = options;
  const startedAt = Date.now();
  const elapsed = () => (Date.now() - startedAt) / 1000;

  let sink: FrameSink | null = null;
  try {
    const concept = parseConcept(job.concept);

    store?.getState().setStatus("analyzing", "extracting audio features");
    const analysis = extractAudioFeatures(job.audio, { logger: logger.child("analysis") });
    const timeline = segmentTimeline(analysis.durationSeconds);
    logger.info(
      `analyzed ${analysis.durationSeconds.toFixed(2)}s: ${analysis.beatTimes.length} beats, ` +
        `${analysis.tempoBpm.toFixed(1)} bpm, pitch ${analysis.averagePitchHz.toFixed(1)} Hz`,
    );

    store?.getState().setStatus("assembling", "building layers");
    const context = createRenderContext(config, { rasterizer: options.rasterizer, logger: logger.child("layers") });
    const compositor = new Compositor(context.size, config.fps);
    compositor.setAnalysis(analysis, timeline);
    compositor.addLayers(
      buildReelLayers(config.style, concept, analysis, timeline, context, {
        enhancedEffects: config.enhancedEffects,
        transcript: job.transcript,
      }),
    );
    compositor.beginRendering();

    const totalFrames = compositor.frameCount;
    store?.getState().setProgressDetails({ currentFrame: 0, totalFrames, elapsedSeconds: elapsed() });
    if (signal?.aborted) {
      store?.getState().setCancelled(0);
      return { outputPath: job.outputPath, framesWritten: 0, totalFrames, complete: false, analysis };
    }

    sink =
      options.sink ??
      (await FfmpegMuxer.open({
        outputPath: job.outputPath,
        size: context.size,
        fps: config.fps,
        audio: job.audioPath ? { kind: "file", path: job.audioPath } : { kind: "pcm", pcm: job.audio },
        settings: config,
        logger: logger.child("encoder"),
      }));
    const encoder = new Encoder(sink, logger.child("encoder"));

    store?.getState().setStatus("rendering", `rendering ${totalFrames} frames`);
    await renderFrames(compositor, encoder, {
      concurrency: config.concurrency,
      signal,
      onProgress: (currentFrame) => store?.getState().setProgressDetails({ currentFrame, elapsedSeconds: elapsed() }),
    });

    const framesWritten = encoder.framesWritten;
    if (framesWritten < totalFrames) {
      await encoder.abort();
      logger.warn(`cancelled after ${framesWritten} of ${totalFrames} frames`);
      store?.getState().setCancelled(framesWritten);
      return { outputPath: job.outputPath, framesWritten, totalFrames, complete: false, analysis };
    }

    store?.getState().setStatus("encoding", "finalizing output");
    await encoder.finish();
    store?.getState().setComplete(job.outputPath);
    logger.info(`rendered ${framesWritten} frames in ${elapsed().toFixed(1)}s`);
    return { outputPath: job.outputPath, framesWritten, totalFrames, complete: true, analysis };
  } catch (error) {
    store?.getState().setError(describeError(error));
    if (sink) {
      await sink.abort().catch((abortError: unknown) => {
        logger.warn(`could not finalize partial output: ${describeError(abortError)}`);
      });
    }
    throw error;
  }
}

/**
 * Decode `audioPath` with ffmpeg, then render with that file as the muxed
 * audio track.
 */
export async function renderReelFromFile(
  audioPath: string,
  job: Omit<RenderJob, "audio" | "audioPath">,
  options: RenderReelOptions = {},
): Promise<RenderResult> {
  const config = resolveRenderConfig(job.config, { preset: job.preset, env: options.env });
  const audio = await decodeAudioFile(config.ffmpegPath, audioPath);
  return renderReel({ ...job, audio, audioPath }, options);
}
