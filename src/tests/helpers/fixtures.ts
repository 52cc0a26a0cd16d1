import { createLogger, type Logger } from "@/lib/logger";
import type { FrameSink } from "@/renderer/encoder";
import type { RenderContext } from "@/renderer/text/render-context";
import type { AudioAnalysis, PcmAudio } from "@/types/audio";
import type { CanvasSize, Frame } from "@/types/render";
import { StubRasterizer } from "@/tests/helpers/stub-rasterizer";

export const quietLogger = (): Logger => createLogger("test", "silent");

export function sineWave(frequency: number, seconds: number, sampleRate: number, amplitude = 0.5): Float32Array {
  const samples = new Float32Array(Math.round(seconds * sampleRate));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
  }
  return samples;
}

/** Single-sample clicks at the given times. */
export function clickTrack(times: readonly number[], seconds: number, sampleRate: number): PcmAudio {
  const samples = new Float32Array(Math.round(seconds * sampleRate));
  for (const time of times) samples[Math.round(time * sampleRate)] = 1;
  return { samples, sampleRate };
}

export function makeAnalysis(overrides: Partial<AudioAnalysis> = {}): AudioAnalysis {
  return {
    durationSeconds: 10,
    sampleRate: 22050,
    beatTimes: [],
    loudnessEnvelope: [0, 0.5, 1],
    envelopeWindowSeconds: 0.02,
    averagePitchHz: 0,
    tempoBpm: 0,
    spectralCentroidHz: 0,
    ...overrides,
  };
}

export function makeContext(size: CanvasSize, overrides: Partial<RenderContext> = {}): RenderContext {
  return {
    size,
    fps: 30,
    seed: 42,
    rasterizer: new StubRasterizer(),
    logger: quietLogger(),
    ...overrides,
  };
}

/** Frame sink that keeps frames in memory instead of running ffmpeg. */
export class MemoryFrameSink implements FrameSink {
  readonly frames: Frame[] = [];
  finished = false;
  aborted = false;

  constructor(private readonly keepPixels = false) {}

  async write(frame: Frame): Promise<void> {
    this.frames.push(this.keepPixels ? frame : { ...frame, pixels: new Uint8Array(0) });
  }

  async finish(): Promise<void> {
    this.finished = true;
  }

  async abort(): Promise<void> {
    this.aborted = true;
  }
}
