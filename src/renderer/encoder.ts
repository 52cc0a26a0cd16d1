import { spawn, type ChildProcessByStdio } from "node:child_process";
import { once } from "node:events";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Readable, Writable } from "node:stream";
import type { RenderConfig } from "@/lib/config";
import { describeError, EncodingError } from "@/lib/errors";
import { stderrTail } from "@/lib/ffmpeg";
import { createLogger, type Logger } from "@/lib/logger";
import type { PcmAudio } from "@/types/audio";
import type { CanvasSize, Frame } from "@/types/render";

/** Destination for composed frames, written strictly in index order. */
export interface FrameSink {
  write: (frame: Frame) => Promise<void>;
  /** Finalize the output after the last frame. */
  finish: () => Promise<void>;
  /** Stop early: keep what was written and finalize. */
  abort: () => Promise<void>;
}

export type AudioSource = { kind: "file"; path: string } | { kind: "pcm"; pcm: PcmAudio };

export type MuxerSettings = Pick<
  RenderConfig,
  "ffmpegPath" | "videoCodec" | "audioCodec" | "audioBitrate" | "crf" | "preset"
>;

export interface FfmpegMuxerOptions {
  outputPath: string;
  size: CanvasSize;
  fps: number;
  audio: AudioSource;
  settings: MuxerSettings;
  logger?: Logger;
}

export function buildMuxerArgs(
  options: Pick<FfmpegMuxerOptions, "outputPath" | "size" | "fps" | "settings">,
  audioInput: readonly string[],
): string[] {
  const { size, fps, settings } = options;
  return [
    "-y",
    "-v",
    "error",
    "-f",
    "rawvideo",
    "-pix_fmt",
    "rgb24",
    "-s",
    `${size.width}x${size.height}`,
    "-r",
    String(fps),
    "-i",
    "-",
    ...audioInput,
    "-map",
    "0:v:0",
    "-map",
    "1:a:0",
    // yuv420p needs even dimensions
    "-vf",
    "pad=ceil(iw/2)*2:ceil(ih/2)*2",
    "-c:v",
    settings.videoCodec,
    "-preset",
    settings.preset,
    "-crf",
    String(settings.crf),
    "-pix_fmt",
    "yuv420p",
    "-c:a",
    settings.audioCodec,
    "-b:a",
    settings.audioBitrate,
    "-shortest",
    "-movflags",
    "+faststart",
    options.outputPath,
  ];
}

/** Interleaved little-endian f32 samples, every channel kept, cut to the shortest channel. */
export function interleavePcm(pcm: PcmAudio): { bytes: Uint8Array; channels: number } {
  const channels = pcm.samples instanceof Float32Array ? [pcm.samples] : pcm.samples;
  const length = channels.length === 0 ? 0 : Math.min(...channels.map((channel) => channel.length));
  const bytes = new Uint8Array(length * channels.length * 4);
  const view = new DataView(bytes.buffer);
  channels.forEach((channel, c) => {
    for (let i = 0; i < length; i++) view.setFloat32((i * channels.length + c) * 4, channel[i] ?? 0, true);
  });
  return { bytes, channels: Math.max(1, channels.length) };
}

const PCM_FILE = "audio.f32le";

/** Writes PCM bytes to a fresh temp directory and returns the directory. */
async function stagePcm(bytes: Uint8Array): Promise<string> {
  let dir: string | null = null;
  try {
    dir = await mkdtemp(path.join(os.tmpdir(), "beatreel-"));
    await writeFile(path.join(dir, PCM_FILE), bytes);
    return dir;
  } catch (error) {
    if (dir) await rm(dir, { recursive: true, force: true });
    throw new EncodingError(`cannot stage PCM audio for muxing: ${describeError(error)}`, { cause: error });
  }
}

type MuxerProcess = ChildProcessByStdio<Writable, null, Readable>;

/**
 * Pipes raw RGB frames into an ffmpeg process that encodes H.264 and muxes the
 * source audio. Writes wait for the pipe to drain.
 */
export class FfmpegMuxer implements FrameSink {
  private readonly stderrChunks: Uint8Array[] = [];
  private readonly closed: Promise<number | null>;
  private failure: Error | null = null;
  private exitCode: number | null | undefined;
  private finalized: Promise<void> | null = null;

  private constructor(
    private readonly child: MuxerProcess,
    private readonly options: FfmpegMuxerOptions,
    private readonly tempDir: string | null,
    private readonly logger: Logger,
  ) {
    child.stderr.on("data", (chunk: Buffer) => this.stderrChunks.push(chunk));
    child.stdin.on("error", (error) => {
      this.failure ??= error;
    });
    this.closed = new Promise((resolve) => {
      child.on("error", (error) => {
        this.failure ??= error;
        resolve(null);
      });
      child.on("close", (code) => {
        this.exitCode = code;
        resolve(code);
      });
    });
  }

  static async open(options: FfmpegMuxerOptions): Promise<FfmpegMuxer> {
    const logger = options.logger ?? createLogger("encoder");
    const outputDir = path.dirname(path.resolve(options.outputPath));
    try {
      await mkdir(outputDir, { recursive: true });
    } catch (error) {
      throw new EncodingError(`cannot create output directory ${outputDir}: ${describeError(error)}`, {
        cause: error,
      });
    }

    let tempDir: string | null = null;
    let audioInput: string[];
    if (options.audio.kind === "file") {
      audioInput = ["-i", options.audio.path];
    } else {
      const { bytes, channels } = interleavePcm(options.audio.pcm);
      tempDir = await stagePcm(bytes);
      const pcmPath = path.join(tempDir, PCM_FILE);
      audioInput = ["-f", "f32le", "-ar", String(options.audio.pcm.sampleRate), "-ac", String(channels), "-i", pcmPath];
    }

    const args = buildMuxerArgs(options, audioInput);
    logger.debug(`${options.settings.ffmpegPath} ${args.join(" ")}`);
    const child = spawn(options.settings.ffmpegPath, args, { stdio: ["pipe", "ignore", "pipe"] });
    return new FfmpegMuxer(child, options, tempDir, logger);
  }

  async write(frame: Frame): Promise<void> {
    this.throwIfFailed();
    const { stdin } = this.child;
    if (stdin.write(frame.pixels)) return;

    const drained = new AbortController();
    // Resolves with the error instead of rejecting; aborted once the race settles.
    const drain = once(stdin, "drain", { signal: drained.signal }).then(
      () => null,
      (error: unknown) => error,
    );
    const outcome = await Promise.race([drain, this.closed.then(() => null)]);
    drained.abort();

    if (outcome !== null) {
      this.failure ??= outcome instanceof Error ? outcome : new Error(describeError(outcome));
    } else if (this.exitCode !== undefined) {
      this.failure ??= new Error(`exited with code ${this.exitCode} before all frames were written`);
    }
    this.throwIfFailed();
  }

  finish(): Promise<void> {
    this.finalized ??= this.finalize();
    return this.finalized;
  }

  abort(): Promise<void> {
    this.logger.warn("stopping early; finalizing the frames written so far");
    return this.finish();
  }

  private async finalize(): Promise<void> {
    this.child.stdin.end();
    const code = await this.closed;
    if (this.tempDir) await rm(this.tempDir, { recursive: true, force: true });

    const { ffmpegPath } = this.options.settings;
    if (code === null && this.failure) {
      throw new EncodingError(`could not start ${ffmpegPath}: ${this.failure.message}`, { cause: this.failure });
    }
    if (code !== 0) {
      throw new EncodingError(`${ffmpegPath} exited with code ${code}\n${stderrTail(this.stderrChunks)}`);
    }
    this.logger.info(`wrote ${this.options.outputPath}`);
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw new EncodingError(`${this.options.settings.ffmpegPath} stopped accepting frames: ${this.failure.message}`, {
        cause: this.failure,
      });
    }
  }
}

/**
 * Accepts frames in any order and hands them to the sink strictly by index,
 * one write at a time.
 */
export class FrameReorderBuffer {
  private next = 0;
  private readonly pending = new Map<number, Frame>();
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly sink: FrameSink) {}

  /** Frames handed to the sink so far. */
  get written(): number {
    return this.next;
  }

  get buffered(): number {
    return this.pending.size;
  }

  push(frame: Frame): Promise<void> {
    if (frame.index < this.next || this.pending.has(frame.index)) {
      return Promise.reject(new RangeError(`frame ${frame.index} was already submitted`));
    }
    this.pending.set(frame.index, frame);
    this.chain = this.chain.then(() => this.drain());
    return this.chain;
  }

  /** Resolves once every frame that can be written in order has been. */
  flush(): Promise<void> {
    return this.chain;
  }

  private async drain(): Promise<void> {
    let frame = this.pending.get(this.next);
    while (frame) {
      this.pending.delete(this.next);
      await this.sink.write(frame);
      this.next++;
      frame = this.pending.get(this.next);
    }
  }
}

/**
 * Front door for composed frames: reorders them, writes them to the sink and
 * finalizes the output.
 */
export class Encoder {
  private readonly buffer: FrameReorderBuffer;

  constructor(
    private readonly sink: FrameSink,
    private readonly logger: Logger = createLogger("encoder"),
  ) {
    this.buffer = new FrameReorderBuffer(sink);
  }

  get framesWritten(): number {
    return this.buffer.written;
  }

  submit(frame: Frame): Promise<void> {
    return this.buffer.push(frame);
  }

  async finish(): Promise<void> {
    await this.settle();
    await this.sink.finish();
  }

  async abort(): Promise<void> {
    await this.settle();
    await this.sink.abort();
  }

  private async settle(): Promise<void> {
    await this.buffer.flush();
    if (this.buffer.buffered > 0) {
      this.logger.warn(`dropping ${this.buffer.buffered} frames that arrived after a gap at ${this.buffer.written}`);
    }
  }
}
