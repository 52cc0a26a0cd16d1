import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { buildMuxerArgs, Encoder, FfmpegMuxer, FrameReorderBuffer } from "@/renderer/encoder";
import { resolveRenderConfig } from "@/lib/config";
import { EncodingError } from "@/lib/errors";
import type { Frame } from "@/types/render";
import { MemoryFrameSink, quietLogger } from "@/tests/helpers/fixtures";

const frame = (index: number): Frame => ({
  index,
  timestampSeconds: index / 30,
  width: 1,
  height: 1,
  pixels: new Uint8Array([index, index, index]),
});

const settings = resolveRenderConfig({}, { env: {} });

describe("FrameReorderBuffer", () => {
  it("writes frames strictly by index whatever order they arrive in", async () => {
    const sink = new MemoryFrameSink(true);
    const buffer = new FrameReorderBuffer(sink);

    const pending = [3, 1, 0, 4, 2].map((i) => buffer.push(frame(i)));
    await Promise.all(pending);

    expect(sink.frames.map((f) => f.index)).toEqual([0, 1, 2, 3, 4]);
    expect(buffer.written).toBe(5);
    expect(buffer.buffered).toBe(0);
  });

  it("holds frames back until the gap is filled", async () => {
    const sink = new MemoryFrameSink();
    const buffer = new FrameReorderBuffer(sink);
    await buffer.push(frame(1));
    expect(sink.frames).toHaveLength(0);
    expect(buffer.buffered).toBe(1);
    await buffer.push(frame(0));
    expect(sink.frames.map((f) => f.index)).toEqual([0, 1]);
  });

  it("rejects a frame submitted twice", async () => {
    const buffer = new FrameReorderBuffer(new MemoryFrameSink());
    await buffer.push(frame(0));
    await expect(buffer.push(frame(0))).rejects.toThrow(RangeError);
  });
});

describe("Encoder", () => {
  it("finalizes the sink after the last frame", async () => {
    const sink = new MemoryFrameSink();
    const encoder = new Encoder(sink, quietLogger());
    await Promise.all([encoder.submit(frame(1)), encoder.submit(frame(0))]);
    await encoder.finish();
    expect(encoder.framesWritten).toBe(2);
    expect(sink.finished).toBe(true);
    expect(sink.aborted).toBe(false);
  });

  it("aborts with the frames written so far", async () => {
    const sink = new MemoryFrameSink();
    const encoder = new Encoder(sink, quietLogger());
    await encoder.submit(frame(0));
    await encoder.submit(frame(2));
    await encoder.abort();
    expect(encoder.framesWritten).toBe(1);
    expect(sink.aborted).toBe(true);
  });
});

describe("buildMuxerArgs", () => {
  it("reads raw RGB from stdin and truncates to the shorter stream", () => {
    const args = buildMuxerArgs(
      { outputPath: "out/reel.mp4", size: { width: 1080, height: 1920 }, fps: 30, settings },
      ["-i", "song.mp3"],
    );
    expect(args.slice(args.indexOf("-f"), args.indexOf("-f") + 4)).toEqual(["-f", "rawvideo", "-pix_fmt", "rgb24"]);
    expect(args[args.indexOf("-s") + 1]).toBe("1080x1920");
    expect(args[args.indexOf("-r") + 1]).toBe("30");
    expect(args).toContain("song.mp3");
    expect(args[args.indexOf("-c:v") + 1]).toBe("libx264");
    expect(args[args.indexOf("-c:a") + 1]).toBe("aac");
    expect(args[args.indexOf("-crf") + 1]).toBe("20");
    expect(args).toContain("-shortest");
    expect(args[args.length - 1]).toBe("out/reel.mp4");
  });
});

describe("FfmpegMuxer", () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) await rm(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it("fails with EncodingError when the output directory cannot be created", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "beatreel-test-"));
    const blocker = path.join(tempDir, "not-a-directory");
    await writeFile(blocker, "x");

    await expect(
      FfmpegMuxer.open({
        outputPath: path.join(blocker, "nested", "reel.mp4"),
        size: { width: 2, height: 2 },
        fps: 30,
        audio: { kind: "file", path: "song.mp3" },
        settings,
        logger: quietLogger(),
      }),
    ).rejects.toThrow(EncodingError);
  });

  it("fails with EncodingError when the muxer binary cannot start", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "beatreel-test-"));
    const muxer = await FfmpegMuxer.open({
      outputPath: path.join(tempDir, "reel.mp4"),
      size: { width: 2, height: 2 },
      fps: 30,
      audio: { kind: "file", path: "song.mp3" },
      settings: { ...settings, ffmpegPath: path.join(tempDir, "missing-ffmpeg") },
      logger: quietLogger(),
    });
    await expect(muxer.finish()).rejects.toThrow(/could not start/);
  });
});
