import { describe, it, expect } from "vitest";
import { float32FromBytes } from "@/lib/audio-decode";
import { stderrTail } from "@/lib/ffmpeg";

describe("float32FromBytes", () => {
  it("reads little-endian float32 samples", () => {
    const bytes = new Uint8Array(new Float32Array([0.5, -1, 0.25]).buffer);
    expect(Array.from(float32FromBytes(bytes))).toEqual([0.5, -1, 0.25]);
  });

  it("handles an unaligned view and ignores a trailing partial sample", () => {
    const source = new Uint8Array(1 + 8 + 2);
    source.set(new Uint8Array(new Float32Array([1, 2]).buffer), 1);
    expect(Array.from(float32FromBytes(source.subarray(1)))).toEqual([1, 2]);
  });
});

describe("stderrTail", () => {
  it("joins chunks and trims", () => {
    const encoder = new TextEncoder();
    expect(stderrTail([encoder.encode("Error opening "), encoder.encode("input\n")])).toBe("Error opening input");
  });
});
