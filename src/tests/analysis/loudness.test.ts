import { describe, it, expect } from "vitest";
import { loudnessEnvelope, rmsLevel } from "@/analysis/loudness";

describe("loudnessEnvelope", () => {
  it("uses 20ms windows and reports the window actually used", () => {
    const env = loudnessEnvelope(new Float32Array(1000).fill(0.3), 1000);
    expect(env.windowSize).toBe(20);
    expect(env.windowSeconds).toBeCloseTo(0.02);
    expect(env.values).toHaveLength(50);
  });

  it("normalizes to the loudest window", () => {
    const samples = new Float32Array(40);
    samples.fill(0.25, 0, 20);
    samples.fill(-0.5, 20, 40);
    const { values } = loudnessEnvelope(samples, 1000);
    expect(values).toHaveLength(2);
    expect(values[0]).toBeCloseTo(0.5, 6);
    expect(values[1]).toBeCloseTo(1, 6);
  });

  it("keeps every value within [0, 1]", () => {
    const samples = new Float32Array(4410);
    for (let i = 0; i < samples.length; i++) samples[i] = Math.sin(i / 7) * (i / samples.length);
    const { values } = loudnessEnvelope(samples, 22050);
    for (const value of values) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
  });

  it("is all zeros for silence", () => {
    const { values } = loudnessEnvelope(new Float32Array(2205), 22050);
    expect(values).toHaveLength(5);
    expect(values.every((value) => value === 0)).toBe(true);
  });

  it("treats a clip shorter than one window as a single window", () => {
    const { values } = loudnessEnvelope(new Float32Array(10).fill(0.2), 1000);
    expect(values).toHaveLength(1);
    expect(values[0]).toBeCloseTo(1, 6);
  });
});

describe("rmsLevel", () => {
  it("is the root mean square of the samples", () => {
    expect(rmsLevel(new Float32Array([3, -4, 0, 0]))).toBeCloseTo(2.5);
    expect(rmsLevel(new Float32Array(0))).toBe(0);
  });
});
