import { describe, it, expect } from "vitest";
import { estimateAveragePitch } from "@/analysis/pitch";
import { estimateSpectralCentroid } from "@/analysis/spectral";
import { magnitudeSpectrogram } from "@/analysis/fft";
import { sineWave } from "@/tests/helpers/fixtures";

describe("estimateAveragePitch", () => {
  it("recovers the frequency of a pure tone", () => {
    const pitch = estimateAveragePitch(sineWave(220, 1, 8192), 8192);
    expect(pitch).toBeGreaterThan(215);
    expect(pitch).toBeLessThan(225);
  });

  it("throws when no frame is voiced", () => {
    expect(() => estimateAveragePitch(new Float32Array(8192), 8192)).toThrow(/no voiced frames/);
  });

  it("throws for a clip shorter than one frame", () => {
    expect(() => estimateAveragePitch(new Float32Array(100), 8192)).toThrow(/too short/);
  });
});

describe("estimateSpectralCentroid", () => {
  it("sits near the frequency of a pure tone", () => {
    const centroid = estimateSpectralCentroid(magnitudeSpectrogram(sineWave(1000, 1, 8192), 8192));
    expect(centroid).toBeGreaterThan(900);
    expect(centroid).toBeLessThan(1100);
  });

  it("throws for silence", () => {
    expect(() => estimateSpectralCentroid(magnitudeSpectrogram(new Float32Array(4096), 8192))).toThrow(/silent/);
  });
});
