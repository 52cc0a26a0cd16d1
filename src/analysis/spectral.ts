import { binFrequency, type Spectrogram } from "@/analysis/fft";

/**
 * Mean spectral centroid ("brightness") in Hz over frames that carry energy.
 * Throws when every frame is silent.
 */
export function estimateSpectralCentroid(spectrogram: Spectrogram): number {
  const { fftSize, sampleRate, frames } = spectrogram;
  let total = 0;
  let counted = 0;

  for (const magnitudes of frames) {
    let weighted = 0;
    let sum = 0;
    for (let k = 0; k < magnitudes.length; k++) {
      const magnitude = magnitudes[k] ?? 0;
      weighted += binFrequency(k, fftSize, sampleRate) * magnitude;
      sum += magnitude;
    }
    if (sum <= 1e-9) continue;
    total += weighted / sum;
    counted++;
  }

  if (counted === 0) throw new Error("spectrum is silent");
  return total / counted;
}
