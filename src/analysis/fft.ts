/**
 * Short-time spectral helpers used by the onset and centroid estimators.
 */

const hannCache = new Map<number, Float32Array>();

export function hannWindow(size: number): Float32Array {
  const cached = hannCache.get(size);
  if (cached) return cached;
  const window = new Float32Array(size);
  for (let i = 0; i < size; i++) {
    window[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / size);
  }
  hannCache.set(size, window);
  return window;
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/** In-place iterative radix-2 FFT over separate real/imaginary arrays. */
export function fft(re: Float64Array, im: Float64Array): void {
  const n = re.length;
  if (!isPowerOfTwo(n) || im.length !== n) {
    throw new RangeError(`fft size must be a power of two, got ${n}`);
  }

  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      const tr = re[i] ?? 0;
      re[i] = re[j] ?? 0;
      re[j] = tr;
      const ti = im[i] ?? 0;
      im[i] = im[j] ?? 0;
      im[j] = ti;
    }
  }

  for (let len = 2; len <= n; len <<= 1) {
    const angle = (-2 * Math.PI) / len;
    const wRe = Math.cos(angle);
    const wIm = Math.sin(angle);
    const half = len >> 1;
    for (let start = 0; start < n; start += len) {
      let curRe = 1;
      let curIm = 0;
      for (let k = 0; k < half; k++) {
        const a = start + k;
        const b = a + half;
        const bRe = re[b] ?? 0;
        const bIm = im[b] ?? 0;
        const tRe = bRe * curRe - bIm * curIm;
        const tIm = bRe * curIm + bIm * curRe;
        const aRe = re[a] ?? 0;
        const aIm = im[a] ?? 0;
        re[a] = aRe + tRe;
        im[a] = aIm + tIm;
        re[b] = aRe - tRe;
        im[b] = aIm - tIm;
        const nextRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = nextRe;
      }
    }
  }
}

export interface Spectrogram {
  fftSize: number;
  hopSize: number;
  sampleRate: number;
  /** One magnitude array of fftSize/2 + 1 bins per frame. */
  frames: Float64Array[];
}

/**
 * Magnitude spectrogram with a Hann window. Clips shorter than one window are
 * zero-padded into a single frame.
 */
export function magnitudeSpectrogram(
  samples: Float32Array,
  sampleRate: number,
  fftSize = 2048,
  hopSize = 512,
): Spectrogram {
  const window = hannWindow(fftSize);
  const bins = fftSize / 2 + 1;
  const frameCount = samples.length <= fftSize ? 1 : 1 + Math.floor((samples.length - fftSize) / hopSize);
  const frames: Float64Array[] = [];
  const re = new Float64Array(fftSize);
  const im = new Float64Array(fftSize);

  for (let f = 0; f < frameCount; f++) {
    const offset = f * hopSize;
    for (let i = 0; i < fftSize; i++) {
      re[i] = (samples[offset + i] ?? 0) * (window[i] ?? 0);
      im[i] = 0;
    }
    fft(re, im);
    const magnitudes = new Float64Array(bins);
    for (let k = 0; k < bins; k++) {
      magnitudes[k] = Math.hypot(re[k] ?? 0, im[k] ?? 0);
    }
    frames.push(magnitudes);
  }

  return { fftSize, hopSize, sampleRate, frames };
}

export function binFrequency(bin: number, fftSize: number, sampleRate: number): number {
  return (bin * sampleRate) / fftSize;
}
