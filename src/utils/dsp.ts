/**
 * Signal-processing helpers shared by the feature extractor.
 */

export function mean(values: ArrayLike<number>): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i];
  return sum / values.length;
}

/** Population standard deviation; 0 for fewer than two values. */
export function std(values: ArrayLike<number>): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += (values[i] - m) ** 2;
  return Math.sqrt(sum / values.length);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Replace NaN or an infinity with `fallback`. */
export function finiteOr(value: number, fallback: number = 0): number {
  return Number.isFinite(value) ? value : fallback;
}

export function rms(samples: ArrayLike<number>, start: number = 0, end: number = samples.length): number {
  const length = end - start;
  if (length <= 0) return 0;
  let sum = 0;
  for (let i = start; i < end; i++) sum += samples[i] * samples[i];
  return Math.sqrt(sum / length);
}

export function hannWindow(size: number): Float64Array {
  const window = new Float64Array(size);
  for (let i = 0; i < size; i++) {
    window[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / (size - 1));
  }
  return window;
}

/**
 * Cooley-Tukey FFT algorithm (in-place, radix-2)
 * `real.length` must be a power of two.
 */
export function fftInPlace(real: Float64Array, imag: Float64Array): void {
  const n = real.length;

  // Bit-reversal permutation
  let j = 0;
  for (let i = 0; i < n - 1; i++) {
    if (i < j) {
      let temp = real[i];
      real[i] = real[j];
      real[j] = temp;
      temp = imag[i];
      imag[i] = imag[j];
      imag[j] = temp;
    }
    let k = n >> 1;
    while (k <= j) {
      j -= k;
      k >>= 1;
    }
    j += k;
  }

  for (let size = 2; size <= n; size *= 2) {
    const halfSize = size / 2;
    const angleStep = -2 * Math.PI / size;

    for (let i = 0; i < n; i += size) {
      for (let k = 0; k < halfSize; k++) {
        const angle = angleStep * k;
        const cos = Math.cos(angle);
        const sin = Math.sin(angle);

        const evenIdx = i + k;
        const oddIdx = i + k + halfSize;

        const tReal = cos * real[oddIdx] - sin * imag[oddIdx];
        const tImag = sin * real[oddIdx] + cos * imag[oddIdx];

        real[oddIdx] = real[evenIdx] - tReal;
        imag[oddIdx] = imag[evenIdx] - tImag;
        real[evenIdx] = real[evenIdx] + tReal;
        imag[evenIdx] = imag[evenIdx] + tImag;
      }
    }
  }
}

/**
 * Power spectrum (|X|^2) of one windowed frame, bins 0..n/2 inclusive.
 * The frame is zero-padded when shorter than the window.
 */
export function powerSpectrum(
  samples: ArrayLike<number>,
  start: number,
  window: Float64Array
): Float64Array {
  const n = window.length;
  const real = new Float64Array(n);
  const imag = new Float64Array(n);

  for (let i = 0; i < n; i++) {
    const index = start + i;
    real[i] = index < samples.length ? samples[index] * window[i] : 0;
  }

  fftInPlace(real, imag);

  const bins = n / 2 + 1;
  const power = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    power[k] = real[k] * real[k] + imag[k] * imag[k];
  }
  return power;
}

const hzToMel = (hz: number): number => 2595 * Math.log10(1 + hz / 700);
const melToHz = (mel: number): number => 700 * (Math.pow(10, mel / 2595) - 1);

/**
 * Triangular mel filterbank spanning 0 Hz to Nyquist.
 * Returns one row of `fftSize / 2 + 1` weights per band.
 */
export function melFilterbank(sampleRate: number, fftSize: number, bands: number): Float64Array[] {
  const bins = fftSize / 2 + 1;
  const highMel = hzToMel(sampleRate / 2);

  const binPoints: number[] = [];
  for (let i = 0; i < bands + 2; i++) {
    const hz = melToHz((i * highMel) / (bands + 1));
    binPoints.push(Math.floor(((fftSize + 1) * hz) / sampleRate));
  }

  const filters: Float64Array[] = [];
  for (let m = 1; m <= bands; m++) {
    const row = new Float64Array(bins);
    const left = binPoints[m - 1];
    const center = binPoints[m];
    const right = binPoints[m + 1];

    for (let k = left; k < center && k < bins; k++) {
      row[k] = (k - left) / (center - left);
    }
    for (let k = center; k < right && k < bins; k++) {
      row[k] = (right - k) / (right - center);
    }
    filters.push(row);
  }
  return filters;
}

/**
 * Orthonormal DCT-II basis: `count` rows of `size` coefficients.
 */
export function dctMatrix(count: number, size: number): Float64Array[] {
  const rows: Float64Array[] = [];
  for (let k = 0; k < count; k++) {
    const row = new Float64Array(size);
    const scale = k === 0 ? Math.sqrt(1 / size) : Math.sqrt(2 / size);
    for (let n = 0; n < size; n++) {
      row[n] = scale * Math.cos((Math.PI * k * (2 * n + 1)) / (2 * size));
    }
    rows.push(row);
  }
  return rows;
}

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Number of frames of `frameSize` taken every `hopSize` samples.
 * A signal shorter than one frame still yields a single zero-padded frame.
 */
export function frameCount(length: number, frameSize: number, hopSize: number): number {
  if (length <= frameSize) return 1;
  return Math.floor((length - frameSize) / hopSize) + 1;
}
