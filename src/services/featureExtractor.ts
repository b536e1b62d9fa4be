import { ExtractorSettings } from '../config/engine';
import { FeatureVector, Waveform } from '../types';
import {
  clamp,
  dctMatrix,
  dot,
  finiteOr,
  frameCount,
  hannWindow,
  mean,
  melFilterbank,
  powerSpectrum,
  rms,
  std,
} from '../utils/dsp';

const MFCC_COUNT = 13;

/**
 * Positional layout of the feature vector. Scoring models index into it,
 * so entries may only ever be appended under a new model version.
 */
export const FEATURE_NAMES = [
  ...Array.from({ length: MFCC_COUNT }, (_, i) => `mfcc_mean_${i}`),
  ...Array.from({ length: MFCC_COUNT }, (_, i) => `mfcc_std_${i}`),
  'centroid_mean',
  'centroid_std',
  'rolloff_mean',
  'rolloff_std',
  'bandwidth_mean',
  'bandwidth_std',
  'flatness_mean',
  'flatness_std',
  'zcr_mean',
  'zcr_std',
  'onset_mean',
  'onset_std',
  'onset_rate',
  'tempo_bpm',
  'rms_mean',
  'rms_std',
  'shimmer',
  'low_energy_ratio',
  'f0_mean',
  'f0_std',
  'voiced_fraction',
  'jitter',
] as const;

export const FEATURE_COUNT = 48;

export const featureIndex = (name: string): number => FEATURE_NAMES.indexOf(name);

interface SpectralFrames {
  mfcc: number[][];
  centroid: number[];
  rolloff: number[];
  bandwidth: number[];
  flatness: number[];
  onsetEnvelope: number[];
}

interface PitchTrack {
  voicedPitches: number[];
  frames: number;
}

const LOG_FLOOR = 1e-10;
const TEMPO_MIN_BPM = 60;
const TEMPO_MAX_BPM = 200;

/**
 * Feature Extractor
 * Reduces a waveform to a fixed-length vector of cepstral, spectral,
 * rhythm, energy and pitch statistics
 */
export class FeatureExtractor {
  private readonly window: Float64Array;
  private readonly melFilters: Float64Array[];
  private readonly dct: Float64Array[];
  private readonly binHz: number;

  constructor(private readonly settings: ExtractorSettings) {
    if (settings.mfccCount !== MFCC_COUNT) {
      throw new Error(`Feature layout requires ${MFCC_COUNT} cepstral coefficients`);
    }
    this.window = hannWindow(settings.frameSize);
    this.melFilters = melFilterbank(settings.sampleRate, settings.frameSize, settings.melBands);
    this.dct = dctMatrix(settings.mfccCount, settings.melBands);
    this.binHz = settings.sampleRate / settings.frameSize;
  }

  extract(wave: Waveform): FeatureVector {
    const limit = Math.floor(this.settings.maxAnalysisSeconds * wave.sampleRate);
    const samples = wave.samples.length > limit ? wave.samples.subarray(0, limit) : wave.samples;

    const spectral = this.analyzeSpectrum(samples);
    const frameRms = this.frameRms(samples);
    const pitch = this.trackPitch(samples, wave.sampleRate);

    const features: number[] = [
      ...this.aggregateMfcc(spectral.mfcc),
      mean(spectral.centroid),
      std(spectral.centroid),
      mean(spectral.rolloff),
      std(spectral.rolloff),
      mean(spectral.bandwidth),
      std(spectral.bandwidth),
      mean(spectral.flatness),
      std(spectral.flatness),
      this.zeroCrossingRate(samples),
      std(this.frameZeroCrossingRates(samples)),
      ...this.rhythmDescriptors(spectral.onsetEnvelope, samples.length / wave.sampleRate),
      ...this.energyDescriptors(frameRms),
      ...this.pitchDescriptors(pitch),
    ];

    return features.map(value => finiteOr(value));
  }

  /**
   * Per-frame MFCCs and spectral descriptors. Frames below the silence
   * floor are skipped for descriptors but still feed the onset envelope.
   */
  private analyzeSpectrum(samples: Float32Array): SpectralFrames {
    const { frameSize, hopSize, rolloffPercent, silenceRms } = this.settings;
    const frames = frameCount(samples.length, frameSize, hopSize);

    const result: SpectralFrames = {
      mfcc: [],
      centroid: [],
      rolloff: [],
      bandwidth: [],
      flatness: [],
      onsetEnvelope: [],
    };

    let previousLogMel: number[] | null = null;

    for (let f = 0; f < frames; f++) {
      const start = f * hopSize;
      const power = powerSpectrum(samples, start, this.window);
      const logMel = this.melFilters.map(filter => Math.log(dot(filter, power) + LOG_FLOOR));

      // Half-wave rectified spectral flux on the log-mel bands
      if (previousLogMel) {
        let flux = 0;
        for (let b = 0; b < logMel.length; b++) {
          flux += Math.max(0, logMel[b] - previousLogMel[b]);
        }
        result.onsetEnvelope.push(flux / logMel.length);
      }
      previousLogMel = logMel;

      if (rms(samples, start, Math.min(samples.length, start + frameSize)) < silenceRms) {
        continue;
      }

      result.mfcc.push(this.dct.map(basis => dot(basis, logMel)));

      let total = 0;
      let weighted = 0;
      for (let k = 0; k < power.length; k++) {
        total += power[k];
        weighted += k * this.binHz * power[k];
      }
      if (total <= 0) continue;

      const centroid = weighted / total;

      let spread = 0;
      let cumulative = 0;
      let rolloffBin = power.length - 1;
      let rolloffFound = false;
      let logSum = 0;
      for (let k = 0; k < power.length; k++) {
        const frequency = k * this.binHz;
        spread += power[k] * (frequency - centroid) ** 2;
        cumulative += power[k];
        if (!rolloffFound && cumulative >= rolloffPercent * total) {
          rolloffBin = k;
          rolloffFound = true;
        }
        logSum += Math.log(power[k] + LOG_FLOOR);
      }

      const arithmeticMean = total / power.length + LOG_FLOOR;
      const geometricMean = Math.exp(logSum / power.length);

      result.centroid.push(centroid);
      result.rolloff.push(rolloffBin * this.binHz);
      result.bandwidth.push(Math.sqrt(spread / total));
      result.flatness.push(clamp(geometricMean / arithmeticMean, 0, 1));
    }

    return result;
  }

  private aggregateMfcc(frames: number[][]): number[] {
    const means: number[] = [];
    const deviations: number[] = [];
    for (let c = 0; c < MFCC_COUNT; c++) {
      const column = frames.map(frame => frame[c]);
      means.push(mean(column));
      deviations.push(std(column));
    }
    return [...means, ...deviations];
  }

  /**
   * Fraction of adjacent sample pairs whose sign differs, over the whole signal.
   */
  private zeroCrossingRate(samples: Float32Array, start: number = 0, end: number = samples.length): number {
    if (end - start < 2) return 0;
    let crossings = 0;
    for (let i = start + 1; i < end; i++) {
      if ((samples[i] >= 0) !== (samples[i - 1] >= 0)) {
        crossings++;
      }
    }
    return crossings / (end - start - 1);
  }

  private frameZeroCrossingRates(samples: Float32Array): number[] {
    const { frameSize, hopSize } = this.settings;
    const frames = frameCount(samples.length, frameSize, hopSize);
    const rates: number[] = [];
    for (let f = 0; f < frames; f++) {
      const start = f * hopSize;
      rates.push(this.zeroCrossingRate(samples, start, Math.min(samples.length, start + frameSize)));
    }
    return rates;
  }

  /**
   * Onset strength mean and spread, onset rate per second and a tempo
   * estimate from the envelope's autocorrelation.
   */
  private rhythmDescriptors(envelope: number[], duration: number): [number, number, number, number] {
    const envelopeMean = mean(envelope);
    const envelopeStd = std(envelope);

    let onsets = 0;
    const peakThreshold = envelopeMean + envelopeStd;
    for (let i = 1; i < envelope.length - 1; i++) {
      if (
        envelope[i] > peakThreshold &&
        envelope[i] > envelope[i - 1] &&
        envelope[i] >= envelope[i + 1]
      ) {
        onsets++;
      }
    }

    const onsetRate = duration > 0 ? onsets / duration : 0;

    return [envelopeMean, envelopeStd, onsetRate, this.estimateTempo(envelope)];
  }

  private estimateTempo(envelope: number[]): number {
    const framesPerSecond = this.settings.sampleRate / this.settings.hopSize;
    const minLag = Math.max(1, Math.round((60 * framesPerSecond) / TEMPO_MAX_BPM));
    const maxLag = Math.round((60 * framesPerSecond) / TEMPO_MIN_BPM);

    const envelopeMean = mean(envelope);
    const centered = envelope.map(value => value - envelopeMean);

    let bestLag = 0;
    let bestCorrelation = 0;
    for (let lag = minLag; lag <= maxLag && lag < centered.length; lag++) {
      let correlation = 0;
      for (let i = 0; i + lag < centered.length; i++) {
        correlation += centered[i] * centered[i + lag];
      }
      if (correlation > bestCorrelation) {
        bestCorrelation = correlation;
        bestLag = lag;
      }
    }

    return bestLag > 0 ? (60 * framesPerSecond) / bestLag : 0;
  }

  private frameRms(samples: Float32Array): number[] {
    const { frameSize, hopSize } = this.settings;
    const frames = frameCount(samples.length, frameSize, hopSize);
    const values: number[] = [];
    for (let f = 0; f < frames; f++) {
      const start = f * hopSize;
      values.push(rms(samples, start, Math.min(samples.length, start + frameSize)));
    }
    return values;
  }

  /**
   * RMS mean and spread, shimmer (mean relative change between frames)
   * and the share of frames under half the mean energy.
   */
  private energyDescriptors(frameRms: number[]): [number, number, number, number] {
    const rmsMean = mean(frameRms);
    if (rmsMean <= 0) return [0, 0, 0, 0];

    let change = 0;
    for (let i = 1; i < frameRms.length; i++) {
      change += Math.abs(frameRms[i] - frameRms[i - 1]);
    }
    const shimmer = frameRms.length > 1 ? change / (frameRms.length - 1) / rmsMean : 0;

    const lowEnergy = frameRms.filter(value => value < 0.5 * rmsMean).length / frameRms.length;

    return [rmsMean, std(frameRms), shimmer, lowEnergy];
  }

  /**
   * Pitch contour by autocorrelation over non-silent frames.
   */
  private trackPitch(samples: Float32Array, sampleRate: number): PitchTrack {
    const { pitchFrameSize, pitchHopSize, silenceRms } = this.settings;
    const frames = frameCount(samples.length, pitchFrameSize, pitchHopSize);
    const voicedPitches: number[] = [];

    for (let f = 0; f < frames; f++) {
      const start = f * pitchHopSize;
      const end = Math.min(samples.length, start + pitchFrameSize);
      if (rms(samples, start, end) < silenceRms) continue;

      const pitch = this.estimatePitch(samples.subarray(start, end), sampleRate);
      if (pitch > 0) {
        voicedPitches.push(pitch);
      }
    }

    return { voicedPitches, frames };
  }

  /**
   * Estimate pitch using autocorrelation, refined by parabolic
   * interpolation around the best lag. Returns 0 for unvoiced frames.
   */
  private estimatePitch(frame: Float32Array, sampleRate: number): number {
    const { pitchMinHz, pitchMaxHz, voicingThreshold } = this.settings;
    const minLag = Math.max(2, Math.floor(sampleRate / pitchMaxHz));
    const maxLag = Math.min(frame.length - 2, Math.ceil(sampleRate / pitchMinHz));
    if (maxLag <= minLag) return 0;

    const correlate = (lag: number): number => {
      let sum = 0;
      for (let i = 0; i + lag < frame.length; i++) {
        sum += frame[i] * frame[i + lag];
      }
      return sum;
    };

    const energy = correlate(0);
    if (energy <= 0) return 0;

    let bestLag = 0;
    let bestCorrelation = -Infinity;
    for (let lag = minLag; lag <= maxLag; lag++) {
      const correlation = correlate(lag);
      if (correlation > bestCorrelation) {
        bestCorrelation = correlation;
        bestLag = lag;
      }
    }

    if (bestCorrelation / energy < voicingThreshold) return 0;

    const before = correlate(bestLag - 1);
    const after = correlate(bestLag + 1);
    const curvature = before - 2 * bestCorrelation + after;
    const offset = curvature < 0 ? clamp((0.5 * (before - after)) / curvature, -0.5, 0.5) : 0;

    return sampleRate / (bestLag + offset);
  }

  private pitchDescriptors(track: PitchTrack): [number, number, number, number] {
    const pitches = track.voicedPitches;
    if (pitches.length === 0) return [0, 0, 0, 0];

    const f0Mean = mean(pitches);

    let change = 0;
    for (let i = 1; i < pitches.length; i++) {
      change += Math.abs(pitches[i] - pitches[i - 1]);
    }
    const jitter = pitches.length > 1 ? change / (pitches.length - 1) / f0Mean : 0;

    return [f0Mean, std(pitches), pitches.length / track.frames, jitter];
  }
}
