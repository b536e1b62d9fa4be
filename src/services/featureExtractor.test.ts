import { describe, expect, it } from 'vitest';
import { createEngineConfig } from '../config/engine';
import { encodeWav, sine, speechLike } from '../testing/wavFixtures';
import { Waveform } from '../types';
import { AudioDecoder } from './audioDecoder';
import { FEATURE_COUNT, FEATURE_NAMES, FeatureExtractor, featureIndex } from './featureExtractor';

const config = createEngineConfig();
const extractor = new FeatureExtractor(config.extractor);

const waveform = (samples: Float32Array): Waveform => ({
  samples,
  sampleRate: 16000,
  channels: 1,
  duration: samples.length / 16000,
});

const feature = (values: readonly number[], name: string): number => values[featureIndex(name)];

describe('FEATURE_NAMES', () => {
  it('lists 48 unique names in the fixed order', () => {
    expect(FEATURE_NAMES).toHaveLength(FEATURE_COUNT);
    expect(new Set(FEATURE_NAMES).size).toBe(FEATURE_COUNT);
    expect(featureIndex('mfcc_mean_0')).toBe(0);
    expect(featureIndex('mfcc_std_0')).toBe(13);
    expect(featureIndex('centroid_mean')).toBe(26);
    expect(featureIndex('zcr_mean')).toBe(34);
    expect(featureIndex('onset_mean')).toBe(36);
    expect(featureIndex('rms_mean')).toBe(40);
    expect(featureIndex('f0_mean')).toBe(44);
    expect(featureIndex('jitter')).toBe(47);
  });
});

describe('FeatureExtractor', () => {
  it.each([0.5, 5, 60])('returns 48 finite values for %s seconds of speech-like audio', (seconds) => {
    const features = extractor.extract(waveform(speechLike(seconds)));

    expect(features).toHaveLength(48);
    expect(features.every(Number.isFinite)).toBe(true);
  });

  it('is deterministic', () => {
    const samples = speechLike(1);
    expect(extractor.extract(waveform(samples))).toEqual(extractor.extract(waveform(samples)));
  });

  it('returns all zeros for digital silence', () => {
    const features = extractor.extract(waveform(new Float32Array(32000)));

    expect(features).toHaveLength(48);
    expect(features.every(value => value === 0)).toBe(true);
  });

  it('handles input shorter than one frame', () => {
    const features = extractor.extract(waveform(sine(220, 0.01)));

    expect(features).toHaveLength(48);
    expect(features.every(Number.isFinite)).toBe(true);
  });

  it('ignores audio past the analysis window', () => {
    const capped = new FeatureExtractor({ ...config.extractor, maxAnalysisSeconds: 1 });
    const tone = sine(220, 1);
    const longer = new Float32Array(32000);
    longer.set(tone);
    longer.set(speechLike(1), 16000);

    expect(capped.extract(waveform(longer))).toEqual(capped.extract(waveform(tone)));
  });

  it('tracks the pitch of a sine decoded from WAV', async () => {
    const decoder = new AudioDecoder(config.decoder);
    const wave = await decoder.decode({ data: encodeWav([sine(220, 1)]), format: 'wav' });

    const features = extractor.extract(wave);

    expect(Math.abs(feature(features, 'f0_mean') - 220)).toBeLessThan(2);
    expect(feature(features, 'f0_std')).toBeLessThan(1);
    expect(feature(features, 'voiced_fraction')).toBe(1);
  });

  it('measures energy of a constant-amplitude tone', () => {
    const features = extractor.extract(waveform(sine(1000, 1, 16000, 0.5)));

    // RMS of a sine is its amplitude over sqrt(2)
    expect(feature(features, 'rms_mean')).toBeCloseTo(0.5 / Math.SQRT2, 2);
    expect(feature(features, 'low_energy_ratio')).toBe(0);
    expect(feature(features, 'centroid_mean')).toBeGreaterThan(900);
    expect(feature(features, 'centroid_mean')).toBeLessThan(1100);
  });

  it('refuses a cepstral count other than 13', () => {
    expect(() => new FeatureExtractor({ ...config.extractor, mfccCount: 20 }))
      .toThrow('Feature layout requires 13 cepstral coefficients');
  });
});
