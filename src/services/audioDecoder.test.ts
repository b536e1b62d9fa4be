import { describe, expect, it } from 'vitest';
import { createEngineConfig } from '../config/engine';
import { encodeWav, sine } from '../testing/wavFixtures';
import { AudioFormat } from '../types';
import {
  CorruptAudioError,
  EmptyAudioError,
  UnsupportedFormatError,
} from '../utils/errors';
import { AudioDecoder, hasContainerSignature, parseWav, resample } from './audioDecoder';

// A binary that cannot exist, so any accidental spawn fails loudly
const decoder = new AudioDecoder({
  ...createEngineConfig().decoder,
  ffmpegPath: '/nonexistent/ffmpeg-test-binary',
});

describe('AudioDecoder', () => {
  it('decodes 16 kHz mono WAV without resampling', async () => {
    const wave = await decoder.decode({ data: encodeWav([sine(220, 1)]), format: 'wav' });

    expect(wave.sampleRate).toBe(16000);
    expect(wave.channels).toBe(1);
    expect(wave.samples.length).toBe(16000);
    expect(wave.duration).toBe(1);
  });

  it('mixes stereo 44.1 kHz down to 16 kHz mono', async () => {
    const left = new Float32Array(44100).fill(0.5);
    const right = new Float32Array(44100).fill(-0.25);

    const wave = await decoder.decode({
      data: encodeWav([left, right], { sampleRate: 44100, encoding: 'float32' }),
      format: 'WAV',
    });

    expect(wave.samples.length).toBe(16000);
    expect(wave.samples[0]).toBeCloseTo(0.125, 6);
    expect(wave.samples[15999]).toBeCloseTo(0.125, 6);
  });

  it('truncates to the requested duration', async () => {
    const wave = await decoder.decode({
      data: encodeWav([sine(220, 3)]),
      format: 'wav',
      maxDurationSeconds: 1.5,
    });

    expect(wave.samples.length).toBe(24000);
    expect(wave.duration).toBe(1.5);
  });

  it('caps a long low-rate WAV before resampling', async () => {
    const wave = await decoder.decode({
      data: encodeWav([sine(220, 60, 8000)], { sampleRate: 8000 }),
      format: 'wav',
      maxDurationSeconds: 1,
    });

    expect(wave.samples.length).toBe(16000);
    expect(wave.samples.buffer.byteLength).toBe(64000);
    expect(wave.duration).toBe(1);
  });

  it('rejects a WAV declaring a 1 Hz sample rate', async () => {
    const wav = encodeWav([new Float32Array(1000)], { sampleRate: 1 });

    await expect(decoder.decode({ data: wav, format: 'wav' }))
      .rejects.toThrow(new CorruptAudioError('Invalid WAV file: unsupported sample rate 1 Hz'));
  });

  it('rejects an unsupported format tag', async () => {
    await expect(decoder.decode({ data: Buffer.alloc(4096), format: 'aac' }))
      .rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it('rejects a malformed mp3 without starting a decoder', async () => {
    const garbage = Buffer.alloc(4096, 0x41);

    await expect(decoder.decode({ data: garbage, format: 'mp3' }))
      .rejects.toThrow('Audio payload is not a valid mp3 stream');
  });

  it('rejects a payload one byte over the size limit', async () => {
    const oversized = Buffer.alloc(25 * 1024 * 1024 + 1);
    oversized.write('ID3', 0);

    const error = await decoder.decode({ data: oversized, format: 'mp3' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CorruptAudioError);
    expect(error).toHaveProperty('kind', 'CorruptAudio');
  });

  it('reports a failed decoder start as corrupt audio', async () => {
    const mp3Header = Buffer.concat([Buffer.from('ID3'), Buffer.alloc(2048)]);

    await expect(decoder.decode({ data: mp3Header, format: 'mp3' }))
      .rejects.toThrow(/Audio decoder could not start/);
  });

  it('raises EmptyAudio for a WAV with no samples', async () => {
    await expect(decoder.decode({ data: encodeWav([new Float32Array(0)]), format: 'wav' }))
      .rejects.toBeInstanceOf(EmptyAudioError);
  });
});

describe('parseWav', () => {
  const reference = new Float32Array([0, 0.5, -0.5, 0.25]);

  it.each([
    ['pcm16', 1 / 32768],
    ['pcm24', 1 / 8388608],
    ['pcm32', 1e-6],
    ['float32', 1e-7],
    ['float64', 1e-12],
  ] as const)('reads %s samples', (encoding, tolerance) => {
    const { samples, sampleRate } = parseWav(encodeWav([reference], { encoding, sampleRate: 8000 }));

    expect(sampleRate).toBe(8000);
    expect(samples.length).toBe(4);
    samples.forEach((value, i) => {
      expect(Math.abs(value - reference[i])).toBeLessThanOrEqual(tolerance);
    });
  });

  it('reads unsigned 8-bit samples', () => {
    const { samples } = parseWav(encodeWav([reference], { encoding: 'pcm8' }));
    // -63.5 rounds toward +Infinity, read back as -63 / 128
    expect(Array.from(samples)).toEqual([0, 0.5, -0.4921875, 0.25]);
  });

  it('follows the sub-format of WAVE_FORMAT_EXTENSIBLE', () => {
    const { samples } = parseWav(encodeWav([reference], { encoding: 'float32', extensible: true }));
    expect(Array.from(samples)).toEqual([0, 0.5, -0.5, 0.25]);
  });

  it('rejects a file without a data chunk', () => {
    const header = encodeWav([reference]).subarray(0, 36);
    expect(() => parseWav(header)).toThrow('Invalid WAV file: missing data chunk');
  });

  it('rejects a file without a fmt chunk', () => {
    const data = Buffer.alloc(20);
    data.write('RIFF', 0);
    data.write('WAVE', 8);
    data.write('data', 12);
    data.writeUInt32LE(0, 16);
    expect(() => parseWav(data)).toThrow('Invalid WAV file: missing fmt chunk');
  });

  it('rejects an unknown encoding', () => {
    const data = encodeWav([reference]);
    // Format tag 2 is ADPCM
    data.writeUInt16LE(2, 20);
    expect(() => parseWav(data)).toThrow('Unsupported WAV encoding (format tag 2, 16-bit)');
  });
});

describe('hasContainerSignature', () => {
  it('matches each container by its leading bytes', () => {
    expect(hasContainerSignature(Buffer.from('OggS....'), AudioFormat.OGG)).toBe(true);
    expect(hasContainerSignature(Buffer.from('fLaC....'), AudioFormat.FLAC)).toBe(true);
    expect(hasContainerSignature(Buffer.from('ID3....'), AudioFormat.MP3)).toBe(true);
    expect(hasContainerSignature(Buffer.from([0xff, 0xfb, 0x90, 0x00]), AudioFormat.MP3)).toBe(true);
    expect(hasContainerSignature(encodeWav([new Float32Array(4)]), AudioFormat.WAV)).toBe(true);
  });

  it('rejects mismatched containers', () => {
    expect(hasContainerSignature(Buffer.from('OggS....'), AudioFormat.FLAC)).toBe(false);
    expect(hasContainerSignature(Buffer.from([0xff, 0xf9]), AudioFormat.MP3)).toBe(false);
    expect(hasContainerSignature(Buffer.alloc(0), AudioFormat.WAV)).toBe(false);
  });
});

describe('resample', () => {
  it('returns the input when rates match', () => {
    const samples = new Float32Array([1, 2, 3]);
    expect(resample(samples, 16000, 16000)).toBe(samples);
  });

  it('interpolates linearly when upsampling', () => {
    const output = resample(new Float32Array([0, 1, 0, 1]), 8000, 16000);
    expect(Array.from(output)).toEqual([0, 0.5, 1, 0.5, 0, 0.5, 1, 1]);
  });

  it('picks every other sample when halving the rate', () => {
    const output = resample(new Float32Array([0, 1, 2, 3, 4, 5]), 16000, 8000);
    expect(Array.from(output)).toEqual([0, 2, 4]);
  });
});
