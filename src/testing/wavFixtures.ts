/**
 * Synthesized RIFF/WAVE payloads for tests.
 */

export type WavEncoding = 'pcm8' | 'pcm16' | 'pcm24' | 'pcm32' | 'float32' | 'float64';

interface WavOptions {
  sampleRate?: number;
  encoding?: WavEncoding;
  /** Write the format tag as WAVE_FORMAT_EXTENSIBLE */
  extensible?: boolean;
}

const BITS: Record<WavEncoding, number> = {
  pcm8: 8,
  pcm16: 16,
  pcm24: 24,
  pcm32: 32,
  float32: 32,
  float64: 64,
};

/**
 * Encode interleaved-by-channel float samples in [-1, 1].
 */
export function encodeWav(channels: Float32Array[], options: WavOptions = {}): Buffer {
  const sampleRate = options.sampleRate ?? 16000;
  const encoding = options.encoding ?? 'pcm16';
  const bits = BITS[encoding];
  const bytesPerSample = bits / 8;
  const channelCount = channels.length;
  const frames = channelCount > 0 ? channels[0].length : 0;
  const dataSize = frames * channelCount * bytesPerSample;
  const isFloat = encoding === 'float32' || encoding === 'float64';
  const formatTag = isFloat ? 3 : 1;
  const fmtSize = options.extensible ? 40 : 16;

  const buffer = Buffer.alloc(12 + 8 + fmtSize + 8 + dataSize);
  let offset = 0;

  buffer.write('RIFF', offset); offset += 4;
  buffer.writeUInt32LE(buffer.length - 8, offset); offset += 4;
  buffer.write('WAVE', offset); offset += 4;

  buffer.write('fmt ', offset); offset += 4;
  buffer.writeUInt32LE(fmtSize, offset); offset += 4;
  buffer.writeUInt16LE(options.extensible ? 0xfffe : formatTag, offset); offset += 2;
  buffer.writeUInt16LE(channelCount, offset); offset += 2;
  buffer.writeUInt32LE(sampleRate, offset); offset += 4;
  buffer.writeUInt32LE(sampleRate * channelCount * bytesPerSample, offset); offset += 4;
  buffer.writeUInt16LE(channelCount * bytesPerSample, offset); offset += 2;
  buffer.writeUInt16LE(bits, offset); offset += 2;
  if (options.extensible) {
    buffer.writeUInt16LE(22, offset); offset += 2;
    buffer.writeUInt16LE(bits, offset); offset += 2;
    buffer.writeUInt32LE(0, offset); offset += 4;
    // Sub-format GUID; only its leading format tag is read
    buffer.writeUInt16LE(formatTag, offset); offset += 16;
  }

  buffer.write('data', offset); offset += 4;
  buffer.writeUInt32LE(dataSize, offset); offset += 4;

  for (let i = 0; i < frames; i++) {
    for (let ch = 0; ch < channelCount; ch++) {
      const value = Math.max(-1, Math.min(1, channels[ch][i]));
      switch (encoding) {
        case 'pcm8':
          buffer.writeUInt8(Math.round(value * 127) + 128, offset);
          break;
        case 'pcm16':
          buffer.writeInt16LE(Math.round(value * 32767), offset);
          break;
        case 'pcm24':
          buffer.writeIntLE(Math.round(value * 8388607), offset, 3);
          break;
        case 'pcm32':
          buffer.writeInt32LE(Math.round(value * 2147483647), offset);
          break;
        case 'float32':
          buffer.writeFloatLE(value, offset);
          break;
        case 'float64':
          buffer.writeDoubleLE(value, offset);
          break;
      }
      offset += bytesPerSample;
    }
  }

  return buffer;
}

export function sine(frequency: number, seconds: number, sampleRate: number = 16000, amplitude: number = 0.5): Float32Array {
  const samples = new Float32Array(Math.round(seconds * sampleRate));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
  }
  return samples;
}

/**
 * A crude voiced signal: a gliding harmonic tone under a syllable-rate
 * envelope, plus deterministic noise.
 */
export function speechLike(seconds: number, sampleRate: number = 16000): Float32Array {
  const samples = new Float32Array(Math.round(seconds * sampleRate));
  let phase = 0;
  let seed = 12345;
  for (let i = 0; i < samples.length; i++) {
    const t = i / sampleRate;
    const f0 = 140 + 30 * Math.sin(2 * Math.PI * 0.7 * t);
    phase += (2 * Math.PI * f0) / sampleRate;
    const envelope = 0.5 + 0.5 * Math.sin(2 * Math.PI * 4 * t);
    seed = (seed * 16807) % 2147483647;
    const noise = seed / 2147483647 - 0.5;
    samples[i] = envelope * (0.3 * Math.sin(phase) + 0.1 * Math.sin(2 * phase) + 0.05 * Math.sin(3 * phase)) +
      0.01 * noise;
  }
  return samples;
}
