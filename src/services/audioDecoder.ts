import { spawn } from 'child_process';
import { DecoderSettings } from '../config/engine';
import { AudioBuffer, AudioFormat, Waveform, isSupportedFormat } from '../types';
import { CorruptAudioError, EmptyAudioError, UnsupportedFormatError } from '../utils/errors';
import { logger } from '../utils/logger';

interface PcmData {
  samples: Float32Array;
  sampleRate: number;
}

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

const MIN_WAV_SAMPLE_RATE = 1000;
const MAX_WAV_SAMPLE_RATE = 384000;

let ffmpegPath: Promise<string> | undefined;

/**
 * Resolve the bundled ffmpeg binary on first use, so that WAV-only callers
 * never load the platform package.
 */
function resolveFfmpegPath(): Promise<string> {
  ffmpegPath ??= import('@ffmpeg-installer/ffmpeg').then((installer) => installer.path);
  return ffmpegPath;
}

/**
 * Audio Decoder
 * Turns an encoded mp3/wav/ogg/flac payload into 16 kHz mono samples
 */
export class AudioDecoder {
  constructor(private readonly settings: DecoderSettings) {}

  async decode(buffer: AudioBuffer): Promise<Waveform> {
    const format = buffer.format.toLowerCase();
    if (!isSupportedFormat(format)) {
      throw new UnsupportedFormatError(buffer.format);
    }

    if (buffer.data.length > this.settings.maxAudioBytes) {
      throw new CorruptAudioError(
        `Audio payload of ${buffer.data.length} bytes exceeds the ${this.settings.maxAudioBytes} byte limit`
      );
    }

    if (!hasContainerSignature(buffer.data, format)) {
      throw new CorruptAudioError(`Audio payload is not a valid ${format} stream`);
    }

    const maxDuration = buffer.maxDurationSeconds ?? this.settings.maxDurationSeconds;

    const pcm = format === AudioFormat.WAV
      ? parseWav(buffer.data)
      : await this.decodeWithFfmpeg(buffer.data, format, maxDuration);

    // Cap the source before resampling so the output never exceeds maxDuration
    const source = truncate(pcm.samples, Math.ceil(maxDuration * pcm.sampleRate));
    const samples = truncate(
      resample(source, pcm.sampleRate, this.settings.sampleRate),
      Math.floor(maxDuration * this.settings.sampleRate)
    );

    if (samples.length === 0) {
      throw new EmptyAudioError();
    }

    logger.debug('Audio decoded', {
      format,
      sourceSampleRate: pcm.sampleRate,
      samples: samples.length,
    });

    return {
      samples,
      sampleRate: this.settings.sampleRate,
      channels: 1,
      duration: samples.length / this.settings.sampleRate,
    };
  }

  /**
   * Pipe the payload through ffmpeg and read back signed 16-bit mono PCM.
   * The child process is killed on every exit path.
   */
  private async decodeWithFfmpeg(data: Buffer, format: AudioFormat, maxDuration: number): Promise<PcmData> {
    const binary = this.settings.ffmpegPath ?? await resolveFfmpegPath();
    const sampleRate = this.settings.sampleRate;

    return new Promise<PcmData>((resolve, reject) => {
      const ffmpeg = spawn(binary, [
        '-hide_banner',
        '-loglevel', 'error',
        '-f', format,
        '-i', 'pipe:0',
        '-t', String(maxDuration),
        '-f', 's16le',
        '-acodec', 'pcm_s16le',
        '-ar', String(sampleRate),
        '-ac', '1',
        'pipe:1',
      ]);

      const chunks: Buffer[] = [];
      let stderr = '';
      let settled = false;

      const finish = (error: Error | null, result?: PcmData): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (ffmpeg.exitCode === null) {
          ffmpeg.kill('SIGKILL');
        }
        if (error) {
          reject(error);
        } else if (result) {
          resolve(result);
        }
      };

      const timer = setTimeout(() => {
        finish(new CorruptAudioError(`Audio decoding timed out after ${this.settings.timeoutMs}ms`));
      }, this.settings.timeoutMs);

      ffmpeg.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      ffmpeg.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      ffmpeg.on('error', (error) => {
        finish(new CorruptAudioError(`Audio decoder could not start: ${error.message}`));
      });

      ffmpeg.on('close', (code) => {
        if (code !== 0) {
          finish(new CorruptAudioError(`Audio decoding failed with code ${code}: ${stderr.trim()}`));
          return;
        }
        finish(null, { samples: int16ToFloat(Buffer.concat(chunks)), sampleRate });
      });

      // ffmpeg may exit before consuming all input on a broken stream
      ffmpeg.stdin.on('error', (error) => {
        logger.debug('Decoder input closed early', { error: error.message });
      });
      ffmpeg.stdin.end(data);
    });
  }
}

/**
 * Check the leading bytes against the declared container.
 */
export function hasContainerSignature(data: Buffer, format: AudioFormat): boolean {
  switch (format) {
    case AudioFormat.WAV:
      return data.length >= 12 &&
        data.toString('ascii', 0, 4) === 'RIFF' &&
        data.toString('ascii', 8, 12) === 'WAVE';
    case AudioFormat.OGG:
      return data.length >= 4 && data.toString('ascii', 0, 4) === 'OggS';
    case AudioFormat.FLAC:
      return data.length >= 4 && data.toString('ascii', 0, 4) === 'fLaC';
    case AudioFormat.MP3:
      if (data.length >= 3 && data.toString('ascii', 0, 3) === 'ID3') return true;
      // MPEG audio frame sync: 11 set bits, layer bits not reserved
      return data.length >= 2 && data[0] === 0xff && (data[1] & 0xe0) === 0xe0 && (data[1] & 0x06) !== 0;
  }
}

/**
 * Parse a RIFF/WAVE file and mix its channels down to mono.
 */
export function parseWav(data: Buffer): PcmData {
  let offset = 12;
  let audioFormat = 0;
  let channels = 0;
  let sampleRate = 0;
  let bitDepth = 0;
  let body: Buffer | undefined;

  while (offset + 8 <= data.length) {
    const chunkId = data.toString('ascii', offset, offset + 4);
    const chunkSize = data.readUInt32LE(offset + 4);
    const chunkStart = offset + 8;

    if (chunkId === 'fmt ') {
      if (chunkSize < 16 || chunkStart + 16 > data.length) {
        throw new CorruptAudioError('Invalid WAV file: truncated fmt chunk');
      }
      audioFormat = data.readUInt16LE(chunkStart);
      channels = data.readUInt16LE(chunkStart + 2);
      sampleRate = data.readUInt32LE(chunkStart + 4);
      bitDepth = data.readUInt16LE(chunkStart + 14);

      if (audioFormat === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 26 && chunkStart + 26 <= data.length) {
        // First two bytes of the sub-format GUID carry the real format tag
        audioFormat = data.readUInt16LE(chunkStart + 24);
      }
    } else if (chunkId === 'data') {
      body = data.subarray(chunkStart, Math.min(data.length, chunkStart + chunkSize));
      break;
    }

    // Chunks are word-aligned
    offset = chunkStart + chunkSize + (chunkSize % 2);
  }

  if (channels === 0 || sampleRate === 0) {
    throw new CorruptAudioError('Invalid WAV file: missing fmt chunk');
  }
  if (sampleRate < MIN_WAV_SAMPLE_RATE || sampleRate > MAX_WAV_SAMPLE_RATE) {
    throw new CorruptAudioError(`Invalid WAV file: unsupported sample rate ${sampleRate} Hz`);
  }
  if (!body) {
    throw new CorruptAudioError('Invalid WAV file: missing data chunk');
  }

  const readSample = sampleReader(audioFormat, bitDepth);
  const bytesPerSample = bitDepth / 8;
  const frameBytes = bytesPerSample * channels;
  const frames = Math.floor(body.length / frameBytes);
  const samples = new Float32Array(frames);

  for (let i = 0; i < frames; i++) {
    let sum = 0;
    for (let ch = 0; ch < channels; ch++) {
      sum += readSample(body, i * frameBytes + ch * bytesPerSample);
    }
    samples[i] = sum / channels;
  }

  return { samples, sampleRate };
}

function sampleReader(audioFormat: number, bitDepth: number): (buffer: Buffer, offset: number) => number {
  if (audioFormat === WAVE_FORMAT_PCM) {
    switch (bitDepth) {
      case 8:
        return (buffer, offset) => (buffer[offset] - 128) / 128;
      case 16:
        return (buffer, offset) => buffer.readInt16LE(offset) / 32768;
      case 24:
        return (buffer, offset) => buffer.readIntLE(offset, 3) / 8388608;
      case 32:
        return (buffer, offset) => buffer.readInt32LE(offset) / 2147483648;
    }
  }

  if (audioFormat === WAVE_FORMAT_IEEE_FLOAT) {
    switch (bitDepth) {
      case 32:
        return (buffer, offset) => buffer.readFloatLE(offset);
      case 64:
        return (buffer, offset) => buffer.readDoubleLE(offset);
    }
  }

  throw new CorruptAudioError(
    `Unsupported WAV encoding (format tag ${audioFormat}, ${bitDepth}-bit)`
  );
}

function int16ToFloat(pcm: Buffer): Float32Array {
  const samples = new Float32Array(Math.floor(pcm.length / 2));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = pcm.readInt16LE(i * 2) / 32768;
  }
  return samples;
}

/**
 * Linear-interpolation resampler.
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate === toRate || samples.length === 0) {
    return samples;
  }

  const ratio = fromRate / toRate;
  const length = Math.max(1, Math.floor(samples.length / ratio));
  const output = new Float32Array(length);

  for (let i = 0; i < length; i++) {
    const position = i * ratio;
    const index = Math.floor(position);
    const fraction = position - index;
    const current = samples[index];
    const next = index + 1 < samples.length ? samples[index + 1] : current;
    output[i] = current + (next - current) * fraction;
  }

  return output;
}

/**
 * Copy rather than view, so a long source buffer can be released.
 */
function truncate(samples: Float32Array, maxLength: number): Float32Array {
  return samples.length > maxLength ? samples.slice(0, maxLength) : samples;
}
