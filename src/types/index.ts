export enum SupportedLanguage {
  TAMIL = 'tamil',
  ENGLISH = 'english',
  HINDI = 'hindi',
  MALAYALAM = 'malayalam',
  TELUGU = 'telugu',
}

export enum AudioFormat {
  MP3 = 'mp3',
  WAV = 'wav',
  OGG = 'ogg',
  FLAC = 'flac',
}

export enum Classification {
  AI_GENERATED = 'AI_GENERATED',
  HUMAN = 'HUMAN',
}

/**
 * Languages the engine has calibration for. The `/api/supported-languages`
 * endpoint returns this list verbatim.
 */
export const SUPPORTED_LANGUAGES: readonly SupportedLanguage[] = Object.values(SupportedLanguage);

export const SUPPORTED_FORMATS: readonly AudioFormat[] = Object.values(AudioFormat);

export const isSupportedLanguage = (value: string): value is SupportedLanguage =>
  SUPPORTED_LANGUAGES.some(language => language === value);

export const isSupportedFormat = (value: string): value is AudioFormat =>
  SUPPORTED_FORMATS.some(format => format === value);

/**
 * Encoded audio as received from the client.
 */
export interface AudioBuffer {
  data: Buffer;
  /** Declared container format, matched case-insensitively against AudioFormat */
  format: string;
  /** Decoding stops after this many seconds */
  maxDurationSeconds?: number;
}

/**
 * Decoded mono PCM at the canonical sample rate.
 */
export interface Waveform {
  samples: Float32Array;
  sampleRate: number;
  channels: 1;
  duration: number;
}

/**
 * Exactly FEATURE_COUNT values, ordered as FEATURE_NAMES.
 */
export type FeatureVector = readonly number[];

export interface ScoreResult {
  aiLikelihood: number;
  label: Classification;
  confidence: number;
}

export interface FeatureContribution {
  name: string;
  value: number;
  contribution: number;
}

export interface DetectionOutcome {
  result: ScoreResult;
  language: SupportedLanguage;
  features: FeatureVector;
  contributions: FeatureContribution[];
  /** Mean RMS at or below the silence floor; the score is then the fixed baseline */
  silent: boolean;
  audio: {
    duration: number;
    sampleRate: number;
    sizeBytes: number;
  };
}

export interface VoiceDetectionRequest {
  audio_base64: string;
  audio_format: AudioFormat;
  language: SupportedLanguage;
  user_id?: string;
}

export interface VoiceDetectionResponse {
  status: 'success';
  classification: Classification;
  confidence_score: number;
  ai_likelihood: number;
  language: SupportedLanguage;
  explanation: string;
  message: string;
  timestamp: string;
  request_id: string;
}
