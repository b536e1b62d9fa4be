import { SupportedLanguage } from '../types';
import scoringModelJson from './scoringModel.json';

export interface FeatureWeight {
  readonly name: string;
  readonly center: number;
  readonly scale: number;
  readonly weight: number;
}

export interface ScoringModel {
  readonly version: string;
  readonly bias: number;
  readonly features: readonly FeatureWeight[];
}

/**
 * Per-language adjustment of the raw score.
 * `pitchStdCenterHz` is the F0 spread a human speaker of the language typically shows.
 */
export interface LanguageCalibration {
  readonly logitOffset: number;
  readonly pitchStdCenterHz: number;
}

export interface DecoderSettings {
  readonly sampleRate: number;
  readonly maxAudioBytes: number;
  readonly maxDurationSeconds: number;
  readonly timeoutMs: number;
  readonly ffmpegPath?: string;
}

export interface ExtractorSettings {
  readonly sampleRate: number;
  readonly frameSize: number;
  readonly hopSize: number;
  readonly pitchFrameSize: number;
  readonly pitchHopSize: number;
  readonly melBands: number;
  readonly mfccCount: number;
  readonly rolloffPercent: number;
  readonly pitchMinHz: number;
  readonly pitchMaxHz: number;
  readonly voicingThreshold: number;
  readonly silenceRms: number;
  readonly maxAnalysisSeconds: number;
}

export interface ScoringSettings {
  readonly model: ScoringModel;
  readonly calibration: Readonly<Record<SupportedLanguage, LanguageCalibration>>;
  readonly zClamp: number;
  readonly silenceRms: number;
  readonly silenceLikelihood: number;
}

export interface ClassifierSettings {
  readonly threshold: number;
  readonly confidenceFloor: number;
  readonly confidenceCeiling: number;
}

export interface EngineConfig {
  readonly decoder: DecoderSettings;
  readonly extractor: ExtractorSettings;
  readonly scoring: ScoringSettings;
  readonly classifier: ClassifierSettings;
}

export interface EngineConfigOverrides {
  decoder?: Partial<DecoderSettings>;
  extractor?: Partial<ExtractorSettings>;
  scoring?: Partial<ScoringSettings>;
  classifier?: Partial<ClassifierSettings>;
}

const SAMPLE_RATE = 16000;
const SILENCE_RMS = 1e-4;

// Illustrative constants for a deterministic baseline, not fitted to data.
export const LANGUAGE_CALIBRATION: Record<SupportedLanguage, LanguageCalibration> = {
  [SupportedLanguage.ENGLISH]: { logitOffset: 0, pitchStdCenterHz: 25 },
  [SupportedLanguage.HINDI]: { logitOffset: -0.05, pitchStdCenterHz: 30 },
  [SupportedLanguage.TAMIL]: { logitOffset: -0.1, pitchStdCenterHz: 35 },
  [SupportedLanguage.TELUGU]: { logitOffset: -0.1, pitchStdCenterHz: 35 },
  [SupportedLanguage.MALAYALAM]: { logitOffset: -0.15, pitchStdCenterHz: 38 },
};

export const DEFAULT_SCORING_MODEL: ScoringModel = scoringModelJson;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  decoder: {
    sampleRate: SAMPLE_RATE,
    maxAudioBytes: 25 * 1024 * 1024,
    maxDurationSeconds: 30,
    timeoutMs: 30000,
  },
  extractor: {
    sampleRate: SAMPLE_RATE,
    frameSize: 512,
    hopSize: 256,
    pitchFrameSize: 1024,
    pitchHopSize: 512,
    melBands: 26,
    mfccCount: 13,
    rolloffPercent: 0.85,
    pitchMinHz: 60,
    pitchMaxHz: 500,
    voicingThreshold: 0.3,
    silenceRms: SILENCE_RMS,
    maxAnalysisSeconds: 30,
  },
  scoring: {
    model: DEFAULT_SCORING_MODEL,
    calibration: LANGUAGE_CALIBRATION,
    zClamp: 3,
    silenceRms: SILENCE_RMS,
    silenceLikelihood: 0.5,
  },
  classifier: {
    threshold: 0.5,
    confidenceFloor: 0.5,
    confidenceCeiling: 0.98,
  },
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build an immutable engine configuration. Components receive this value
 * at construction and never consult process state.
 */
export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;
  const merged: EngineConfig = {
    decoder: { ...base.decoder, ...overrides.decoder },
    extractor: { ...base.extractor, ...overrides.extractor },
    scoring: {
      ...base.scoring,
      ...overrides.scoring,
      model: structuredClone(overrides.scoring?.model ?? base.scoring.model),
      calibration: structuredClone(overrides.scoring?.calibration ?? base.scoring.calibration),
    },
    classifier: { ...base.classifier, ...overrides.classifier },
  };

  const { threshold, confidenceFloor, confidenceCeiling } = merged.classifier;
  if (!(threshold > 0 && threshold < 1)) {
    throw new Error(`Decision threshold must lie strictly between 0 and 1 (received: ${threshold})`);
  }
  if (!(confidenceFloor <= confidenceCeiling)) {
    throw new Error('Confidence floor must not exceed the ceiling');
  }

  return deepFreeze(merged);
}
