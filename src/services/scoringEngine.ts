import { ScoringSettings } from '../config/engine';
import { FeatureContribution, FeatureVector, SupportedLanguage, isSupportedLanguage } from '../types';
import { clamp } from '../utils/dsp';
import { UnsupportedLanguageError } from '../utils/errors';
import { FEATURE_COUNT, FEATURE_NAMES, featureIndex } from './featureExtractor';

/**
 * Anything that maps a feature vector to an AI-likelihood in [0, 1].
 * The classifier only depends on this contract.
 */
export interface LikelihoodScorer {
  score(features: FeatureVector, language: string): number;
}

export interface ExplainableScorer extends LikelihoodScorer {
  explain(features: FeatureVector, language: string): FeatureContribution[];
}

const F0_STD_INDEX = featureIndex('f0_std');
const RMS_MEAN_INDEX = featureIndex('rms_mean');

const sigmoid = (x: number): number => 1 / (1 + Math.exp(-x));

/**
 * Scoring Engine
 * Fixed logistic heuristic over standardized features, calibrated per language
 */
export class ScoringEngine implements ExplainableScorer {
  constructor(private readonly settings: ScoringSettings) {
    const names = settings.model.features.map(feature => feature.name);
    const mismatch = FEATURE_NAMES.findIndex((name, i) => names[i] !== name);
    if (names.length !== FEATURE_COUNT || mismatch !== -1) {
      throw new Error(
        `Scoring model ${settings.model.version} does not match the feature layout` +
        (mismatch !== -1 ? ` (first mismatch at index ${mismatch})` : '')
      );
    }
    if (settings.model.features.some(feature => !(feature.scale > 0))) {
      throw new Error(`Scoring model ${settings.model.version} has a non-positive scale`);
    }
  }

  score(features: FeatureVector, language: string): number {
    const tag = this.resolveLanguage(language);
    assertFeatureVector(features);

    if (this.isSilent(features)) {
      return this.settings.silenceLikelihood;
    }

    const logit = this.settings.model.bias +
      this.settings.calibration[tag].logitOffset +
      this.contributions(features, tag).reduce((sum, item) => sum + item.contribution, 0);

    return clamp(sigmoid(logit), 0, 1);
  }

  /**
   * Per-feature contributions to the logit, largest magnitude first.
   * Empty for silent input, whose score is the fixed baseline.
   */
  explain(features: FeatureVector, language: string): FeatureContribution[] {
    const tag = this.resolveLanguage(language);
    assertFeatureVector(features);

    if (this.isSilent(features)) {
      return [];
    }

    return this.contributions(features, tag)
      .filter(item => item.contribution !== 0)
      .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution));
  }

  private contributions(features: FeatureVector, language: SupportedLanguage): FeatureContribution[] {
    const { model, calibration, zClamp } = this.settings;

    return model.features.map((feature, i) => {
      const center = i === F0_STD_INDEX ? calibration[language].pitchStdCenterHz : feature.center;
      const z = clamp((features[i] - center) / feature.scale, -zClamp, zClamp);
      return {
        name: feature.name,
        value: features[i],
        contribution: feature.weight * z,
      };
    });
  }

  private isSilent(features: FeatureVector): boolean {
    return features[RMS_MEAN_INDEX] <= this.settings.silenceRms;
  }

  private resolveLanguage(language: string): SupportedLanguage {
    const normalized = language.toLowerCase();
    if (!isSupportedLanguage(normalized)) {
      throw new UnsupportedLanguageError(language);
    }
    return normalized;
  }
}

export function assertFeatureVector(features: FeatureVector): void {
  if (features.length !== FEATURE_COUNT) {
    throw new Error(`Expected ${FEATURE_COUNT} features, received ${features.length}`);
  }
  const invalid = features.findIndex(value => !Number.isFinite(value));
  if (invalid !== -1) {
    throw new Error(`Feature ${FEATURE_NAMES[invalid]} is not a finite number`);
  }
}
