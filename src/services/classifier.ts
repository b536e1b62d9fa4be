import { ClassifierSettings } from '../config/engine';
import { Classification, ScoreResult } from '../types';
import { clamp } from '../utils/dsp';

/**
 * Classifier
 * Thresholds the AI-likelihood and rescales its distance from the
 * threshold into a bounded confidence
 */
export class Classifier {
  constructor(private readonly settings: ClassifierSettings) {}

  classify(aiLikelihood: number): ScoreResult {
    const { threshold, confidenceFloor, confidenceCeiling } = this.settings;
    const likelihood = Number.isNaN(aiLikelihood) ? threshold : clamp(aiLikelihood, 0, 1);

    // Ties go to AI_GENERATED
    const label = likelihood >= threshold ? Classification.AI_GENERATED : Classification.HUMAN;

    const distance = label === Classification.AI_GENERATED
      ? (likelihood - threshold) / (1 - threshold)
      : (threshold - likelihood) / threshold;

    const confidence = clamp(
      confidenceFloor + distance * (confidenceCeiling - confidenceFloor),
      confidenceFloor,
      confidenceCeiling
    );

    return { aiLikelihood: likelihood, label, confidence };
  }
}
