import { EngineConfig } from '../config/engine';
import { AudioBuffer, DetectionOutcome, isSupportedLanguage } from '../types';
import { UnsupportedLanguageError } from '../utils/errors';
import { logger } from '../utils/logger';
import { AudioDecoder } from './audioDecoder';
import { Classifier } from './classifier';
import { FeatureExtractor, featureIndex } from './featureExtractor';
import { ExplainableScorer, ScoringEngine } from './scoringEngine';

const RMS_MEAN_INDEX = featureIndex('rms_mean');

/**
 * Voice Detection Engine
 * Runs decode → extract → score → classify for one recording
 */
export class VoiceDetectionEngine {
  private readonly decoder: AudioDecoder;
  private readonly extractor: FeatureExtractor;
  private readonly scorer: ExplainableScorer;
  private readonly classifier: Classifier;
  private readonly silenceRms: number;

  constructor(config: EngineConfig, scorer?: ExplainableScorer) {
    this.decoder = new AudioDecoder(config.decoder);
    this.extractor = new FeatureExtractor(config.extractor);
    this.scorer = scorer ?? new ScoringEngine(config.scoring);
    this.classifier = new Classifier(config.classifier);
    this.silenceRms = config.scoring.silenceRms;
  }

  async analyze(buffer: AudioBuffer, language: string, requestId: string = 'unknown'): Promise<DetectionOutcome> {
    // Fail on the language before spending time on decoding
    const tag = language.toLowerCase();
    if (!isSupportedLanguage(tag)) {
      throw new UnsupportedLanguageError(language);
    }

    logger.info(`Step 1: Decoding audio - ${requestId}`, {
      format: buffer.format,
      sizeBytes: buffer.data.length,
    });
    const waveform = await this.decoder.decode(buffer);

    logger.info(`Step 2: Extracting features - ${requestId}`, {
      duration: `${waveform.duration.toFixed(2)}s`,
    });
    const features = this.extractor.extract(waveform);

    logger.info(`Step 3: Scoring - ${requestId}`, { language: tag });
    const aiLikelihood = this.scorer.score(features, tag);
    const contributions = this.scorer.explain(features, tag);

    const result = this.classifier.classify(aiLikelihood);

    logger.info(`Step 4: Classified - ${requestId}`, {
      label: result.label,
      aiLikelihood: result.aiLikelihood,
      confidence: result.confidence,
    });

    return {
      result,
      language: tag,
      features,
      contributions,
      silent: features[RMS_MEAN_INDEX] <= this.silenceRms,
      audio: {
        duration: waveform.duration,
        sampleRate: waveform.sampleRate,
        sizeBytes: buffer.data.length,
      },
    };
  }
}
