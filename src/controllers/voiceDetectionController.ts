import { Request, Response } from 'express';
import { config } from '../config';
import { createEngineConfig } from '../config/engine';
import { MetricsCollector } from '../services/metricsCollector';
import { generateExplanation } from '../services/explanationBuilder';
import { VoiceDetectionEngine } from '../services/voiceDetectionEngine';
import {
  Classification,
  SUPPORTED_FORMATS,
  SUPPORTED_LANGUAGES,
  VoiceDetectionRequest,
  VoiceDetectionResponse,
} from '../types';
import { logger } from '../utils/logger';

let engine: VoiceDetectionEngine | undefined;

/**
 * The engine is immutable after construction and shared by all requests.
 */
export const getDetectionEngine = (): VoiceDetectionEngine => {
  if (!engine) {
    engine = new VoiceDetectionEngine(createEngineConfig({
      decoder: {
        maxAudioBytes: config.MAX_AUDIO_SIZE_MB * 1024 * 1024,
        maxDurationSeconds: config.MAX_ANALYSIS_SECONDS,
        timeoutMs: config.DECODE_TIMEOUT_MS,
      },
      extractor: {
        maxAnalysisSeconds: config.MAX_ANALYSIS_SECONDS,
      },
      classifier: {
        threshold: config.DECISION_THRESHOLD,
      },
    }));
  }
  return engine;
};

const LABEL_TEXT: Record<Classification, string> = {
  [Classification.AI_GENERATED]: 'AI-generated',
  [Classification.HUMAN]: 'human',
};

/**
 * Main voice detection controller
 * Expects a body already validated by validateDetectionRequest
 */
export const detectVoice = async (req: Request, res: Response): Promise<void> => {
  const startTime = Date.now();
  const requestId = req.requestId || 'unknown';
  const body: VoiceDetectionRequest = req.body;

  try {
    logger.info(`Starting voice detection - ${requestId}`, {
      language: body.language,
      format: body.audio_format,
      userId: body.user_id,
    });

    const audioBuffer = Buffer.from(body.audio_base64, 'base64');

    const outcome = await getDetectionEngine().analyze(
      { data: audioBuffer, format: body.audio_format },
      body.language,
      requestId
    );

    const { label, confidence, aiLikelihood } = outcome.result;
    const processingTime = Date.now() - startTime;

    const response: VoiceDetectionResponse = {
      status: 'success',
      classification: label,
      confidence_score: parseFloat(confidence.toFixed(4)),
      ai_likelihood: parseFloat(aiLikelihood.toFixed(4)),
      language: outcome.language,
      explanation: generateExplanation(outcome),
      message: `Audio classified as ${LABEL_TEXT[label]} with ${(confidence * 100).toFixed(1)}% confidence`,
      timestamp: new Date().toISOString(),
      request_id: requestId,
    };

    MetricsCollector.recordDetection({
      requestId,
      result: label,
      confidence,
      processingTime,
      language: outcome.language,
    });

    logger.info(`Detection completed successfully - ${requestId}`, {
      result: label,
      confidence,
      audioDuration: `${outcome.audio.duration.toFixed(2)}s`,
      processingTime: `${processingTime}ms`,
    });

    res.status(200).json(response);
  } catch (error) {
    const processingTime = Date.now() - startTime;

    logger.error(`Detection failed - ${requestId}`, {
      error: error instanceof Error ? error.message : 'Unknown error',
      processingTime: `${processingTime}ms`,
    });

    MetricsCollector.recordError({
      requestId,
      errorType: error instanceof Error ? error.name : 'UnknownError',
      errorMessage: error instanceof Error ? error.message : 'Unknown error',
      processingTime,
    });

    throw error;
  }
};

/**
 * GET /api/supported-languages
 */
export const listSupportedLanguages = (req: Request, res: Response): void => {
  res.status(200).json({
    status: 'success',
    supported_languages: SUPPORTED_LANGUAGES,
    supported_formats: SUPPORTED_FORMATS,
  });
};
