import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { config } from '../config';
import {
  AudioFormat,
  SUPPORTED_FORMATS,
  SUPPORTED_LANGUAGES,
  SupportedLanguage,
  VoiceDetectionRequest,
} from '../types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const MAX_AUDIO_BYTES = config.MAX_AUDIO_SIZE_MB * 1024 * 1024;

/**
 * Schema for voice detection request validation
 */
export const voiceDetectionSchema = Joi.object<VoiceDetectionRequest>({
  audio_base64: Joi.string()
    .required()
    .custom((value: string, helpers) => {
      const base64Regex = /^[A-Za-z0-9+/]+={0,2}$/;
      if (!base64Regex.test(value)) {
        return helpers.error('string.base64');
      }

      const decodedSize = calculateBase64Size(value);
      if (decodedSize > MAX_AUDIO_BYTES) {
        return helpers.error('string.maxSize', { maxSize: config.MAX_AUDIO_SIZE_MB });
      }
      if (decodedSize < config.MIN_AUDIO_SIZE_BYTES) {
        return helpers.error('string.minSize');
      }

      return value;
    })
    .messages({
      'any.required': 'audio_base64 is required',
      'string.empty': 'audio_base64 cannot be empty',
      'string.base64': 'audio_base64 must be valid Base64',
      'string.maxSize': 'Audio file too large (max {{#maxSize}}MB)',
      'string.minSize': 'Audio file too small',
    }),

  audio_format: Joi.string()
    .lowercase()
    .valid(...SUPPORTED_FORMATS)
    .default(AudioFormat.MP3)
    .messages({
      'any.only': `audio_format must be one of: ${SUPPORTED_FORMATS.join(', ')}`,
    }),

  language: Joi.string()
    .lowercase()
    .valid(...SUPPORTED_LANGUAGES)
    .default(SupportedLanguage.ENGLISH)
    .messages({
      'any.only': `Unsupported language. Supported: ${SUPPORTED_LANGUAGES.join(', ')}`,
    }),

  user_id: Joi.string().max(128).optional(),
});

/**
 * Validate detection request
 */
export const validateDetectionRequest = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  try {
    const body: unknown = req.body;
    const input = isRecord(body) && typeof body.audio_base64 === 'string'
      ? { ...body, audio_base64: sanitizeBase64Audio(body.audio_base64) }
      : body;

    const { error, value } = voiceDetectionSchema.validate(input, {
      abortEarly: false,
      stripUnknown: true,
      convert: true,
    });

    if (error) {
      const errors = error.details.map(detail => detail.message);

      logger.warn(`Validation failed - ${req.requestId}`, { errors });

      throw new ValidationError('Request validation failed', { errors });
    }

    logger.info(`Validation passed - ${req.requestId}`, {
      audioSize: `${(calculateBase64Size(value.audio_base64) / 1024).toFixed(2)}KB`,
      audioFormat: value.audio_format,
      language: value.language,
    });

    req.body = value;
    next();
  } catch (error) {
    next(error);
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Sanitize base64 audio string
 * Removes whitespace and data URL prefix if present
 */
export const sanitizeBase64Audio = (audio: string): string => {
  const cleaned = audio.replace(/\s/g, '');

  // e.g. "data:audio/mp3;base64,"
  return cleaned.replace(/^data:audio\/[a-zA-Z0-9.+-]+;base64,/, '');
};

/**
 * Calculate size of Base64 encoded data in bytes
 */
export const calculateBase64Size = (base64String: string): number => {
  const padding = (base64String.match(/=+$/) || [''])[0].length;
  return (base64String.length * 3) / 4 - padding;
};
