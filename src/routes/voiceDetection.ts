import { Router } from 'express';
import { detectVoice, listSupportedLanguages } from '../controllers/voiceDetectionController';
import { validateDetectionRequest } from '../middleware/validation';
import { asyncHandler } from '../middleware/errorHandler';

const router = Router();

/**
 * POST /api/detect
 *
 * Request body:
 * {
 *   "audio_base64": "base64-encoded-audio-string",
 *   "audio_format": "mp3",     // mp3, wav, ogg, flac
 *   "language": "tamil",       // tamil, english, hindi, malayalam, telugu
 *   "user_id": "optional"
 * }
 *
 * Response:
 * {
 *   "status": "success",
 *   "classification": "AI_GENERATED" | "HUMAN",
 *   "confidence_score": 0.91,
 *   "ai_likelihood": 0.93,
 *   "language": "tamil",
 *   "explanation": "Synthetic speech indicators: flat pitch contour and uniform loudness",
 *   "message": "Audio classified as AI-generated with 91.0% confidence",
 *   "timestamp": "...",
 *   "request_id": "..."
 * }
 */
router.post('/', validateDetectionRequest, asyncHandler(detectVoice));

export const voiceDetectionRouter = router;

const languages = Router();

languages.get('/', listSupportedLanguages);

export const supportedLanguagesRouter = languages;
