import express, { Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import morgan from 'morgan';
import compression from 'compression';
import { config } from './config';
import { apiKeyAuth, assignRequestId } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { supportedLanguagesRouter, voiceDetectionRouter } from './routes/voiceDetection';
import { metricsRouter } from './routes/metrics';
import { SUPPORTED_FORMATS, SUPPORTED_LANGUAGES } from './types';
import { logger } from './utils/logger';

const RATE_LIMIT_MINUTES = Math.round(config.RATE_LIMIT_WINDOW_MS / 60000);

export const createApp = (): express.Express => {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
      },
    },
  }));

  app.use(cors({
    origin: config.ALLOWED_ORIGINS,
    credentials: true,
    methods: ['POST', 'GET'],
    allowedHeaders: ['Content-Type', 'X-API-Key', 'X-Request-ID'],
  }));

  app.use(compression());

  app.use(assignRequestId);

  // Base64 inflates the 25MB audio limit by a third
  app.use(express.json({ limit: '35mb' }));

  app.use(morgan('combined', {
    stream: {
      write: (message: string) => logger.http(message.trim()),
    },
  }));

  const limiter = rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    max: config.RATE_LIMIT_MAX_REQUESTS,
    message: {
      error: 'Too many requests from this IP, please try again later.',
      retryAfter: `${RATE_LIMIT_MINUTES} minutes`,
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use('/api/', limiter);

  app.get('/', (req: Request, res: Response) => {
    res.status(200).json({ status: 'running' });
  });

  // Health check endpoint (no auth required)
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.NODE_ENV,
    });
  });

  app.get('/api/info', (req: Request, res: Response) => {
    res.status(200).json({
      name: 'Voice Authenticity API',
      version: '1.0.0',
      supportedLanguages: SUPPORTED_LANGUAGES,
      supportedFormats: SUPPORTED_FORMATS,
      maxAudioSize: `${config.MAX_AUDIO_SIZE_MB}MB`,
      rateLimit: `${config.RATE_LIMIT_MAX_REQUESTS} requests per ${RATE_LIMIT_MINUTES} minutes`,
    });
  });

  // Protected routes
  app.use('/api/detect', apiKeyAuth, voiceDetectionRouter);
  app.use('/api/supported-languages', apiKeyAuth, supportedLanguagesRouter);
  app.use('/api/metrics', apiKeyAuth, metricsRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
