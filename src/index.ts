import { createApp } from './app';
import { config } from './config';
import { getDetectionEngine } from './controllers/voiceDetectionController';
import { logger } from './utils/logger';

// Fail at startup on a bad engine configuration rather than on the first request
getDetectionEngine();

const app = createApp();

const server = app.listen(config.PORT, () => {
  logger.info(`Server running on port ${config.PORT}`);
  logger.info(`Environment: ${config.NODE_ENV}`);
  logger.info(`Decision threshold: ${config.DECISION_THRESHOLD}`);
  logger.info(`Rate limit: ${config.RATE_LIMIT_MAX_REQUESTS} requests per window`);
});

const shutdown = (signal: string): void => {
  logger.info(`${signal} signal received: closing HTTP server`);
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

export default app;
