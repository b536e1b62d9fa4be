import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

interface Config {
  NODE_ENV: string;
  PORT: number;
  API_BASE_URL: string;

  // API Keys
  API_KEYS: string[];
  MASTER_API_KEY: string;

  // Rate limiting
  RATE_LIMIT_MAX_REQUESTS: number;
  RATE_LIMIT_WINDOW_MS: number;

  // CORS
  ALLOWED_ORIGINS: string[];

  // Audio processing
  MAX_AUDIO_SIZE_MB: number;
  MIN_AUDIO_SIZE_BYTES: number;
  MAX_ANALYSIS_SECONDS: number;
  DECODE_TIMEOUT_MS: number;

  // Classification
  DECISION_THRESHOLD: number;

  // Logging
  LOG_LEVEL: string;
  LOG_FILE_PATH: string;
}

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const config: Config = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '3000', 10),
  API_BASE_URL: process.env.API_BASE_URL || 'http://localhost:3000',

  // API Keys - comma-separated in env
  API_KEYS: process.env.API_KEYS?.split(',').map(key => key.trim()).filter(Boolean) || [],
  MASTER_API_KEY: process.env.MASTER_API_KEY || 'master_key_change_in_production',

  RATE_LIMIT_MAX_REQUESTS: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10),
  RATE_LIMIT_WINDOW_MS: 15 * 60 * 1000, // 15 minutes

  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS?.split(',').map(origin => origin.trim()) || ['*'],

  MAX_AUDIO_SIZE_MB: 25,
  MIN_AUDIO_SIZE_BYTES: 1024,
  MAX_ANALYSIS_SECONDS: parseNumber(process.env.MAX_ANALYSIS_SECONDS, 30),
  DECODE_TIMEOUT_MS: parseInt(process.env.DECODE_TIMEOUT_MS || '30000', 10),

  DECISION_THRESHOLD: parseNumber(process.env.DECISION_THRESHOLD, 0.5),

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_FILE_PATH: process.env.LOG_FILE_PATH || './logs/app.log',
};

// Validate required config
const requiredEnvVars = ['API_KEYS', 'MASTER_API_KEY'];

const missingVars = requiredEnvVars.filter(varName => {
  const value = process.env[varName];
  return !value || value.trim() === '';
});

if (missingVars.length > 0 && config.NODE_ENV === 'production') {
  throw new Error(
    `Missing required environment variables: ${missingVars.join(', ')}\n` +
    'Please set them in your .env file or environment.'
  );
}

export default config;
