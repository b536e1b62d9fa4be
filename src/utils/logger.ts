import path from 'path';
import winston from 'winston';
import { config } from '../config';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.NODE_ENV === 'production'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple()),
  }),
];

if (config.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: path.resolve(config.LOG_FILE_PATH),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

export const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  silent: config.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'voice-authenticity-api' },
  transports,
});

export default logger;
