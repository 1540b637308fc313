import pino from 'pino';
import { config } from './config.js';

// stdout carries records, so logs go to stderr
export const logger = pino(
  {
    name: 'procurement-normalizer',
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  pino.destination(2),
);
