import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: 'api-gateway',
  level: config.isTest ? 'silent' : config.logLevel,
});

export type Logger = typeof logger;
