import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'print-dispatch',
  level: config.logLevel,
});
