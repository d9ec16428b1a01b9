import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'groundwork',
  level: config.logLevel,
  base: { env: config.env },
});

export type Logger = pino.Logger;
