import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  name: 'video-share',
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          // stderr, so prompts and the share summary on stdout stay readable
          options: { colorize: true, destination: 2 },
        }
      : undefined,
});
