import pino from 'pino';

import { APP_ENV } from './config.js';

// stdout belongs to the CLI; structured logs go to stderr
export const logger = pino(
  {
    name: 'setlist-to-playlist',
    level: APP_ENV.LOG_LEVEL
  },
  pino.destination(2)
);

export type Logger = typeof logger;
