import pino from 'pino';
import { loadConfig } from './config';

// stdout belongs to the menu; logs go to stderr.
export const logger = pino(
  {
    name: 'gradebook',
    level: loadConfig().logLevel,
  },
  pino.destination(2),
);
