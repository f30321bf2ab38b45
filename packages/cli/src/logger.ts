import { type Logger, destination, pino } from 'pino';

/**
 * Structured logs go to stderr; stdout carries only the artifact.
 */
export const logger: Logger = pino(
  {
    name: 'edge-debug',
    level: 'info',
  },
  destination(2),
);
