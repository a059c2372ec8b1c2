/**
 * Structured logging
 *
 * Every module gets a child of one root pino logger, tagged with its name.
 * The level comes from LOG_LEVEL and is read when the first logger is created,
 * so the CLI sets it before loading the modules that log.
 */

import pino, { type Logger } from 'pino';

let root: Logger | undefined;

function getRoot(): Logger {
  if (!root) {
    // stderr, so CLI output on stdout stays parseable
    root = pino(
      {
        name: 'geoframes',
        level: process.env.LOG_LEVEL ?? 'info',
      },
      pino.destination(2)
    );
  }
  return root;
}

/**
 * Create a logger for a module
 */
export function createLogger(module: string): Logger {
  return getRoot().child({ module });
}

