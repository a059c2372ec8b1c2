#!/usr/bin/env node
/**
 * geoframes CLI
 *
 * Command-line interface for converting points between geodetic, ECEF,
 * local ENU and projected (Lambert-93, UTM) frames, and for measuring
 * distances and angles between two points.
 */

import { GeoFramesError } from './utils/errors.js';

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // The log level is read when the first logger is created, so it is set
  // before the command modules load
  if (args.includes('-v') || args.includes('--verbose')) {
    process.env.LOG_LEVEL = 'debug';
  }

  const { parseArgs, HELP_TEXT } = await import('./commands/options.js');
  const { runCommand } = await import('./commands/run.js');

  const verbose = process.env.LOG_LEVEL === 'debug';

  try {
    const options = parseArgs(args);

    // Show help
    if (options.help || args.length === 0) {
      console.log(HELP_TEXT);
      process.exit(0);
    }

    const lines = await runCommand(options);
    for (const line of lines) {
      console.log(line);
    }
    process.exit(0);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    if (verbose) {
      console.error(error instanceof GeoFramesError ? { code: error.code, details: error.details } : error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
