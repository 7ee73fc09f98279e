import { Logger } from '../../utils/logger.js';

/** Diagnostics logger matching the global flags: debug when verbose, JSON lines when quiet. */
export function cliLogger(): Logger {
  const verbose = process.env.TESTLAYERS_VERBOSE === '1';
  const quiet = process.env.TESTLAYERS_QUIET === '1';
  return new Logger({ level: verbose ? 'debug' : 'warn', json: quiet });
}
