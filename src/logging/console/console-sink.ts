/**
 * Console output sink
 *
 * Writes each formatted line straight to the console API, optionally colored
 * by severity with chalk and prefixed with an ISO timestamp. WARNING and
 * CRITICAL go to stderr so they survive stdout redirection.
 */

import chalk from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  0: chalk.gray,
  1: chalk.cyan,
  2: chalk.yellow,
  3: chalk.red.bold
};

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (color, timestamps)
 * @param clock - Millisecond clock used for timestamps
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { color: true, timestamps: true });
 * consoleSink.write(LOG_LEVELS.INFO, "ℹ️ [INFO]     hello");
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  clock: () => number = Date.now
): LogSink {
  function write(level: LogLevel, formattedMessage: string): void {
    let line = config.color ? LEVEL_STYLES[level](formattedMessage) : formattedMessage;
    if (config.timestamps) {
      const stamp = new Date(clock()).toISOString();
      line = (config.color ? chalk.dim(stamp) : stamp) + ' ' + line;
    }

    if (level >= 2) {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
