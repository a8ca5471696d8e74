import 'dotenv/config';

import { CommanderError } from 'commander';

import { IntimeError } from '$types/errors';
import { parseBootOptions } from './cli';
import type { BootOptions, Daemon } from './types';
import { resolveAppConstants } from './config';
import { createAppLogger, initialize } from './init';

async function main(): Promise<number> {
  let options: BootOptions;
  try {
    options = parseBootOptions(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const { constants, warnings } = resolveAppConstants(process.env);
  const logger = await createAppLogger(constants);
  warnings.forEach(function(warning) { logger.warning(warning); });

  let daemon: Daemon;
  try {
    daemon = await initialize(options, constants, logger);
  } catch (err) {
    if (err instanceof IntimeError) {
      logger.critical(`Startup failed: ${err.message}`);
      await logger.close();
      return 1;
    }
    throw err;
  }

  return new Promise<number>(function(resolve) {
    function onSignal(signal: NodeJS.Signals): void {
      logger.info(`Received ${signal}`);
      daemon.shutdown().then(
        function() { resolve(0); },
        function(err: unknown) {
          console.error(`Shutdown failed: ${String(err)}`);
          resolve(1);
        }
      );
    }
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

main().then(
  function(code) { process.exitCode = code; },
  function(err: unknown) {
    console.error(err);
    process.exitCode = 1;
  }
);
