/**
 * Screen sampler backed by an external command
 *
 * The command is run with `execFile` (no shell) and must print one color
 * to stdout. Capture tooling differs per desktop, so the command is
 * configuration rather than code.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { Rgb } from '$types/common';
import { SamplerUnavailableError } from '$types/errors';
import type { ScreenSampler } from '@core/scheduler';
import { parseColorOutput } from './helpers';
import type { CommandSamplerConfig, ExecFileAPI } from './types';

const execFileAsync: ExecFileAPI = promisify(execFile);

/**
 * Create a command-backed screen sampler
 *
 * @param config - Command, arguments and timeout
 * @param exec - execFile implementation
 * @returns Sampler whose calls reject with SamplerUnavailableError on failure
 *
 * @example
 * const sampler = createCommandSampler({ command: 'intime-sample', args: ['--center'], timeoutMs: 500 });
 * const rgb = await sampler.sample(new AbortController().signal);
 */
export function createCommandSampler(
  config: CommandSamplerConfig,
  exec: ExecFileAPI = execFileAsync
): ScreenSampler {
  const command = config.command;

  async function sample(signal: AbortSignal): Promise<Rgb> {
    if (command === null) {
      throw new SamplerUnavailableError('No screen sampler command configured');
    }

    let stdout: string;
    try {
      const result = await exec(command, config.args, {
        timeout: config.timeoutMs,
        signal,
        windowsHide: true
      });
      stdout = result.stdout;
    } catch (err) {
      throw new SamplerUnavailableError(`${command} failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    const rgb = parseColorOutput(stdout);
    if (rgb === null) {
      throw new SamplerUnavailableError(`${command} printed no color`);
    }
    return rgb;
  }

  return { sample };
}
