/**
 * Control plane initialization
 */

import { appendFile, mkdir } from 'node:fs/promises';

import type { AppConstants } from '$types/config';
import { NODE_TIMERS } from '@core/scheduler';
import { createCommandSampler } from '@hardware/sampler';
import { createConsoleSink, createFileSink, createLogger } from '@logging';
import type { Logger, SinkWithLevel } from '@logging';
import { createCommandHandler, createControlChannel } from '@system/control';
import { createOverlayInstance } from '@system/instance';
import type { OverlayInstance, SettingsSource } from '@system/instance';
import { createInstanceRegistry } from '@system/registry';
import { now, nowMs } from '@utils/time';
import { DEFAULT_SETTINGS } from './config';
import { applyOverrides, createFileSettingsSource, loadInitialSettings, withOverrides } from './settings';
import type { BootOptions, Daemon } from './types';

/**
 * Create the logger with a console sink and, when configured, a file sink
 */
export async function createAppLogger(constants: AppConstants): Promise<Logger> {
  const sinks: SinkWithLevel[] = [
    {
      sink: createConsoleSink(console, { color: Boolean(process.stdout.isTTY), timestamps: true }),
      minLevel: constants.LOG_LEVELS.DEBUG
    }
  ];
  if (constants.LOG_FILE !== null) {
    sinks.push({
      sink: createFileSink({ mkdir, appendFile }, { path: constants.LOG_FILE, bufferSize: 256 }),
      minLevel: constants.LOG_LEVELS.DEBUG
    });
  }

  const logger = createLogger(
    { level: constants.LOG_LEVEL, demoteHours: constants.LOG_AUTO_DEMOTE_HOURS },
    { timeSource: now, sinks },
    constants.LOG_LEVELS
  );

  const messages = await logger.initialize();
  messages.forEach(function(msg) {
    if (msg.success) {
      logger.debug(msg.message);
    } else {
      logger.warning(msg.message);
    }
  });
  return logger;
}

/**
 * Build and start the control plane
 *
 * Instances are created and put in their start mode before the socket is
 * bound, so a bad duration fails startup without leaving a socket behind.
 *
 * @param options - Startup options
 * @param constants - Resolved app constants
 * @param logger - Application logger
 * @param settingsSource - Settings document source (file-backed by default)
 * @returns Running daemon
 * @throws {InvalidDurationError} If the start duration is invalid
 * @throws {SocketBindError} If the control socket cannot be bound
 */
export async function initialize(
  options: BootOptions,
  constants: AppConstants,
  logger: Logger,
  settingsSource: SettingsSource = createFileSettingsSource(constants.SETTINGS_PATH, DEFAULT_SETTINGS, logger)
): Promise<Daemon> {
  const settings = applyOverrides(
    await loadInitialSettings(settingsSource, DEFAULT_SETTINGS, logger),
    options.overrides
  );
  const instanceSettingsSource = withOverrides(settingsSource, options.overrides);

  const sampler = createCommandSampler({
    command: constants.SAMPLER_COMMAND,
    args: constants.SAMPLER_ARGS,
    timeoutMs: constants.SAMPLER_TIMEOUT_MS
  });
  if (constants.SAMPLER_COMMAND === null && settings.screen_sampling.enabled && options.fixedColor === null) {
    logger.warning('Screen sampling is enabled but INTIME_SAMPLER_COMMAND is not set');
  }

  const registry = createInstanceRegistry(logger);
  const instances: OverlayInstance[] = [];
  for (let id = 0; id < options.instances; id++) {
    const instance = createOverlayInstance(
      {
        id,
        settings,
        fixedColor: options.fixedColor,
        tickIntervalMs: constants.TICK_INTERVAL_MS,
        alarmTimeoutMs: constants.ALARM_TIMEOUT_SEC * 1000,
        samplerTimeoutMs: constants.SAMPLER_TIMEOUT_MS,
        maxSamplerFailures: constants.SAMPLER_MAX_FAILURES,
        minLuminanceDelta: constants.MIN_LUMINANCE_DELTA
      },
      { sampler, settingsSource: instanceSettingsSource, logger, timers: NODE_TIMERS, clock: nowMs }
    );
    instance.enterMode(options.mode, options.duration);
    registry.register(instance);
    instances.push(instance);
  }

  const channel = createControlChannel(
    {
      socketPath: constants.SOCKET_PATH,
      socketMode: constants.SOCKET_MODE,
      readTimeoutMs: constants.READ_TIMEOUT_MS,
      maxCommandBytes: constants.MAX_COMMAND_BYTES
    },
    createCommandHandler({ registry, localId: 0, logger }),
    logger
  );
  await channel.start();

  instances.forEach(function(instance) { instance.start(); });
  logger.info(`Started ${instances.length} instance(s) in ${options.mode} mode`);

  let stopped = false;
  async function shutdown(): Promise<void> {
    if (stopped) {
      return;
    }
    stopped = true;
    instances.forEach(function(instance) { instance.stop(); });
    await channel.stop();
    logger.info('Shut down');
    await logger.close();
  }

  return { constants, logger, registry, instances, channel, shutdown };
}
