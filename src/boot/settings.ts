/**
 * Settings document loading
 *
 * Reads config.json from disk, validates it over the defaults and hands
 * the result to instances through the SettingsSource interface.
 */

import { readFile } from 'node:fs/promises';

import type { OverlaySettings } from '$types/config';
import { ValidationError } from '$types/errors';
import type { Logger } from '@logging';
import type { SettingsSource } from '@system/instance';
import { readSettings } from '@validation';
import type { SettingsOverrides } from './types';

/**
 * Subset of `fs/promises` used to read the document
 */
export interface SettingsFileAPI {
  readFile: (filePath: string, encoding: 'utf8') => Promise<string>;
}

const NODE_FILE_API: SettingsFileAPI = { readFile };

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Create a settings source backed by a JSON file
 *
 * A missing file yields the defaults. An unreadable, malformed or invalid
 * file rejects with ValidationError; warnings are logged.
 *
 * @param filePath - Path of config.json
 * @param defaults - Values for missing keys
 * @param logger - Logger for warnings
 * @param fileApi - File reader
 * @returns Settings source
 */
export function createFileSettingsSource(
  filePath: string,
  defaults: Readonly<OverlaySettings>,
  logger: Logger,
  fileApi: SettingsFileAPI = NODE_FILE_API
): SettingsSource {
  async function load(): Promise<OverlaySettings> {
    let text: string;
    try {
      text = await fileApi.readFile(filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        logger.debug(`[Settings] ${filePath} not found, using defaults`);
        return defaults;
      }
      throw new ValidationError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ValidationError(`${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = readSettings(raw, defaults);
    result.warnings.forEach(function(warn) {
      logger.warning(`[Settings] ${warn.field}: ${warn.message}`);
    });
    if (!result.valid) {
      const details = result.errors.map(function(e) { return `${e.field}: ${e.message}`; }).join('; ');
      throw new ValidationError(`${filePath} is invalid: ${details}`);
    }
    return result.settings;
  }

  return { load };
}

/**
 * Load settings at startup, falling back to the defaults on any error
 */
export async function loadInitialSettings(
  source: SettingsSource,
  defaults: Readonly<OverlaySettings>,
  logger: Logger
): Promise<OverlaySettings> {
  try {
    return await source.load();
  } catch (err) {
    logger.warning(`[Settings] ${err instanceof Error ? err.message : String(err)}; using defaults`);
    return defaults;
  }
}

/**
 * Lay command line overrides over a settings document
 */
export function applyOverrides(settings: OverlaySettings, overrides: SettingsOverrides): OverlaySettings {
  return { ...settings, ...overrides };
}

/**
 * Wrap a settings source so every load, including reloads, keeps the overrides
 */
export function withOverrides(source: SettingsSource, overrides: SettingsOverrides): SettingsSource {
  return {
    load: async function() {
      return applyOverrides(await source.load(), overrides);
    }
  };
}
