/**
 * Shared configuration utilities
 *
 * Settings come from a JSON settings file (appsettings.json) with the same
 * `Section:Key` layout the demos always used. Each key resolves, in order, from:
 * 1. CLI overrides (`--set Bedrock:Prompt=...`)
 * 2. Environment variables (`BEDROCK_PROMPT` or `Bedrock__Prompt`)
 * 3. The settings file
 * 4. The caller's default
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { AWSConfig } from './types';
import { ConfigurationError, getErrorCode, getErrorMessage, isRecord, logInfo, logWarn } from './utils';

export const DEFAULT_SETTINGS_FILE = 'appsettings.json';

export interface Settings {
  readonly workingDirectory: string;
  /** Absolute path of the settings file that was loaded, if any */
  readonly source?: string;
  readonly values: Record<string, unknown>;
  readonly overrides: Readonly<Record<string, string>>;
  readonly env: NodeJS.ProcessEnv;
}

export interface LoadSettingsOptions {
  /** Explicit settings file; a missing explicit file is an error */
  settingsPath?: string;
  workingDirectory?: string;
  overrides?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Converts a `Section:Key` setting name into its environment variable name
 * e.g. `Bedrock:NERModelId` -> `BEDROCK_NER_MODEL_ID`
 */
export function toEnvName(key: string): string {
  return key
    .split(':')
    .map(segment =>
      segment
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .toUpperCase()
    )
    .join('_');
}

/**
 * Loads the settings file and captures overrides and environment
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const env = options.env ?? process.env;
  const workingDirectory = options.workingDirectory ?? process.cwd();
  const explicitPath = options.settingsPath ?? nonEmpty(env.SETTINGS_FILE);
  const settingsFile = path.resolve(workingDirectory, explicitPath ?? DEFAULT_SETTINGS_FILE);
  const overrides = options.overrides ?? {};

  let raw: string;
  try {
    raw = await readFile(settingsFile, 'utf8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT' && explicitPath === undefined) {
      logWarn('Settings file not found, using environment and defaults', { settingsFile });
      return { workingDirectory, values: {}, overrides, env };
    }
    throw new ConfigurationError(`Could not read settings file: ${settingsFile}`, {
      settingsFile,
      error: getErrorMessage(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Settings file is not valid JSON: ${settingsFile}`, {
      settingsFile,
      error: getErrorMessage(error),
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Settings file must contain a JSON object: ${settingsFile}`, { settingsFile });
  }

  logInfo('Loaded settings file', { settingsFile });
  return { workingDirectory, source: settingsFile, values: parsed, overrides, env };
}

/**
 * Resolves a `Section:Key` setting; returns the default when unset everywhere
 */
export function getSetting(settings: Settings, key: string): string | undefined;
export function getSetting(settings: Settings, key: string, defaultValue: string): string;
export function getSetting(settings: Settings, key: string, defaultValue?: string): string | undefined {
  const override = nonEmpty(settings.overrides[key]);
  if (override !== undefined) return override;

  const fromEnv = nonEmpty(settings.env[toEnvName(key)]) ?? nonEmpty(settings.env[key.split(':').join('__')]);
  if (fromEnv !== undefined) return fromEnv;

  const fromFile = lookupFileValue(settings.values, key);
  if (fromFile !== undefined) return fromFile;

  return defaultValue;
}

/**
 * Resolves a positive integer setting; invalid values fall back to the default
 */
export function getSettingInt(settings: Settings, key: string, defaultValue?: number): number | undefined {
  const value = getSetting(settings, key);
  if (value === undefined) return defaultValue;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    logWarn(`Invalid integer value for ${key}: "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }

  return parsed;
}

/**
 * Gets AWS client configuration for a region
 * Credentials always come from the SDK's default provider chain
 */
export function getAwsConfig(region: string): AWSConfig {
  // At most one attempt per invocation; retry policy belongs to the caller
  return { region, maxAttempts: 1 };
}

function lookupFileValue(values: Record<string, unknown>, key: string): string | undefined {
  let current: unknown = values;

  for (const segment of key.split(':')) {
    if (!isRecord(current)) return undefined;
    const match = Object.keys(current).find(candidate => candidate.toLowerCase() === segment.toLowerCase());
    if (match === undefined) return undefined;
    current = current[match];
  }

  if (typeof current === 'string') return nonEmpty(current);
  if (typeof current === 'number' || typeof current === 'boolean') return String(current);
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}
