import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ZodIssue } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { CONFIG_FILE_NAME } from './constants.js';
import {
  bridgeConfigInputSchema,
  bridgeConfigSchema,
  type BridgeConfig,
  type BridgeConfigInput
} from './types.js';

type Env = Record<string, string | undefined>;

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

/**
 * Unison keeps its state under $UNISON, falling back to ~/.unison; the bridge
 * config file sits beside it.
 */
export function getDefaultConfigPath(env: Env = process.env): string {
  if (env.FSMONITOR_CONFIG) {
    return path.resolve(env.FSMONITOR_CONFIG);
  }
  const unisonDir = env.UNISON ? path.resolve(env.UNISON) : path.join(os.homedir(), '.unison');
  return path.join(unisonDir, CONFIG_FILE_NAME);
}

/**
 * Read a JSON config file. A missing file is only an error when the caller
 * asked for that file explicitly.
 */
export function readFileConfig(filePath: string, required = false): BridgeConfigInput | null {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new ConfigError(`config file not found: ${filePath}`);
    }
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`cannot read config file ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }

  const parsed = bridgeConfigInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid config file ${filePath}: ${formatIssues(parsed.error.issues)}`);
  }

  log.debug('Loaded config file', { path: filePath });
  return parsed.data;
}

function parseIntegerEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Read configuration from environment variables
 */
export function readEnvConfig(env: Env = process.env): BridgeConfigInput {
  const config: BridgeConfigInput = {};

  const debounceMs = parseIntegerEnv(env, 'FSMONITOR_DEBOUNCE_MS');
  if (debounceMs !== undefined) {
    config.debounceMs = debounceMs;
  }

  const maxBatchDelayMs = parseIntegerEnv(env, 'FSMONITOR_MAX_BATCH_DELAY_MS');
  if (maxBatchDelayMs !== undefined) {
    config.maxBatchDelayMs = maxBatchDelayMs;
  }

  if (env.FSMONITOR_IGNORE) {
    config.ignore = env.FSMONITOR_IGNORE
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }

  if (env.FSMONITOR_LOG_LEVEL) {
    config.logLevel = env.FSMONITOR_LOG_LEVEL;
  }

  const maxAttempts = parseIntegerEnv(env, 'FSMONITOR_MAX_RETRIES');
  if (maxAttempts !== undefined) {
    config.retry = { maxAttempts };
  }

  return config;
}

/**
 * Merge partial configs, later entries winning. Ignore globs accumulate.
 */
export function mergeConfigs(...inputs: Array<BridgeConfigInput | null | undefined>): BridgeConfigInput {
  const merged: BridgeConfigInput = {};

  for (const input of inputs) {
    if (!input) continue;

    if (input.debounceMs !== undefined) merged.debounceMs = input.debounceMs;
    if (input.maxBatchDelayMs !== undefined) merged.maxBatchDelayMs = input.maxBatchDelayMs;
    if (input.logLevel !== undefined) merged.logLevel = input.logLevel;
    if (input.ignore !== undefined) {
      merged.ignore = [...(merged.ignore ?? []), ...input.ignore];
    }
    if (input.retry !== undefined) {
      merged.retry = { ...merged.retry, ...input.retry };
    }
  }

  if (merged.ignore) {
    merged.ignore = Array.from(new Set(merged.ignore));
  }

  return merged;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Highest-precedence values, usually from the command line */
  overrides?: BridgeConfigInput;
  env?: Env;
}

/**
 * Resolve the effective configuration: defaults < file < env < overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const fileConfig = options.configPath
    ? readFileConfig(path.resolve(options.configPath), true)
    : readFileConfig(getDefaultConfigPath(env), Boolean(env.FSMONITOR_CONFIG));

  const merged = mergeConfigs(fileConfig, readEnvConfig(env), options.overrides);
  const result = bridgeConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(result.error.issues)}`);
  }

  return result.data;
}
