/**
 * Configuration loader for lintkit.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 *
 * Only the file's shape is checked here. Rule entries stay raw and are
 * validated against the registry by ConfigResolver.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createSilentLogger, LOG_LEVELS, type Logger, type LogLevel } from '../logging/logger.js';
import { DEFAULT_CONFIG, type LintConfig } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.LINTKIT_CONFIG or './lintkit.yaml') */
  configPath?: string;
  /** Whether to validate config (default: true) */
  validate?: boolean;
  logger?: Logger;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

const LogLevelSchema = z.custom<LogLevel>(
  value => typeof value === 'string' && LOG_LEVELS.some(level => level === value),
  { message: `must be one of: ${LOG_LEVELS.join(', ')}` }
);

const ConfigFileSchema = z
  .object({
    logLevel: LogLevelSchema,
    onInvalidRule: z.enum(['abort', 'disable']),
    correction: z
      .object({
        maxIterations: z.coerce.number().int().positive(),
      })
      .partial()
      .strict(),
    rules: z.record(z.unknown()),
    overrides: z.array(
      z
        .object({
          paths: z.array(z.string()).min(1),
          rules: z.record(z.unknown()),
        })
        .strict()
    ),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, logger: Logger): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    logger.warn({ variable: varName }, 'Environment variable is not set and has no default');
    return '';
  });
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
export function substituteEnvVarsRecursive(value: unknown, logger: Logger = createSilentLogger()): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value, logger);
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVarsRecursive(item, logger));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = substituteEnvVarsRecursive(entry, logger);
    }
    return result;
  }
  return value;
}

/**
 * Validate the shape of a parsed config file.
 */
export function validateConfig(config: unknown): ConfigFile {
  const result = ConfigFileSchema.safeParse(config ?? {});
  if (!result.success) {
    const [issue] = result.error.issues;
    if (issue === undefined) {
      throw new ConfigValidationError('invalid configuration', '', config);
    }
    const path = issue.path.map(String);
    if (issue.code === 'unrecognized_keys' && issue.keys[0] !== undefined) {
      path.push(issue.keys[0]);
    }
    const message = issue.code === 'unrecognized_keys' ? 'unrecognized key' : issue.message;
    throw new ConfigValidationError(message, path.join('.'), valueAt(config, issue.path));
  }
  return result.data;
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = root;
  for (const segment of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Object.entries(current).find(([key]) => key === String(segment))?.[1];
  }
  return current;
}

/**
 * Merge a validated file over the defaults.
 */
export function applyDefaults(file: ConfigFile): LintConfig {
  return {
    logLevel: file.logLevel ?? DEFAULT_CONFIG.logLevel,
    onInvalidRule: file.onInvalidRule ?? DEFAULT_CONFIG.onInvalidRule,
    correction: {
      maxIterations: file.correction?.maxIterations ?? DEFAULT_CONFIG.correction.maxIterations,
    },
    rules: { ...DEFAULT_CONFIG.rules, ...file.rules },
    overrides: (file.overrides ?? []).map(override => ({ paths: override.paths, rules: override.rules })),
  };
}

/**
 * Parse configuration from YAML text.
 */
export function parseConfig(content: string, options: Pick<LoadConfigOptions, 'validate' | 'logger'> = {}): LintConfig {
  const logger = options.logger ?? createSilentLogger();
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // Substitute environment variables
  const substituted = substituteEnvVarsRecursive(parsed, logger);

  if (options.validate === false) {
    const lenient = ConfigFileSchema.safeParse(substituted ?? {});
    if (lenient.success) {
      return applyDefaults(lenient.data);
    }
    logger.warn('Config file has an invalid shape, using defaults');
    return applyDefaults({});
  }
  return applyDefaults(validateConfig(substituted));
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LintConfig> {
  const logger = options.logger ?? createSilentLogger();
  const configPath = options.configPath ?? process.env.LINTKIT_CONFIG ?? './lintkit.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    logger.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return applyDefaults({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  return parseConfig(content, options);
}
