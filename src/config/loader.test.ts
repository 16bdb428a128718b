/**
 * Tests for the configuration loader.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, loadConfig, parseConfig, substituteEnvVarsRecursive } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('parseConfig', () => {
  it('merges a file over the defaults', () => {
    const config = parseConfig(`
onInvalidRule: disable
rules:
  strong_iboutlet: { enabled: true }
  empty_enum_arguments:
    severity: error
    parameters: { reportNested: every }
overrides:
  - paths: ["Sources/Legacy"]
    rules:
      empty_enum_arguments: { enabled: false }
`);

    expect(config).toEqual({
      logLevel: 'info',
      onInvalidRule: 'disable',
      correction: { maxIterations: 10 },
      rules: {
        strong_iboutlet: { enabled: true },
        empty_enum_arguments: { severity: 'error', parameters: { reportNested: 'every' } },
      },
      overrides: [{ paths: ['Sources/Legacy'], rules: { empty_enum_arguments: { enabled: false } } }],
    });
  });

  it('returns the defaults for an empty file', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
  });

  it('substitutes environment variables before validating', () => {
    process.env.LINTKIT_TEST_ITERATIONS = '4';
    try {
      const config = parseConfig(`
logLevel: \${LINTKIT_TEST_LEVEL:-warn}
correction:
  maxIterations: \${LINTKIT_TEST_ITERATIONS}
`);

      expect(config.logLevel).toBe('warn');
      expect(config.correction.maxIterations).toBe(4);
    } finally {
      delete process.env.LINTKIT_TEST_ITERATIONS;
    }
  });

  it('rejects unknown top-level keys', () => {
    expect(() => parseConfig('colour: red\n')).toThrow(ConfigValidationError);
    expect(() => parseConfig('colour: red\n')).toThrow("Config validation error at 'colour': unrecognized key");
  });

  it('rejects an invalid log level', () => {
    expect(() => parseConfig('logLevel: loud\n')).toThrow("Config validation error at 'logLevel'");
  });

  it('rejects an override without paths', () => {
    expect(() => parseConfig('overrides:\n  - paths: []\n    rules: {}\n')).toThrow(
      "Config validation error at 'overrides.0.paths'"
    );
  });

  it('falls back to defaults on an invalid shape when validation is off', () => {
    const config = parseConfig('colour: red\n', { validate: false });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.correction).not.toBe(DEFAULT_CONFIG.correction);
  });

  it('reports YAML syntax errors', () => {
    expect(() => parseConfig('rules: [unclosed\n')).toThrow('Failed to parse config file:');
  });
});

describe('substituteEnvVarsRecursive', () => {
  it('replaces variables in nested strings and leaves other values alone', () => {
    process.env.LINTKIT_TEST_NAME = 'legacy';
    try {
      expect(
        substituteEnvVarsRecursive({ paths: ['Sources/${LINTKIT_TEST_NAME}'], count: 3, flag: true, none: null })
      ).toEqual({ paths: ['Sources/legacy'], count: 3, flag: true, none: null });
    } finally {
      delete process.env.LINTKIT_TEST_NAME;
    }
  });

  it('substitutes an empty string for an unset variable without default', () => {
    expect(substituteEnvVarsRecursive('a${LINTKIT_TEST_UNSET}b')).toBe('ab');
  });
});

describe('loadConfig', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), 'lintkit-config-'));
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  it('reads the file at configPath', async () => {
    const configPath = join(configDir, 'lintkit.yaml');
    await writeFile(configPath, 'logLevel: debug\ncorrection:\n  maxIterations: 3\n');

    const config = await loadConfig({ configPath });

    expect(config.logLevel).toBe('debug');
    expect(config.correction.maxIterations).toBe(3);
  });

  it('returns the defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: join(configDir, 'missing.yaml') });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults the caller can change without touching later loads', async () => {
    const configPath = join(configDir, 'missing.yaml');
    const first = await loadConfig({ configPath });
    first.correction.maxIterations = 2;
    first.rules['strong_iboutlet'] = { enabled: true };
    first.overrides.push({ paths: ['Sources'], rules: {} });

    const second = await loadConfig({ configPath });

    expect(second).toEqual({
      logLevel: 'info',
      onInvalidRule: 'abort',
      correction: { maxIterations: 10 },
      rules: {},
      overrides: [],
    });
    expect(DEFAULT_CONFIG.correction.maxIterations).toBe(10);
  });
});
