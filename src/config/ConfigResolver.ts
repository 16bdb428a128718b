/**
 * ConfigResolver — resolves the effective configuration of each rule.
 *
 * Layers, most specific last:
 *   built-in defaults → project `rules` → matching file `overrides`
 *   → per-example override (catalog harness only)
 *
 * Entries are validated when the resolver is built, so configuration
 * errors surface at load time, not in the middle of a run.
 */

import { posix } from 'node:path';
import { z } from 'zod';
import { componentLogger, createSilentLogger, type Logger } from '../logging/logger.js';
import { RuleNotFoundError, type Rule } from '../catalog/types.js';
import type { InvalidRulePolicy, LintConfig, RuleConfiguration, RuleOverride } from './types.js';

/**
 * Raised for an invalid rule entry: unknown option or parameter key,
 * invalid severity or parameter value, or unknown rule identifier.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly ruleId: string,
    public readonly key: string
  ) {
    super(`Invalid configuration for rule '${ruleId}' at '${key}': ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * The registry surface the resolver needs.
 */
export interface RuleLookup {
  lookup(id: string): Rule | undefined;
  rules(): readonly Rule[];
}

const RuleOverrideSchema = z
  .object({
    severity: z.enum(['warning', 'error']),
    optIn: z.boolean(),
    enabled: z.boolean(),
    parameters: z.record(z.unknown()),
  })
  .partial()
  .strict();

export interface ResolveOptions {
  /** Path of the analysed file, for file-scoped overrides */
  path?: string;
  /** Per-example override; always validated strictly */
  example?: RuleOverride;
  /** Run the rule regardless of opt-in and enabled settings */
  forceEnabled?: boolean;
}

export interface ActiveRule {
  rule: Rule;
  configuration: RuleConfiguration;
}

interface FileLayer {
  paths: string[];
  rules: Map<string, RuleOverride>;
}

function issueKey(issue: z.ZodIssue, prefix = ''): string {
  const path = issue.path.map(String);
  if (issue.code === 'unrecognized_keys' && issue.keys[0] !== undefined) {
    path.push(issue.keys[0]);
  }
  const key = path.join('.');
  return prefix === '' ? key || '(root)' : key === '' ? prefix : `${prefix}.${key}`;
}

function issueMessage(issue: z.ZodIssue): string {
  return issue.code === 'unrecognized_keys' ? 'unrecognized key' : issue.message;
}

/**
 * Normalize a configured or analysed path for prefix matching.
 */
export function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, '/'));
  return normalized.replace(/^\.\//, '').replace(/\/+$/, '') || '.';
}

/**
 * True when `filePath` equals one of `paths` or lies under it.
 */
export function pathMatches(filePath: string, paths: readonly string[]): boolean {
  const file = normalizePath(filePath);
  return paths.some(path => path === '.' || file === path || file.startsWith(`${path}/`));
}

/**
 * Validate one raw rule entry.
 */
export function parseRuleOverride(ruleId: string, raw: unknown): RuleOverride {
  const result = RuleOverrideSchema.safeParse(raw ?? {});
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ConfigurationError(
      issue === undefined ? 'invalid entry' : issueMessage(issue),
      ruleId,
      issue === undefined ? '(root)' : issueKey(issue)
    );
  }
  return result.data;
}

/**
 * Fold layers: later fields win, parameters merge key by key.
 */
export function mergeOverrides(layers: ReadonlyArray<RuleOverride | undefined>): RuleOverride {
  const merged: RuleOverride = {};
  for (const layer of layers) {
    if (layer === undefined) continue;
    if (layer.severity !== undefined) merged.severity = layer.severity;
    if (layer.optIn !== undefined) merged.optIn = layer.optIn;
    if (layer.enabled !== undefined) merged.enabled = layer.enabled;
    if (layer.parameters !== undefined) {
      merged.parameters = { ...merged.parameters, ...layer.parameters };
    }
  }
  return merged;
}

export class ConfigResolver {
  private readonly policy: InvalidRulePolicy;
  private readonly logger: Logger;
  private readonly project = new Map<string, RuleOverride>();
  private readonly fileLayers: FileLayer[] = [];
  /** Rules switched off by an invalid project-wide entry */
  private readonly disabled = new Set<string>();

  constructor(
    private readonly registry: RuleLookup,
    config: Pick<LintConfig, 'rules' | 'overrides' | 'onInvalidRule'>,
    logger: Logger = createSilentLogger()
  ) {
    this.policy = config.onInvalidRule;
    this.logger = componentLogger(logger, 'config');

    this.loadLayer(config.rules, this.project, id => this.disabled.add(id));
    for (const override of config.overrides) {
      const rules = new Map<string, RuleOverride>();
      this.loadLayer(override.rules, rules, id => rules.set(id, { enabled: false }));
      this.fileLayers.push({ paths: override.paths.map(normalizePath), rules });
    }
  }

  /**
   * Effective configuration of one rule.
   */
  resolve(ruleId: string, options: ResolveOptions = {}): RuleConfiguration {
    const rule = this.registry.lookup(ruleId);
    if (rule === undefined) {
      throw new RuleNotFoundError(ruleId);
    }
    const { descriptor, implementation } = rule;

    const layers: Array<RuleOverride | undefined> = [this.project.get(ruleId)];
    if (options.path !== undefined) {
      for (const layer of this.fileLayers) {
        if (pathMatches(options.path, layer.paths)) {
          layers.push(layer.rules.get(ruleId));
        }
      }
    }
    if (options.example !== undefined) {
      layers.push(parseRuleOverride(ruleId, options.example));
    }

    const merged = mergeOverrides(layers);
    const optIn = merged.optIn ?? descriptor.optIn;
    const severity = merged.severity ?? descriptor.defaultSeverity;
    const parsed = implementation.parseParameters(merged.parameters);

    if (!parsed.success) {
      const [issue] = parsed.issues;
      const error = new ConfigurationError(
        issue === undefined ? 'invalid parameters' : issueMessage(issue),
        ruleId,
        issue === undefined ? 'parameters' : issueKey(issue, 'parameters')
      );
      if (options.example !== undefined || this.policy === 'abort') {
        throw error;
      }
      this.logger.warn({ ruleId, key: error.key }, `${error.message}; rule disabled`);
      return { severity, optIn, enabled: false, parameters: {} };
    }

    const enabled =
      options.forceEnabled === true || (!this.disabled.has(ruleId) && (merged.enabled ?? !optIn));

    return { severity, optIn, enabled, parameters: parsed.parameters };
  }

  /**
   * Rules that run on a file, in registration order.
   */
  activeRules(path?: string): ActiveRule[] {
    const active: ActiveRule[] = [];
    for (const rule of this.registry.rules()) {
      const configuration = this.resolve(rule.descriptor.identifier, path === undefined ? {} : { path });
      if (configuration.enabled) {
        active.push({ rule, configuration });
      }
    }
    return active;
  }

  private loadLayer(
    entries: Readonly<Record<string, unknown>>,
    target: Map<string, RuleOverride>,
    disableRule: (ruleId: string) => void
  ): void {
    for (const [ruleId, raw] of Object.entries(entries)) {
      const rule = this.registry.lookup(ruleId);
      if (rule === undefined) {
        this.handle(new ConfigurationError('unknown rule identifier', ruleId, ruleId), 'entry ignored');
        continue;
      }

      try {
        const override = parseRuleOverride(ruleId, raw);
        const parsed = rule.implementation.parseParameters(override.parameters);
        if (!parsed.success) {
          const [issue] = parsed.issues;
          throw new ConfigurationError(
            issue === undefined ? 'invalid parameters' : issueMessage(issue),
            ruleId,
            issue === undefined ? 'parameters' : issueKey(issue, 'parameters')
          );
        }
        target.set(ruleId, override);
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        this.handle(err, 'rule disabled');
        disableRule(ruleId);
      }
    }
  }

  private handle(error: ConfigurationError, consequence: string): void {
    if (this.policy === 'abort') {
      throw error;
    }
    this.logger.warn({ ruleId: error.ruleId, key: error.key }, `${error.message}; ${consequence}`);
  }
}
