/**
 * CatalogLoader — discovers `*.rule.yaml` files and pairs them with rule
 * implementations.
 *
 * Layout: `<catalog>/<kind>/<identifier>.rule.yaml`. The file name gives the
 * identifier and the directory gives the kind; the file holds the rest of
 * the descriptor and every example. Example origins are the catalog file
 * and the line of the example entry.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, dirname, join, relative, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isNode, LineCounter, parseDocument } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, parseRuleOverride } from '../config/ConfigResolver.js';
import type { RuleOverride } from '../config/types.js';
import type { RuleImplementation } from '../engine/types.js';
import { componentLogger, createSilentLogger, type Logger } from '../logging/logger.js';
import type { SourceLocation } from '../syntax/types.js';
import { RULE_KINDS, type RuleKind, type SourceOrigin } from '../types/common.js';
import {
  CatalogValidationError,
  type CorrectionExample,
  type Example,
  type Rule,
  type RuleDescriptor,
  type TriggeringExample,
} from './types.js';

/** Pattern used to match catalog files. */
const RULE_FILE_SUFFIX = '.rule.yaml';

const PLACEHOLDER_PATTERN = /\{\{(\w+)\}\}/g;

/**
 * The catalog shipped with the package.
 */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../rules/', import.meta.url));

// ============================================================================
// File shape
// ============================================================================

const TemplateSchema = z
  .object({
    text: z.string(),
    defaults: z.record(z.string()).default({}),
  })
  .strict();

const TemplatedSourceSchema = z
  .object({
    template: z.string(),
    vars: z.record(z.string()).default({}),
  })
  .strict();

const SourceSchema = z.union([z.string(), TemplatedSourceSchema]);

const LocationSchema = z
  .object({
    line: z.number().int().positive(),
    column: z.number().int().positive(),
  })
  .strict();

const ExampleSchema = z.union([
  z.string(),
  z
    .object({
      code: z.string().optional(),
      template: z.string().optional(),
      vars: z.record(z.string()).default({}),
      violations: z.array(LocationSchema).default([]),
      configuration: z.unknown().optional(),
    })
    .strict(),
]);

const CorrectionSchema = z
  .object({
    before: SourceSchema,
    after: SourceSchema,
    configuration: z.unknown().optional(),
  })
  .strict();

const RuleFileSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().min(1),
    defaultSeverity: z.enum(['warning', 'error']).default('warning'),
    optIn: z.boolean().default(false),
    templates: z.record(TemplateSchema).default({}),
    nonTriggeringExamples: z.array(ExampleSchema).default([]),
    triggeringExamples: z.array(ExampleSchema).default([]),
    corrections: z.array(CorrectionSchema).default([]),
  })
  .strict();

type TemplateEntry = z.infer<typeof TemplateSchema>;
type ExampleEntry = z.infer<typeof ExampleSchema>;

// ============================================================================
// Parsing one file
// ============================================================================

export interface RuleFileContext {
  /** Catalog-relative path used in example origins */
  file: string;
  identifier: string;
  kind: RuleKind;
}

function isRuleKind(value: string): value is RuleKind {
  return RULE_KINDS.some(kind => kind === value);
}

/**
 * Parse one catalog file into a descriptor.
 */
export function parseRuleFile(content: string, context: RuleFileContext): RuleDescriptor {
  const { file, identifier } = context;
  const lineCounter = new LineCounter();
  const document = parseDocument(content, { lineCounter });

  const [yamlError] = document.errors;
  if (yamlError !== undefined) {
    throw new CatalogValidationError(`invalid YAML: ${yamlError.message}`, identifier, {
      file,
      line: yamlError.linePos?.[0].line ?? 1,
    });
  }

  const result = RuleFileSchema.safeParse(document.toJS());
  if (!result.success) {
    const [issue] = result.error.issues;
    const path = issue?.path ?? [];
    throw new CatalogValidationError(
      `${path.join('.') || '(root)'}: ${issue?.message ?? 'invalid rule file'}`,
      identifier,
      { file, line: lineOf(path) }
    );
  }
  const data = result.data;

  function lineOf(path: ReadonlyArray<string | number>): number {
    const node = document.getIn(path, true);
    if (isNode(node) && node.range) {
      return lineCounter.linePos(node.range[0]).line;
    }
    return 1;
  }

  function originOf(section: string, index: number): SourceOrigin {
    return { file, line: lineOf([section, index]) };
  }

  function render(template: string, vars: Readonly<Record<string, string>>, origin: SourceOrigin): string {
    const entry: TemplateEntry | undefined = data.templates[template];
    if (entry === undefined) {
      throw new CatalogValidationError(`unknown template '${template}'`, identifier, origin);
    }
    const values: Record<string, string> = { ...entry.defaults, ...vars };
    return entry.text.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
      const value = values[name];
      if (value === undefined) {
        throw new CatalogValidationError(`unknown placeholder '{{${name}}}' in template '${template}'`, identifier, origin);
      }
      return value;
    });
  }

  function sourceOf(source: z.infer<typeof SourceSchema>, origin: SourceOrigin): string {
    return typeof source === 'string' ? source : render(source.template, source.vars, origin);
  }

  function overrideOf(raw: unknown, origin: SourceOrigin): RuleOverride | undefined {
    if (raw === undefined) return undefined;
    try {
      return parseRuleOverride(identifier, raw);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        throw new CatalogValidationError(err.message, identifier, origin);
      }
      throw err;
    }
  }

  function exampleOf(entry: ExampleEntry, section: string, index: number): TriggeringExample {
    const origin = originOf(section, index);
    if (typeof entry === 'string') {
      return { code: entry, origin, violations: [] };
    }

    let code: string;
    if (entry.code !== undefined && entry.template === undefined) {
      code = entry.code;
    } else if (entry.template !== undefined && entry.code === undefined) {
      code = render(entry.template, entry.vars, origin);
    } else {
      throw new CatalogValidationError('an example needs exactly one of code or template', identifier, origin);
    }

    const configuration = overrideOf(entry.configuration, origin);
    const violations: SourceLocation[] = entry.violations;
    return configuration === undefined ? { code, origin, violations } : { code, origin, violations, configuration };
  }

  const nonTriggeringExamples: Example[] = data.nonTriggeringExamples.map((entry, index) => {
    const { violations, ...example } = exampleOf(entry, 'nonTriggeringExamples', index);
    if (violations.length > 0) {
      throw new CatalogValidationError('non-triggering example declares violations', identifier, example.origin);
    }
    return example;
  });

  const triggeringExamples = data.triggeringExamples.map((entry, index) =>
    exampleOf(entry, 'triggeringExamples', index)
  );

  const corrections: CorrectionExample[] = data.corrections.map((entry, index) => {
    const origin = originOf('corrections', index);
    const correction: CorrectionExample = {
      before: sourceOf(entry.before, origin),
      after: sourceOf(entry.after, origin),
      origin,
    };
    const configuration = overrideOf(entry.configuration, origin);
    return configuration === undefined ? correction : { ...correction, configuration };
  });

  return {
    identifier,
    name: data.name,
    description: data.description,
    kind: context.kind,
    defaultSeverity: data.defaultSeverity,
    optIn: data.optIn,
    nonTriggeringExamples,
    triggeringExamples,
    corrections,
  };
}

// ============================================================================
// Discovery and pairing
// ============================================================================

/**
 * Recursively find all *.rule.yaml files in a directory.
 */
async function findRuleFiles(dirPath: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);

    if (entry.isDirectory()) {
      files.push(...(await findRuleFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith(RULE_FILE_SUFFIX)) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

export interface LoadCatalogOptions {
  /** Root directory of the catalog (default: the bundled `rules/`) */
  basePath?: string;
  /** Implementations to pair with catalog files by identifier */
  implementations: readonly RuleImplementation[];
  logger?: Logger;
}

/**
 * Load every catalog file and pair it with its implementation. Rules come
 * back in the order of `implementations`.
 */
export async function loadCatalog(options: LoadCatalogOptions): Promise<Rule[]> {
  const basePath = options.basePath ?? DEFAULT_CATALOG_PATH;
  const logger = componentLogger(options.logger ?? createSilentLogger(), 'catalog');

  const stats = await stat(basePath);
  if (!stats.isDirectory()) {
    throw new Error(`Rule catalog is not a directory: ${basePath}`);
  }

  const descriptors = new Map<string, RuleDescriptor>();
  for (const filePath of await findRuleFiles(basePath)) {
    const file = relative(basePath, filePath).split(sep).join('/');
    const identifier = basename(filePath, RULE_FILE_SUFFIX);
    const kind = basename(dirname(filePath));
    const origin: SourceOrigin = { file, line: 1 };

    if (!isRuleKind(kind)) {
      throw new CatalogValidationError(`unknown rule kind directory '${kind}'`, identifier, origin);
    }
    if (descriptors.has(identifier)) {
      throw new CatalogValidationError('identifier declared by more than one catalog file', identifier, origin);
    }

    const content = await readFile(filePath, 'utf-8');
    descriptors.set(identifier, parseRuleFile(content, { file, identifier, kind }));
  }

  const rules: Rule[] = [];
  for (const implementation of options.implementations) {
    const descriptor = descriptors.get(implementation.identifier);
    if (descriptor === undefined) {
      throw new CatalogValidationError('implementation has no catalog file', implementation.identifier);
    }
    descriptors.delete(implementation.identifier);
    rules.push({ descriptor, implementation });
  }

  for (const [identifier, descriptor] of descriptors) {
    const example = descriptor.nonTriggeringExamples[0] ?? descriptor.triggeringExamples[0];
    throw new CatalogValidationError('catalog file has no implementation', identifier, example?.origin ?? null);
  }

  logger.info({ basePath, rules: rules.length }, 'Rule catalog loaded');
  return rules;
}
