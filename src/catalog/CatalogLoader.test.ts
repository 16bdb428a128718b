/**
 * Tests for CatalogLoader.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { emptyEnumArguments } from '../rules/style/EmptyEnumArgumentsRule.js';
import { strongIBOutlet } from '../rules/lint/StrongIBOutletRule.js';
import { loadCatalog, parseRuleFile } from './CatalogLoader.js';
import { CatalogValidationError } from './types.js';

const context = { file: 'lint/strong_iboutlet.rule.yaml', identifier: 'strong_iboutlet', kind: 'lint' } as const;

const ruleFile = `name: Sample
description: Sample rule.
templates:
  wrap:
    text: "class C { {{code}} }"
nonTriggeringExamples:
  - "var a = 1"
triggeringExamples:
  - template: wrap
    vars: { code: "@IBOutlet weak var a: A?" }
    violations: [{ line: 1, column: 21 }]
corrections:
  - before: { template: wrap, vars: { code: "@IBOutlet weak var a: A?" } }
    after: "class C { @IBOutlet var a: A? }"
    configuration: { severity: error }
`;

describe('parseRuleFile', () => {
  it('builds a descriptor with rendered examples and origins', () => {
    const descriptor = parseRuleFile(ruleFile, context);

    expect(descriptor).toEqual({
      identifier: 'strong_iboutlet',
      name: 'Sample',
      description: 'Sample rule.',
      kind: 'lint',
      defaultSeverity: 'warning',
      optIn: false,
      nonTriggeringExamples: [
        { code: 'var a = 1', origin: { file: 'lint/strong_iboutlet.rule.yaml', line: 7 } },
      ],
      triggeringExamples: [
        {
          code: 'class C { @IBOutlet weak var a: A? }',
          origin: { file: 'lint/strong_iboutlet.rule.yaml', line: 9 },
          violations: [{ line: 1, column: 21 }],
        },
      ],
      corrections: [
        {
          before: 'class C { @IBOutlet weak var a: A? }',
          after: 'class C { @IBOutlet var a: A? }',
          origin: { file: 'lint/strong_iboutlet.rule.yaml', line: 13 },
          configuration: { severity: 'error' },
        },
      ],
    });
  });

  it('fills placeholders from template defaults', () => {
    const content = `name: Sample
description: Sample rule.
templates:
  wrap:
    text: "switch {{variable}} { {{code}}: break }"
    defaults: { variable: foo }
nonTriggeringExamples:
  - template: wrap
    vars: { code: case .bar }
`;

    const descriptor = parseRuleFile(content, context);

    expect(descriptor.nonTriggeringExamples[0]?.code).toBe('switch foo { case .bar: break }');
  });

  it('rejects an unknown placeholder', () => {
    const content = `name: Sample
description: Sample rule.
templates:
  wrap:
    text: "{{missing}}"
nonTriggeringExamples:
  - template: wrap
`;

    expect(() => parseRuleFile(content, context)).toThrow(
      "Catalog validation failed for 'strong_iboutlet' (lint/strong_iboutlet.rule.yaml:7): " +
        "unknown placeholder '{{missing}}' in template 'wrap'"
    );
  });

  it('rejects an unknown template', () => {
    const content = `name: Sample
description: Sample rule.
nonTriggeringExamples:
  - template: nowhere
`;

    expect(() => parseRuleFile(content, context)).toThrow("unknown template 'nowhere'");
  });

  it('rejects an example with both code and template', () => {
    const content = `name: Sample
description: Sample rule.
templates:
  wrap:
    text: "x"
triggeringExamples:
  - code: "var a = 1"
    template: wrap
`;

    expect(() => parseRuleFile(content, context)).toThrow('an example needs exactly one of code or template');
  });

  it('rejects unknown keys in the file', () => {
    const content = `name: Sample
description: Sample rule.
severity: error
`;

    expect(() => parseRuleFile(content, context)).toThrow(CatalogValidationError);
  });

  it('rejects an invalid example configuration', () => {
    const content = `name: Sample
description: Sample rule.
nonTriggeringExamples:
  - code: "var a = 1"
    configuration: { severity: fatal }
`;

    expect(() => parseRuleFile(content, context)).toThrow(
      "Catalog validation failed for 'strong_iboutlet' (lint/strong_iboutlet.rule.yaml:4): " +
        "Invalid configuration for rule 'strong_iboutlet' at 'severity'"
    );
  });
});

describe('loadCatalog', () => {
  let catalogDir: string;

  beforeEach(async () => {
    catalogDir = await mkdtemp(join(tmpdir(), 'lintkit-catalog-'));
    await mkdir(join(catalogDir, 'lint'), { recursive: true });
    await writeFile(join(catalogDir, 'lint', 'strong_iboutlet.rule.yaml'), ruleFile);
  });

  afterEach(async () => {
    await rm(catalogDir, { recursive: true, force: true });
  });

  it('pairs catalog files with implementations', async () => {
    const rules = await loadCatalog({ basePath: catalogDir, implementations: [strongIBOutlet] });

    expect(rules).toHaveLength(1);
    expect(rules[0]?.implementation).toBe(strongIBOutlet);
    expect(rules[0]?.descriptor.kind).toBe('lint');
    expect(rules[0]?.descriptor.triggeringExamples[0]?.origin).toEqual({
      file: 'lint/strong_iboutlet.rule.yaml',
      line: 9,
    });
  });

  it('rejects an implementation without a catalog file', async () => {
    await expect(
      loadCatalog({ basePath: catalogDir, implementations: [strongIBOutlet, emptyEnumArguments] })
    ).rejects.toThrow("Catalog validation failed for 'empty_enum_arguments': implementation has no catalog file");
  });

  it('rejects a catalog file without an implementation', async () => {
    await writeFile(join(catalogDir, 'lint', 'orphan_rule.rule.yaml'), ruleFile);

    await expect(loadCatalog({ basePath: catalogDir, implementations: [strongIBOutlet] })).rejects.toThrow(
      "Catalog validation failed for 'orphan_rule' (lint/orphan_rule.rule.yaml:7): catalog file has no implementation"
    );
  });

  it('rejects a directory that is not a rule kind', async () => {
    await mkdir(join(catalogDir, 'widgets'));
    await writeFile(join(catalogDir, 'widgets', 'gadget.rule.yaml'), ruleFile);

    await expect(loadCatalog({ basePath: catalogDir, implementations: [strongIBOutlet] })).rejects.toThrow(
      "unknown rule kind directory 'widgets'"
    );
  });

  it('ignores files that are not catalog files', async () => {
    await writeFile(join(catalogDir, 'lint', 'notes.yaml'), 'not: a rule');

    const rules = await loadCatalog({ basePath: catalogDir, implementations: [strongIBOutlet] });

    expect(rules.map(rule => rule.descriptor.identifier)).toEqual(['strong_iboutlet']);
  });
});
