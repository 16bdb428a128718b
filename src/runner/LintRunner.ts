/**
 * LintRunner — lints or corrects a batch of files under one configuration.
 *
 * Files are independent: a file that cannot be parsed, or a rule that
 * crashes on it, affects only that file. Cancellation is the one error that stops the run.
 */

import { ConfigResolver, type ActiveRule, type RuleLookup } from '../config/ConfigResolver.js';
import type { LintConfig } from '../config/types.js';
import { CorrectionEngine } from '../engine/CorrectionEngine.js';
import { DetectionEngine, type AnalysisOptions } from '../engine/DetectionEngine.js';
import { AnalysisCancelledError, RuleExecutionError, throwIfCancelled } from '../engine/errors.js';
import { SourceFile } from '../engine/SourceFile.js';
import type { CorrectionRecord, TraversalFailure, Violation } from '../engine/types.js';
import { componentLogger, createSilentLogger, type Logger } from '../logging/logger.js';
import { ParseError } from '../syntax/Parser.js';

export interface LintInput {
  path: string;
  text: string;
}

export interface SkippedRule {
  ruleId: string;
  reason: string;
}

export interface ParseFailure {
  message: string;
  offset: number;
}

export interface FileSummary {
  errors: number;
  warnings: number;
  corrections: number;
}

export interface FileReport {
  path: string;
  /** Violations of the final text (after correction in fix mode) */
  violations: Violation[];
  corrections: CorrectionRecord[];
  traversalErrors: TraversalFailure[];
  skippedRules: SkippedRule[];
  parseFailure: ParseFailure | null;
  /** Set in fix mode when the file parsed */
  correctedText?: string;
  /** False when correction stopped at the iteration limit */
  converged?: boolean;
  summary: FileSummary;
}

export type RunStatus = 'passed' | 'failed';

export interface RunSummary {
  files: number;
  errors: number;
  warnings: number;
  corrections: number;
  parseFailures: number;
  skippedRules: number;
}

export interface RunResult {
  /** `failed` iff some file has an error-severity violation or did not parse */
  status: RunStatus;
  files: FileReport[];
  summary: RunSummary;
}

export interface RunOptions extends AnalysisOptions {
  fix?: boolean;
}

export type RunnerConfig = Pick<LintConfig, 'rules' | 'overrides' | 'onInvalidRule' | 'correction'>;

function summarize(violations: readonly Violation[], corrections: readonly CorrectionRecord[]): FileSummary {
  return {
    errors: violations.filter(v => v.severity === 'error').length,
    warnings: violations.filter(v => v.severity === 'warning').length,
    corrections: corrections.length,
  };
}

export class LintRunner {
  private readonly logger: Logger;
  private readonly resolver: ConfigResolver;
  private readonly detection: DetectionEngine;
  private readonly correction: CorrectionEngine;
  private readonly maxIterations: number;

  constructor(registry: RuleLookup, config: RunnerConfig, logger: Logger = createSilentLogger()) {
    this.logger = componentLogger(logger, 'runner');
    this.resolver = new ConfigResolver(registry, config, logger);
    this.detection = new DetectionEngine(logger);
    this.correction = new CorrectionEngine(logger);
    this.maxIterations = config.correction.maxIterations;
  }

  /**
   * Detect violations of every rule active for the file's path.
   */
  lintFile(input: LintInput, options: AnalysisOptions = {}): FileReport {
    const parsed = this.parse(input);
    if (!(parsed instanceof SourceFile)) return parsed;

    const skippedRules: SkippedRule[] = [];
    const active = this.resolver.activeRules(input.path);
    const { violations, traversalErrors } = this.detectAll(active, parsed, skippedRules, options);

    return {
      path: input.path,
      violations,
      corrections: [],
      traversalErrors,
      skippedRules,
      parseFailure: null,
      summary: summarize(violations, []),
    };
  }

  /**
   * Correct to a fixed point, then detect what remains in the corrected text.
   */
  correctFile(input: LintInput, options: AnalysisOptions = {}): FileReport {
    const parsed = this.parse(input);
    if (!(parsed instanceof SourceFile)) return parsed;

    const skippedRules: SkippedRule[] = [];
    const active = this.resolver.activeRules(input.path);
    const fixed = this.correction.correctToFixedPoint(active, parsed, {
      ...options,
      maxIterations: this.maxIterations,
      onRuleError: error => skippedRules.push(this.skip(input.path, error)),
    });

    const remaining = active.filter(({ rule }) =>
      skippedRules.every(skipped => skipped.ruleId !== rule.descriptor.identifier)
    );
    const detected = this.detectAll(remaining, fixed.file, skippedRules, options);

    return {
      path: input.path,
      violations: detected.violations,
      corrections: fixed.corrections,
      traversalErrors: [...fixed.traversalErrors, ...detected.traversalErrors],
      skippedRules,
      parseFailure: null,
      correctedText: fixed.file.text,
      converged: fixed.converged,
      summary: summarize(detected.violations, fixed.corrections),
    };
  }

  /**
   * Lint (or, with `fix`, correct) every file.
   */
  run(files: readonly LintInput[], options: RunOptions = {}): RunResult {
    const { fix = false, ...analysis } = options;
    const reports: FileReport[] = [];

    for (const input of files) {
      throwIfCancelled(analysis.signal);
      reports.push(fix ? this.correctFile(input, analysis) : this.lintFile(input, analysis));
    }

    const summary: RunSummary = {
      files: reports.length,
      errors: 0,
      warnings: 0,
      corrections: 0,
      parseFailures: 0,
      skippedRules: 0,
    };
    for (const report of reports) {
      summary.errors += report.summary.errors;
      summary.warnings += report.summary.warnings;
      summary.corrections += report.summary.corrections;
      summary.skippedRules += report.skippedRules.length;
      if (report.parseFailure !== null) summary.parseFailures++;
    }

    const status: RunStatus = summary.errors > 0 || summary.parseFailures > 0 ? 'failed' : 'passed';
    this.logger.info({ status, ...summary }, 'Run finished');
    return { status, files: reports, summary };
  }

  private parse(input: LintInput): SourceFile | FileReport {
    try {
      return SourceFile.parse(input.text, { path: input.path });
    } catch (err) {
      if (err instanceof AnalysisCancelledError) throw err;
      const parseFailure: ParseFailure =
        err instanceof ParseError
          ? { message: err.message, offset: err.offset }
          : { message: err instanceof Error ? err.message : String(err), offset: 0 };
      this.logger.warn({ path: input.path, offset: parseFailure.offset }, parseFailure.message);
      return {
        path: input.path,
        violations: [],
        corrections: [],
        traversalErrors: [],
        skippedRules: [],
        parseFailure,
        summary: { errors: 0, warnings: 0, corrections: 0 },
      };
    }
  }

  private detectAll(
    active: readonly ActiveRule[],
    file: SourceFile,
    skippedRules: SkippedRule[],
    options: AnalysisOptions
  ): { violations: Violation[]; traversalErrors: TraversalFailure[] } {
    const violations: Violation[] = [];
    const traversalErrors: TraversalFailure[] = [];

    for (const { rule, configuration } of active) {
      try {
        const result = this.detection.detect(rule, configuration, file, options);
        violations.push(...result.violations);
        traversalErrors.push(...result.traversalErrors);
      } catch (err) {
        if (err instanceof AnalysisCancelledError) throw err;
        const ruleId = rule.descriptor.identifier;
        const failure = err instanceof RuleExecutionError ? err : new RuleExecutionError(ruleId, err);
        skippedRules.push(this.skip(file.path ?? '(unnamed)', failure));
      }
    }

    violations.sort((a, b) => a.position - b.position || a.ruleId.localeCompare(b.ruleId));
    return { violations, traversalErrors };
  }

  private skip(path: string, error: RuleExecutionError): SkippedRule {
    this.logger.warn({ path, ruleId: error.ruleId }, error.message);
    return { ruleId: error.ruleId, reason: error.message };
  }
}
