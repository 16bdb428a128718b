/**
 * Engine module exports.
 */

export * from './types.js';
// TraversalError is exported with the syntax module
export { RuleExecutionError, AnalysisCancelledError, throwIfCancelled } from './errors.js';
export * from './defineRule.js';
export * from './SourceFile.js';
export * from './DetectionEngine.js';
export * from './CorrectionEngine.js';
