/**
 * Errors raised while running rules.
 */

export { TraversalError } from '../syntax/nodes.js';

/**
 * Any failure inside a rule handler other than a TraversalError.
 */
export class RuleExecutionError extends Error {
  constructor(
    public readonly ruleId: string,
    cause: unknown
  ) {
    super(`Rule '${ruleId}' failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'RuleExecutionError';
  }
}

/**
 * Raised between node visits once the caller's AbortSignal fires.
 */
export class AnalysisCancelledError extends Error {
  constructor(reason?: unknown) {
    super(reason === undefined ? 'Analysis cancelled' : `Analysis cancelled: ${String(reason)}`);
    this.name = 'AnalysisCancelledError';
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    throw new AnalysisCancelledError(signal.reason);
  }
}
