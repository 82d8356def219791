/**
 * Error taxonomy for workflow construction
 */

export type WorkflowErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DESIGN_ERROR'
  | 'CYCLE_DETECTED'
  | 'UNREACHABLE_NODE'
  | 'NO_ROOTS';

export class WorkflowError extends Error {
  constructor(
    public readonly code: WorkflowErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

/**
 * Malformed or missing catalogue entries. Never recovered locally.
 */
export class ConfigurationError extends WorkflowError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Unrecognized design name
 */
export class DesignError extends WorkflowError {
  constructor(public readonly design: string, message?: string) {
    super('DESIGN_ERROR', message ?? `Unrecognized design: ${design}`);
    this.name = 'DesignError';
  }
}

/**
 * A design that must be acyclic produced a cycle
 */
export class CycleError extends WorkflowError {
  constructor(public readonly cycle: string[]) {
    super('CYCLE_DETECTED', `Cycle detected: ${cycle.join(' → ')}`, { cycle });
    this.name = 'CycleError';
  }
}
