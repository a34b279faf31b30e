/**
 * Pipeline errors — every fatal error names its phase and the offending unit(s).
 */

export type PipelinePhase = 'config' | 'diff' | 'classify' | 'validate' | 'assemble' | 'promote';

export type ConflictRule =
  | 'dual-source'
  | 'dual-staged'
  | 'dual-changeset'
  | 'missing-descriptor'
  | 'unresolved';

export interface UnitConflict {
  unitName: string;
  rule: ConflictRule;
  message: string;
}

/**
 * Base class for all errors that abort a run
 */
export class PipelineError extends Error {
  readonly phase: PipelinePhase;

  constructor(message: string, phase: PipelinePhase) {
    super(message);
    this.name = 'PipelineError';
    this.phase = phase;
  }

  /** One diagnostic line per offending unit */
  diagnostics(): string[] {
    return [`[${this.phase}] ${this.message}`];
  }
}

/**
 * Invalid invocation (missing revision, empty target label, ...)
 */
export class UsageError extends PipelineError {
  constructor(message: string) {
    super(message, 'config');
    this.name = 'UsageError';
  }
}

/**
 * A unit resolves to two incompatible representations, or to none
 */
export class ConflictError extends PipelineError {
  readonly conflicts: UnitConflict[];

  constructor(conflicts: UnitConflict[]) {
    const units = [...new Set(conflicts.map((c) => c.unitName))];
    super(`Conflicting static resources: ${units.join(', ')}`, 'validate');
    this.name = 'ConflictError';
    this.conflicts = conflicts;
  }

  override diagnostics(): string[] {
    return this.conflicts.map((c) => `[${this.phase}] ${c.unitName}: ${c.message}`);
  }
}

/**
 * Expected source content vanished between classification and assembly
 */
export class MissingSourceError extends PipelineError {
  readonly unitName: string;
  readonly path: string;

  constructor(unitName: string, path: string, phase: PipelinePhase = 'assemble') {
    super(`${unitName}: source not found at ${path}`, phase);
    this.name = 'MissingSourceError';
    this.unitName = unitName;
    this.path = path;
  }
}

/**
 * A copy, archive or git primitive failed
 */
export class ExternalToolError extends PipelineError {
  readonly unitName: string | null;
  readonly operation: string;

  constructor(
    operation: string,
    phase: PipelinePhase,
    unitName: string | null,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const subject = unitName ? `${unitName}: ` : '';
    super(`${subject}${operation} failed: ${reason}`, phase);
    this.name = 'ExternalToolError';
    this.unitName = unitName;
    this.operation = operation;
    this.cause = cause;
  }
}

export type UnitFailure = MissingSourceError | ExternalToolError;

/**
 * One or more units could not be assembled; nothing was promoted
 */
export class AssemblyError extends PipelineError {
  readonly failures: UnitFailure[];

  constructor(failures: UnitFailure[]) {
    super(`${failures.length} static resource(s) failed to assemble`, 'assemble');
    this.name = 'AssemblyError';
    this.failures = failures;
  }

  override diagnostics(): string[] {
    return this.failures.flatMap((f) => f.diagnostics());
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
