import type { DiagnosticResult } from './result.js';

/**
 * Reason a check declined to run. Carries a stable message id and the
 * evaluated text shown to the user, plus the underlying error if there was one.
 */
export class DiagnosticError extends Error {
  readonly id: string;

  constructor(id: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DiagnosticError';
    this.id = id;
  }
}

export type CanRunResult =
  | { canRun: true }
  | { canRun: false; error: DiagnosticError };

export interface Check {
  // Stable identifier; also the name of the result it produces.
  readonly name: string;
  readonly description: string;

  // Precondition gate. Must be free of side effects and safe to call repeatedly.
  canRun(): Promise<CanRunResult>;

  // Run the check. Never rejects: every failure becomes a finding in the result.
  inspect(): Promise<DiagnosticResult>;
}

export const RUNNABLE: CanRunResult = { canRun: true };

export function cannotRun(id: string, message: string, cause?: unknown): CanRunResult {
  return { canRun: false, error: new DiagnosticError(id, message, cause) };
}
