/**
 * Error taxonomy for the validation harness.
 *
 * Every error carries a stable `code` and a `context` record, the same shape
 * as a `ValidationWarning`, so a failed case can be reported with the numbers
 * that caused it.
 */

/** Error codes */
export type HarnessErrorCode =
  | 'DOMAIN_ERROR'
  | 'ARRIVAL_NOT_FOUND'
  | 'INSUFFICIENT_SAMPLES'
  | 'SIMULATION_FAILURE'
  | 'TOLERANCE_VIOLATION'
  | 'CONFIGURATION_ERROR';

/** Numeric comparison result for one node or one sampled index */
export interface Verdict {
  label: string;
  observed: number;
  expected: number;
  difference: number;
  decimalPlaces: number;
  passed: boolean;
}

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    code: HarnessErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Invalid material parameters or load */
export class DomainError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('DOMAIN_ERROR', message, context);
  }
}

/** Expected arrival time is at or after the end of the recording window */
export class ArrivalNotFoundError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('ARRIVAL_NOT_FOUND', message, context);
  }
}

/** Not enough samples after the arrival index for a secant estimate */
export class InsufficientSamplesError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('INSUFFICIENT_SAMPLES', message, context);
  }
}

/** External simulation aborted or left no output artifact */
export class SimulationFailureError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super('SIMULATION_FAILURE', message, context, cause === undefined ? undefined : { cause });
  }
}

/** Malformed case configuration or simulation output */
export class ConfigurationError extends HarnessError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super('CONFIGURATION_ERROR', message, context, cause === undefined ? undefined : { cause });
  }
}

/** Computed values differ from the analytical reference */
export class ToleranceViolationError extends HarnessError {
  readonly verdicts: readonly Verdict[];

  constructor(caseName: string, verdicts: readonly Verdict[]) {
    const lines = verdicts.map(
      (v) => `${v.label}: expected ${v.expected}, observed ${v.observed} (|diff| ${v.difference})`
    );
    super('TOLERANCE_VIOLATION', `${caseName}: ${verdicts.length} value(s) out of tolerance\n${lines.join('\n')}`, {
      caseName,
      failing: verdicts.map((v) => v.label),
    });
    this.verdicts = verdicts;
  }
}

/** Narrow an unknown thrown value */
export function isHarnessError(value: unknown): value is HarnessError {
  return value instanceof HarnessError;
}
