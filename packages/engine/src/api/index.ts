/**
 * Harness API - collaborator contract and report types
 */

import { almostEqual } from '@columnwave/shared';
import type { RunnerId, ValidationTimings, ValidationWarning } from '@columnwave/shared';
import { HarnessError, SimulationFailureError } from '@columnwave/core';
import type {
  AnalyticalReference,
  CalculatedResult,
  ColumnCase,
  ModelRef,
  NodalCoordinates,
  NodalTimeSeries,
  ReflectionCase,
  Verdict,
} from '@columnwave/core';

// ============================================================================
// Simulation Collaborator
// ============================================================================

/** Result artifacts of one simulation run, resolved by the runner */
export interface SimulationArtifacts {
  /** Mesh holding the node table, if the runner can provide coordinates */
  mesh?: string;
  /** Nodal time series (GiD ASCII), if the model writes one */
  nodalResults?: string;
  /** Key-value result file, if the model writes one */
  calculatedResult?: string;
}

/** Handle to a completed simulation run */
export interface SimulationHandle {
  runId: string;
  runnerId: RunnerId;
  model: ModelRef;
  artifacts: SimulationArtifacts;
}

/**
 * External simulation engine.
 * `run` executes a model to completion; a solver failure rejects and is fatal
 * to the validation case. Runs are never retried.
 */
export interface SimulationRunner {
  /** Execute the model and resolve its result artifacts */
  run(model: ModelRef): Promise<SimulationHandle>;

  /** Node id -> (x, y, z) of the run's mesh */
  getNodalCoordinates(handle: SimulationHandle): Promise<NodalCoordinates>;

  /** Ordered nodal output of one variable */
  getNodalTimeSeries(handle: SimulationHandle, variable: string): Promise<NodalTimeSeries>;

  /** Pre-aggregated key-value result file */
  getCalculatedResult(handle: SimulationHandle): Promise<CalculatedResult>;

  /** Get runner identifier */
  getRunnerId(): RunnerId;

  /** Dispose/cleanup resources */
  dispose(): void;
}

// ============================================================================
// Report Types
// ============================================================================

/** Verdict for one probe node of a column case */
export interface NodeVerdict extends Verdict {
  node: number;
  distance: number;
  expectedArrivalTime: number;
  arrivalIndex: number;
  arrivalTime: number;
}

/** Outcome of a column case */
export interface ColumnValidationReport {
  kind: 'column';
  caseName: string;
  caseHash: string;
  runnerId: RunnerId;
  reference: AnalyticalReference;
  verdicts: NodeVerdict[];
  passed: boolean;
  timings: ValidationTimings;
  warnings: ValidationWarning[];
}

/** Outcome of a reflection case */
export interface ReflectionValidationReport {
  kind: 'reflection';
  caseName: string;
  caseHash: string;
  runnerId: RunnerId;
  reference: AnalyticalReference;
  node: number;
  variable: string;
  sampleIndices: number[];
  verdicts: Verdict[];
  passed: boolean;
  timings: ValidationTimings;
  warnings: ValidationWarning[];
}

/** Union of all reports */
export type ValidationReport = ColumnValidationReport | ReflectionValidationReport;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a case hash so reports can be matched to the configuration that produced them
 */
export function createCaseHash(validationCase: ColumnCase | ReflectionCase): string {
  return hashObject(normalizeForHash(validationCase));
}

/** Normalize an object for hashing */
function normalizeForHash(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj !== 'object') return obj;
  if (Array.isArray(obj)) return obj.map(normalizeForHash);

  const sorted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj).sort(([a], [b]) => a.localeCompare(b))) {
    sorted[key] = normalizeForHash(value);
  }
  return sorted;
}

/** Simple hash function for objects */
function hashObject(obj: unknown): string {
  const str = JSON.stringify(obj);
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash;
  }
  return Math.abs(hash).toString(36);
}

/**
 * Compare an observed value with its analytical counterpart
 */
export function createVerdict(label: string, observed: number, expected: number, decimalPlaces: number): Verdict {
  return {
    label,
    observed,
    expected,
    difference: Math.abs(observed - expected),
    decimalPlaces,
    passed: almostEqual(observed, expected, decimalPlaces),
  };
}

/** Await a collaborator call, turning foreign failures into SimulationFailureError */
export async function callRunner<T>(step: string, model: ModelRef, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof HarnessError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new SimulationFailureError(`${step} failed for model ${model.name}: ${reason}`, { step, model }, err);
  }
}
