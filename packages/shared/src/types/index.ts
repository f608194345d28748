/**
 * Shared type definitions
 */

// ============================================================================
// Axis & Direction Types
// ============================================================================

/** Spatial direction index: 0 = x, 1 = y, 2 = z */
export type Direction = 0 | 1 | 2;

/** Axis names indexed by direction */
export type AxisName = 'x' | 'y' | 'z';

/** Nodal vector value (x, y, z components) */
export type Vector3 = readonly [number, number, number];

// ============================================================================
// Runner Types
// ============================================================================

/** Runner identifiers */
export type RunnerId = 'recorded' | 'process' | 'in-memory';

// ============================================================================
// Report Types
// ============================================================================

/** Warning severity levels */
export type WarningSeverity = 'info' | 'warning' | 'error';

/** Non-fatal finding attached to a validation report */
export interface ValidationWarning {
  code: string;
  message: string;
  severity: WarningSeverity;
  context?: Record<string, unknown>;
}

/** Timing information for a single validation case */
export interface ValidationTimings {
  totalMs: number;
  simulationMs?: number;
  analysisMs?: number;
}
