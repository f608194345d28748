/**
 * Physical and harness constants
 */

import type { AxisName } from '../types/index.js';

// ============================================================================
// Elastic Constants
// ============================================================================

/** Poisson ratio upper bound (exclusive) - incompressible limit */
export const POISSON_RATIO_LIMIT = 0.5;

// ============================================================================
// Comparison Constants
// ============================================================================

/** Default agreement for analytical comparisons (decimal places) */
export const DEFAULT_DECIMAL_PLACES = 2;

/** Geometry epsilon for coordinate range checks */
export const GEOMETRY_EPSILON = 1e-6;

// ============================================================================
// Axes
// ============================================================================

/** Axis names indexed by direction */
export const AXIS_NAMES: readonly AxisName[] = ['x', 'y', 'z'] as const;

// ============================================================================
// Artifacts
// ============================================================================

/** Suffix of the GiD ASCII nodal result file written next to the model */
export const NODAL_RESULT_SUFFIX = '.post.res';

/** Suffix of the mesh file holding the node table */
export const MESH_SUFFIX = '.mdpa';

/** Name of the key-value result file written by the result output process */
export const CALCULATED_RESULT_FILE = 'calculated_result.json';

/** Prefix of node keys in the calculated result file */
export const NODE_KEY_PREFIX = 'NODE_';

/** Nodal variable used for arrival detection */
export const DEFAULT_ARRIVAL_VARIABLE = 'DISPLACEMENT';

/** Variable sampled in reflection mode */
export const DEFAULT_REFLECTION_VARIABLE = 'VELOCITY_Y';

/**
 * Output indices sampled in reflection mode.
 * Assumes the fixed output cadence of the stiff-boundary model: quarter periods
 * of the standing oscillation land eight outputs apart.
 */
export const REFLECTION_SAMPLE_INDICES = [0, 8, 16, 24, 32] as const;

// ============================================================================
// Reference Column
// ============================================================================

/** Soil column used by the absorbing boundary benchmark */
export const REFERENCE_COLUMN = {
  youngModulus: 10000,
  poissonRatio: 0.2,
  density: 2.65 * 0.7,
  load: -10,
  height: 10,
} as const;
