/**
 * Nodal time series produced by a simulation run
 */

import { isStrictlyIncreasing } from '@columnwave/shared';
import type { Vector3 } from '@columnwave/shared';
import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/** Values of one variable at one output time */
export interface TimeStep {
  readonly time: number;
  readonly values: ReadonlyMap<number, Vector3>;
}

/** Ordered output of one nodal variable; times strictly increasing */
export interface NodalTimeSeries {
  readonly variable: string;
  readonly steps: readonly TimeStep[];
}

/** One node's projection of a NodalTimeSeries */
export interface NodeSeries {
  readonly node: number;
  readonly times: readonly number[];
  readonly values: readonly Vector3[];
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Create a time series, sorting steps by time and rejecting duplicate times
 */
export function createNodalTimeSeries(variable: string, steps: readonly TimeStep[]): NodalTimeSeries {
  const sorted = [...steps].sort((a, b) => a.time - b.time);
  const times = sorted.map((s) => s.time);
  if (!isStrictlyIncreasing(times)) {
    throw new ConfigurationError(`Time series for ${variable} has duplicate or non-finite output times`, {
      variable,
      times,
    });
  }
  return { variable, steps: sorted };
}

/**
 * Extract one node's values over time.
 * Throws ConfigurationError when the series is empty or a step lacks the node.
 */
export function extractNodeSeries(series: NodalTimeSeries, node: number): NodeSeries {
  if (series.steps.length === 0) {
    throw new ConfigurationError(`Time series for ${series.variable} is empty`, {
      variable: series.variable,
      node,
    });
  }

  const times: number[] = [];
  const values: Vector3[] = [];
  for (const step of series.steps) {
    const value = step.values.get(node);
    if (!value) {
      throw new ConfigurationError(`Node ${node} has no ${series.variable} value at t = ${step.time}`, {
        variable: series.variable,
        node,
        time: step.time,
      });
    }
    times.push(step.time);
    values.push(value);
  }
  return { node, times, values };
}
