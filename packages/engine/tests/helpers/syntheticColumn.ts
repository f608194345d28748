/**
 * Analytic 1D column output for tests.
 *
 * Nodes sit evenly from the base (0) to the top (height). A step load at the
 * top makes every node move at `particleVelocity` once the wavefront has
 * travelled (height - y) at `pWaveVelocity`. With `reflect` the base acts as
 * a rigid wall and the returning wave doubles the velocity after it passes.
 */

import { createNodalCoordinates, createNodalTimeSeries } from '@columnwave/core';
import type { NodalCoordinates, NodalTimeSeries, TimeStep } from '@columnwave/core';
import type { Vector3 } from '@columnwave/shared';

export interface SyntheticColumnOptions {
  height: number;
  segments: number;
  pWaveVelocity: number;
  particleVelocity: number;
  times: readonly number[];
  reflect?: boolean;
  /** Extra displacement added at output k, node position y */
  ripple?: (k: number, y: number) => number;
  variable?: string;
}

export interface SyntheticColumn {
  coordinates: NodalCoordinates;
  series: NodalTimeSeries;
  /** Node id at a height, for nodes that sit on a segment boundary */
  nodeAt(y: number): number;
}

/** t_k = k·dt for k = 0..count-1 */
export function uniformTimes(dt: number, count: number): number[] {
  return Array.from({ length: count }, (_, k) => k * dt);
}

/** Displacement of a point at height y */
export function columnDisplacement(
  y: number,
  t: number,
  options: Pick<SyntheticColumnOptions, 'height' | 'pWaveVelocity' | 'particleVelocity' | 'reflect'>
): number {
  const { height, pWaveVelocity, particleVelocity, reflect } = options;
  const incident = Math.max(0, t - (height - y) / pWaveVelocity);
  const reflected = reflect ? Math.max(0, t - (height + y) / pWaveVelocity) : 0;
  return particleVelocity * (incident + reflected);
}

export function createSyntheticColumn(options: SyntheticColumnOptions): SyntheticColumn {
  const { height, segments, times } = options;
  const positions = Array.from({ length: segments + 1 }, (_, i) => (height * i) / segments);

  const coordinates = createNodalCoordinates(positions.map((y, i) => [i + 1, 0, y, 0] as const));

  const steps: TimeStep[] = times.map((time, k) => {
    const values = new Map<number, Vector3>();
    positions.forEach((y, i) => {
      const u = columnDisplacement(y, time, options) + (options.ripple?.(k, y) ?? 0);
      values.set(i + 1, [0, u, 0]);
    });
    return { time, values };
  });

  return {
    coordinates,
    series: createNodalTimeSeries(options.variable ?? 'DISPLACEMENT', steps),
    nodeAt: (y) => Math.round((y / height) * segments) + 1,
  };
}
