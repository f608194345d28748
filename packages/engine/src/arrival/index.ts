/**
 * Wave arrival search and post-arrival velocity estimation
 */

import { component, isValidNumber } from '@columnwave/shared';
import type { Direction } from '@columnwave/shared';
import { ArrivalNotFoundError, InsufficientSamplesError } from '@columnwave/core';
import type { NodeSeries } from '@columnwave/core';

// ============================================================================
// Time-Series Locator
// ============================================================================

/**
 * Index of the first sample strictly after `target`.
 *
 * `times` must be strictly increasing; spacing may be irregular. A sample
 * exactly at `target` is skipped: at the theoretical arrival instant the
 * discretized signal can still be in its pre-arrival state.
 *
 * @throws ArrivalNotFoundError when no sample lies after `target`
 */
export function findFirstIndexAfter(times: readonly number[], target: number): number {
  const last = times.length - 1;
  if (last < 0 || !isValidNumber(target) || target >= times[last]) {
    throw new ArrivalNotFoundError(
      last < 0
        ? 'Arrival search on an empty recording'
        : `Expected arrival at t = ${target} is not before the end of the recording (t = ${times[last]})`,
      {
        target,
        windowStart: last < 0 ? null : times[0],
        windowEnd: last < 0 ? null : times[last],
      }
    );
  }

  let lo = 0;
  let hi = last;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (times[mid] > target) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

// ============================================================================
// Arrival Velocity Estimator
// ============================================================================

/**
 * Secant slope from the arrival sample to the last sample:
 * (u(t_last) - u(t_arrival)) / (t_last - t_arrival)
 *
 * Spanning the whole post-arrival window averages out the oscillation right
 * behind the wavefront.
 *
 * @throws InsufficientSamplesError unless at least one sample follows `arrivalIndex`
 */
export function estimatePostArrivalVelocity(series: NodeSeries, arrivalIndex: number, direction: Direction): number {
  const count = Math.min(series.times.length, series.values.length);
  if (!Number.isInteger(arrivalIndex) || arrivalIndex < 0 || arrivalIndex >= count - 1) {
    throw new InsufficientSamplesError(
      `Node ${series.node}: need a sample after index ${arrivalIndex}, series has ${count}`,
      { node: series.node, arrivalIndex, sampleCount: count }
    );
  }

  const last = count - 1;
  const t1 = series.times[arrivalIndex];
  const t2 = series.times[last];
  const dt = t2 - t1;
  if (dt === 0) {
    throw new InsufficientSamplesError(`Node ${series.node}: arrival and last sample share t = ${t1}`, {
      node: series.node,
      arrivalIndex,
      time: t1,
    });
  }

  return (component(series.values[last], direction) - component(series.values[arrivalIndex], direction)) / dt;
}
