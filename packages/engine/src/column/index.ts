/**
 * Column validation - absorbing boundary check on a 1D column.
 *
 * A constant load at the top of the column sends a P-wave down toward the
 * absorbing base. Behind the wavefront every node should move at the
 * impedance velocity q / (vp·ρ). For each probe node we:
 *
 *   1. measure its distance from the loaded top along the propagation axis,
 *   2. predict the arrival time distance / vp,
 *   3. take the first output strictly after that time,
 *   4. estimate the velocity as the secant from there to the final output,
 *   5. compare with the analytical particle velocity.
 *
 * If the boundary reflects, the returning wave changes the late-time slope and
 * the secant drifts away from the analytical value.
 */

import type { Direction, ValidationWarning } from '@columnwave/shared';
import {
  ArrivalNotFoundError,
  InsufficientSamplesError,
  ToleranceViolationError,
  createAnalyticalReference,
  extractNodeSeries,
  probeDistance,
  travelTime,
} from '@columnwave/core';
import type {
  AnalyticalReference,
  ColumnCase,
  NodalCoordinates,
  NodalTimeSeries,
  NodeSeries,
} from '@columnwave/core';
import type { ColumnValidationReport, NodeVerdict, SimulationRunner } from '../api/index.js';
import { callRunner, createCaseHash, createVerdict } from '../api/index.js';
import { estimatePostArrivalVelocity, findFirstIndexAfter } from '../arrival/index.js';

// ============================================================================
// Per-node Verification
// ============================================================================

/** Attach the probe node to an analysis error raised below it */
function withNode(err: unknown, node: number): unknown {
  if (err instanceof ArrivalNotFoundError) {
    return new ArrivalNotFoundError(`Node ${node}: ${err.message}`, { ...err.context, node });
  }
  if (err instanceof InsufficientSamplesError) {
    return new InsufficientSamplesError(err.message, { ...err.context, node });
  }
  return err;
}

/** Locate the arrival sample and estimate the velocity behind it */
function measureArrival(
  nodeSeries: NodeSeries,
  expectedArrivalTime: number,
  direction: Direction
): { arrivalIndex: number; observed: number } {
  try {
    const arrivalIndex = findFirstIndexAfter(nodeSeries.times, expectedArrivalTime);
    return { arrivalIndex, observed: estimatePostArrivalVelocity(nodeSeries, arrivalIndex, direction) };
  } catch (err) {
    throw withNode(err, nodeSeries.node);
  }
}

/**
 * Check every probe node of an already-run column.
 *
 * Analysis errors (missing node, arrival outside the recording, too few
 * samples) are thrown at once. Tolerance failures are collected, unless
 * `failFast` is set, in which case the first one throws.
 */
export function verifyProbeNodes(
  reference: AnalyticalReference,
  coordinates: NodalCoordinates,
  series: NodalTimeSeries,
  columnCase: ColumnCase
): { verdicts: NodeVerdict[]; warnings: ValidationWarning[] } {
  const { direction, decimalPlaces } = columnCase;
  const verdicts: NodeVerdict[] = [];
  const warnings: ValidationWarning[] = [];

  for (const node of columnCase.probeNodes) {
    const distance = probeDistance(coordinates, node, direction, columnCase.geometry.height);
    const expectedArrivalTime = travelTime(distance, reference.pWaveVelocity);
    const nodeSeries = extractNodeSeries(series, node);

    const { arrivalIndex, observed } = measureArrival(nodeSeries, expectedArrivalTime, direction);

    if (arrivalIndex === 0 && expectedArrivalTime < nodeSeries.times[0]) {
      warnings.push({
        code: 'ARRIVAL_BEFORE_RECORDING',
        message: `Node ${node}: wave arrives at t = ${expectedArrivalTime}, before the first output`,
        severity: 'warning',
        context: { node, expectedArrivalTime, firstTime: nodeSeries.times[0] },
      });
    }
    if (arrivalIndex === nodeSeries.times.length - 2) {
      warnings.push({
        code: 'SHORT_POST_ARRIVAL_WINDOW',
        message: `Node ${node}: only two outputs after arrival`,
        severity: 'info',
        context: { node, arrivalIndex },
      });
    }

    const verdict: NodeVerdict = {
      ...createVerdict(`node ${node}`, observed, reference.expectedParticleVelocity, decimalPlaces),
      node,
      distance,
      expectedArrivalTime,
      arrivalIndex,
      arrivalTime: nodeSeries.times[arrivalIndex],
    };
    verdicts.push(verdict);

    if (columnCase.failFast && !verdict.passed) {
      throw new ToleranceViolationError(columnCase.name, [verdict]);
    }
  }

  return { verdicts, warnings };
}

// ============================================================================
// Orchestration
// ============================================================================

/**
 * Run a column model and check the post-arrival velocity at its probe nodes
 */
export async function validateColumn(
  runner: SimulationRunner,
  columnCase: ColumnCase
): Promise<ColumnValidationReport> {
  const start = performance.now();
  const reference = createAnalyticalReference(columnCase.material, columnCase.load);

  const handle = await callRunner('run', columnCase.model, () => runner.run(columnCase.model));
  const coordinates = await callRunner('read coordinates', columnCase.model, () =>
    runner.getNodalCoordinates(handle)
  );
  const series = await callRunner('read time series', columnCase.model, () =>
    runner.getNodalTimeSeries(handle, columnCase.variable)
  );
  const simulationDone = performance.now();

  const { verdicts, warnings } = verifyProbeNodes(reference, coordinates, series, columnCase);

  return {
    kind: 'column',
    caseName: columnCase.name,
    caseHash: createCaseHash(columnCase),
    runnerId: handle.runnerId,
    reference,
    verdicts,
    passed: verdicts.every((v) => v.passed),
    timings: {
      totalMs: performance.now() - start,
      simulationMs: simulationDone - start,
      analysisMs: performance.now() - simulationDone,
    },
    warnings,
  };
}

/**
 * Throw ToleranceViolationError naming every failing node
 */
export function assertColumnReport(report: ColumnValidationReport): void {
  const failing = report.verdicts.filter((v) => !v.passed);
  if (failing.length > 0) {
    throw new ToleranceViolationError(report.caseName, failing);
  }
}
