/**
 * Reflection validation - a very stiff boundary should reflect the wave fully.
 *
 * At the probe node the incident and reflected waves superpose into an
 * oscillation sampled at fixed output indices. The expected sequence is
 * [0, +V, 0, -V, 0] with V the single-pass particle velocity.
 */

import { NODE_KEY_PREFIX } from '@columnwave/shared';
import type { ValidationWarning } from '@columnwave/shared';
import { ConfigurationError, ToleranceViolationError, createAnalyticalReference } from '@columnwave/core';
import type { CalculatedResult, ReflectionCase, Verdict } from '@columnwave/core';
import type { ReflectionValidationReport, SimulationRunner } from '../api/index.js';
import { callRunner, createCaseHash, createVerdict } from '../api/index.js';

/**
 * Expected total-reflection sequence for particle velocity V
 */
export function reflectionPattern(particleVelocity: number): number[] {
  return [0, particleVelocity, 0, -particleVelocity, 0];
}

/**
 * Read `result["NODE_<node>"][variable]` at the given indices
 */
export function sampleCalculatedResult(
  result: CalculatedResult,
  node: number,
  variable: string,
  indices: readonly number[]
): number[] {
  const key = `${NODE_KEY_PREFIX}${node}`;
  const nodeResult = result[key];
  if (!nodeResult) {
    throw new ConfigurationError(`Calculated result has no entry ${key}`, { node, available: Object.keys(result) });
  }
  const values = nodeResult[variable];
  if (!values) {
    throw new ConfigurationError(`Calculated result ${key} has no ${variable}`, {
      node,
      variable,
      available: Object.keys(nodeResult),
    });
  }

  return indices.map((index) => {
    if (index >= values.length) {
      throw new ConfigurationError(`${key}.${variable} has ${values.length} values, index ${index} requested`, {
        node,
        variable,
        index,
        length: values.length,
      });
    }
    return values[index];
  });
}

/**
 * Element-wise comparison of sampled and expected sequences
 */
export function compareSequences(
  indices: readonly number[],
  observed: readonly number[],
  expected: readonly number[],
  decimalPlaces: number
): Verdict[] {
  if (observed.length !== expected.length || indices.length !== expected.length) {
    throw new ConfigurationError(
      `Sequence lengths differ: ${indices.length} indices, ${observed.length} observed, ${expected.length} expected`,
      { indices: indices.length, observed: observed.length, expected: expected.length }
    );
  }
  return expected.map((value, i) => createVerdict(`index ${indices[i]}`, observed[i], value, decimalPlaces));
}

/**
 * Run the stiff-boundary model and compare the sampled output with the
 * total-reflection pattern
 */
export async function validateReflection(
  runner: SimulationRunner,
  reflectionCase: ReflectionCase
): Promise<ReflectionValidationReport> {
  const start = performance.now();
  const reference = createAnalyticalReference(reflectionCase.material, reflectionCase.load);
  const expected = reflectionPattern(reference.expectedParticleVelocity);
  if (reflectionCase.sampleIndices.length !== expected.length) {
    throw new ConfigurationError(
      `Reflection case ${reflectionCase.name} samples ${reflectionCase.sampleIndices.length} indices, pattern has ${expected.length}`,
      { sampleIndices: reflectionCase.sampleIndices }
    );
  }

  const handle = await callRunner('run', reflectionCase.model, () => runner.run(reflectionCase.model));
  const result = await callRunner('read calculated result', reflectionCase.model, () =>
    runner.getCalculatedResult(handle)
  );
  const simulationDone = performance.now();

  const sampled = sampleCalculatedResult(result, reflectionCase.node, reflectionCase.variable, reflectionCase.sampleIndices);
  const verdicts = compareSequences(reflectionCase.sampleIndices, sampled, expected, reflectionCase.decimalPlaces);

  const warnings: ValidationWarning[] = [];
  const indices = reflectionCase.sampleIndices;
  const strides = new Set(indices.slice(1).map((index, i) => index - indices[i]));
  if (strides.size > 1) {
    warnings.push({
      code: 'UNEVEN_SAMPLE_STRIDE',
      message: `Sample indices ${indices.join(', ')} are not evenly spaced`,
      severity: 'warning',
      context: { sampleIndices: indices },
    });
  }

  return {
    kind: 'reflection',
    caseName: reflectionCase.name,
    caseHash: createCaseHash(reflectionCase),
    runnerId: handle.runnerId,
    reference,
    node: reflectionCase.node,
    variable: reflectionCase.variable,
    sampleIndices: [...indices],
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
 * Throw ToleranceViolationError naming every failing index
 */
export function assertReflectionReport(report: ReflectionValidationReport): void {
  const failing = report.verdicts.filter((v) => !v.passed);
  if (failing.length > 0) {
    throw new ToleranceViolationError(report.caseName, failing);
  }
}
