/**
 * Harness driver - runs every case of a manifest, one after another
 */

import { isHarnessError } from '@columnwave/core';
import type { HarnessConfig, HarnessErrorCode } from '@columnwave/core';
import type { SimulationRunner, ValidationReport } from '../api/index.js';
import { validateColumn } from '../column/index.js';
import { validateReflection } from '../reflection/index.js';

/** Single pass/fail outcome of one case */
export interface CaseOutcome {
  name: string;
  kind: 'column' | 'reflection';
  passed: boolean;
  report?: ValidationReport;
  error?: {
    code: HarnessErrorCode | 'UNEXPECTED_ERROR';
    message: string;
    context: Record<string, unknown>;
  };
}

/** Outcomes of a whole manifest */
export interface HarnessSummary {
  name: string;
  outcomes: CaseOutcome[];
  passed: number;
  failed: number;
}

function describeError(err: unknown): NonNullable<CaseOutcome['error']> {
  if (isHarnessError(err)) {
    return { code: err.code, message: err.message, context: err.context };
  }
  return {
    code: 'UNEXPECTED_ERROR',
    message: err instanceof Error ? err.message : String(err),
    context: {},
  };
}

async function runCase(
  name: string,
  kind: CaseOutcome['kind'],
  validate: () => Promise<ValidationReport>
): Promise<CaseOutcome> {
  try {
    const report = await validate();
    return { name, kind, passed: report.passed, report };
  } catch (err) {
    // A thrown error is this case's failure; later cases still run.
    return { name, kind, passed: false, error: describeError(err) };
  }
}

/**
 * Run all column cases, then all reflection cases
 */
export async function runHarness(config: HarnessConfig, runner: SimulationRunner): Promise<HarnessSummary> {
  const outcomes: CaseOutcome[] = [];

  for (const columnCase of config.columnCases) {
    outcomes.push(await runCase(columnCase.name, 'column', () => validateColumn(runner, columnCase)));
  }
  for (const reflectionCase of config.reflectionCases) {
    outcomes.push(await runCase(reflectionCase.name, 'reflection', () => validateReflection(runner, reflectionCase)));
  }

  const passed = outcomes.filter((o) => o.passed).length;
  return { name: config.name, outcomes, passed, failed: outcomes.length - passed };
}
