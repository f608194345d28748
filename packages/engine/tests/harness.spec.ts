import { describe, it, expect } from 'vitest';
import type { RunnerId } from '@columnwave/shared';
import { createAnalyticalReference, parseHarnessConfig } from '@columnwave/core';
import type { ModelRef } from '@columnwave/core';
import type { SimulationHandle } from '../src/api/index.js';
import { runHarness } from '../src/harness/index.js';
import { formatCsvReport, formatMarkdownReport } from '../src/report/index.js';
import { FakeSimulationRunner } from './helpers/fakeRunner.js';
import { createSyntheticColumn, uniformTimes } from './helpers/syntheticColumn.js';

const reference = createAnalyticalReference(
  { youngModulus: 10000, poissonRatio: 0.2, density: 2.65 * 0.7 },
  { magnitude: -10 }
);
const V = reference.expectedParticleVelocity;

const config = parseHarnessConfig({
  version: 1,
  columnCases: [{ name: 'quad', model: { name: 'quad', directory: '/m/quad' }, probeNodes: [5] }],
  reflectionCases: [
    { name: 'stiff', model: { name: 'stiff', directory: '/m/stiff' }, node: 51 },
    { name: 'missing node', model: { name: 'stiff', directory: '/m/stiff' }, node: 52 },
  ],
});

/** Hands out a handle whose runner id cannot be read */
class UnidentifiedRunner extends FakeSimulationRunner {
  async run(model: ModelRef): Promise<SimulationHandle> {
    const handle = await super.run(model);
    return {
      ...handle,
      get runnerId(): RunnerId {
        throw new TypeError('runner id unavailable');
      },
    };
  }
}

function columnOutputs() {
  return createSyntheticColumn({
    height: 10,
    segments: 20,
    pWaveVelocity: reference.pWaveVelocity,
    particleVelocity: V,
    times: uniformTimes(0.005, 25),
  });
}

function createRunner(): FakeSimulationRunner {
  const { coordinates, series } = columnOutputs();
  const velocity = Array.from({ length: 33 }, (_, i) => V * Math.sin((Math.PI * i) / 16));
  return new FakeSimulationRunner({ coordinates, series, calculatedResult: { NODE_51: { VELOCITY_Y: velocity } } });
}

describe('runHarness', () => {
  it('gives every case one outcome and keeps going after a failure', async () => {
    const runner = createRunner();
    const summary = await runHarness(config, runner);

    expect(summary.outcomes.map((o) => [o.name, o.kind, o.passed])).toEqual([
      ['quad', 'column', true],
      ['stiff', 'reflection', true],
      ['missing node', 'reflection', false],
    ]);
    expect(summary.passed).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outcomes[2].error?.code).toBe('CONFIGURATION_ERROR');
    expect(runner.runs.map((m) => m.name)).toEqual(['quad', 'stiff', 'stiff']);
  });

  it('records a failed run as a simulation failure', async () => {
    const runner = new FakeSimulationRunner({ failWith: 'segfault' });
    const summary = await runHarness(parseHarnessConfig({ version: 1, columnCases: config.columnCases }), runner);

    expect(summary.outcomes[0].error).toEqual({
      code: 'SIMULATION_FAILURE',
      message: 'run failed for model quad: segfault',
      context: { step: 'run', model: { name: 'quad', directory: '/m/quad' } },
    });
  });

  it('records errors outside the harness taxonomy as unexpected', async () => {
    const runner = new UnidentifiedRunner(columnOutputs());
    const summary = await runHarness(parseHarnessConfig({ version: 1, columnCases: config.columnCases }), runner);

    expect(summary.failed).toBe(1);
    expect(summary.outcomes[0].error).toEqual({
      code: 'UNEXPECTED_ERROR',
      message: 'runner id unavailable',
      context: {},
    });
  });
});

describe('reports', () => {
  it('renders a markdown table', async () => {
    const summary = await runHarness(config, createRunner());
    const lines = formatMarkdownReport(summary, new Date('2026-01-02T03:04:05Z')).split('\n');

    expect(lines[0]).toBe('# Absorbing boundary validation');
    expect(lines[1]).toBe('Generated: 2026-01-02T03:04:05.000Z');
    expect(lines[3]).toBe('| Case | Kind | Check | Expected | Observed | Tolerance | Status |');
    expect(lines[5]).toBe('| quad | column | node 5 | -0.06965 | -0.06965 | ±0.005 | ✅ |');
    expect(lines).toContain('| stiff | reflection | index 8 | -0.06965 | -0.06965 | ±0.005 | ✅ |');
    expect(lines).toContain(
      '| missing node | reflection | CONFIGURATION_ERROR |  | Calculated result has no entry NODE_52 |  | ❌ |'
    );
    expect(lines[lines.length - 1]).toBe('**Summary:** 2/3 cases passed');
  });

  it('exports CSV', async () => {
    const summary = await runHarness(config, createRunner());
    const rows = formatCsvReport(summary).split('\n');

    expect(rows[0]).toBe('Case,Kind,Check,Expected,Observed,Tolerance,Passed');
    expect(rows[1]).toBe('quad,column,node 5,-0.06965,-0.06965,±0.005,PASS');
    expect(rows[rows.length - 1]).toBe(
      'missing node,reflection,CONFIGURATION_ERROR,,Calculated result has no entry NODE_52,,FAIL'
    );
    expect(rows).toHaveLength(1 + 1 + 5 + 1);
  });
});
