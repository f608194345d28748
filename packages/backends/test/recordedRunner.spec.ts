import { writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  SimulationFailureError,
  createAnalyticalReference,
  createColumnCase,
  createReflectionCase,
  getDefaultMaterial,
} from '@columnwave/core';
import { validateColumn, validateReflection } from '@columnwave/engine';
import { readCalculatedResult } from '../src/artifacts.js';
import { RecordedSimulationRunner } from '../src/recordedRunner.js';
import { copyFixtures, fixtureModel, removeDir } from './helpers/fixtures.js';

const V = createAnalyticalReference(getDefaultMaterial(), { magnitude: -10 }).expectedParticleVelocity;

// ============================================================================
// Artifact Resolution
// ============================================================================

describe('RecordedSimulationRunner.run', () => {
  it('resolves the artifacts present in the model directory', async () => {
    const runner = new RecordedSimulationRunner();
    const model = fixtureModel('lysmer_column');
    const handle = await runner.run(model);

    expect(handle.runId).toBe('recorded-1');
    expect(handle.runnerId).toBe('recorded');
    expect(handle.artifacts).toEqual({
      mesh: join(model.directory, 'lysmer_column.mdpa'),
      nodalResults: join(model.directory, 'lysmer_column.post.res'),
    });
  });

  it('numbers successive runs', async () => {
    const runner = new RecordedSimulationRunner();
    await runner.run(fixtureModel('lysmer_column'));
    const second = await runner.run(fixtureModel('lysmer_stiff_column'));
    expect(second.runId).toBe('recorded-2');
    expect(second.artifacts.mesh).toBeUndefined();
  });

  it('fails when the model left no result artifact', async () => {
    const runner = new RecordedSimulationRunner();
    const model = fixtureModel('no_output');
    await expect(runner.run(model)).rejects.toThrow(SimulationFailureError);
    await expect(runner.run(model)).rejects.toThrow(`Model no_output left no result artifact in ${model.directory}`);
  });

  it('fails when asked for an artifact the run did not write', async () => {
    const runner = new RecordedSimulationRunner();
    const column = await runner.run(fixtureModel('lysmer_column'));
    const stiff = await runner.run(fixtureModel('lysmer_stiff_column'));

    await expect(runner.getCalculatedResult(column)).rejects.toThrow('Model lysmer_column wrote no calculated result');
    await expect(runner.getNodalCoordinates(stiff)).rejects.toThrow('Model lysmer_stiff_column wrote no mesh');
    await expect(runner.getNodalTimeSeries(stiff, 'DISPLACEMENT')).rejects.toThrow(
      'Model lysmer_stiff_column wrote no nodal results'
    );
  });
});

// ============================================================================
// Reading
// ============================================================================

describe('RecordedSimulationRunner readers', () => {
  it('reads coordinates and the displacement series', async () => {
    const runner = new RecordedSimulationRunner();
    const handle = await runner.run(fixtureModel('lysmer_column'));

    const coords = await runner.getNodalCoordinates(handle);
    const series = await runner.getNodalTimeSeries(handle, 'DISPLACEMENT');
    expect(coords.get(4)).toEqual([0, 7.5, 0]);
    expect(series.steps).toHaveLength(20);
  });

  it('reads the calculated result', async () => {
    const runner = new RecordedSimulationRunner();
    const handle = await runner.run(fixtureModel('lysmer_stiff_column'));
    const result = await runner.getCalculatedResult(handle);
    expect(Object.keys(result)).toEqual(['NODE_1', 'NODE_51']);
    expect(result.NODE_51.VELOCITY_Y).toHaveLength(33);
  });
});

describe('readCalculatedResult', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await removeDir(dir);
    dir = undefined;
  });

  it('rejects a file that is not JSON', async () => {
    dir = await copyFixtures();
    const path = join(dir, 'broken.json');
    await writeFile(path, '{"NODE_1": ');
    await expect(readCalculatedResult(path)).rejects.toThrow(ConfigurationError);
  });

  it('rejects keys that do not name a node', async () => {
    dir = await copyFixtures();
    const path = join(dir, 'keys.json');
    await writeFile(path, JSON.stringify({ node1: { VELOCITY_Y: [0] } }));
    await expect(readCalculatedResult(path)).rejects.toThrow('node1: expected a key of the form NODE_<id>');
  });

  it('turns a missing file into a simulation failure', async () => {
    dir = await copyFixtures();
    await expect(readCalculatedResult(join(dir, 'absent.json'))).rejects.toThrow(SimulationFailureError);
  });
});

// ============================================================================
// Validation Over Recorded Artifacts
// ============================================================================

describe('validation over recorded artifacts', () => {
  it('column with absorbing base matches the analytical velocity at every probe', async () => {
    const runner = new RecordedSimulationRunner();
    const report = await validateColumn(
      runner,
      createColumnCase({ name: 'lysmer column', model: fixtureModel('lysmer_column'), probeNodes: [2, 3, 4] })
    );

    expect(report.passed).toBe(true);
    expect(report.runnerId).toBe('recorded');
    expect(report.verdicts.map((v) => v.node)).toEqual([2, 3, 4]);
    expect(report.verdicts.map((v) => v.arrivalIndex)).toEqual([9, 6, 3]);
    for (const verdict of report.verdicts) {
      expect(verdict.observed).toBeCloseTo(V, 8);
    }
  });

  it('stiff base reflects the full velocity', async () => {
    const runner = new RecordedSimulationRunner();
    const report = await validateReflection(
      runner,
      createReflectionCase({ name: 'stiff boundary', model: fixtureModel('lysmer_stiff_column'), node: 51 })
    );

    expect(report.passed).toBe(true);
    expect(report.verdicts.map((v) => v.observed)).toEqual([0, -0.069655, 0, 0.069655, 0]);
  });
});
