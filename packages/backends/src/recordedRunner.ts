/**
 * Runner over artifacts an earlier solver run left in the model directory
 */

import type { RunnerId } from '@columnwave/shared';
import { SimulationFailureError } from '@columnwave/core';
import type { CalculatedResult, ModelRef, NodalCoordinates, NodalTimeSeries } from '@columnwave/core';
import type { SimulationArtifacts, SimulationHandle, SimulationRunner } from '@columnwave/engine';
import { artifactPaths, locateArtifacts, readArtifact, readCalculatedResult } from './artifacts.js';
import { parseGidNodalResults } from './gidAscii.js';
import { parseMdpaNodes } from './mdpa.js';

const ARTIFACT_LABELS: Record<keyof SimulationArtifacts, string> = {
  mesh: 'mesh',
  nodalResults: 'nodal results',
  calculatedResult: 'calculated result',
};

export class RecordedSimulationRunner implements SimulationRunner {
  private runCount = 0;

  getRunnerId(): RunnerId {
    return 'recorded';
  }

  async run(model: ModelRef): Promise<SimulationHandle> {
    const artifacts = await locateArtifacts(model);
    if (!artifacts.nodalResults && !artifacts.calculatedResult) {
      const paths = artifactPaths(model);
      throw new SimulationFailureError(`Model ${model.name} left no result artifact in ${model.directory}`, {
        model,
        expected: [paths.nodalResults, paths.calculatedResult],
      });
    }

    this.runCount++;
    return {
      runId: `${this.getRunnerId()}-${this.runCount}`,
      runnerId: this.getRunnerId(),
      model,
      artifacts,
    };
  }

  async getNodalCoordinates(handle: SimulationHandle): Promise<NodalCoordinates> {
    return parseMdpaNodes(await readArtifact(this.requireArtifact(handle, 'mesh')));
  }

  async getNodalTimeSeries(handle: SimulationHandle, variable: string): Promise<NodalTimeSeries> {
    return parseGidNodalResults(await readArtifact(this.requireArtifact(handle, 'nodalResults')), variable);
  }

  async getCalculatedResult(handle: SimulationHandle): Promise<CalculatedResult> {
    return readCalculatedResult(this.requireArtifact(handle, 'calculatedResult'));
  }

  dispose(): void {
    /* nothing held between runs */
  }

  private requireArtifact(handle: SimulationHandle, key: keyof SimulationArtifacts): string {
    const path = handle.artifacts[key];
    if (path === undefined) {
      throw new SimulationFailureError(`Model ${handle.model.name} wrote no ${ARTIFACT_LABELS[key]}`, {
        model: handle.model,
        runId: handle.runId,
        artifact: key,
      });
    }
    return path;
  }
}
