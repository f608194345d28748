/**
 * Artifact discovery and whole-file reads
 */

import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { CALCULATED_RESULT_FILE, MESH_SUFFIX, NODAL_RESULT_SUFFIX } from '@columnwave/shared';
import { ConfigurationError, SimulationFailureError, parseCalculatedResult } from '@columnwave/core';
import type { CalculatedResult, ModelRef } from '@columnwave/core';
import type { SimulationArtifacts } from '@columnwave/engine';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Paths a model directory may hold after a run */
export function artifactPaths(model: ModelRef): Required<SimulationArtifacts> {
  return {
    mesh: join(model.directory, `${model.name}${MESH_SUFFIX}`),
    nodalResults: join(model.directory, `${model.name}${NODAL_RESULT_SUFFIX}`),
    calculatedResult: join(model.directory, CALCULATED_RESULT_FILE),
  };
}

/** True when `path` is an existing regular file */
export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}

/**
 * Resolve the artifacts present in a model directory
 */
export async function locateArtifacts(model: ModelRef): Promise<SimulationArtifacts> {
  const paths = artifactPaths(model);
  const artifacts: SimulationArtifacts = {};
  if (await fileExists(paths.mesh)) artifacts.mesh = paths.mesh;
  if (await fileExists(paths.nodalResults)) artifacts.nodalResults = paths.nodalResults;
  if (await fileExists(paths.calculatedResult)) artifacts.calculatedResult = paths.calculatedResult;
  return artifacts;
}

/**
 * Read a whole artifact as text; a missing or unreadable file is a simulation failure
 */
export async function readArtifact(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    throw new SimulationFailureError(`Cannot read artifact ${path}: ${reasonOf(err)}`, { path }, err);
  }
}

/**
 * Read and validate a key-value result file
 */
export async function readCalculatedResult(path: string): Promise<CalculatedResult> {
  const text = await readArtifact(path);
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`${path} is not valid JSON: ${reasonOf(err)}`, { path }, err);
  }
  return parseCalculatedResult(data);
}
