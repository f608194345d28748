/**
 * Harness manifest loading
 */

import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { ConfigurationError, parseHarnessConfig } from '@columnwave/core';
import type { HarnessConfig, ModelRef } from '@columnwave/core';

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function resolveModel(baseDir: string, model: ModelRef): ModelRef {
  return { ...model, directory: resolve(baseDir, model.directory) };
}

/**
 * Read a JSON manifest; model directories are taken relative to the manifest
 */
export async function loadHarnessConfig(manifestPath: string): Promise<HarnessConfig> {
  const text = await readFile(manifestPath, 'utf8').catch((err: unknown) => {
    throw new ConfigurationError(`Cannot read harness manifest ${manifestPath}: ${reasonOf(err)}`, {
      path: manifestPath,
    }, err);
  });

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Harness manifest ${manifestPath} is not valid JSON: ${reasonOf(err)}`, {
      path: manifestPath,
    }, err);
  }

  const config = parseHarnessConfig(data);
  const baseDir = dirname(resolve(manifestPath));
  return {
    ...config,
    columnCases: config.columnCases.map((c) => ({ ...c, model: resolveModel(baseDir, c.model) })),
    reflectionCases: config.reflectionCases.map((c) => ({ ...c, model: resolveModel(baseDir, c.model) })),
  };
}
