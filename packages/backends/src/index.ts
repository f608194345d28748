/**
 * @columnwave/backends
 * Simulation runners and result artifact readers
 */

import type { RunnerConfig } from '@columnwave/core';
import { runHarness } from '@columnwave/engine';
import type { HarnessSummary, SimulationRunner } from '@columnwave/engine';
import { loadHarnessConfig } from './manifest.js';
import { ProcessSimulationRunner } from './processRunner.js';
import { RecordedSimulationRunner } from './recordedRunner.js';
import type { RunnerOptions } from './types.js';

export * from './types.js';
export * from './artifacts.js';
export { parseGidNodalResults } from './gidAscii.js';
export { parseMdpaNodes } from './mdpa.js';
export { RecordedSimulationRunner } from './recordedRunner.js';
export { ProcessSimulationRunner, launchSolver, STDERR_TAIL_LENGTH } from './processRunner.js';
export { loadHarnessConfig } from './manifest.js';

/**
 * Create the runner a manifest asks for
 */
export function createRunner(config: RunnerConfig, options: RunnerOptions = {}): SimulationRunner {
  switch (config.kind) {
    case 'recorded':
      return new RecordedSimulationRunner();
    case 'process':
      return new ProcessSimulationRunner(config, options.launch);
  }
}

/**
 * Load a manifest, run every case with its runner, and release the runner
 */
export async function runManifest(manifestPath: string, options: RunnerOptions = {}): Promise<HarnessSummary> {
  const config = await loadHarnessConfig(manifestPath);
  const runner = createRunner(config.runner, options);
  try {
    return await runHarness(config, runner);
  } finally {
    runner.dispose();
  }
}
