/**
 * Runner that starts the external solver for every case
 */

import { spawn } from 'child_process';
import { rm } from 'fs/promises';
import type { RunnerId } from '@columnwave/shared';
import { SimulationFailureError } from '@columnwave/core';
import type { ModelRef, ProcessRunnerConfig } from '@columnwave/core';
import type { SimulationHandle } from '@columnwave/engine';
import { artifactPaths } from './artifacts.js';
import { RecordedSimulationRunner } from './recordedRunner.js';
import type { SolverExit, SolverLauncher } from './types.js';

/** Characters of solver stderr kept for error context */
export const STDERR_TAIL_LENGTH = 4000;

/**
 * Spawn the solver with stdout discarded and the tail of stderr captured
 */
export const launchSolver: SolverLauncher = (command, args, options) =>
  new Promise<SolverExit>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_LENGTH);
    });

    child.once('error', reject);
    child.once('close', (code, signal) => resolve({ code, signal, stderr: stderr.trim() }));
  });

export class ProcessSimulationRunner extends RecordedSimulationRunner {
  constructor(
    private readonly config: ProcessRunnerConfig,
    private readonly launch: SolverLauncher = launchSolver
  ) {
    super();
  }

  getRunnerId(): RunnerId {
    return 'process';
  }

  async run(model: ModelRef): Promise<SimulationHandle> {
    // Results of an earlier run must not pass for this one
    const { nodalResults, calculatedResult } = artifactPaths(model);
    await rm(nodalResults, { force: true });
    await rm(calculatedResult, { force: true });

    const { command, args } = this.config;
    const exit = await this.launch(command, args, {
      cwd: model.directory,
      env: { ...process.env, ...this.config.env },
    }).catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SimulationFailureError(`Cannot start solver "${command}" for model ${model.name}: ${reason}`, {
        model,
        command,
      }, err);
    });

    if (exit.code !== 0) {
      const status = exit.signal ? `signal ${exit.signal}` : `code ${exit.code}`;
      throw new SimulationFailureError(`Solver exited with ${status} for model ${model.name}`, {
        model,
        command,
        code: exit.code,
        signal: exit.signal,
        stderr: exit.stderr,
      });
    }

    return super.run(model);
  }
}
