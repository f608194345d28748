/**
 * Types shared by the simulation runners
 */

import type { ProcessRunnerConfig, RunnerConfig } from '@columnwave/core';

/** How an external solver process ended */
export interface SolverExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Tail of the solver's standard error */
  stderr: string;
}

export interface SolverLaunchOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Start a solver and resolve once it has exited.
 * Rejects only when the process cannot be started.
 */
export type SolverLauncher = (
  command: string,
  args: readonly string[],
  options: SolverLaunchOptions
) => Promise<SolverExit>;

export interface RunnerOptions {
  /** Replaces the child-process launcher of the process runner */
  launch?: SolverLauncher;
}

export type { ProcessRunnerConfig, RunnerConfig };
