/**
 * On-disk fixtures and scratch copies of them
 */

import { cp, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { ModelRef } from '@columnwave/core';

export const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

export function fixtureModel(name: string, root = FIXTURES_DIR): ModelRef {
  return { name, directory: join(root, name) };
}

export function fixturePath(...segments: string[]): string {
  return join(FIXTURES_DIR, ...segments);
}

/** Copy every fixture into a fresh temporary directory */
export async function copyFixtures(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'columnwave-'));
  await cp(FIXTURES_DIR, dir, { recursive: true });
  return dir;
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
