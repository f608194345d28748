/**
 * Node table of a model part file (`*.mdpa`)
 */

import { ConfigurationError, createNodalCoordinates } from '@columnwave/core';
import type { NodalCoordinates } from '@columnwave/core';

const NODES_BEGIN = /^Begin\s+Nodes\b/i;
const NODES_END = /^End\s+Nodes\b/i;

/**
 * Collect `<id> <x> <y> <z>` rows of every `Begin Nodes` block
 */
export function parseMdpaNodes(text: string): NodalCoordinates {
  const rows: Array<[number, number, number, number]> = [];
  let inNodes = false;
  let blocks = 0;

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].replace(/\/\/.*$/, '').trim();
    if (line === '') continue;

    if (!inNodes) {
      if (NODES_BEGIN.test(line)) {
        inNodes = true;
        blocks++;
      }
      continue;
    }
    if (NODES_END.test(line)) {
      inNodes = false;
      continue;
    }

    const values = line.split(/\s+/).map(Number);
    if (values.length !== 4 || values.some((v) => !Number.isFinite(v)) || !Number.isInteger(values[0]) || values[0] <= 0) {
      throw new ConfigurationError(`Line ${index + 1}: malformed node row "${line}"`, { line: index + 1 });
    }
    rows.push([values[0], values[1], values[2], values[3]]);
  }

  if (inNodes) throw new ConfigurationError('Nodes block is not closed', {});
  if (blocks === 0) throw new ConfigurationError('Model part has no Nodes block', {});

  return createNodalCoordinates(rows);
}
