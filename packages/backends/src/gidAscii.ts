/**
 * GiD ASCII post-process results (`*.post.res`)
 *
 * Each output time of a variable is one block:
 *
 *   Result "DISPLACEMENT" "column" 0.005 Vector OnNodes
 *   ComponentNames "DISPLACEMENT_X", "DISPLACEMENT_Y", "DISPLACEMENT_Z"
 *   Values
 *   1 0.0 -1.2e-05 0.0
 *   End Values
 */

import type { Vector3 } from '@columnwave/shared';
import { ConfigurationError, createNodalTimeSeries } from '@columnwave/core';
import type { NodalTimeSeries, TimeStep } from '@columnwave/core';

type ResultKind = 'Scalar' | 'Vector';

interface OpenBlock {
  time: number;
  kind: ResultKind;
  headerLine: number;
  inValues: boolean;
  values: Map<number, Vector3>;
}

const RESULT_HEADER = /^Result\s+"([^"]*)"\s+"([^"]*)"\s+(\S+)\s+(\S+)\s+(\S+)/i;
const VALUES_BEGIN = /^Values$/i;
const VALUES_END = /^End\s+Values$/i;

function openBlock(header: RegExpExecArray, lineNo: number): OpenBlock | null {
  const [, variable, , timeText, kindText, location] = header;
  if (location.toLowerCase() !== 'onnodes') return null;

  const time = Number(timeText);
  if (!Number.isFinite(time)) {
    throw new ConfigurationError(`Line ${lineNo}: invalid output time "${timeText}" for ${variable}`, {
      line: lineNo,
      variable,
    });
  }

  const kind = kindText.toLowerCase();
  if (kind !== 'scalar' && kind !== 'vector') {
    throw new ConfigurationError(`Line ${lineNo}: unsupported result type ${kindText} for ${variable}`, {
      line: lineNo,
      variable,
      kind: kindText,
    });
  }

  return {
    time,
    kind: kind === 'scalar' ? 'Scalar' : 'Vector',
    headerLine: lineNo,
    inValues: false,
    values: new Map(),
  };
}

function parseRow(line: string, block: OpenBlock, lineNo: number): [number, Vector3] {
  const [idText, ...rest] = line.split(/\s+/);
  const id = Number(idText);
  const components = rest.map(Number);
  const minComponents = block.kind === 'Scalar' ? 1 : 2;

  if (!Number.isInteger(id) || id <= 0 || components.length < minComponents || components.some((c) => !Number.isFinite(c))) {
    throw new ConfigurationError(`Line ${lineNo}: malformed result row "${line}"`, { line: lineNo });
  }
  if (block.values.has(id)) {
    throw new ConfigurationError(`Line ${lineNo}: node ${id} listed twice at t = ${block.time}`, {
      line: lineNo,
      node: id,
      time: block.time,
    });
  }

  // Vector rows may carry a trailing modulus; only x, y, z are kept.
  const vector: Vector3 =
    block.kind === 'Scalar' ? [components[0], 0, 0] : [components[0], components[1], components[2] ?? 0];
  return [id, vector];
}

/**
 * Parse every OnNodes block of `variable`.
 * Steps come out sorted by time; a repeated time is a ConfigurationError.
 */
export function parseGidNodalResults(text: string, variable: string): NodalTimeSeries {
  const steps: TimeStep[] = [];
  let block: OpenBlock | null = null;

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].trim();
    const lineNo = index + 1;
    if (line === '' || line.startsWith('#')) continue;

    if (block === null) {
      const header = RESULT_HEADER.exec(line);
      if (header && header[1] === variable) block = openBlock(header, lineNo);
      continue;
    }

    if (!block.inValues) {
      // ComponentNames and Unit lines precede the values
      if (VALUES_BEGIN.test(line)) block.inValues = true;
      continue;
    }

    if (VALUES_END.test(line)) {
      steps.push({ time: block.time, values: block.values });
      block = null;
      continue;
    }

    const [id, vector] = parseRow(line, block, lineNo);
    block.values.set(id, vector);
  }

  if (block !== null) {
    throw new ConfigurationError(`Result block for ${variable} at line ${block.headerLine} is not closed`, {
      line: block.headerLine,
      variable,
    });
  }
  if (steps.length === 0) {
    throw new ConfigurationError(`No nodal results for ${variable}`, { variable });
  }

  return createNodalTimeSeries(variable, steps);
}
