/**
 * Nodal coordinates and column geometry
 */

import { GEOMETRY_EPSILON, AXIS_NAMES, isValidNumber } from '@columnwave/shared';
import type { Direction, Vector3 } from '@columnwave/shared';
import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/** Node id -> (x, y, z) as written by the solver */
export type NodalCoordinates = ReadonlyMap<number, Vector3>;

// ============================================================================
// Lookups
// ============================================================================

/**
 * Get a node's coordinate, throwing ConfigurationError if the mesh lacks it
 */
export function coordinateOf(coordinates: NodalCoordinates, node: number): Vector3 {
  const coordinate = coordinates.get(node);
  if (!coordinate) {
    throw new ConfigurationError(`Node ${node} is not in the coordinate table`, {
      node,
      nodeCount: coordinates.size,
    });
  }
  return coordinate;
}

/**
 * Distance travelled by a wave entering at the top of the column before it
 * reaches `position` (measured from the base along the propagation axis)
 */
export function distanceFromTop(height: number, position: number): number {
  return height - position;
}

/**
 * Distance from the loaded top to a node, checking the node lies on the column
 */
export function probeDistance(
  coordinates: NodalCoordinates,
  node: number,
  direction: Direction,
  height: number
): number {
  const position = coordinateOf(coordinates, node)[direction];
  if (!isValidNumber(position) || position < -GEOMETRY_EPSILON || position > height + GEOMETRY_EPSILON) {
    throw new ConfigurationError(
      `Node ${node} lies outside the column: ${AXIS_NAMES[direction]} = ${position}, height = ${height}`,
      { node, position, height, direction }
    );
  }
  return distanceFromTop(height, position);
}

/**
 * Build a coordinate table from [id, x, y, z] rows
 */
export function createNodalCoordinates(rows: Iterable<readonly [number, number, number, number]>): NodalCoordinates {
  const table = new Map<number, Vector3>();
  for (const [id, x, y, z] of rows) {
    if (table.has(id)) {
      throw new ConfigurationError(`Duplicate node ${id} in coordinate table`, { node: id });
    }
    table.set(id, [x, y, z]);
  }
  return table;
}
