/**
 * Shared utility functions
 */

import type { Direction, Vector3 } from '../types/index.js';

// ============================================================================
// Numeric Utilities
// ============================================================================

/**
 * Largest difference (exclusive) accepted when two values must agree to
 * `places` decimal places: 2 places -> 0.005
 */
export function decimalTolerance(places: number): number {
  return Math.pow(10, -places) / 2;
}

/**
 * Check agreement to a number of decimal places.
 * Same criterion as vitest's `toBeCloseTo(expected, places)`.
 */
export function almostEqual(actual: number, expected: number, places: number): boolean {
  if (!isValidNumber(actual) || !isValidNumber(expected)) return false;
  return Math.abs(actual - expected) < decimalTolerance(places);
}

/**
 * Pick a component of a nodal vector
 */
export function component(vector: Vector3, direction: Direction): number {
  return vector[direction];
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Check if a value is a valid finite number
 */
export function isValidNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if an array of numbers is strictly increasing
 */
export function isStrictlyIncreasing(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (!(values[i] > values[i - 1])) return false;
  }
  return true;
}
