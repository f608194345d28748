/**
 * @columnwave/shared
 * Shared types, constants, and utilities for the column wave harness
 */

export * from './types/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
