/**
 * @columnwave/engine
 * Arrival analysis and column/reflection validation against elastic wave theory
 */

export * from './api/index.js';
export * from './arrival/index.js';
export * from './column/index.js';
export * from './reflection/index.js';
export * from './harness/index.js';
export * from './report/index.js';
