/**
 * @columnwave/core
 * Core schema, analytical wave model, errors, and data types
 */

export * from './schema/index.js';
export * from './errors/index.js';
export * from './units/index.js';
export * from './coords/index.js';
export * from './timeseries/index.js';
