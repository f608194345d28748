/**
 * Harness configuration schema
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import {
  DEFAULT_ARRIVAL_VARIABLE,
  DEFAULT_DECIMAL_PLACES,
  DEFAULT_REFLECTION_VARIABLE,
  REFERENCE_COLUMN,
  REFLECTION_SAMPLE_INDICES,
} from '@columnwave/shared';
import { ConfigurationError } from '../errors/index.js';

/** Current harness manifest version */
export const HARNESS_SCHEMA_VERSION = 1;

// ============================================================================
// Base Schemas
// ============================================================================

/** Spatial direction: 0 = x, 1 = y, 2 = z */
export const DirectionSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

/**
 * Elastic material.
 * Only finiteness is checked here; the admissible range (ν in [0, 0.5), ρ > 0)
 * is enforced by the analytical model, which raises DomainError.
 */
export const MaterialParametersSchema = z.object({
  youngModulus: z.number().finite(),
  poissonRatio: z.number().finite(),
  density: z.number().finite(),
});

/** Distributed load applied at the free (top) end */
export const ColumnLoadSchema = z.object({
  magnitude: z.number().finite(),
});

/** Column extent along the propagation axis; the base sits at 0 */
export const ColumnGeometrySchema = z.object({
  height: z.number().positive(),
});

/** Reference to a simulation model the runner knows how to execute */
export const ModelRefSchema = z.object({
  name: z.string().min(1),
  directory: z.string().min(1),
});

const decimalPlaces = z.number().int().min(0).max(12).default(DEFAULT_DECIMAL_PLACES);
const nodeIdSchema = z.number().int().positive();

const referenceMaterial = {
  youngModulus: REFERENCE_COLUMN.youngModulus,
  poissonRatio: REFERENCE_COLUMN.poissonRatio,
  density: REFERENCE_COLUMN.density,
};

// ============================================================================
// Case Schemas
// ============================================================================

/** Wave arrival + post-arrival velocity check on a set of probe nodes */
export const ColumnCaseSchema = z.object({
  name: z.string().min(1),
  model: ModelRefSchema,
  material: MaterialParametersSchema.default(referenceMaterial),
  load: ColumnLoadSchema.default({ magnitude: REFERENCE_COLUMN.load }),
  geometry: ColumnGeometrySchema.default({ height: REFERENCE_COLUMN.height }),
  direction: DirectionSchema.default(1),
  probeNodes: z.array(nodeIdSchema).min(1),
  variable: z.string().min(1).default(DEFAULT_ARRIVAL_VARIABLE),
  decimalPlaces,
  failFast: z.boolean().default(false),
});

/** Total reflection check against a very stiff boundary */
export const ReflectionCaseSchema = z.object({
  name: z.string().min(1),
  model: ModelRefSchema,
  material: MaterialParametersSchema.default(referenceMaterial),
  load: ColumnLoadSchema.default({ magnitude: REFERENCE_COLUMN.load }),
  node: nodeIdSchema,
  variable: z.string().min(1).default(DEFAULT_REFLECTION_VARIABLE),
  sampleIndices: z.array(z.number().int().nonnegative()).default([...REFLECTION_SAMPLE_INDICES]),
  decimalPlaces,
});

// ============================================================================
// Runner Configuration
// ============================================================================

/** Read artifacts of an already-computed model directory */
export const RecordedRunnerConfigSchema = z.object({
  kind: z.literal('recorded'),
});

/** Spawn an external solver in the model directory, then read its artifacts */
export const ProcessRunnerConfigSchema = z.object({
  kind: z.literal('process'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
});

/** Runner union */
export const RunnerConfigSchema = z.discriminatedUnion('kind', [
  RecordedRunnerConfigSchema,
  ProcessRunnerConfigSchema,
]);

// ============================================================================
// Complete Harness Manifest
// ============================================================================

export const HarnessConfigSchema = z.object({
  version: z.literal(HARNESS_SCHEMA_VERSION),
  name: z.string().default('Absorbing boundary validation'),
  runner: RunnerConfigSchema.default({ kind: 'recorded' }),
  columnCases: z.array(ColumnCaseSchema).default([]),
  reflectionCases: z.array(ReflectionCaseSchema).default([]),
});

// ============================================================================
// Result Artifacts
// ============================================================================

/** Key-value result file: "NODE_<id>" -> { "<VARIABLE>": [values...] } */
export const CalculatedResultSchema = z.record(
  z.string().regex(/^NODE_\d+$/, 'expected a key of the form NODE_<id>'),
  z.record(z.array(z.number()))
);

// ============================================================================
// TypeScript Type Exports
// ============================================================================

export type MaterialParameters = z.infer<typeof MaterialParametersSchema>;
export type ColumnLoad = z.infer<typeof ColumnLoadSchema>;
export type ColumnGeometry = z.infer<typeof ColumnGeometrySchema>;
export type ModelRef = z.infer<typeof ModelRefSchema>;
export type ColumnCase = z.infer<typeof ColumnCaseSchema>;
export type ColumnCaseInput = z.input<typeof ColumnCaseSchema>;
export type ReflectionCase = z.infer<typeof ReflectionCaseSchema>;
export type ReflectionCaseInput = z.input<typeof ReflectionCaseSchema>;
export type RecordedRunnerConfig = z.infer<typeof RecordedRunnerConfigSchema>;
export type ProcessRunnerConfig = z.infer<typeof ProcessRunnerConfigSchema>;
export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;
export type CalculatedResult = z.infer<typeof CalculatedResultSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/** Flatten zod issues into "path: message" strings */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid ${what}:\n${issues.join('\n')}`, { issues }, result.error);
  }
  return result.data;
}

/**
 * Validate a harness manifest against the schema
 */
export function validateHarnessConfig(
  data: unknown
): { success: true; data: HarnessConfig } | { success: false; errors: z.ZodError } {
  const result = HarnessConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Parse and validate a harness manifest, throwing ConfigurationError on error
 */
export function parseHarnessConfig(data: unknown): HarnessConfig {
  return parseOrThrow(HarnessConfigSchema, data, 'harness manifest');
}

/** Build a column case, applying reference-column defaults */
export function createColumnCase(input: ColumnCaseInput): ColumnCase {
  return parseOrThrow(ColumnCaseSchema, input, `column case "${input.name}"`);
}

/** Build a reflection case, applying reference-column defaults */
export function createReflectionCase(input: ReflectionCaseInput): ReflectionCase {
  return parseOrThrow(ReflectionCaseSchema, input, `reflection case "${input.name}"`);
}

/** Parse a key-value result artifact */
export function parseCalculatedResult(data: unknown): CalculatedResult {
  return parseOrThrow(CalculatedResultSchema, data, 'calculated result');
}

/**
 * Get the benchmark material
 */
export function getDefaultMaterial(): MaterialParameters {
  return { ...referenceMaterial };
}

/**
 * Merge a column case with overrides; nested material/load/geometry merge per field
 */
export function mergeColumnCase(defaults: ColumnCase, override?: Partial<ColumnCase>): ColumnCase {
  if (!override) return defaults;

  return {
    ...defaults,
    ...override,
    material: { ...defaults.material, ...override.material },
    load: { ...defaults.load, ...override.load },
    geometry: { ...defaults.geometry, ...override.geometry },
    model: { ...defaults.model, ...override.model },
  };
}
