/**
 * @typeshape/openapi — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Annotated, NotRequired, Int, Sequence } from '@typeshape/core';
 * import { SchemaSynthesizer, loadConfig } from '@typeshape/openapi';
 *
 * const synth = new SchemaSynthesizer(loadConfig());
 * const schema = synth.objectSchema({
 *     id: Int,
 *     tags: NotRequired.of(Sequence.of(String)),
 *     limit: Annotated.of(Int, { minimum: 1, maximum: 100 }),
 * });
 * ```
 *
 * @module
 */

// ── Config ───────────────────────────────────────────────
export { mergeConfig, DEFAULT_CONFIG } from './config/SynthesizerConfig.js';
export type {
    SynthesizerConfig, PartialConfig, FeatureFlags, FormatConfig,
} from './config/SynthesizerConfig.js';
export { loadConfig } from './config/ConfigLoader.js';
export { ConfigValidationError } from './config/ConfigValidationError.js';

// ── Schema Types ─────────────────────────────────────────
export type { SchemaObject, SchemaType } from './schema/types.js';

// ── Constraints ──────────────────────────────────────────
export { collectConstraints, constraints, SchemaConstraintsSchema } from './schema/SchemaConstraints.js';
export type { SchemaConstraints, CollectOptions } from './schema/SchemaConstraints.js';

// ── Synthesizer ──────────────────────────────────────────
export { SchemaSynthesizer } from './schema/SchemaSynthesizer.js';
export type { FieldDescription, ObjectSchemaOptions, FieldMap } from './schema/SchemaSynthesizer.js';
