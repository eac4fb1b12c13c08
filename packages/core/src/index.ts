/**
 * @typeshape/core — Root Barrel Export
 *
 * Public API entry point. Aggregates the descriptor algebra, the
 * wrapper registry, the annotation normalizer, the container
 * classifier and the debug observer into a single flat namespace.
 *
 * @example
 * ```typescript
 * import { Annotated, ReadOnly, Int, Sequence, unwrap, isMultiValue } from '@typeshape/core';
 *
 * unwrap(ReadOnly.of(Annotated.of(Int, { minimum: 0 })));
 * // → { base: Int, metadata: [{ minimum: 0 }], wrappers: Set { 'read-only', 'annotated' } }
 *
 * isMultiValue(Sequence.of(Int)); // true
 * ```
 *
 * @module
 */

// ── Descriptor Algebra ───────────────────────────────────
export * from './typing/index.js';

// ── Registry ─────────────────────────────────────────────
export * from './registry/index.js';

// ── Normalizer & Classifier ──────────────────────────────
export * from './normalize/index.js';

// ── Observability ────────────────────────────────────────
export * from './observability/index.js';
