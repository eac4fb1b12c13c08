/**
 * SchemaConstraints — Metadata → Schema Keywords
 *
 * `Annotated` metadata is free-form. The entries that are plain objects
 * made only of schema keywords are treated as constraints and merged
 * into the field schema:
 *
 * ```typescript
 * Annotated.of(Int, { minimum: 1, maximum: 100 }, 'Page size')
 * // → { type: 'integer', minimum: 1, maximum: 100, description: 'Page size' }
 * ```
 *
 * Entries are read outermost first and the first value seen for a
 * keyword wins, so a field's own annotation overrides the one carried
 * by a reusable inner alias.
 *
 * @module
 */
import { z } from 'zod';
import { formatType, type InspectOptions } from '@typeshape/core';

// ── Schema ───────────────────────────────────────────────

export const SchemaConstraintsSchema = z.object({
    title: z.string(),
    description: z.string(),
    format: z.string(),
    minimum: z.number(),
    maximum: z.number(),
    exclusiveMinimum: z.boolean(),
    exclusiveMaximum: z.boolean(),
    multipleOf: z.number().positive(),
    minLength: z.number().int().nonnegative(),
    maxLength: z.number().int().nonnegative(),
    pattern: z.string(),
    minItems: z.number().int().nonnegative(),
    maxItems: z.number().int().nonnegative(),
    uniqueItems: z.boolean(),
    default: z.unknown(),
    example: z.unknown(),
    deprecated: z.boolean(),
    nullable: z.boolean(),
}).partial().strict();

/** Schema keywords accepted as `Annotated` metadata */
export type SchemaConstraints = z.infer<typeof SchemaConstraintsSchema>;

export interface CollectOptions extends InspectOptions {
    /** Use the first bare string entry as `description` (default: true) */
    readonly stringsAsDescription?: boolean;
}

// ── Public API ───────────────────────────────────────────

/**
 * Merge every constraint entry of an `Annotated` metadata list.
 *
 * Strings become the description unless a constraint entry sets one.
 * Plain objects that are not valid constraints are skipped and
 * reported as `fallback` debug events; anything else is ignored.
 */
export function collectConstraints(metadata: readonly unknown[], options: CollectOptions = {}): SchemaConstraints {
    let merged: SchemaConstraints = {};
    let note: string | undefined;

    for (const entry of metadata) {
        if (typeof entry === 'string') {
            note ??= entry;
            continue;
        }
        if (!isPlainObject(entry)) continue;

        const parsed = SchemaConstraintsSchema.safeParse(entry);
        if (parsed.success) {
            merged = { ...parsed.data, ...merged };
        } else {
            options.debug?.({
                type: 'fallback',
                operation: 'synthesize',
                descriptor: formatType(entry),
                reason: `metadata is not a constraint set: ${parsed.error.issues.map(i => i.message).join('; ')}`,
                timestamp: Date.now(),
            });
        }
    }

    if (merged.description === undefined && note !== undefined && options.stringsAsDescription !== false) {
        merged = { ...merged, description: note };
    }
    return merged;
}

/**
 * Validate a constraint set up front, for declarations that want a
 * typo to fail at load time instead of being skipped.
 *
 * @throws ZodError when the object holds an unknown keyword or a bad value
 */
export function constraints(value: SchemaConstraints): SchemaConstraints {
    return Object.freeze(SchemaConstraintsSchema.parse(value));
}

// ── Internal ─────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
