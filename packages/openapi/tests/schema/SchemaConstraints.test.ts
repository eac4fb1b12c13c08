import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import type { DebugEvent } from '@typeshape/core';
import { collectConstraints, constraints } from '../../src/schema/SchemaConstraints.js';

// ============================================================================
// SchemaConstraints Tests
// ============================================================================

describe('collectConstraints()', () => {
    // ── Merging ──

    it('should return an empty set for empty metadata', () => {
        expect(collectConstraints([])).toEqual({});
    });

    it('should merge keyword objects', () => {
        const result = collectConstraints([{ minimum: 1 }, { maximum: 10, multipleOf: 2 }]);
        expect(result).toEqual({ minimum: 1, maximum: 10, multipleOf: 2 });
    });

    it('should let the first value seen for a keyword win', () => {
        const result = collectConstraints([{ maximum: 5 }, { maximum: 100, minimum: 0 }]);
        expect(result).toEqual({ maximum: 5, minimum: 0 });
    });

    // ── Descriptions ──

    it('should use the first string as the description', () => {
        expect(collectConstraints(['Page size', 'ignored'])).toEqual({ description: 'Page size' });
    });

    it('should prefer an explicit description keyword over a bare string', () => {
        const result = collectConstraints(['note', { description: 'Explicit' }]);
        expect(result).toEqual({ description: 'Explicit' });
    });

    it('should skip bare strings when descriptions are disabled', () => {
        expect(collectConstraints(['note', { minLength: 1 }], { stringsAsDescription: false }))
            .toEqual({ minLength: 1 });
    });

    // ── Skipped Entries ──

    it('should ignore numbers, arrays and class instances', () => {
        expect(collectConstraints([42, [1, 2], new Date(0), null])).toEqual({});
    });

    it('should skip objects with unknown keywords and report them', () => {
        const events: DebugEvent[] = [];
        const result = collectConstraints(
            [{ maxProperties: 5 }, { minimum: 0 }],
            { debug: e => events.push(e) },
        );

        expect(result).toEqual({ minimum: 0 });
        expect(events).toHaveLength(1);
        expect(events[0]).toMatchObject({
            type: 'fallback',
            operation: 'synthesize',
            descriptor: '{"maxProperties":5}',
        });
    });

    it('should skip objects with invalid values', () => {
        expect(collectConstraints([{ minLength: -1 }])).toEqual({});
        expect(collectConstraints([{ multipleOf: 0 }])).toEqual({});
    });

    it('should accept objects without a prototype', () => {
        const bounds: Record<string, unknown> = Object.create(null);
        bounds['maxItems'] = 3;
        expect(collectConstraints([bounds])).toEqual({ maxItems: 3 });
    });
});

describe('constraints()', () => {
    it('should return a frozen copy of a valid set', () => {
        const result = constraints({ pattern: '^[a-z]+$', maxLength: 12 });
        expect(result).toEqual({ pattern: '^[a-z]+$', maxLength: 12 });
        expect(Object.isFrozen(result)).toBe(true);
    });

    it('should throw ZodError on a bad value', () => {
        expect(() => constraints({ maxItems: 1.5 })).toThrow(ZodError);
    });
});
