import { describe, it, expect } from 'vitest';
import { Int, FrozenSet, Deque, DefaultMap } from '../../src/typing/builtins.js';

// ============================================================================
// Builtins Tests
// ============================================================================

describe('Int', () => {
    it('should be a Number subclass', () => {
        expect(new Int(3)).toBeInstanceOf(Number);
        expect(new Int(3).valueOf()).toBe(3);
    });
});

describe('FrozenSet', () => {
    it('should deduplicate its members', () => {
        const set = new FrozenSet(['a', 'b', 'a']);
        expect(set.size).toBe(2);
        expect([...set]).toEqual(['a', 'b']);
    });

    it('should answer membership', () => {
        const set = new FrozenSet([1, 2]);
        expect(set.has(1)).toBe(true);
        expect(set.has(3)).toBe(false);
    });

    it('should be frozen', () => {
        expect(Object.isFrozen(new FrozenSet())).toBe(true);
    });

    it('should visit every member with forEach', () => {
        const seen: number[] = [];
        new FrozenSet([3, 1]).forEach(v => seen.push(v));
        expect(seen).toEqual([3, 1]);
    });
});

describe('Deque', () => {
    it('should push and pop at both ends', () => {
        const deque = new Deque<number>([2]);
        deque.pushFront(1);
        deque.pushBack(3);

        expect([...deque]).toEqual([1, 2, 3]);
        expect(deque.popFront()).toBe(1);
        expect(deque.popBack()).toBe(3);
        expect(deque.length).toBe(1);
    });

    it('should peek without removing', () => {
        const deque = new Deque(['a', 'b']);
        expect(deque.peekFront()).toBe('a');
        expect(deque.peekBack()).toBe('b');
        expect(deque.length).toBe(2);
    });

    it('should return undefined when empty', () => {
        const deque = new Deque<string>();
        expect(deque.popFront()).toBeUndefined();
        expect(deque.peekBack()).toBeUndefined();
    });

    it('should discard from the opposite end when bounded', () => {
        const deque = new Deque([1, 2, 3], 2);
        expect([...deque]).toEqual([2, 3]);

        deque.pushFront(0);
        expect([...deque]).toEqual([0, 2]);
    });

    it('should reject an invalid maxLength', () => {
        expect(() => new Deque([], -1)).toThrow('Deque maxLength must be a non-negative integer, received -1');
    });
});

describe('DefaultMap', () => {
    it('should fill missing keys from the factory', () => {
        const counts = new DefaultMap<string, number>(() => 0);
        counts.set('a', (counts.get('a') ?? 0) + 1);

        expect(counts.get('a')).toBe(1);
        expect(counts.get('b')).toBe(0);
        expect(counts.has('b')).toBe(true);
    });

    it('should accept initial entries', () => {
        const map = new DefaultMap<string, string[]>(() => [], [['x', ['1']]]);
        expect(map.get('x')).toEqual(['1']);
        expect(map.get('y')).toEqual([]);
    });

    it('should behave like a Map without a factory', () => {
        const map = new DefaultMap<string, number>();
        expect(map.get('missing')).toBeUndefined();
        expect(map.has('missing')).toBe(false);
    });
});
