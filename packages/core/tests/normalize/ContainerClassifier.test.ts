import { describe, it, expect } from 'vitest';
import {
    getOriginOrInnerType, resolveEffectiveOrigin, isMultiValue,
} from '../../src/normalize/ContainerClassifier.js';
import { generic } from '../../src/typing/TypeForms.js';
import { Int, Deque, DefaultMap, FrozenSet } from '../../src/typing/builtins.js';
import {
    Annotated, Required, NotRequired, ReadOnly, Literal, Union,
    Sequence, MutableSequence, List, Tuple,
    AbstractSet, MutableSet,
    Mapping, MutableMapping, Dict,
} from '../../src/typing/forms.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';

// ============================================================================
// ContainerClassifier Tests
// ============================================================================

class Customer {
    constructor(readonly name: string) {}
}

class TagList extends Array<string> {}

describe('ContainerClassifier', () => {
    // ── getOriginOrInnerType ──

    describe('getOriginOrInnerType()', () => {
        it('should return undefined for non-generic descriptors', () => {
            expect(getOriginOrInnerType(Int)).toBeUndefined();
            expect(getOriginOrInnerType(Sequence)).toBeUndefined();
            expect(getOriginOrInnerType('Customer')).toBeUndefined();
        });

        it('should map abstract origins to their concrete constructor', () => {
            expect(getOriginOrInnerType(Sequence.of(Int))).toBe(Array);
            expect(getOriginOrInnerType(MutableMapping.of(String, Int))).toBe(Map);
            expect(getOriginOrInnerType(AbstractSet.of(String))).toBe(Set);
        });

        it('should keep concrete origins', () => {
            expect(getOriginOrInnerType(generic(Deque, Int))).toBe(Deque);
            expect(getOriginOrInnerType(generic(FrozenSet, Int))).toBe(FrozenSet);
        });

        it('should return unknown origins as they are', () => {
            expect(getOriginOrInnerType(generic(Promise, Int))).toBe(Promise);
        });

        it('should look through wrappers into a nested generic payload', () => {
            const index = Annotated.of(Mapping.of(String, List.of(Int)), 'index');
            expect(getOriginOrInnerType(index)).toBe(Map);
        });

        it('should return undefined for a wrapped scalar', () => {
            expect(getOriginOrInnerType(ReadOnly.of(Annotated.of(Int, 'x')))).toBeUndefined();
        });
    });

    // ── resolveEffectiveOrigin ──

    describe('resolveEffectiveOrigin()', () => {
        it.each([
            ['Sequence[Int]', Sequence.of(Int), 'sequence'],
            ['MutableSequence[Int]', MutableSequence.of(Int), 'sequence'],
            ['List[Int]', List.of(Int), 'sequence'],
            ['Tuple[Int, String]', Tuple.of(Int, String), 'sequence'],
            ['Array[Int]', generic(Array, Int), 'sequence'],
            ['AbstractSet[Int]', AbstractSet.of(Int), 'set'],
            ['MutableSet[Int]', MutableSet.of(Int), 'set'],
            ['Set[Int]', generic(Set, Int), 'set'],
            ['FrozenSet[Int]', generic(FrozenSet, Int), 'frozen-set'],
            ['Deque[Int]', generic(Deque, Int), 'deque'],
            ['Mapping[String, Int]', Mapping.of(String, Int), 'mapping'],
            ['Dict[String, Int]', Dict.of(String, Int), 'mapping'],
            ['Map[String, Int]', generic(Map, String, Int), 'mapping'],
            ['DefaultMap[String, Int]', generic(DefaultMap, String, Int), 'default-mapping'],
        ])('should resolve %s', (_label, descriptor, expected) => {
            expect(resolveEffectiveOrigin(descriptor)).toBe(expected);
        });

        it('should resolve through several wrapper layers', () => {
            const tags = Required.of(ReadOnly.of(Annotated.of(Sequence.of(String), 'tags')));
            expect(resolveEffectiveOrigin(tags)).toBe('sequence');
        });

        it('should resolve bare container classes and tokens', () => {
            expect(resolveEffectiveOrigin(Array)).toBe('sequence');
            expect(resolveEffectiveOrigin(Dict)).toBe('mapping');
            expect(resolveEffectiveOrigin(NotRequired.of(Set))).toBe('set');
        });

        it('should return undefined for scalars', () => {
            expect(resolveEffectiveOrigin(Int)).toBeUndefined();
            expect(resolveEffectiveOrigin(String)).toBeUndefined();
            expect(resolveEffectiveOrigin(Annotated.of(Int, 'x'))).toBeUndefined();
        });

        it('should return undefined for unregistered generic origins', () => {
            expect(resolveEffectiveOrigin(generic(Promise, Int))).toBeUndefined();
            expect(resolveEffectiveOrigin(generic(Customer))).toBeUndefined();
        });

        it('should return undefined for special forms and forward references', () => {
            expect(resolveEffectiveOrigin(Literal.of('a', 'b'))).toBeUndefined();
            expect(resolveEffectiveOrigin(Union.of(Int, String))).toBeUndefined();
            expect(resolveEffectiveOrigin('Customer')).toBeUndefined();
        });
    });

    // ── isMultiValue ──

    describe('isMultiValue()', () => {
        it('should accept sequences of every spelling', () => {
            expect(isMultiValue(Sequence.of(Int))).toBe(true);
            expect(isMultiValue(List.of(Int))).toBe(true);
            expect(isMultiValue(Tuple.of(Int, Int))).toBe(true);
            expect(isMultiValue(generic(Array, Int))).toBe(true);
            expect(isMultiValue(MutableSequence.of(String))).toBe(true);
        });

        it('should accept sets, frozen sets and deques', () => {
            expect(isMultiValue(AbstractSet.of(Int))).toBe(true);
            expect(isMultiValue(MutableSet.of(Int))).toBe(true);
            expect(isMultiValue(generic(FrozenSet, Int))).toBe(true);
            expect(isMultiValue(generic(Deque, Int))).toBe(true);
        });

        it('should reject mappings', () => {
            expect(isMultiValue(Mapping.of(String, Int))).toBe(false);
            expect(isMultiValue(Dict.of(String, Int))).toBe(false);
            expect(isMultiValue(generic(DefaultMap, String, Int))).toBe(false);
            expect(isMultiValue(Map)).toBe(false);
        });

        it('should reject strings and byte arrays even though they are sequences', () => {
            expect(isMultiValue(String)).toBe(false);
            expect(isMultiValue(Uint8Array)).toBe(false);
            expect(isMultiValue(Buffer)).toBe(false);
        });

        it('should reject plain scalars', () => {
            expect(isMultiValue(Int)).toBe(false);
            expect(isMultiValue(Number)).toBe(false);
            expect(isMultiValue(Boolean)).toBe(false);
            expect(isMultiValue(Customer)).toBe(false);
        });

        it('should accept bare container classes, tokens and subclasses', () => {
            expect(isMultiValue(Array)).toBe(true);
            expect(isMultiValue(Sequence)).toBe(true);
            expect(isMultiValue(MutableSet)).toBe(true);
            expect(isMultiValue(TagList)).toBe(true);
        });

        it('should see through wrappers', () => {
            expect(isMultiValue(ReadOnly.of(Annotated.of(List.of(Int), 'ids')))).toBe(true);
            expect(isMultiValue(NotRequired.of(Mapping.of(String, Int)))).toBe(false);
            expect(isMultiValue(Annotated.of(String, 'name'))).toBe(false);
        });

        it('should answer false for unregistered generic origins', () => {
            expect(isMultiValue(generic(Promise, Int))).toBe(false);
        });

        it('should answer false for forward references', () => {
            expect(isMultiValue('Customer')).toBe(false);
        });

        it('should answer false when the origin is not a class', () => {
            expect(() => isMultiValue(Literal.of('asc', 'desc'))).not.toThrow();
            expect(isMultiValue(Literal.of('asc', 'desc'))).toBe(false);
            expect(isMultiValue(Union.of(List.of(Int), String))).toBe(false);
        });
    });

    // ── Debug Events ──

    describe('debug observer', () => {
        it('should report the resolved kind', () => {
            const events: DebugEvent[] = [];
            resolveEffectiveOrigin(Sequence.of(Int), { debug: e => events.push(e) });

            expect(events).toHaveLength(1);
            expect(events[0]).toMatchObject({
                type: 'classify',
                operation: 'resolveEffectiveOrigin',
                descriptor: 'Sequence[Int]',
                result: 'sequence',
            });
        });

        it('should report "none" for unknown origins', () => {
            const events: DebugEvent[] = [];
            resolveEffectiveOrigin(generic(Promise, Int), { debug: e => events.push(e) });
            expect(events[0]).toMatchObject({ result: 'none' });
        });

        it('should report a fallback when the subtype test fails', () => {
            const events: DebugEvent[] = [];
            isMultiValue(Literal.of('a'), { debug: e => events.push(e) });

            expect(events.map(e => e.type)).toEqual(['fallback', 'classify']);
            expect(events[0]).toMatchObject({
                type: 'fallback',
                operation: 'isMultiValue',
                descriptor: "Literal['a']",
                reason: 'isSubtype() arg 1 must be a class or abstract type, received Literal',
            });
            expect(events[1]).toMatchObject({ type: 'classify', result: 'false' });
        });
    });
});
