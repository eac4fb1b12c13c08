/**
 * WrapperRegistry — Static Classification Tables
 *
 * Two lookup tables, built once at module load. The maps stay private;
 * only frozen entry lists and the lookup functions are exported:
 *
 * 1. Wrapper forms — the special forms that carry a payload type plus
 *    side metadata without changing the value's shape.
 * 2. Container table — every recognised container origin (abstract
 *    token or concrete class) mapped to one instantiable container kind.
 *
 * The container table is closed: an origin it does not
 * know resolves to `undefined` and callers treat it as "not a container".
 *
 * @module
 */
import {
    type Constructor, type TypeOrigin,
    AbstractType, SpecialForm, isConstructor,
} from '../typing/TypeForms.js';
import { Deque, DefaultMap, FrozenSet } from '../typing/builtins.js';
import {
    Annotated, Required, NotRequired, ReadOnly,
    Sequence, MutableSequence, List, Tuple,
    AbstractSet, MutableSet,
    Mapping, MutableMapping, Dict,
} from '../typing/forms.js';

// ── Wrapper Kinds ────────────────────────────────────────

export type WrapperKind = 'annotated' | 'required' | 'not-required' | 'read-only';

const WRAPPER_KINDS: ReadonlyMap<SpecialForm, WrapperKind> = new Map<SpecialForm, WrapperKind>([
    [Annotated, 'annotated'],
    [Required, 'required'],
    [NotRequired, 'not-required'],
    [ReadOnly, 'read-only'],
]);

/** The four recognised wrapper forms */
export const WRAPPER_FORMS: readonly SpecialForm[] = Object.freeze([...WRAPPER_KINDS.keys()]);

export function isWrapperOrigin(origin: unknown): origin is SpecialForm {
    return origin instanceof SpecialForm && WRAPPER_KINDS.has(origin);
}

/** Wrapper kind of a generic origin, or `undefined` when it is not a wrapper */
export function wrapperKindOf(origin: unknown): WrapperKind | undefined {
    return origin instanceof SpecialForm ? WRAPPER_KINDS.get(origin) : undefined;
}

// ── Container Kinds ──────────────────────────────────────

export type ContainerKind = 'set' | 'default-mapping' | 'deque' | 'mapping' | 'frozen-set' | 'sequence';

/** Empty instance type produced for each container kind */
export interface ContainerInstances {
    readonly 'set': Set<unknown>;
    readonly 'default-mapping': DefaultMap<unknown, unknown>;
    readonly 'deque': Deque<unknown>;
    readonly 'mapping': Map<unknown, unknown>;
    readonly 'frozen-set': FrozenSet<unknown>;
    readonly 'sequence': unknown[];
}

/** The one concrete constructor behind each container kind */
export const CONTAINER_CONSTRUCTORS: Readonly<Record<ContainerKind, Constructor>> = Object.freeze({
    'set': Set,
    'default-mapping': DefaultMap,
    'deque': Deque,
    'mapping': Map,
    'frozen-set': FrozenSet,
    'sequence': Array,
});

const CONTAINER_FACTORIES: { readonly [K in ContainerKind]: () => ContainerInstances[K] } = Object.freeze({
    'set': () => new Set<unknown>(),
    'default-mapping': () => new DefaultMap<unknown, unknown>(),
    'deque': () => new Deque<unknown>(),
    'mapping': () => new Map<unknown, unknown>(),
    'frozen-set': () => new FrozenSet<unknown>(),
    'sequence': () => [],
});

/**
 * Abstract and concrete container origins → container kind.
 *
 * Tuples resolve to `sequence`: arrays are the only ordered,
 * instantiable sequence the runtime has.
 */
const CONTAINER_KINDS: ReadonlyMap<TypeOrigin, ContainerKind> = new Map<TypeOrigin, ContainerKind>([
    // Abstract spellings
    [AbstractSet, 'set'],
    [MutableSet, 'set'],
    [Mapping, 'mapping'],
    [MutableMapping, 'mapping'],
    [Dict, 'mapping'],
    [Sequence, 'sequence'],
    [MutableSequence, 'sequence'],
    [List, 'sequence'],
    [Tuple, 'sequence'],
    // Concrete classes map to themselves
    [Set, 'set'],
    [FrozenSet, 'frozen-set'],
    [Map, 'mapping'],
    [DefaultMap, 'default-mapping'],
    [Deque, 'deque'],
    [Array, 'sequence'],
]);

/** Entries of the container table, in registration order */
export const CONTAINER_TABLE: ReadonlyArray<readonly [TypeOrigin, ContainerKind]> = Object.freeze(
    [...CONTAINER_KINDS].map(entry => Object.freeze(entry)),
);

/** Container kind registered for `origin`, or `undefined` for unknown origins */
export function lookupContainerKind(origin: unknown): ContainerKind | undefined {
    if (isConstructor(origin) || origin instanceof AbstractType || origin instanceof SpecialForm) {
        return CONTAINER_KINDS.get(origin);
    }
    return undefined;
}

export function containerConstructorOf(kind: ContainerKind): Constructor {
    return CONTAINER_CONSTRUCTORS[kind];
}

/**
 * Build an empty instance of a container kind.
 *
 * @example
 * ```typescript
 * instantiateContainer('deque');    // Deque {}
 * instantiateContainer('sequence'); // []
 * ```
 */
export function instantiateContainer<K extends ContainerKind>(kind: K): ContainerInstances[K] {
    return CONTAINER_FACTORIES[kind]();
}
