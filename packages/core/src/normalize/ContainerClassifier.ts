/**
 * ContainerClassifier — Scalar vs Array Decisions
 *
 * Looks through wrapper layers to find the container a descriptor
 * denotes, and decides whether it is a multi-value container: an
 * ordered or unordered collection of values that a schema renders as
 * `type: 'array'`.
 *
 * Nothing here throws. An unrecognised shape is answered with the most
 * conservative result (`undefined` / `false`) and reported as a
 * `fallback` debug event when an observer is attached.
 *
 * @module
 */
import {
    type AbstractType, type Constructor, type TypeDescriptor, type TypeOrigin,
    getOrigin, isType, isSubtype, formatType,
} from '../typing/TypeForms.js';
import { Deque, FrozenSet } from '../typing/builtins.js';
import { AbstractSet, List, Sequence, Tuple } from '../typing/forms.js';
import {
    type ContainerKind,
    CONTAINER_CONSTRUCTORS, isWrapperOrigin, lookupContainerKind,
} from '../registry/WrapperRegistry.js';
import { unwrap } from './AnnotationNormalizer.js';
import type { ClassifyOperation, InspectOptions } from '../observability/DebugObserver.js';

// ── Classification Tables ────────────────────────────────

/** Iterable, but rendered as scalars */
const STRING_TYPES: readonly Constructor[] = [String, Uint8Array];

/** Shapes rendered as arrays; mappings are not listed */
const MULTI_VALUE_TYPES: readonly (Constructor | AbstractType)[] = [
    Array, Set, FrozenSet, Deque,
    Sequence, List, Tuple, AbstractSet,
];

// ── Public API ───────────────────────────────────────────

/**
 * The origin type of a generic descriptor, looked through wrappers.
 *
 * Wrapped descriptors are unwrapped and their payload inspected
 * recursively, since the payload may itself be a generic container
 * (`Annotated[Map[String, List[Int]], ...]`). A known container origin
 * is replaced by its concrete constructor; an unknown one is returned
 * as is.
 *
 * @returns `undefined` when the descriptor is not a generic alias
 */
export function getOriginOrInnerType(descriptor: TypeDescriptor): TypeOrigin | undefined {
    const origin = getOrigin(descriptor);
    if (origin === undefined) return undefined;

    if (isWrapperOrigin(origin)) {
        return getOriginOrInnerType(unwrap(descriptor).base);
    }

    const kind = lookupContainerKind(origin);
    return kind !== undefined ? CONTAINER_CONSTRUCTORS[kind] : origin;
}

/**
 * Concrete container kind a descriptor denotes, looked through wrappers.
 *
 * @example
 * ```typescript
 * resolveEffectiveOrigin(Sequence.of(Int));                     // 'sequence'
 * resolveEffectiveOrigin(Annotated.of(Mapping.of(String, Int), 'x')); // 'mapping'
 * resolveEffectiveOrigin(generic(Promise, Int));                // undefined
 * ```
 */
export function resolveEffectiveOrigin(
    descriptor: TypeDescriptor,
    options: InspectOptions = {},
): ContainerKind | undefined {
    const type = effectiveType(descriptor);
    const kind = type === undefined ? undefined : lookupContainerKind(type);

    report(options, 'resolveEffectiveOrigin', descriptor, kind ?? 'none');
    return kind;
}

/**
 * Whether a descriptor should be rendered as an array schema.
 *
 * True for sequences, sets, frozen sets and deques, wrapped or not.
 * False for mappings, for strings and byte arrays (iterable, but
 * scalar), and for anything whose type cannot be tested.
 */
export function isMultiValue(descriptor: TypeDescriptor, options: InspectOptions = {}): boolean {
    const type = effectiveType(descriptor);
    if (type === undefined) {
        report(options, 'isMultiValue', descriptor, 'false');
        return false;
    }

    let result: boolean;
    try {
        result = !isSubtype(type, STRING_TYPES) && isSubtype(type, MULTI_VALUE_TYPES);
    } catch (err) {
        options.debug?.({
            type: 'fallback',
            operation: 'isMultiValue',
            descriptor: formatType(descriptor),
            reason: err instanceof Error ? err.message : String(err),
            timestamp: Date.now(),
        });
        result = false;
    }

    report(options, 'isMultiValue', descriptor, String(result));
    return result;
}

// ── Internal ─────────────────────────────────────────────

/**
 * Generic origin (through wrappers), else the unwrapped descriptor
 * itself when it is a plain class or abstract token.
 */
function effectiveType(descriptor: TypeDescriptor): TypeOrigin | undefined {
    const origin = getOriginOrInnerType(descriptor);
    if (origin !== undefined) return origin;

    const { base } = unwrap(descriptor);
    return isType(base) ? base : undefined;
}

function report(options: InspectOptions, operation: ClassifyOperation, descriptor: TypeDescriptor, result: string): void {
    if (!options.debug) return;
    options.debug({
        type: 'classify',
        operation,
        descriptor: formatType(descriptor),
        result,
        timestamp: Date.now(),
    });
}
