/**
 * AnnotationNormalizer — Wrapper Stripping
 *
 * Reduces a descriptor to its bare type, the metadata attached along
 * the way, and the set of wrapper kinds that were peeled off:
 *
 * ```
 * ReadOnly[Annotated[Int, { minimum: 0 }, 'age']]
 *   → base: Int
 *     metadata: [{ minimum: 0 }, 'age']
 *     wrappers: {read-only, annotated}
 * ```
 *
 * Every layer is peeled, in any order and to any depth. Metadata keeps
 * the outer-to-inner order in which it was attached.
 *
 * @module
 */
import {
    type TypeDescriptor,
    getOrigin, getArgs, isTypeDescriptor, formatType,
} from '../typing/TypeForms.js';
import { type WrapperKind, wrapperKindOf } from '../registry/WrapperRegistry.js';
import type { InspectOptions } from '../observability/DebugObserver.js';

/** Result of {@link unwrap} */
export interface NormalizedType {
    /** The descriptor with every wrapper layer removed */
    readonly base: TypeDescriptor;
    /** Extra arguments of every wrapper layer, outermost layer first */
    readonly metadata: readonly unknown[];
    /** Every wrapper kind encountered; insertion order is outermost first */
    readonly wrappers: ReadonlySet<WrapperKind>;
}

/**
 * Strip `Annotated`, `Required`, `NotRequired` and `ReadOnly` layers.
 *
 * Never throws. A descriptor without a wrapper origin comes back
 * verbatim with empty metadata and wrappers, which makes the operation
 * idempotent on its own `base`.
 */
export function unwrap(descriptor: TypeDescriptor, options: InspectOptions = {}): NormalizedType {
    const wrappers = new Set<WrapperKind>();
    const metadata: unknown[] = [];

    let current: TypeDescriptor = descriptor;
    let kind = wrapperKindOf(getOrigin(current));

    while (kind !== undefined) {
        const [carried, ...extra] = getArgs(current);
        if (!isTypeDescriptor(carried)) {
            // Hand-built alias with no payload type: keep the layer as the base.
            options.debug?.({
                type: 'fallback',
                operation: 'unwrap',
                descriptor: formatType(current),
                reason: 'wrapper layer carries no type argument',
                timestamp: Date.now(),
            });
            break;
        }

        wrappers.add(kind);
        metadata.push(...extra);
        current = carried;
        kind = wrapperKindOf(getOrigin(current));
    }

    if (options.debug) {
        options.debug({
            type: 'unwrap',
            descriptor: formatType(descriptor),
            base: formatType(current),
            wrappers: [...wrappers],
            metadataCount: metadata.length,
            timestamp: Date.now(),
        });
    }

    return { base: current, metadata, wrappers };
}
