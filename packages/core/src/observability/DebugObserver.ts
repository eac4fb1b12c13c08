/**
 * DebugObserver — Opt-in Observability for Type Inspection
 *
 * Provides structured, typed debug events emitted by the normalizer,
 * the container classifier, the schema synthesizer and the config
 * loader. When no observer is attached (the default) nothing is built
 * or printed.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { createDebugObserver, unwrap } from '@typeshape/core';
 *
 * // Default: pretty console.debug output
 * const debug = createDebugObserver();
 * unwrap(ReadOnly.of(Annotated.of(Int, 'age')), { debug });
 *
 * // Custom handler (e.g. collect in a test)
 * const events: DebugEvent[] = [];
 * const collect = createDebugObserver((event) => events.push(event));
 * ```
 *
 * @module
 */
import type { WrapperKind } from '../registry/WrapperRegistry.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted after a descriptor has been stripped of its wrapper layers. */
export interface UnwrapEvent {
    readonly type: 'unwrap';
    /** Label of the descriptor as received */
    readonly descriptor: string;
    /** Label of the bare type left after unwrapping */
    readonly base: string;
    /** Wrapper kinds peeled off, outermost first */
    readonly wrappers: readonly WrapperKind[];
    readonly metadataCount: number;
    readonly timestamp: number;
}

/** Operations of the container classifier */
export type ClassifyOperation = 'resolveEffectiveOrigin' | 'isMultiValue';

/** Emitted with the answer of a classifier operation. */
export interface ClassifyEvent {
    readonly type: 'classify';
    readonly operation: ClassifyOperation;
    readonly descriptor: string;
    /** The answer, rendered as text (`'sequence'`, `'true'`, `'none'`) */
    readonly result: string;
    readonly timestamp: number;
}

/**
 * Emitted when a descriptor has a shape the engine cannot interpret
 * and the most conservative answer was returned instead.
 */
export interface FallbackEvent {
    readonly type: 'fallback';
    readonly operation: ClassifyOperation | 'unwrap' | 'synthesize';
    readonly descriptor: string;
    readonly reason: string;
    readonly timestamp: number;
}

/** Emitted when the schema synthesizer renders one descriptor. */
export interface SynthesizeEvent {
    readonly type: 'synthesize';
    readonly descriptor: string;
    /** Schema `type` keyword of the result, `'any'` when it has none */
    readonly schemaType: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a configuration has been resolved. */
export interface ConfigEvent {
    readonly type: 'config';
    /** Absolute path of the file read, or `'defaults'` */
    readonly source: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling:
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'unwrap':     // UnwrapEvent
 *         case 'classify':   // ClassifyEvent
 *         case 'fallback':   // FallbackEvent
 *         case 'synthesize': // SynthesizeEvent
 *         case 'config':     // ConfigEvent
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | UnwrapEvent
    | ClassifyEvent
    | FallbackEvent
    | SynthesizeEvent
    | ConfigEvent;

/**
 * Observer function that receives debug events.
 *
 * This is a simple function type — no class, no inheritance.
 * Pass it as the `debug` option of any inspection call.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

/** Options accepted by every inspection operation */
export interface InspectOptions {
    readonly debug?: DebugObserverFn;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with pretty console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler produces compact, readable output:
 *
 * ```
 * [typeshape] unwrap     ReadOnly[Annotated[Int, 'age']] → Int {read-only, annotated} 1 meta
 * [typeshape] classify   isMultiValue Sequence[Int] = true
 * [typeshape] fallback   isMultiValue Literal['a']: isSubtype() arg 1 must be ...
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[typeshape]';

        switch (event.type) {
            case 'unwrap': {
                const wrappers = event.wrappers.length > 0 ? ` {${event.wrappers.join(', ')}}` : '';
                console.debug(`${prefix} unwrap     ${event.descriptor} → ${event.base}${wrappers} ${event.metadataCount} meta`);
                break;
            }

            case 'classify':
                console.debug(`${prefix} classify   ${event.operation} ${event.descriptor} = ${event.result}`);
                break;

            case 'fallback':
                console.debug(`${prefix} fallback   ${event.operation} ${event.descriptor}: ${event.reason}`);
                break;

            case 'synthesize':
                console.debug(`${prefix} synthesize ${event.descriptor} → ${event.schemaType} ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'config':
                console.debug(`${prefix} config     ${event.source}`);
                break;
        }
    };
}
