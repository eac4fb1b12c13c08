/**
 * Observability — Barrel Export
 *
 * Public API for debug observers.
 */
export { createDebugObserver } from './DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn, InspectOptions,
    UnwrapEvent, ClassifyEvent, ClassifyOperation, FallbackEvent,
    SynthesizeEvent, ConfigEvent,
} from './DebugObserver.js';
