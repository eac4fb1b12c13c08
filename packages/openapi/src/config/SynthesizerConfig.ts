/**
 * SynthesizerConfig — Configuration for the Schema Synthesizer
 *
 * Controls how descriptors are rendered: object totality, which
 * optional keywords are emitted, the `format` used for scalars without
 * a JSON type of their own, and how unknown types degrade.
 *
 * Can be loaded from a YAML file (`typeshape.yaml`) or passed programmatically.
 *
 * @module
 */

// ── Feature Toggles ──────────────────────────────────────

/**
 * Controls which optional keywords appear in synthesized schemas.
 * All fields default to `true`.
 */
export interface FeatureFlags {
    /** Emit `readOnly: true` for fields wrapped in `ReadOnly` */
    readonly readOnly: boolean;
    /** Emit `uniqueItems: true` for set and frozen-set fields */
    readonly uniqueItems: boolean;
    /** Use a bare string `Annotated` argument as the field description */
    readonly descriptions: boolean;
}

// ── Formats ──────────────────────────────────────────────

/** `format` keyword for scalars that JSON carries as another type */
export interface FormatConfig {
    /** Format of `BigInt` fields (type `integer`) */
    readonly bigint: string;
    /** Format of `Date` fields (type `string`) */
    readonly date: 'date-time' | 'date';
    /** Format of `Uint8Array` fields (type `string`) */
    readonly bytes: string;
}

// ── Full Config ──────────────────────────────────────────

/**
 * Complete synthesizer configuration.
 *
 * All fields have sensible defaults — see {@link DEFAULT_CONFIG}.
 */
export interface SynthesizerConfig {
    /** Whether unmarked object fields are required */
    readonly total: boolean;
    /**
     * Schema for types with no mapping:
     * - `'empty'`  — `{}` (any value)
     * - `'object'` — `{ type: 'object' }`
     */
    readonly unknownTypes: 'empty' | 'object';
    /** Prefix prepended to forward references to build a `$ref` */
    readonly refPrefix: string;
    /** Print debug events through `console.debug` when no observer is given */
    readonly debug: boolean;
    /** Optional keyword toggles */
    readonly features: FeatureFlags;
    /** Scalar formats */
    readonly formats: FormatConfig;
}

// ── Defaults ─────────────────────────────────────────────

/** Default configuration */
export const DEFAULT_CONFIG: SynthesizerConfig = {
    total: true,
    unknownTypes: 'empty',
    refPrefix: '#/components/schemas/',
    debug: false,
    features: {
        readOnly: true,
        uniqueItems: true,
        descriptions: true,
    },
    formats: {
        bigint: 'int64',
        date: 'date-time',
        bytes: 'binary',
    },
};

// ── Merge Helper ─────────────────────────────────────────

/**
 * Deep-merge a partial config with defaults.
 * Partial values override defaults at each level.
 */
export function mergeConfig(partial: PartialConfig): SynthesizerConfig {
    return {
        total: partial.total ?? DEFAULT_CONFIG.total,
        unknownTypes: partial.unknownTypes ?? DEFAULT_CONFIG.unknownTypes,
        refPrefix: partial.refPrefix ?? DEFAULT_CONFIG.refPrefix,
        debug: partial.debug ?? DEFAULT_CONFIG.debug,
        features: {
            readOnly: partial.features?.readOnly ?? DEFAULT_CONFIG.features.readOnly,
            uniqueItems: partial.features?.uniqueItems ?? DEFAULT_CONFIG.features.uniqueItems,
            descriptions: partial.features?.descriptions ?? DEFAULT_CONFIG.features.descriptions,
        },
        formats: {
            bigint: partial.formats?.bigint ?? DEFAULT_CONFIG.formats.bigint,
            date: partial.formats?.date ?? DEFAULT_CONFIG.formats.date,
            bytes: partial.formats?.bytes ?? DEFAULT_CONFIG.formats.bytes,
        },
    };
}

/** Partial config shape for merging */
export interface PartialConfig {
    readonly total?: boolean;
    readonly unknownTypes?: 'empty' | 'object';
    readonly refPrefix?: string;
    readonly debug?: boolean;
    readonly features?: Partial<FeatureFlags>;
    readonly formats?: Partial<FormatConfig>;
}
