/**
 * SchemaSynthesizer — Type Descriptors → OpenAPI Schema Objects
 *
 * Renders field descriptors into OpenAPI 3.0 schemas, using the
 * normalizer to find the bare type and the classifier to decide between
 * array, map and scalar shapes:
 *
 * ```typescript
 * const synth = new SchemaSynthesizer();
 * synth.schemaFor(ReadOnly.of(Annotated.of(Sequence.of(Int), { maxItems: 10 })));
 * // → { type: 'array', items: { type: 'integer' }, maxItems: 10, readOnly: true }
 * ```
 *
 * Key design decisions:
 * - Wrapper semantics are read from the normalized wrapper set only
 * - The outermost `Required` / `NotRequired` marker decides presence
 * - Forward references become `$ref` under `refPrefix`
 * - Unknown types degrade to `{}` (configurable) and never throw
 *
 * @module
 */
import {
    type Constructor, type ContainerKind, type DebugObserverFn, type InspectOptions,
    type LiteralValue, type NormalizedType, type TypeDescriptor, type WrapperKind,
    Int, Literal, Tuple, Union,
    createDebugObserver, formatType, getArgs, getOrigin,
    isConstructor, isLiteralValue, isMultiValue, isSubclassOf, isTypeDescriptor,
    resolveEffectiveOrigin, unwrap,
} from '@typeshape/core';
import { mergeConfig, type PartialConfig, type SynthesizerConfig } from '../config/SynthesizerConfig.js';
import { collectConstraints } from './SchemaConstraints.js';
import type { SchemaObject, SchemaType } from './types.js';

// ── Types ────────────────────────────────────────────────

/** Everything the synthesizer learned about one field */
export interface FieldDescription {
    readonly schema: SchemaObject;
    /** `true` for `Required`, `false` for `NotRequired`, `undefined` when unmarked */
    readonly required: boolean | undefined;
    readonly readOnly: boolean;
    readonly multiValue: boolean;
    readonly container: ContainerKind | undefined;
}

export interface ObjectSchemaOptions {
    /** Overrides the configured totality for this object */
    readonly total?: boolean;
    readonly title?: string;
    readonly description?: string;
}

/** Field name → descriptor */
export type FieldMap = Readonly<Record<string, TypeDescriptor>>;

// ── Scalar Table ─────────────────────────────────────────

type ScalarFormat = keyof SynthesizerConfig['formats'];

interface ScalarMapping {
    readonly type: SchemaType;
    readonly format?: ScalarFormat;
}

/** Ordered: subclasses are matched against the first base that fits */
const SCALARS: ReadonlyArray<readonly [Constructor, ScalarMapping]> = [
    [Int, { type: 'integer' }],
    [Number, { type: 'number' }],
    [String, { type: 'string' }],
    [Boolean, { type: 'boolean' }],
    [BigInt, { type: 'integer', format: 'bigint' }],
    [Date, { type: 'string', format: 'date' }],
    [Uint8Array, { type: 'string', format: 'bytes' }],
];

// ── Synthesizer ──────────────────────────────────────────

export class SchemaSynthesizer {
    readonly config: SynthesizerConfig;
    private readonly debug: DebugObserverFn | undefined;

    constructor(config: PartialConfig = {}, options: InspectOptions = {}) {
        this.config = mergeConfig(config);
        this.debug = options.debug ?? (this.config.debug ? createDebugObserver() : undefined);
    }

    /** Schema of a single descriptor */
    schemaFor(descriptor: TypeDescriptor): SchemaObject {
        return this.describeField(descriptor).schema;
    }

    /**
     * Full description of a field: its schema plus the presence,
     * read-only and container facts the schema was built from.
     */
    describeField(descriptor: TypeDescriptor): FieldDescription {
        const started = performance.now();
        const inspect: InspectOptions = { debug: this.debug };

        const normalized = unwrap(descriptor, inspect);
        const container = resolveEffectiveOrigin(descriptor, inspect);
        const multiValue = isMultiValue(descriptor, inspect);
        const readOnly = normalized.wrappers.has('read-only');

        const constraints = collectConstraints(normalized.metadata, {
            debug: this.debug,
            stringsAsDescription: this.config.features.descriptions,
        });

        let schema: SchemaObject = {
            ...this.render(normalized, container, multiValue),
            ...constraints,
        };
        if (readOnly && this.config.features.readOnly) {
            schema = { ...schema, readOnly: true };
        }

        this.debug?.({
            type: 'synthesize',
            descriptor: formatType(descriptor),
            schemaType: schema.type ?? 'any',
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });

        return {
            schema,
            required: presenceOf(normalized.wrappers),
            readOnly,
            multiValue,
            container,
        };
    }

    /**
     * Object schema of a set of named fields.
     *
     * A field is listed in `required` when marked `Required`, or when
     * unmarked and the object is total. `NotRequired` always wins over
     * totality.
     */
    objectSchema(fields: FieldMap, options: ObjectSchemaOptions = {}): SchemaObject {
        const total = options.total ?? this.config.total;
        const entries: [string, SchemaObject][] = [];
        const required: string[] = [];

        for (const [name, descriptor] of Object.entries(fields)) {
            const field = this.describeField(descriptor);
            entries.push([name, field.schema]);
            if (field.required ?? total) required.push(name);
        }
        // own properties, `__proto__` included
        const properties: Record<string, SchemaObject> = Object.fromEntries(entries);

        return {
            type: 'object',
            ...(options.title !== undefined ? { title: options.title } : {}),
            ...(options.description !== undefined ? { description: options.description } : {}),
            properties,
            ...(required.length > 0 ? { required } : {}),
        };
    }

    /**
     * Schemas for a `components.schemas` section, one per model.
     * Forward references between models resolve against these names.
     */
    componentSchemas(models: Readonly<Record<string, FieldMap>>): Record<string, SchemaObject> {
        return Object.fromEntries(
            Object.entries(models).map(([name, fields]): [string, SchemaObject] => [name, this.objectSchema(fields, { title: name })]),
        );
    }

    // ── Rendering ────────────────────────────────────────

    private render(normalized: NormalizedType, container: ContainerKind | undefined, multiValue: boolean): SchemaObject {
        const { base } = normalized;

        if (typeof base === 'string') {
            return { $ref: `${this.config.refPrefix}${base}` };
        }

        const origin = getOrigin(base);
        const args = getArgs(base);

        if (origin === Literal) return renderLiteral(args.filter(isLiteralValue));
        if (origin === Union) {
            return { anyOf: args.filter(isTypeDescriptor).map(member => this.schemaFor(member)) };
        }

        if (multiValue) return this.renderArray(origin === Tuple, args, container);

        if (container === 'mapping' || container === 'default-mapping') {
            const value = args[1];
            return isTypeDescriptor(value)
                ? { type: 'object', additionalProperties: this.schemaFor(value) }
                : { type: 'object' };
        }

        if (origin === undefined && isConstructor(base)) {
            const scalar = this.renderScalar(base);
            if (scalar) return scalar;
        }

        this.debug?.({
            type: 'fallback',
            operation: 'synthesize',
            descriptor: formatType(base),
            reason: 'no schema mapping for this type',
            timestamp: Date.now(),
        });
        return this.config.unknownTypes === 'object' ? { type: 'object' } : {};
    }

    private renderArray(tuple: boolean, args: readonly unknown[], container: ContainerKind | undefined): SchemaObject {
        const members = args.filter(isTypeDescriptor);
        const unique = this.config.features.uniqueItems && (container === 'set' || container === 'frozen-set')
            ? { uniqueItems: true }
            : {};

        if (tuple && members.length > 0) {
            return {
                type: 'array',
                items: oneOfDistinct(members.map(member => this.schemaFor(member))),
                minItems: members.length,
                maxItems: members.length,
                ...unique,
            };
        }

        const [item] = members;
        return {
            type: 'array',
            items: item !== undefined ? this.schemaFor(item) : {},
            ...unique,
        };
    }

    private renderScalar(cls: Constructor): SchemaObject | undefined {
        const match = SCALARS.find(([candidate]) => candidate === cls)
            ?? SCALARS.find(([candidate]) => isSubclassOf(cls, candidate));
        if (!match) return undefined;

        const [, mapping] = match;
        return mapping.format !== undefined
            ? { type: mapping.type, format: this.config.formats[mapping.format] }
            : { type: mapping.type };
    }
}

// ── Internal ─────────────────────────────────────────────

function presenceOf(wrappers: ReadonlySet<WrapperKind>): boolean | undefined {
    for (const kind of wrappers) {
        if (kind === 'required') return true;
        if (kind === 'not-required') return false;
    }
    return undefined;
}

function renderLiteral(values: readonly LiteralValue[]): SchemaObject {
    const type = literalType(values);
    return type !== undefined ? { type, enum: values } : { enum: values };
}

function literalType(values: readonly LiteralValue[]): SchemaType | undefined {
    if (values.every(v => typeof v === 'string')) return 'string';
    if (values.every(v => typeof v === 'boolean')) return 'boolean';
    if (values.every(v => typeof v === 'number')) {
        return values.every(v => Number.isInteger(v)) ? 'integer' : 'number';
    }
    return undefined;
}

/** One schema when every member renders the same, else a `oneOf` of the distinct ones */
function oneOfDistinct(schemas: readonly SchemaObject[]): SchemaObject {
    const seen = new Map<string, SchemaObject>();
    for (const schema of schemas) {
        const key = JSON.stringify(schema);
        if (!seen.has(key)) seen.set(key, schema);
    }
    const distinct = [...seen.values()];
    const [only] = distinct;
    return distinct.length === 1 && only !== undefined ? only : { oneOf: distinct };
}
