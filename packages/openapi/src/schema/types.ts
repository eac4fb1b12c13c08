/**
 * Schema Types
 *
 * The subset of the OpenAPI 3.0 Schema Object produced by the
 * synthesizer. This is the only output contract of the package; the
 * surrounding document tree (paths, components, servers) belongs to
 * whichever generator consumes it.
 *
 * @module
 */
import type { LiteralValue } from '@typeshape/core';

/** Values of the `type` keyword */
export type SchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

/** OpenAPI 3.0 Schema Object (subset) */
export interface SchemaObject {
    readonly $ref?: string;
    readonly type?: SchemaType;
    readonly format?: string;
    readonly title?: string;
    readonly description?: string;
    readonly enum?: readonly LiteralValue[];
    readonly default?: unknown;
    readonly example?: unknown;
    readonly nullable?: boolean;
    readonly readOnly?: boolean;
    readonly deprecated?: boolean;

    // Numbers
    readonly minimum?: number;
    readonly maximum?: number;
    readonly exclusiveMinimum?: boolean;
    readonly exclusiveMaximum?: boolean;
    readonly multipleOf?: number;

    // Strings
    readonly minLength?: number;
    readonly maxLength?: number;
    readonly pattern?: string;

    // Arrays
    readonly items?: SchemaObject;
    readonly minItems?: number;
    readonly maxItems?: number;
    readonly uniqueItems?: boolean;

    // Objects
    readonly properties?: Readonly<Record<string, SchemaObject>>;
    readonly additionalProperties?: SchemaObject | boolean;
    readonly required?: readonly string[];

    // Composition
    readonly oneOf?: readonly SchemaObject[];
    readonly anyOf?: readonly SchemaObject[];
}
