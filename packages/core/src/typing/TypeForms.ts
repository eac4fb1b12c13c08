/**
 * TypeForms — Runtime Type Descriptor Algebra
 *
 * TypeScript erases its types, so field declarations that need to be
 * inspected at run time are written with descriptors instead:
 *
 * - plain constructors (`String`, `Number`, `Array`, `Map`, user classes)
 * - abstract container tokens (`Sequence`, `Mapping`, ...)
 * - special forms (`Annotated`, `Required`, `Literal`, ...)
 * - generic aliases built from any of the above
 * - forward references (a bare string naming a type)
 *
 * Every descriptor is immutable. Aliases are built once per declaration
 * and only ever read afterwards.
 *
 * @example
 * ```typescript
 * const tags = Sequence.of(String);
 * const age = Annotated.of(Int, { minimum: 0 }, 'Age in years');
 * const nick = NotRequired.of(String);
 * ```
 *
 * @module
 */

// ── Constructors ─────────────────────────────────────────

/**
 * Any runtime class usable as a descriptor.
 * `BigInt` is listed on its own: it has no construct signature.
 */
export type Constructor = (abstract new (...args: never[]) => unknown) | BigIntConstructor;

/** A bare string naming a type that is declared later */
export type ForwardRef = string;

/** Anything a {@link GenericAlias} can be parameterized over */
export type TypeOrigin = Constructor | AbstractType | SpecialForm;

/** Every value the inspection engine accepts as a type descriptor */
export type TypeDescriptor = TypeOrigin | GenericAlias | ForwardRef;

// ── Abstract Types ───────────────────────────────────────

/**
 * Nominal token for an abstract container shape.
 *
 * Membership is declared up front and never changes: `members` lists
 * every constructor (and, through the prototype chain, its subclasses)
 * that counts as an instance of the shape. `bases` lists the abstract
 * shapes this one refines.
 */
export class AbstractType {
    readonly kind = 'abstract' as const;
    readonly name: string;
    readonly bases: readonly AbstractType[];
    private readonly members: readonly Constructor[];

    constructor(name: string, members: readonly Constructor[], bases: readonly AbstractType[] = []) {
        this.name = name;
        this.members = Object.freeze([...members]);
        this.bases = Object.freeze([...bases]);
        Object.freeze(this);
    }

    /** Parameterize the token, e.g. `Sequence.of(Int)` */
    of(...args: readonly TypeDescriptor[]): GenericAlias {
        return new GenericAlias(this, args);
    }

    /** Whether `cls` (or one of its superclasses) is a declared member. */
    accepts(cls: Constructor): boolean {
        return this.members.some(member => isSubclassOf(cls, member));
    }

    /** Whether this token is `other` or refines it, directly or transitively. */
    refines(other: AbstractType): boolean {
        return this === other || this.bases.some(base => base.refines(other));
    }

    toString(): string {
        return this.name;
    }
}

// ── Special Forms ────────────────────────────────────────

/**
 * Argument shape a special form accepts:
 * - `type`               — exactly one type (`Required.of(String)`)
 * - `type-with-metadata` — one type plus at least one metadata value
 * - `values`             — one or more literal values
 * - `types`              — two or more types
 */
export type FormArity = 'type' | 'type-with-metadata' | 'values' | 'types';

/** Literal values accepted by {@link SpecialForm} forms of arity `values` */
export type LiteralValue = string | number | boolean;

/**
 * A type constructor with no runtime class of its own.
 *
 * Special forms only exist as the origin of a {@link GenericAlias};
 * `of()` checks the arguments against the form's arity and throws
 * `TypeError` on a malformed declaration.
 */
export class SpecialForm {
    readonly kind = 'special-form' as const;
    readonly name: string;
    readonly arity: FormArity;

    constructor(name: string, arity: FormArity) {
        this.name = name;
        this.arity = arity;
        Object.freeze(this);
    }

    of(...args: readonly unknown[]): GenericAlias {
        const problem = this.checkArgs(args);
        if (problem !== undefined) {
            throw new TypeError(`${this.name}.of() ${problem}`);
        }
        return new GenericAlias(this, args);
    }

    toString(): string {
        return this.name;
    }

    private checkArgs(args: readonly unknown[]): string | undefined {
        switch (this.arity) {
            case 'type':
                if (args.length !== 1) return `takes exactly one type argument, received ${args.length}`;
                return isTypeDescriptor(args[0]) ? undefined : `expects a type, received ${formatArgument(args[0])}`;

            case 'type-with-metadata':
                if (args.length < 2) return 'takes a type followed by at least one metadata argument';
                return isTypeDescriptor(args[0]) ? undefined : `expects a type first, received ${formatArgument(args[0])}`;

            case 'values': {
                if (args.length === 0) return 'takes at least one literal value';
                const bad = args.find(arg => !isLiteralValue(arg));
                return bad === undefined ? undefined : `accepts only string, number or boolean values, received ${formatArgument(bad)}`;
            }

            case 'types': {
                if (args.length < 2) return 'takes at least two type arguments';
                const bad = args.find(arg => !isTypeDescriptor(arg));
                return bad === undefined ? undefined : `expects types, received ${formatArgument(bad)}`;
            }
        }
    }
}

// ── Generic Aliases ──────────────────────────────────────

/**
 * A parameterized type: an origin plus its ordered arguments.
 *
 * For container origins the arguments are element types. For special
 * forms they follow the form's arity, so they may hold metadata values
 * that are not types at all.
 */
export class GenericAlias {
    readonly kind = 'generic-alias' as const;
    readonly origin: TypeOrigin;
    readonly args: readonly unknown[];

    constructor(origin: TypeOrigin, args: readonly unknown[]) {
        this.origin = origin;
        this.args = Object.freeze([...args]);
        Object.freeze(this);
    }

    toString(): string {
        return formatType(this);
    }
}

/**
 * Parameterize a constructor or abstract token.
 *
 * @example
 * ```typescript
 * generic(Map, String, Int);   // Map[String, Int]
 * generic(Deque, String);      // Deque[String]
 * ```
 */
export function generic(origin: Constructor | AbstractType, ...args: readonly TypeDescriptor[]): GenericAlias {
    return new GenericAlias(origin, args);
}

// ── Introspection ────────────────────────────────────────

/** The alias origin, or `undefined` for anything that is not a generic alias. */
export function getOrigin(descriptor: unknown): TypeOrigin | undefined {
    return descriptor instanceof GenericAlias ? descriptor.origin : undefined;
}

/** The alias arguments, or an empty list. */
export function getArgs(descriptor: unknown): readonly unknown[] {
    return descriptor instanceof GenericAlias ? descriptor.args : [];
}

export function isConstructor(value: unknown): value is Constructor {
    return typeof value === 'function';
}

/** Whether `value` is a class or an abstract token (the operands of {@link isSubtype}) */
export function isType(value: unknown): value is Constructor | AbstractType {
    return isConstructor(value) || value instanceof AbstractType;
}

export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
    return isType(value)
        || value instanceof SpecialForm
        || value instanceof GenericAlias
        || typeof value === 'string';
}

export function isLiteralValue(value: unknown): value is LiteralValue {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

// ── Subtyping ────────────────────────────────────────────

/** Prototype-chain subclass test between two constructors */
export function isSubclassOf(cls: Constructor, base: Constructor): boolean {
    if (cls === base) return true;
    const proto: unknown = cls.prototype;
    return typeof proto === 'object' && proto !== null && proto instanceof base;
}

/**
 * Whether `type` is a subtype of `bases` (or of any entry when given a list).
 *
 * - class vs class: prototype chain
 * - class vs abstract token: declared membership
 * - token vs token: declared refinement
 * - token vs class: never
 *
 * @throws TypeError when `type` or one of `bases` is not a type
 */
export function isSubtype(
    type: unknown,
    bases: Constructor | AbstractType | readonly (Constructor | AbstractType)[],
): boolean {
    if (!isType(type)) {
        throw new TypeError(`isSubtype() arg 1 must be a class or abstract type, received ${formatType(type)}`);
    }
    const subject: Constructor | AbstractType = type;
    const candidates: readonly unknown[] = Array.isArray(bases) ? bases : [bases];

    return candidates.some(base => {
        if (!isType(base)) {
            throw new TypeError(`isSubtype() arg 2 must contain only classes or abstract types, received ${formatType(base)}`);
        }
        if (base instanceof AbstractType) {
            return subject instanceof AbstractType ? subject.refines(base) : base.accepts(subject);
        }
        return isConstructor(subject) && isSubclassOf(subject, base);
    });
}

// ── Formatting ───────────────────────────────────────────

/**
 * Render a descriptor as a compact, bracketed label.
 *
 * @example
 * ```typescript
 * formatType(Annotated.of(Int, { minimum: 1 })); // 'Annotated[Int, {"minimum":1}]'
 * ```
 */
export function formatType(descriptor: unknown): string {
    if (descriptor instanceof GenericAlias) {
        const args = descriptor.args.map(arg => isTypeDescriptor(arg) ? formatType(arg) : formatArgument(arg));
        return `${formatType(descriptor.origin)}[${args.join(', ')}]`;
    }
    if (descriptor instanceof AbstractType || descriptor instanceof SpecialForm) return descriptor.name;
    if (isConstructor(descriptor)) return descriptor.name || '<anonymous class>';
    if (typeof descriptor === 'string') return `'${descriptor}'`;
    return formatArgument(descriptor);
}

function formatArgument(value: unknown): string {
    if (value === undefined) return 'undefined';
    if (typeof value === 'function') return value.name || '<anonymous function>';
    if (typeof value === 'symbol' || typeof value === 'bigint') return value.toString();
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        // circular structures
        return Object.prototype.toString.call(value);
    }
}
