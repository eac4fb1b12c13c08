/**
 * Forms — Special Forms and Abstract Container Tokens
 *
 * The fixed vocabulary of non-class descriptors. All values here are
 * frozen at module load.
 *
 * @module
 */
import { AbstractType, SpecialForm } from './TypeForms.js';
import { Deque, FrozenSet } from './builtins.js';

// ── Wrapper Forms ────────────────────────────────────────

/** Attach metadata to a type: `Annotated.of(Int, { minimum: 0 })` */
export const Annotated = new SpecialForm('Annotated', 'type-with-metadata');

/** Mark an object field as required regardless of the object's totality */
export const Required = new SpecialForm('Required', 'type');

/** Mark an object field as optional regardless of the object's totality */
export const NotRequired = new SpecialForm('NotRequired', 'type');

/** Mark an object field as read-only */
export const ReadOnly = new SpecialForm('ReadOnly', 'type');

// ── Value Forms ──────────────────────────────────────────

/** One of a fixed set of literal values: `Literal.of('asc', 'desc')` */
export const Literal = new SpecialForm('Literal', 'values');

/** Any one of several types: `Union.of(String, Int)` */
export const Union = new SpecialForm('Union', 'types');

// ── Abstract Containers ──────────────────────────────────

// Strings and byte arrays are sequences too; callers that want
// collections only have to exclude them explicitly.
export const Sequence = new AbstractType('Sequence', [Array, String, Uint8Array, Deque]);
export const MutableSequence = new AbstractType('MutableSequence', [Array, Deque], [Sequence]);
export const List = new AbstractType('List', [Array], [MutableSequence]);
export const Tuple = new AbstractType('Tuple', [Array], [Sequence]);

export const AbstractSet = new AbstractType('AbstractSet', [Set, FrozenSet]);
export const MutableSet = new AbstractType('MutableSet', [Set], [AbstractSet]);

export const Mapping = new AbstractType('Mapping', [Map]);
export const MutableMapping = new AbstractType('MutableMapping', [Map], [Mapping]);
export const Dict = new AbstractType('Dict', [Map], [MutableMapping]);
