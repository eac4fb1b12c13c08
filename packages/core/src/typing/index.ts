/**
 * Typing — Barrel Export
 *
 * The runtime descriptor algebra.
 */
export {
    AbstractType, SpecialForm, GenericAlias,
    generic, getOrigin, getArgs,
    isConstructor, isType, isTypeDescriptor, isLiteralValue,
    isSubclassOf, isSubtype, formatType,
} from './TypeForms.js';
export type {
    Constructor, ForwardRef, TypeOrigin, TypeDescriptor,
    FormArity, LiteralValue,
} from './TypeForms.js';
export { Int, FrozenSet, Deque, DefaultMap } from './builtins.js';
export {
    Annotated, Required, NotRequired, ReadOnly, Literal, Union,
    Sequence, MutableSequence, List, Tuple,
    AbstractSet, MutableSet,
    Mapping, MutableMapping, Dict,
} from './forms.js';
