/**
 * Normalize — Barrel Export
 *
 * The annotation normalizer and the container classifier.
 */
export { unwrap } from './AnnotationNormalizer.js';
export type { NormalizedType } from './AnnotationNormalizer.js';
export { getOriginOrInnerType, resolveEffectiveOrigin, isMultiValue } from './ContainerClassifier.js';
