/**
 * @module fixed-array
 * Fixed-length mutable arrays with identity equality, and their read-only,
 * structurally compared counterpart `Vector`.
 *
 * * Usage:
 * ```ts
 * import { Arrays, intCompare } from 'fixed-array';
 *
 * const a = Arrays.fromList([1, 2]);
 * Arrays.update(a, 0, 5);
 * Arrays.collate(intCompare, a, Arrays.fromList([1, 2, 3])); // GREATER
 * ```
 */

export * as Arrays from './array';
export * as Vectors from './vector';

export { FixedArray } from './array';
export type { CopyArgs, CopyVecArgs } from './array';
export { Vector } from './vector';
export { maxLen } from './bounds';

export {
    ArrayError,
    ArrayErrorCode,
    SizeError,
    SubscriptError,
    isSizeError,
    isSubscriptError,
} from './errors';
export type { ArrayErrorMetaData, ArrayErrorObject, SizeErrorType, SubscriptErrorType } from './errors';

export { areEqual, hashValue, isStructural } from './hash';
export type { Structural } from './hash';

export { EQUAL, GREATER, LESS, intCompare, stringCompare, toOrder } from './order';
export type { Comparator, Order } from './order';
