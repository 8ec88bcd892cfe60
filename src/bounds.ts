import { SizeError, SubscriptError } from './errors';

/**
 * Largest supported length. V8 keeps arrays up to this size in packed element
 * storage; beyond it they fall back to dictionary storage and exhaust the heap.
 */
export const maxLen = 2 ** 26;

export function isValidLength(n: number): boolean {
    return Number.isInteger(n) && n >= 0 && n <= maxLen;
}

/** @throws SizeError */
export function checkSize(n: number): void {
    if (!isValidLength(n)) throw new SizeError(n, maxLen);
}

/** @throws SubscriptError unless `0 <= i < length` */
export function checkSubscript(i: number, length: number): void {
    if (!Number.isInteger(i) || i < 0 || i >= length) {
        throw new SubscriptError(i, length);
    }
}

/**
 * Validates the destination range `[start, start + count)` of a copy.
 * @throws SubscriptError
 */
export function checkRange(start: number, count: number, length: number): void {
    if (!Number.isInteger(start) || start < 0 || start + count > length) {
        throw new SubscriptError(start, length);
    }
}
