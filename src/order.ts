// ============================================================================
// ORDER
// ============================================================================

/**
 * Result of a three-way comparison.
 * Same sign convention as an `Array.prototype.sort` comparator.
 */
export type Order = -1 | 0 | 1;

export const LESS = -1;
export const EQUAL = 0;
export const GREATER = 1;

export type Comparator<T> = (a: T, b: T) => Order;

/** Sign of `n` as an `Order`. `NaN` maps to `EQUAL`. */
export function toOrder(n: number): Order {
    if (n < 0) return LESS;
    if (n > 0) return GREATER;
    return EQUAL;
}

export function intCompare(a: number, b: number): Order {
    return a < b ? LESS : a > b ? GREATER : EQUAL;
}

/** Compares by UTF-16 code units, like `<` on strings. */
export function stringCompare(a: string, b: string): Order {
    return a < b ? LESS : a > b ? GREATER : EQUAL;
}

/**
 * Lexicographic walk over two indexed sequences.
 * Returns the first non-EQUAL element result; on a common prefix the shorter
 * sequence is LESS.
 */
export function collateSequences<T>(
    cmp: Comparator<T>,
    lenA: number,
    atA: (i: number) => T,
    lenB: number,
    atB: (i: number) => T
): Order {
    const len = lenA < lenB ? lenA : lenB;
    for (let i = 0; i < len; i++) {
        const diff = cmp(atA(i), atB(i));
        if (diff !== EQUAL) return diff;
    }
    return intCompare(lenA, lenB);
}
