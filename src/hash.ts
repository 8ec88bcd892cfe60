/**
 * @module hash
 * Hashing and equality for the values a sequence can hold.
 *
 * * Contract:
 * - Primitives compare with `===` and hash by content.
 * - Objects implementing `Structural` decide their own equality. A `Vector`
 *   compares by content, a `FixedArray` by identity.
 * - Anything else compares by reference and hashes to 0.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Interface for objects that define their own equality.
 * Equal objects MUST report equal hash codes.
 */
export interface Structural {
    readonly hashCode: number;
    equals(other: unknown): boolean;
}

export function isStructural(v: unknown): v is Structural {
    return typeof v === 'object' && v !== null
        && 'equals' in v && typeof v.equals === 'function'
        && 'hashCode' in v && typeof v.hashCode === 'number';
}

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

const FNV_PRIME = 0x01000193;
const FNV_OFFSET = 0x811c9dc5;
const TRUE_HASH = 1231;
const FALSE_HASH = 1237;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

/**
 * Integers are bit-mixed directly, floats through their IEEE-754 words.
 */
function hashNumber(val: number): number {
    if ((val | 0) === val) {
        let h = val | 0;
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        return (h >> 16) ^ h;
    }
    // one bit pattern for every NaN
    view.setFloat64(0, Number.isNaN(val) ? NaN : val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h | 0;
}

/** FNV-1a */
function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h | 0;
}

/**
 * Computes a 32-bit hash code for any value.
 * Consistent with `areEqual`: equal values hash alike.
 */
export function hashValue(v: unknown): number {
    if (typeof v === 'number') return hashNumber(v);
    if (typeof v === 'string') return hashString(v);
    if (typeof v === 'boolean') return v ? TRUE_HASH : FALSE_HASH;
    if (isStructural(v)) return v.hashCode;
    return 0;
}

/**
 * Order-dependent combination of element hashes (31-multiplier scheme).
 */
export function hashSequence(length: number, at: (i: number) => unknown): number {
    let h = 1;
    for (let i = 0; i < length; i++) {
        h = (Math.imul(h, 31) + hashValue(at(i))) | 0;
    }
    return h;
}

// ============================================================================
// 3. EQUALITY
// ============================================================================

/**
 * `===`, except that `NaN` equals `NaN` (matching `hashValue`, which hashes
 * every `NaN` alike). `0` and `-0` stay equal.
 */
export function areEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
    if (isStructural(a)) return a.equals(b);
    return false;
}
