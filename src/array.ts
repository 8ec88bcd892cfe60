/**
 * @module array
 * Fixed-length mutable arrays with identity semantics.
 *
 * * Contracts:
 * - Length is fixed at construction, `0 <= length <= maxLen`.
 * - Equality is identity: every construction call yields a new array that is
 *   equal only to itself, even when it is empty.
 * - Writes are immediate and visible through every alias.
 * - Callbacks run in a fixed index order; search operations stop at the first
 *   decisive element.
 */

import { checkRange, checkSize, checkSubscript, maxLen } from './bounds';
import type { Structural } from './hash';
import { collateSequences } from './order';
import type { Comparator, Order } from './order';
import { Vector } from './vector';

export { maxLen };

export interface CopyArgs<T> {
    src: FixedArray<T>;
    dst: FixedArray<T>;
    startIndex: number;
}

export interface CopyVecArgs<T> {
    src: Vector<T>;
    dst: FixedArray<T>;
    startIndex: number;
}

// ============================================================================
// 1. FIXED ARRAY
// ============================================================================

export class FixedArray<T> implements Structural, Iterable<T> {
    static #nextId = 1;

    readonly #slots: T[];
    readonly #id: number;

    private constructor(slots: T[]) {
        this.#slots = slots;
        this.#id = FixedArray.#nextId++;
    }

    /**
     * Allocates `n` slots, each holding `init`.
     * @throws SizeError
     */
    static array<T>(n: number, init: T): FixedArray<T> {
        checkSize(n);
        const slots: T[] = [];
        for (let i = 0; i < n; i++) slots.push(init);
        return new FixedArray(slots);
    }

    /** @throws SizeError if there are more than `maxLen` items */
    static fromList<T>(items: Iterable<T>): FixedArray<T> {
        const slots = Array.from(items);
        checkSize(slots.length);
        return new FixedArray(slots);
    }

    /**
     * Slot `i` is initialized to `f(i)`. `f` runs once per index, ascending,
     * and each result is stored before the next call.
     * @throws SizeError before `f` is called
     */
    static tabulate<T>(n: number, f: (i: number) => T): FixedArray<T> {
        checkSize(n);
        const slots: T[] = [];
        for (let i = 0; i < n; i++) slots.push(f(i));
        return new FixedArray(slots);
    }

    get length(): number { return this.#slots.length; }

    /**
     * Allocation tag. Distinct for every array ever constructed, so it doubles
     * as a hash code consistent with identity equality.
     */
    get hashCode(): number { return this.#id; }

    /** @throws SubscriptError */
    sub(i: number): T {
        checkSubscript(i, this.#slots.length);
        return this.#slots[i];
    }

    /** @throws SubscriptError */
    update(i: number, x: T): void {
        checkSubscript(i, this.#slots.length);
        this.#slots[i] = x;
    }

    /** Snapshot of the current contents. */
    vector(): Vector<T> {
        const slots = this.#slots;
        const out: T[] = [];
        for (let i = 0; i < slots.length; i++) out.push(slots[i]);
        return new Vector(out);
    }

    /**
     * Writes `src[i]` to `dst[startIndex + i]` for every index of `src`.
     * @throws SubscriptError if the range does not fit `dst`; nothing is written
     */
    static copy<T>({ src, dst, startIndex }: CopyArgs<T>): void {
        const from = src.#slots;
        const to = dst.#slots;
        checkRange(startIndex, from.length, to.length);
        // Same storage: the range check only admits startIndex 0.
        if (from === to) return;
        for (let i = 0; i < from.length; i++) to[startIndex + i] = from[i];
    }

    /** @throws SubscriptError if the range does not fit `dst`; nothing is written */
    static copyVec<T>({ src, dst, startIndex }: CopyVecArgs<T>): void {
        const from = src.raw;
        const to = dst.#slots;
        checkRange(startIndex, from.length, to.length);
        for (let i = 0; i < from.length; i++) to[startIndex + i] = from[i];
    }

    // === Traversal ===

    app(f: (x: T) => void): void {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) f(slots[i]);
    }

    appi(f: (i: number, x: T) => void): void {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) f(i, slots[i]);
    }

    /** Slot `i` is rewritten before `f` sees slot `i + 1`. */
    modify(f: (x: T) => T): void {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) slots[i] = f(slots[i]);
    }

    modifyi(f: (i: number, x: T) => T): void {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) slots[i] = f(i, slots[i]);
    }

    foldl<A>(f: (x: T, acc: A) => A, init: A): A {
        const slots = this.#slots;
        let acc = init;
        for (let i = 0; i < slots.length; i++) acc = f(slots[i], acc);
        return acc;
    }

    foldli<A>(f: (i: number, x: T, acc: A) => A, init: A): A {
        const slots = this.#slots;
        let acc = init;
        for (let i = 0; i < slots.length; i++) acc = f(i, slots[i], acc);
        return acc;
    }

    foldr<A>(f: (x: T, acc: A) => A, init: A): A {
        const slots = this.#slots;
        let acc = init;
        for (let i = slots.length - 1; i >= 0; i--) acc = f(slots[i], acc);
        return acc;
    }

    foldri<A>(f: (i: number, x: T, acc: A) => A, init: A): A {
        const slots = this.#slots;
        let acc = init;
        for (let i = slots.length - 1; i >= 0; i--) acc = f(i, slots[i], acc);
        return acc;
    }

    // === Search ===

    find(f: (x: T) => boolean): T | undefined {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) {
            const x = slots[i];
            if (f(x)) return x;
        }
        return undefined;
    }

    findi(f: (i: number, x: T) => boolean): [number, T] | undefined {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) {
            const x = slots[i];
            if (f(i, x)) return [i, x];
        }
        return undefined;
    }

    exists(f: (x: T) => boolean): boolean {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) {
            if (f(slots[i])) return true;
        }
        return false;
    }

    all(f: (x: T) => boolean): boolean {
        const slots = this.#slots;
        for (let i = 0; i < slots.length; i++) {
            if (!f(slots[i])) return false;
        }
        return true;
    }

    // === Comparison ===

    /** Lexicographic. Arrays of different lengths are fine. */
    collate(cmp: Comparator<T>, other: FixedArray<T>): Order {
        const a = this.#slots;
        const b = other.#slots;
        return collateSequences(cmp, a.length, i => a[i], b.length, i => b[i]);
    }

    /** Identity: true only for the very same array. */
    equals(other: unknown): boolean {
        return this === other;
    }

    *[Symbol.iterator](): Iterator<T> { yield* this.#slots; }

    toString(): string {
        return `[${this.#slots.map(String).join(', ')}]`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 2. FUNCTIONAL API
// ============================================================================

export function array<T>(n: number, init: T): FixedArray<T> { return FixedArray.array(n, init); }
export function fromList<T>(items: Iterable<T>): FixedArray<T> { return FixedArray.fromList(items); }
export function tabulate<T>(n: number, f: (i: number) => T): FixedArray<T> { return FixedArray.tabulate(n, f); }

export function length<T>(a: FixedArray<T>): number { return a.length; }
export function sub<T>(a: FixedArray<T>, i: number): T { return a.sub(i); }
export function update<T>(a: FixedArray<T>, i: number, x: T): void { a.update(i, x); }

/** Identity comparison of two array handles. */
export function same<T>(a1: FixedArray<T>, a2: FixedArray<T>): boolean { return a1.equals(a2); }

export function vector<T>(a: FixedArray<T>): Vector<T> { return a.vector(); }
export function copy<T>(args: CopyArgs<T>): void { FixedArray.copy(args); }
export function copyVec<T>(args: CopyVecArgs<T>): void { FixedArray.copyVec(args); }

export function app<T>(f: (x: T) => void, a: FixedArray<T>): void { a.app(f); }
export function appi<T>(f: (i: number, x: T) => void, a: FixedArray<T>): void { a.appi(f); }
export function modify<T>(f: (x: T) => T, a: FixedArray<T>): void { a.modify(f); }
export function modifyi<T>(f: (i: number, x: T) => T, a: FixedArray<T>): void { a.modifyi(f); }

export function foldl<T, A>(f: (x: T, acc: A) => A, init: A, a: FixedArray<T>): A { return a.foldl(f, init); }
export function foldli<T, A>(f: (i: number, x: T, acc: A) => A, init: A, a: FixedArray<T>): A { return a.foldli(f, init); }
export function foldr<T, A>(f: (x: T, acc: A) => A, init: A, a: FixedArray<T>): A { return a.foldr(f, init); }
export function foldri<T, A>(f: (i: number, x: T, acc: A) => A, init: A, a: FixedArray<T>): A { return a.foldri(f, init); }

export function find<T>(f: (x: T) => boolean, a: FixedArray<T>): T | undefined { return a.find(f); }
export function findi<T>(f: (i: number, x: T) => boolean, a: FixedArray<T>): [number, T] | undefined { return a.findi(f); }
export function exists<T>(f: (x: T) => boolean, a: FixedArray<T>): boolean { return a.exists(f); }
export function all<T>(f: (x: T) => boolean, a: FixedArray<T>): boolean { return a.all(f); }

export function collate<T>(cmp: Comparator<T>, a1: FixedArray<T>, a2: FixedArray<T>): Order { return a1.collate(cmp, a2); }
