/**
 * @module vector
 * Immutable, fixed-length sequences with value semantics.
 *
 * A `Vector` is the read-only counterpart of `FixedArray`: it is what an array
 * converts to, and what `copyVec` copies from. Two vectors are equal when
 * their elements are pairwise equal (see `areEqual`).
 */

import { checkSize, checkSubscript, maxLen } from './bounds';
import { SizeError } from './errors';
import { areEqual, hashSequence } from './hash';
import type { Structural } from './hash';
import { collateSequences } from './order';
import type { Comparator, Order } from './order';

export { maxLen };

// ============================================================================
// 1. VECTOR
// ============================================================================

export class Vector<T> implements Structural, Iterable<T> {
    readonly #elements: readonly T[];
    readonly #hashCode: number;

    /**
     * Copies `items` into frozen storage and computes the hash code once.
     * @throws SizeError if there are more than `maxLen` items
     */
    constructor(items: Iterable<T>) {
        const elements = Array.from(items);
        checkSize(elements.length);
        this.#elements = Object.freeze(elements);
        this.#hashCode = hashSequence(elements.length, i => elements[i]);
    }

    static fromList<T>(items: Iterable<T>): Vector<T> {
        return new Vector(items);
    }

    /**
     * Builds `[f(0), ..., f(n-1)]`, calling `f` in ascending index order.
     * @throws SizeError before `f` is called, if `n` is not a valid length
     */
    static tabulate<T>(n: number, f: (i: number) => T): Vector<T> {
        checkSize(n);
        const elements: T[] = [];
        for (let i = 0; i < n; i++) elements.push(f(i));
        return new Vector(elements);
    }

    static concat<T>(vs: Iterable<Vector<T>>): Vector<T> {
        const elements: T[] = [];
        for (const v of vs) {
            if (elements.length + v.length > maxLen) {
                throw new SizeError(elements.length + v.length, maxLen);
            }
            for (const x of v.#elements) elements.push(x);
        }
        return new Vector(elements);
    }

    get length(): number { return this.#elements.length; }

    /** The frozen backing store. */
    get raw(): readonly T[] { return this.#elements; }

    get hashCode(): number { return this.#hashCode; }

    /** @throws SubscriptError */
    sub(i: number): T {
        checkSubscript(i, this.#elements.length);
        return this.#elements[i];
    }

    /**
     * Returns a copy with slot `i` replaced by `x`. The receiver is unchanged.
     * @throws SubscriptError
     */
    update(i: number, x: T): Vector<T> {
        checkSubscript(i, this.#elements.length);
        const elements = this.#elements.slice();
        elements[i] = x;
        return new Vector(elements);
    }

    map<U>(f: (x: T) => U): Vector<U> {
        const src = this.#elements;
        return Vector.tabulate(src.length, i => f(src[i]));
    }

    mapi<U>(f: (i: number, x: T) => U): Vector<U> {
        const src = this.#elements;
        return Vector.tabulate(src.length, i => f(i, src[i]));
    }

    // === Traversal ===

    app(f: (x: T) => void): void {
        const src = this.#elements;
        for (let i = 0; i < src.length; i++) f(src[i]);
    }

    appi(f: (i: number, x: T) => void): void {
        const src = this.#elements;
        for (let i = 0; i < src.length; i++) f(i, src[i]);
    }

    foldl<A>(f: (x: T, acc: A) => A, init: A): A {
        const src = this.#elements;
        let acc = init;
        for (let i = 0; i < src.length; i++) acc = f(src[i], acc);
        return acc;
    }

    foldli<A>(f: (i: number, x: T, acc: A) => A, init: A): A {
        const src = this.#elements;
        let acc = init;
        for (let i = 0; i < src.length; i++) acc = f(i, src[i], acc);
        return acc;
    }

    foldr<A>(f: (x: T, acc: A) => A, init: A): A {
        const src = this.#elements;
        let acc = init;
        for (let i = src.length - 1; i >= 0; i--) acc = f(src[i], acc);
        return acc;
    }

    foldri<A>(f: (i: number, x: T, acc: A) => A, init: A): A {
        const src = this.#elements;
        let acc = init;
        for (let i = src.length - 1; i >= 0; i--) acc = f(i, src[i], acc);
        return acc;
    }

    // === Search ===

    find(f: (x: T) => boolean): T | undefined {
        const src = this.#elements;
        for (let i = 0; i < src.length; i++) {
            if (f(src[i])) return src[i];
        }
        return undefined;
    }

    findi(f: (i: number, x: T) => boolean): [number, T] | undefined {
        const src = this.#elements;
        for (let i = 0; i < src.length; i++) {
            if (f(i, src[i])) return [i, src[i]];
        }
        return undefined;
    }

    exists(f: (x: T) => boolean): boolean {
        const src = this.#elements;
        for (let i = 0; i < src.length; i++) {
            if (f(src[i])) return true;
        }
        return false;
    }

    all(f: (x: T) => boolean): boolean {
        const src = this.#elements;
        for (let i = 0; i < src.length; i++) {
            if (!f(src[i])) return false;
        }
        return true;
    }

    // === Comparison ===

    collate(cmp: Comparator<T>, other: Vector<T>): Order {
        const a = this.#elements;
        const b = other.#elements;
        return collateSequences(cmp, a.length, i => a[i], b.length, i => b[i]);
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Vector)) return false;
        if (this.#hashCode !== other.#hashCode) return false;

        const a = this.#elements;
        const b: readonly unknown[] = other.#elements;
        if (a.length !== b.length) return false;
        for (let i = 0; i < a.length; i++) {
            if (!areEqual(a[i], b[i])) return false;
        }
        return true;
    }

    /** Returns a fresh, mutable JavaScript array. */
    toArray(): T[] { return this.#elements.slice(); }

    *[Symbol.iterator](): Iterator<T> { yield* this.#elements; }

    toString(): string {
        return `#[${this.#elements.map(String).join(', ')}]`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 2. FUNCTIONAL API
// ============================================================================

export function fromList<T>(items: Iterable<T>): Vector<T> { return Vector.fromList(items); }
export function tabulate<T>(n: number, f: (i: number) => T): Vector<T> { return Vector.tabulate(n, f); }
export function concat<T>(vs: Iterable<Vector<T>>): Vector<T> { return Vector.concat(vs); }

export function length<T>(v: Vector<T>): number { return v.length; }
export function sub<T>(v: Vector<T>, i: number): T { return v.sub(i); }
export function update<T>(v: Vector<T>, i: number, x: T): Vector<T> { return v.update(i, x); }

export function map<T, U>(f: (x: T) => U, v: Vector<T>): Vector<U> { return v.map(f); }
export function mapi<T, U>(f: (i: number, x: T) => U, v: Vector<T>): Vector<U> { return v.mapi(f); }

export function app<T>(f: (x: T) => void, v: Vector<T>): void { v.app(f); }
export function appi<T>(f: (i: number, x: T) => void, v: Vector<T>): void { v.appi(f); }

export function foldl<T, A>(f: (x: T, acc: A) => A, init: A, v: Vector<T>): A { return v.foldl(f, init); }
export function foldli<T, A>(f: (i: number, x: T, acc: A) => A, init: A, v: Vector<T>): A { return v.foldli(f, init); }
export function foldr<T, A>(f: (x: T, acc: A) => A, init: A, v: Vector<T>): A { return v.foldr(f, init); }
export function foldri<T, A>(f: (i: number, x: T, acc: A) => A, init: A, v: Vector<T>): A { return v.foldri(f, init); }

export function find<T>(f: (x: T) => boolean, v: Vector<T>): T | undefined { return v.find(f); }
export function findi<T>(f: (i: number, x: T) => boolean, v: Vector<T>): [number, T] | undefined { return v.findi(f); }
export function exists<T>(f: (x: T) => boolean, v: Vector<T>): boolean { return v.exists(f); }
export function all<T>(f: (x: T) => boolean, v: Vector<T>): boolean { return v.all(f); }

export function collate<T>(cmp: Comparator<T>, v1: Vector<T>, v2: Vector<T>): Order { return v1.collate(cmp, v2); }
