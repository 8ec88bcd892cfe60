import { describe, expect, it } from 'vitest';
import * as Arrays from '../src/array';
import { SizeError, SubscriptError } from '../src/errors';
import { EQUAL, GREATER, intCompare, LESS } from '../src/order';
import {
    all, app, appi, collate, concat, exists, find, findi, foldl, foldli,
    foldr, foldri, fromList, length, map, mapi, sub, tabulate, update, Vector,
} from '../src/vector';

// ============================================================================
// 1. Structural Equality
// ============================================================================

describe('structural equality', () => {
    it('vectors with equal contents are equal and hash alike', () => {
        const a = fromList([1, 2]);
        const b = tabulate(2, i => i + 1);
        expect(a.equals(b)).toBe(true);
        expect(a.hashCode).toBe(b.hashCode);
    });

    it('order matters', () => {
        const a = fromList([1, 2]);
        const b = fromList([2, 1]);
        expect(a.equals(b)).toBe(false);
        expect(a.hashCode).not.toBe(b.hashCode);
    });

    it('all empty vectors are equal', () => {
        expect(fromList([]).equals(tabulate(0, () => 'x'))).toBe(true);
        expect(fromList([]).hashCode).toBe(1);
    });

    it('elements that are arrays compare by identity', () => {
        const arr1 = Arrays.fromList([1]);
        const arr2 = Arrays.fromList([1]);
        expect(fromList([arr1]).equals(fromList([arr1]))).toBe(true);
        expect(fromList([arr1]).equals(fromList([arr2]))).toBe(false);
    });

    it('nested vectors compare structurally', () => {
        const a = fromList([fromList([1]), fromList([2, 3])]);
        const b = fromList([fromList([1]), fromList([2, 3])]);
        expect(a.equals(b)).toBe(true);
        expect(a.hashCode).toBe(b.hashCode);
    });

    it('NaN elements are equal', () => {
        const a = fromList([NaN, 1]);
        const b = fromList([0 / 0, 1]);
        expect(a.equals(b)).toBe(true);
        expect(a.hashCode).toBe(b.hashCode);
        expect(fromList([NaN]).equals(fromList([1]))).toBe(false);
    });

    it('is never equal to a plain array', () => {
        expect(fromList([1]).equals([1])).toBe(false);
        expect(fromList([1]).equals(Arrays.fromList([1]))).toBe(false);
    });
});

// ============================================================================
// 2. Construction & Access
// ============================================================================

describe('construction', () => {
    it('fromList copies and freezes its storage', () => {
        const input = [1, 2];
        const v = fromList(input);
        input[0] = 9;
        expect(sub(v, 0)).toBe(1);
        expect(Object.isFrozen(v.raw)).toBe(true);
    });

    it('tabulate calls f in ascending order', () => {
        const calls: number[] = [];
        const v = tabulate(3, i => {
            calls.push(i);
            return `#${i}`;
        });
        expect(calls).toEqual([0, 1, 2]);
        expect(v.toArray()).toEqual(['#0', '#1', '#2']);
    });

    it('tabulate rejects invalid lengths', () => {
        expect(() => tabulate(-1, i => i)).toThrow(SizeError);
        expect(() => tabulate(2.5, i => i)).toThrow(SizeError);
    });

    it('sub checks bounds', () => {
        const v = fromList(['a', 'b']);
        expect(length(v)).toBe(2);
        expect(sub(v, 1)).toBe('b');
        expect(() => sub(v, 2)).toThrow(SubscriptError);
        expect(() => sub(v, -1)).toThrow(SubscriptError);
    });

    it('toArray returns a fresh mutable copy', () => {
        const v = fromList([1, 2]);
        const copy = v.toArray();
        copy[0] = 99;
        expect(sub(v, 0)).toBe(1);
    });
});

// ============================================================================
// 3. Derived Vectors
// ============================================================================

describe('update / concat / map', () => {
    it('update returns a new vector and leaves the original alone', () => {
        const v = fromList([1, 2, 3]);
        const w = update(v, 1, 20);
        expect(w.toArray()).toEqual([1, 20, 3]);
        expect(v.toArray()).toEqual([1, 2, 3]);
        expect(() => update(v, 3, 0)).toThrow(SubscriptError);
    });

    it('concat joins in order', () => {
        const v = concat([fromList([1]), fromList<number>([]), fromList([2, 3])]);
        expect(v.toArray()).toEqual([1, 2, 3]);
        expect(concat<number>([]).length).toBe(0);
    });

    it('map and mapi', () => {
        const v = fromList([1, 2, 3]);
        expect(map(x => x * 2, v).toArray()).toEqual([2, 4, 6]);
        expect(mapi((i, x) => i * x, v).toArray()).toEqual([0, 2, 6]);
    });
});

// ============================================================================
// 4. Traversal, Search, Collate
// ============================================================================

describe('traversal', () => {
    const v = fromList([1, 2, 3]);

    it('folds', () => {
        const empty: number[] = [];
        expect(foldl((x, acc) => [...acc, x], empty, v)).toEqual([1, 2, 3]);
        expect(foldr((x, acc) => [...acc, x], empty, v)).toEqual([3, 2, 1]);
        expect(foldli((i, x, acc) => acc + i * x, 0, v)).toBe(8);
        expect(foldri((i, _x, acc) => `${acc}${i}`, '', v)).toBe('210');
    });

    it('app and appi', () => {
        const seen: number[] = [];
        app(x => { seen.push(x); }, v);
        appi((i, _x) => { seen.push(10 + i); }, v);
        expect(seen).toEqual([1, 2, 3, 10, 11, 12]);
    });

    it('search', () => {
        expect(find(x => x > 1, v)).toBe(2);
        expect(findi((_i, x) => x > 1, v)).toEqual([1, 2]);
        expect(find(x => x > 3, v)).toBeUndefined();
        expect(exists(x => x === 3, v)).toBe(true);
        expect(all(x => x < 3, v)).toBe(false);
        expect(all(x => x < 4, v)).toBe(true);
    });

    it('collate', () => {
        expect(collate(intCompare, fromList([1, 2]), fromList([1, 2, 3]))).toBe(LESS);
        expect(collate(intCompare, fromList([1, 3]), fromList([1, 2]))).toBe(GREATER);
        expect(collate(intCompare, v, fromList([1, 2, 3]))).toBe(EQUAL);
    });
});

// ============================================================================
// 5. Presentation
// ============================================================================

describe('presentation', () => {
    it('toString', () => {
        expect(String(fromList([1, 2]))).toBe('#[1, 2]');
        expect(String(fromList([]))).toBe('#[]');
        expect(String(fromList([Arrays.fromList(['a'])]))).toBe('#[[a]]');
    });

    it('iterates in index order', () => {
        const v: Vector<string> = fromList(['x', 'y']);
        expect([...v]).toEqual(['x', 'y']);
    });
});
