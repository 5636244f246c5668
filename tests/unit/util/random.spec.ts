import { describe, expect, it } from 'vitest';
import { createRandomManager, mulberry32, normalizeSeed, pickOne, sampleWithoutReplacement } from 'util/random';

const sample = (source: () => number, count: number): number[] => {
    return Array.from({ length: count }, () => source());
};

const sequence = (...values: number[]): (() => number) => {
    let index = 0;
    return () => {
        const value = values[index % values.length];
        index += 1;
        return value;
    };
};

describe('mulberry32', () => {
    it('produces deterministic sequences for the same seed', () => {
        expect(sample(mulberry32(1234), 5)).toEqual(sample(mulberry32(1234), 5));
    });

    it('produces distinct sequences for different seeds', () => {
        expect(sample(mulberry32(1), 3)).not.toEqual(sample(mulberry32(2), 3));
    });

    it('stays inside the unit interval', () => {
        for (const value of sample(mulberry32(99), 200)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('normalizeSeed', () => {
    it('maps zero and non-finite seeds to the default', () => {
        expect(normalizeSeed(0)).toBe(1);
        expect(normalizeSeed(Number.NaN)).toBe(1);
        expect(normalizeSeed(42)).toBe(42);
        expect(normalizeSeed(-1)).toBe(0xffffffff);
    });
});

describe('pickOne', () => {
    it('maps the draw onto the list', () => {
        expect(pickOne(sequence(0), ['a', 'b', 'c'])).toBe('a');
        expect(pickOne(sequence(0.5), ['a', 'b', 'c'])).toBe('b');
        expect(pickOne(sequence(1), ['a', 'b', 'c'])).toBe('c');
    });

    it('rejects an empty list', () => {
        expect(() => pickOne(sequence(0), [])).toThrow(RangeError);
    });
});

describe('sampleWithoutReplacement', () => {
    it('draws distinct elements in draw order', () => {
        // 0.99 -> index 3 of [a,b,c,d]; then 0 -> first of the remaining [b,c,a]
        const picked = sampleWithoutReplacement(sequence(0.99, 0), ['a', 'b', 'c', 'd'], 2);
        expect(picked).toEqual(['d', 'b']);
    });

    it('returns every element when the count equals the pool', () => {
        const picked = sampleWithoutReplacement(mulberry32(5), [1, 2, 3, 4, 5, 6], 6);
        expect([...picked].sort()).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it('rejects invalid counts', () => {
        expect(() => sampleWithoutReplacement(sequence(0), [1, 2], 3)).toThrow(RangeError);
        expect(() => sampleWithoutReplacement(sequence(0), [1, 2], -1)).toThrow(RangeError);
        expect(() => sampleWithoutReplacement(sequence(0), [1, 2], 1.5)).toThrow(RangeError);
        expect(sampleWithoutReplacement(sequence(0), [1, 2], 0)).toEqual([]);
    });
});

describe('createRandomManager', () => {
    it('resets to the same sequence when requested', () => {
        const manager = createRandomManager(42);
        const firstRun = [manager.next(), manager.next(), manager.next()];
        manager.reset();
        expect([manager.next(), manager.next(), manager.next()]).toEqual(firstRun);
    });

    it('re-seeds to produce a new deterministic sequence', () => {
        const manager = createRandomManager(7);
        const initial = [manager.next(), manager.next()];
        expect(manager.setSeed(99)).toBe(99);
        const reseeded = [manager.next(), manager.next()];
        expect(reseeded).not.toEqual(initial);
        manager.reset();
        expect([manager.next(), manager.next()]).toEqual(reseeded);
    });

    it('matches a bare mulberry32 stream through its random source', () => {
        const manager = createRandomManager(11);
        expect(sample(manager.random, 4)).toEqual(sample(mulberry32(11), 4));
    });

    it('generates bounded integers and rejects bad bounds', () => {
        const manager = createRandomManager(123);
        for (let i = 0; i < 50; i++) {
            const value = manager.nextInt(5);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(5);
        }
        expect(() => manager.nextInt(0)).toThrow(RangeError);
    });

    it('picks a non-zero seed when none is given', () => {
        expect(createRandomManager().seed()).toBeGreaterThan(0);
    });
});
