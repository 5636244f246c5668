import { describe, expect, it } from 'vitest';
import { clamp, roundHalfEven } from 'util/math';

describe('clamp', () => {
    it('limits values to the range', () => {
        expect(clamp(5, 0, 3)).toBe(3);
        expect(clamp(-1, 0, 3)).toBe(0);
        expect(clamp(2, 0, 3)).toBe(2);
    });

    it('accepts reversed bounds and maps NaN to the lower bound', () => {
        expect(clamp(5, 3, 0)).toBe(3);
        expect(clamp(Number.NaN, 1, 2)).toBe(1);
    });
});

describe('roundHalfEven', () => {
    it('rounds exact halves to the even neighbour', () => {
        expect(roundHalfEven(0.5)).toBe(0);
        expect(roundHalfEven(1.5)).toBe(2);
        expect(roundHalfEven(2.5)).toBe(2);
        expect(roundHalfEven(-0.5)).toBe(0);
        expect(roundHalfEven(-1.5)).toBe(-2);
        expect(roundHalfEven(-2.5)).toBe(-2);
    });

    it('rounds other values to the nearest integer', () => {
        expect(roundHalfEven(4.8)).toBe(5);
        expect(roundHalfEven(-4.8)).toBe(-5);
        expect(roundHalfEven(0.58)).toBe(1);
        expect(roundHalfEven(0.3)).toBe(0);
        expect(roundHalfEven(15)).toBe(15);
    });

    it('passes non-finite values through', () => {
        expect(roundHalfEven(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
        expect(roundHalfEven(Number.NaN)).toBeNaN();
    });
});
