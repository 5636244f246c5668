import { describe, expect, it } from 'vitest';
import {
    clampRectangleInside,
    createRectangle,
    intersectsAny,
    rectangleBottom,
    rectangleCenter,
    rectangleFromTuple,
    rectangleRight,
    rectanglesIntersect,
} from 'util/geometry';

describe('rectangles', () => {
    it('builds rectangles from tuples and derives their edges', () => {
        const rect = rectangleFromTuple([10, 20, 30, 40]);
        expect(rect).toEqual({ x: 10, y: 20, width: 30, height: 40 });
        expect(rectangleRight(rect)).toBe(40);
        expect(rectangleBottom(rect)).toBe(60);
        expect(rectangleCenter(rect)).toEqual({ x: 25, y: 40 });
    });

    it('defaults to an empty rectangle at the origin', () => {
        expect(createRectangle()).toEqual({ x: 0, y: 0, width: 0, height: 0 });
    });
});

describe('rectanglesIntersect', () => {
    const base = createRectangle(0, 0, 10, 10);

    it('detects overlapping rectangles', () => {
        expect(rectanglesIntersect(base, createRectangle(9, 9, 5, 5))).toBe(true);
    });

    it('does not count shared edges', () => {
        expect(rectanglesIntersect(base, createRectangle(10, 0, 5, 5))).toBe(false);
        expect(rectanglesIntersect(base, createRectangle(0, 10, 5, 5))).toBe(false);
        expect(rectanglesIntersect(base, createRectangle(-5, 0, 5, 5))).toBe(false);
    });

    it('never reports overlap for rectangles without area', () => {
        expect(rectanglesIntersect(base, createRectangle(2, 2, 0, 5))).toBe(false);
        expect(rectanglesIntersect(createRectangle(2, 2, 5, 0), base)).toBe(false);
    });

    it('checks a rectangle against a list', () => {
        const others = [createRectangle(20, 20, 5, 5), createRectangle(5, 5, 1, 1)];
        expect(intersectsAny(base, others)).toBe(true);
        expect(intersectsAny(base, others.slice(0, 1))).toBe(false);
        expect(intersectsAny(base, [])).toBe(false);
    });
});

describe('clampRectangleInside', () => {
    const bounds = createRectangle(0, -200, 960, 1040);

    it('returns the same object when already inside', () => {
        const rect = createRectangle(70, 420, 34, 52);
        expect(clampRectangleInside(rect, bounds)).toBe(rect);
    });

    it('pushes rectangles back inside on each axis', () => {
        expect(clampRectangleInside(createRectangle(-8, 900, 34, 52), bounds)).toEqual({
            x: 0,
            y: 788,
            width: 34,
            height: 52,
        });
        expect(clampRectangleInside(createRectangle(940, -260, 34, 52), bounds)).toEqual({
            x: 926,
            y: -200,
            width: 34,
            height: 52,
        });
    });

    it('aligns oversized rectangles to the near edge', () => {
        expect(clampRectangleInside(createRectangle(50, 0, 2000, 10), bounds)).toEqual({
            x: 0,
            y: 0,
            width: 2000,
            height: 10,
        });
    });
});
