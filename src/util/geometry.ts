/**
 * Geometry Utilities
 *
 * Axis-aligned rectangles in screen space: x grows right, y grows down.
 * Edges are derived, never stored, so a rectangle is always four numbers.
 */

export interface Vector2 {
    readonly x: number;
    readonly y: number;
}

export interface Rectangle {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

/**
 * Create a new Rectangle
 */
export function createRectangle(x = 0, y = 0, width = 0, height = 0): Rectangle {
    return { x, y, width, height };
}

/**
 * Build a Rectangle from an `[x, y, width, height]` tuple
 */
export function rectangleFromTuple(tuple: readonly [number, number, number, number]): Rectangle {
    const [x, y, width, height] = tuple;
    return { x, y, width, height };
}

export const rectangleRight = (rect: Rectangle): number => rect.x + rect.width;

export const rectangleBottom = (rect: Rectangle): number => rect.y + rect.height;

/**
 * Get the center point of a rectangle
 */
export function rectangleCenter(rect: Rectangle): Vector2 {
    return {
        x: rect.x + rect.width / 2,
        y: rect.y + rect.height / 2,
    };
}

/**
 * Check if two rectangles overlap. Shared edges do not count, and a
 * rectangle without area never overlaps anything.
 */
export function rectanglesIntersect(a: Rectangle, b: Rectangle): boolean {
    if (a.width <= 0 || a.height <= 0 || b.width <= 0 || b.height <= 0) {
        return false;
    }

    return !(a.x + a.width <= b.x ||
        b.x + b.width <= a.x ||
        a.y + a.height <= b.y ||
        b.y + b.height <= a.y);
}

export const intersectsAny = (rect: Rectangle, others: readonly Rectangle[]): boolean =>
    others.some((other) => rectanglesIntersect(rect, other));

/**
 * Move a rectangle so it lies inside `bounds`. A rectangle larger than the
 * bounds on an axis is aligned to the bounds' near edge on that axis.
 */
export function clampRectangleInside(rect: Rectangle, bounds: Rectangle): Rectangle {
    let { x, y } = rect;

    if (rect.width >= bounds.width) {
        x = bounds.x;
    } else if (x < bounds.x) {
        x = bounds.x;
    } else if (x + rect.width > bounds.x + bounds.width) {
        x = bounds.x + bounds.width - rect.width;
    }

    if (rect.height >= bounds.height) {
        y = bounds.y;
    } else if (y < bounds.y) {
        y = bounds.y;
    } else if (y + rect.height > bounds.y + bounds.height) {
        y = bounds.y + bounds.height - rect.height;
    }

    return x === rect.x && y === rect.y ? rect : { x, y, width: rect.width, height: rect.height };
}
