export const clamp = (value: number, min: number, max: number): number => {
    if (Number.isNaN(value)) {
        return min;
    }
    if (min > max) {
        return clamp(value, max, min);
    }
    if (value < min) {
        return min;
    }
    if (value > max) {
        return max;
    }
    return value;
};

/**
 * Round to the nearest integer, sending exact halves to the even neighbour so
 * that +v and -v always move the same number of pixels.
 */
export const roundHalfEven = (value: number): number => {
    if (!Number.isFinite(value)) {
        return value;
    }

    const floor = Math.floor(value);
    const fraction = value - floor;
    if (fraction > 0.5) {
        return floor + 1;
    }
    if (fraction < 0.5) {
        return floor;
    }
    return floor % 2 === 0 ? floor : floor + 1;
};
