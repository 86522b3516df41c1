/**
 * Absolute tolerance used at every threshold comparison in the engine.
 * Fixed so trigger boundaries are reproducible across runs and configs.
 */
export const EPSILON = 1e-9;

export function atOrBelow(value: number, limit: number): boolean {
    return value <= limit + EPSILON;
}

export function atOrAbove(value: number, limit: number): boolean {
    return value >= limit - EPSILON;
}

export function exceeds(value: number, limit: number): boolean {
    return value > limit + EPSILON;
}

export function isZero(value: number): boolean {
    return Math.abs(value) <= EPSILON;
}
