import type { Axis, GridCoord } from '../coordinates';

/** Inclusive integer range on one axis */
export interface AxisBound {
    readonly min: number;
    readonly max: number;
}

/** Region a character may occupy */
export interface PlayerBounds {
    readonly x: AxisBound;
    readonly y: AxisBound;
}

export interface SplitBounds {
    left: PlayerBounds;
    right: PlayerBounds;
}

export function boundSpan(bound: AxisBound): number {
    return bound.max - bound.min + 1;
}

export function isWithinBounds(coord: GridCoord, bounds: PlayerBounds): boolean {
    return coord.x >= bounds.x.min && coord.x <= bounds.x.max
        && coord.y >= bounds.y.min && coord.y <= bounds.y.max;
}

/**
 * Halve a width x height grid along `splitAxis`.
 * The split dimension must be even; the caller validates that.
 * On 'y' the left character gets the upper half (higher y).
 */
export function computeSplitBounds(splitAxis: Axis, width: number, height: number): SplitBounds {
    const fullX: AxisBound = { min: 0, max: width - 1 };
    const fullY: AxisBound = { min: 0, max: height - 1 };

    if (splitAxis === 'x') {
        const half = width / 2;
        return {
            left: { x: { min: 0, max: half - 1 }, y: fullY },
            right: { x: { min: half, max: width - 1 }, y: fullY },
        };
    }

    const half = height / 2;
    return {
        left: { x: fullX, y: { min: half, max: height - 1 } },
        right: { x: fullX, y: { min: 0, max: half - 1 } },
    };
}
