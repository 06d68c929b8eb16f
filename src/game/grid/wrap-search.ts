/**
 * Bounded wrap search.
 *
 * Walks from a start cell along one axis, treating the two ends of the bound as
 * adjacent, and stops on the first occupied cell. The walk never leaves the bound,
 * so a character cannot search into the other character's half.
 *
 * The number of steps is capped at the bound's span. A bound with no other
 * occupied cell on the line therefore ends back on the start (or gives up),
 * and the move becomes a no-op instead of looping.
 */

import { withAxis, type Axis, type GridCoord } from '../coordinates';
import type { Step } from '../directions';
import { boundSpan, type AxisBound } from './bounds';
import type { OccupancyGrid } from './occupancy-grid';

export interface WrapSearchResult {
    coord: GridCoord;
    /** True when the walk passed over an edge of the bound */
    wrapped: boolean;
    /** Steps taken; 0 only for an empty bound */
    steps: number;
}

export function searchNextValid(
    grid: OccupancyGrid,
    start: GridCoord,
    axis: Axis,
    direction: Step,
    bound: AxisBound
): WrapSearchResult {
    const maxSteps = boundSpan(bound);
    let value = start[axis];
    let wrapped = false;

    for (let i = 1; i <= maxSteps; i++) {
        value += direction;
        if (value > bound.max) {
            value = bound.min;
            wrapped = true;
        } else if (value < bound.min) {
            value = bound.max;
            wrapped = true;
        }

        const candidate = withAxis(start, axis, value);
        if (grid.isOccupied(candidate)) {
            return { coord: candidate, wrapped, steps: i };
        }
    }

    return { coord: start, wrapped: false, steps: Math.max(maxSteps, 0) };
}

/** Next occupied cell from `start` along `axis`, or `start` when there is none */
export function findNextValid(
    grid: OccupancyGrid,
    start: GridCoord,
    axis: Axis,
    direction: Step,
    bound: AxisBound
): GridCoord {
    return searchNextValid(grid, start, axis, direction, bound).coord;
}
