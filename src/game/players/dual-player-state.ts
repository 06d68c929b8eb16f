import type { GridCoord } from '../coordinates';
import { leftCharacterStep, rightCharacterStep, type AxisStep, type Direction } from '../directions';
import type { PlayerBounds, SplitBounds } from '../grid/bounds';
import type { OccupancyGrid } from '../grid/occupancy-grid';
import { searchNextValid, type WrapSearchResult } from '../grid/wrap-search';

export interface PlayerPositions {
    left: GridCoord;
    right: GridCoord;
}

export interface MoveOutcome extends PlayerPositions {
    /** Either character wrapped around an edge of its half */
    crossedBoundary: boolean;
}

function stepWithin(grid: OccupancyGrid, start: GridCoord, { axis, step }: AxisStep, bounds: PlayerBounds): WrapSearchResult {
    return searchNextValid(grid, start, axis, step, bounds[axis]);
}

/**
 * Resolve one directional command for both characters without mutating anything.
 * The right character takes the mirrored step; each one searches only its own half.
 */
export function computeMove(
    grid: OccupancyGrid,
    bounds: SplitBounds,
    positions: PlayerPositions,
    direction: Direction
): MoveOutcome {
    const left = stepWithin(grid, positions.left, leftCharacterStep(direction), bounds.left);
    const right = stepWithin(grid, positions.right, rightCharacterStep(direction), bounds.right);
    return {
        left: left.coord,
        right: right.coord,
        crossedBoundary: left.wrapped || right.wrapped,
    };
}

/** Positions of both characters on the current level */
export class DualPlayerState {
    private leftPos: GridCoord;
    private rightPos: GridCoord;

    constructor(
        private readonly grid: OccupancyGrid,
        public readonly bounds: SplitBounds,
        start: PlayerPositions
    ) {
        this.leftPos = start.left;
        this.rightPos = start.right;
    }

    public get left(): GridCoord {
        return this.leftPos;
    }

    public get right(): GridCoord {
        return this.rightPos;
    }

    public get positions(): PlayerPositions {
        return { left: this.leftPos, right: this.rightPos };
    }

    /** Move both characters for one command and commit the result */
    public applyMove(direction: Direction): MoveOutcome {
        const outcome = computeMove(this.grid, this.bounds, this.positions, direction);
        this.leftPos = outcome.left;
        this.rightPos = outcome.right;
        return outcome;
    }
}
