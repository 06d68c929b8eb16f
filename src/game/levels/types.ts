import type { Axis } from '../coordinates';
import type { Direction } from '../directions';

/** Characters allowed in a level row */
export const CELL_VOID = '.';
export const CELL_FLOOR = '0';
export const CELL_LEFT_START = '1';
export const CELL_RIGHT_START = '2';
export const CELL_HAZARD = 'X';

export const LEVEL_ALPHABET: ReadonlySet<string> = new Set([
    CELL_VOID,
    CELL_FLOOR,
    CELL_LEFT_START,
    CELL_RIGHT_START,
    CELL_HAZARD,
]);

/**
 * Static description of one puzzle.
 *
 * `splitAxis` is the axis the grid is halved along:
 * - 'x': horizontal layout, the left character ('1') owns the left half and the right character ('2') the right half
 * - 'y': vertical layout, the left character owns the top half and the right character the bottom half
 */
export interface LevelDefinition {
    name?: string;
    /** Rows top to bottom; rows may be ragged */
    rows: readonly string[];
    splitAxis: Axis;
    /** Command that, pressed next to the boundary, finishes the level */
    winCommand: Direction;
    /** Fewest directional commands (winning press included) that solve the level */
    par?: number;
}

export type LevelCatalog = readonly LevelDefinition[];
