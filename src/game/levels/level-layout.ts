import type { Axis, GridCoord } from '../coordinates';
import { leftCharacterStep, type Direction, type Step } from '../directions';
import { computeSplitBounds, isWithinBounds, type SplitBounds } from '../grid/bounds';
import { OccupancyGrid } from '../grid/occupancy-grid';
import { InvalidLevelLayoutError } from './level-errors';
import {
    CELL_HAZARD,
    CELL_LEFT_START,
    CELL_RIGHT_START,
    CELL_VOID,
    LEVEL_ALPHABET,
    type LevelDefinition,
} from './types';

/** Everything derived from a LevelDefinition when it is loaded */
export interface LevelLayout {
    readonly definition: LevelDefinition;
    readonly grid: OccupancyGrid;
    readonly width: number;
    readonly height: number;
    readonly splitAxis: Axis;
    readonly winCommand: Direction;
    readonly bounds: SplitBounds;
    readonly leftStart: GridCoord;
    readonly rightStart: GridCoord;
    /** Occupied cells in source order: rows top to bottom, columns left to right */
    readonly occupiedCells: readonly GridCoord[];
    /** 'X' cells, same order; they are also in occupiedCells */
    readonly hazardCells: readonly GridCoord[];
}

/** Step the left character must take on the split axis to reach the other half */
const TOWARD_RIGHT_HALF: Record<Axis, Step> = { x: 1, y: -1 };

function measure(definition: LevelDefinition, name: string): { width: number; height: number } {
    const height = definition.rows.length;
    let width = 0;
    for (const row of definition.rows) {
        if (row.length > width) width = row.length;
    }

    if (width === 0 || height === 0) {
        throw new InvalidLevelLayoutError(name, 'empty', `level is ${width}x${height}`);
    }

    const splitDimension = definition.splitAxis === 'x' ? width : height;
    if (splitDimension % 2 !== 0) {
        const label = definition.splitAxis === 'x' ? 'width' : 'height';
        throw new InvalidLevelLayoutError(
            name,
            'odd_split_dimension',
            `${label} ${splitDimension} must be even when split along ${definition.splitAxis}`
        );
    }

    return { width, height };
}

function checkWinCommand(definition: LevelDefinition, name: string): void {
    const { axis, step } = leftCharacterStep(definition.winCommand);
    if (axis !== definition.splitAxis || step !== TOWARD_RIGHT_HALF[definition.splitAxis]) {
        throw new InvalidLevelLayoutError(
            name,
            'invalid_win_command',
            `win command "${definition.winCommand}" does not move toward the other half on ${definition.splitAxis}`
        );
    }
}

/**
 * Scan a level definition into its occupancy grid, starts and bounds.
 * Source row r becomes grid row height - 1 - r so that y grows upward.
 */
export function buildLevelLayout(definition: LevelDefinition, fallbackName = 'unnamed'): LevelLayout {
    const name = definition.name ?? fallbackName;
    const { width, height } = measure(definition, name);
    checkWinCommand(definition, name);

    const cells = new Uint8Array(width * height);
    const occupiedCells: GridCoord[] = [];
    const hazardCells: GridCoord[] = [];
    let leftStart: GridCoord | null = null;
    let rightStart: GridCoord | null = null;

    for (let r = 0; r < height; r++) {
        const row = definition.rows[r];
        const y = height - 1 - r;
        for (let x = 0; x < row.length; x++) {
            const cell = row[x];
            if (!LEVEL_ALPHABET.has(cell)) {
                throw new InvalidLevelLayoutError(name, 'unknown_cell', `unexpected "${cell}" at row ${r}, column ${x}`);
            }
            if (cell === CELL_VOID) continue;

            const pos: GridCoord = { x, y };
            cells[y * width + x] = 1;
            occupiedCells.push(pos);

            if (cell === CELL_LEFT_START) {
                if (leftStart) {
                    throw new InvalidLevelLayoutError(name, 'duplicate_start', `more than one "${CELL_LEFT_START}"`);
                }
                leftStart = pos;
            } else if (cell === CELL_RIGHT_START) {
                if (rightStart) {
                    throw new InvalidLevelLayoutError(name, 'duplicate_start', `more than one "${CELL_RIGHT_START}"`);
                }
                rightStart = pos;
            } else if (cell === CELL_HAZARD) {
                hazardCells.push(pos);
            }
        }
    }

    if (!leftStart) {
        throw new InvalidLevelLayoutError(name, 'missing_start', `no "${CELL_LEFT_START}" cell`);
    }
    if (!rightStart) {
        throw new InvalidLevelLayoutError(name, 'missing_start', `no "${CELL_RIGHT_START}" cell`);
    }

    const bounds = computeSplitBounds(definition.splitAxis, width, height);
    if (!isWithinBounds(leftStart, bounds.left)) {
        throw new InvalidLevelLayoutError(name, 'start_outside_half', `"${CELL_LEFT_START}" lies in the other character's half`);
    }
    if (!isWithinBounds(rightStart, bounds.right)) {
        throw new InvalidLevelLayoutError(name, 'start_outside_half', `"${CELL_RIGHT_START}" lies in the other character's half`);
    }

    return {
        definition,
        grid: new OccupancyGrid(width, height, cells),
        width,
        height,
        splitAxis: definition.splitAxis,
        winCommand: definition.winCommand,
        bounds,
        leftStart,
        rightStart,
        occupiedCells,
        hazardCells,
    };
}
