import { coordKey, sameCoord } from '../coordinates';
import type { LevelLayout } from '../levels/level-layout';
import {
    CELL_FLOOR,
    CELL_HAZARD,
    CELL_LEFT_START,
    CELL_RIGHT_START,
    CELL_VOID,
} from '../levels/types';
import type { PlayerPositions } from '../players/dual-player-state';

/**
 * Draw the level in the catalog alphabet, top row first.
 * Characters are drawn as '1' and '2' wherever they stand, so a freshly loaded
 * level renders as its source rows padded with '.' to the full width.
 */
export function renderLevel(layout: LevelLayout, positions: PlayerPositions): string[] {
    const hazards = new Set(layout.hazardCells.map(coordKey));
    const rows: string[] = [];

    for (let y = layout.height - 1; y >= 0; y--) {
        let row = '';
        for (let x = 0; x < layout.width; x++) {
            const cell = { x, y };
            if (sameCoord(cell, positions.left)) {
                row += CELL_LEFT_START;
            } else if (sameCoord(cell, positions.right)) {
                row += CELL_RIGHT_START;
            } else if (hazards.has(coordKey(cell))) {
                row += CELL_HAZARD;
            } else if (layout.grid.isOccupied(cell)) {
                row += CELL_FLOOR;
            } else {
                row += CELL_VOID;
            }
        }
        rows.push(row);
    }

    return rows;
}
