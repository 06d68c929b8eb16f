import { sameCoord, withAxis } from '../coordinates';
import { leftCharacterStep, type Direction } from '../directions';
import type { LevelLayout } from '../levels/level-layout';
import type { PlayerPositions } from '../players/dual-player-state';

/**
 * True when `direction` is the level's win command and the characters already
 * touch across the split boundary, so that one more step by the left character
 * would land on the right character. Checked before the move is applied.
 */
export function isWinningMove(layout: LevelLayout, positions: PlayerPositions, direction: Direction): boolean {
    if (direction !== layout.winCommand) {
        return false;
    }
    const { axis, step } = leftCharacterStep(direction);
    const target = withAxis(positions.left, axis, positions.left[axis] + step);
    return sameCoord(target, positions.right);
}
