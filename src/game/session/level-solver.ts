/**
 * Breadth-first search over the pair of character positions.
 *
 * Each node is (left, right); each edge is one directional command resolved
 * exactly as the session would. The answer counts the winning press, matching
 * the move counter reported with level:winTriggered.
 *
 * The state space is at most (width * height)^2 nodes, tiny for hand-made levels.
 */

import { coordKey, type GridCoord } from '../coordinates';
import { ALL_DIRECTIONS, type Direction } from '../directions';
import { buildLevelLayout, type LevelLayout } from '../levels/level-layout';
import type { LevelDefinition } from '../levels/types';
import { computeMove, type PlayerPositions } from '../players/dual-player-state';
import { isWinningMove } from './win-condition';

export interface LevelSolution {
    /** Commands to press, the last one being the winning press */
    commands: Direction[];
    moveCount: number;
}

interface SearchNode {
    positions: PlayerPositions;
    /** Index of the parent node in the visit list, -1 for the start */
    parent: number;
    via: Direction | null;
}

function pairKey(left: GridCoord, right: GridCoord): string {
    return coordKey(left) + '|' + coordKey(right);
}

function collectPath(nodes: SearchNode[], from: number, winning: Direction): Direction[] {
    const path: Direction[] = [winning];
    for (let node = nodes[from]; node.via !== null; node = nodes[node.parent]) {
        path.push(node.via);
    }
    return path.reverse();
}

/** Shortest command sequence that wins the level, or null if none exists */
export function solveLevel(level: LevelDefinition | LevelLayout): LevelSolution | null {
    const layout = 'grid' in level ? level : buildLevelLayout(level);
    const start: PlayerPositions = { left: layout.leftStart, right: layout.rightStart };

    const nodes: SearchNode[] = [{ positions: start, parent: -1, via: null }];
    const seen = new Set<string>([pairKey(start.left, start.right)]);

    // nodes doubles as the FIFO queue; head walks forward
    for (let head = 0; head < nodes.length; head++) {
        const { positions } = nodes[head];

        for (const direction of ALL_DIRECTIONS) {
            if (isWinningMove(layout, positions, direction)) {
                const commands = collectPath(nodes, head, direction);
                return { commands, moveCount: commands.length };
            }

            const next = computeMove(layout.grid, layout.bounds, positions, direction);
            const key = pairKey(next.left, next.right);
            if (seen.has(key)) continue;

            seen.add(key);
            nodes.push({ positions: { left: next.left, right: next.right }, parent: head, via: direction });
        }
    }

    return null;
}
