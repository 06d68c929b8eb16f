import { describe, it, expect } from 'vitest';
import { Direction } from '@/game/directions';
import { DEFAULT_LEVELS } from '@/game/levels/level-catalog';
import { buildLevelLayout } from '@/game/levels/level-layout';
import { solveLevel } from '@/game/session/level-solver';
import { CORRIDOR, TOWER, createSession, horizontalLevel } from './helpers/test-levels';

describe('solveLevel', () => {
    it('should find the shortest solution, wrapping included', () => {
        expect(solveLevel(CORRIDOR)).toEqual({ commands: [Direction.Left, Direction.Right], moveCount: 2 });
    });

    it('should solve vertical levels', () => {
        // up wraps both characters next to the split just like down does, and is tried first
        expect(solveLevel(TOWER)).toEqual({ commands: [Direction.Up, Direction.Down], moveCount: 2 });
    });

    it('should accept a built layout', () => {
        expect(solveLevel(buildLevelLayout(CORRIDOR))?.moveCount).toBe(2);
    });

    it('should return null when the halves can never meet', () => {
        expect(solveLevel(horizontalLevel(['10..', '..02']))).toBeNull();
    });

    describe('built-in levels', () => {
        it('should all be solvable in their par', () => {
            expect(DEFAULT_LEVELS.map(level => solveLevel(level)?.moveCount)).toEqual(
                DEFAULT_LEVELS.map(level => level.par)
            );
        });

        it('should win a session when the solution is replayed', () => {
            for (const level of DEFAULT_LEVELS) {
                const solution = solveLevel(level);
                expect(solution).not.toBeNull();
                if (!solution) continue;

                const session = createSession([level]);
                for (const direction of solution.commands) {
                    session.applyCommand({ type: 'move', direction });
                }

                expect(session.state).toBe('winning');
                expect(session.moveCount).toBe(solution.moveCount);
            }
        });
    });
});
