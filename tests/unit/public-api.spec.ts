import { describe, it, expect } from 'vitest';
import { DEFAULT_LEVELS, Direction, LevelSession, moveCommand, solveLevel } from '@/index';

describe('public API', () => {
    it('should play the built-in catalog through to the second level', () => {
        const session = new LevelSession({ lockInputWhileAnimating: false, startIndex: 0 });
        const solution = solveLevel(DEFAULT_LEVELS[0]);

        for (const direction of solution?.commands ?? []) {
            session.applyCommand(moveCommand(direction));
        }
        session.applyCommand({ type: 'acknowledge_win' });

        expect(session.levelIndex).toBe(1);
        expect(session.layout.splitAxis).toBe('y');
        expect(session.applyCommand(moveCommand(Direction.Down)).success).toBe(true);
    });
});
