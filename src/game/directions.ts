import type { Axis } from './coordinates';

/** Directional commands as the player presses them */
export enum Direction {
    Left = 'left',
    Right = 'right',
    Up = 'up',
    Down = 'down',
}

export const ALL_DIRECTIONS: readonly Direction[] = [
    Direction.Left,
    Direction.Right,
    Direction.Up,
    Direction.Down,
];

/** Unit step along one axis */
export type Step = 1 | -1;

export interface AxisStep {
    axis: Axis;
    step: Step;
}

/**
 * Step taken by the left character for each command.
 * The right character always takes the negated step on the same axis.
 */
const LEFT_CHARACTER_STEPS: Record<Direction, AxisStep> = {
    [Direction.Left]: { axis: 'x', step: -1 },
    [Direction.Right]: { axis: 'x', step: 1 },
    [Direction.Up]: { axis: 'y', step: 1 },
    [Direction.Down]: { axis: 'y', step: -1 },
};

export function leftCharacterStep(direction: Direction): AxisStep {
    return LEFT_CHARACTER_STEPS[direction];
}

export function rightCharacterStep(direction: Direction): AxisStep {
    const { axis, step } = LEFT_CHARACTER_STEPS[direction];
    return { axis, step: step === 1 ? -1 : 1 };
}

export function isDirection(value: unknown): value is Direction {
    return typeof value === 'string' && (ALL_DIRECTIONS as readonly string[]).includes(value);
}
