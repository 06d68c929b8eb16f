import { describe, it, expect } from 'vitest';
import type { Axis, GridCoord } from '@/game/coordinates';
import type { Step } from '@/game/directions';
import type { AxisBound } from '@/game/grid/bounds';
import type { OccupancyGrid } from '@/game/grid/occupancy-grid';
import { findNextValid, searchNextValid } from '@/game/grid/wrap-search';
import { occupancyFromRows } from './helpers/test-levels';

describe('searchNextValid', () => {
    const row = occupancyFromRows(['#.#.']);
    const whole = { min: 0, max: 3 };

    it('should skip empty cells', () => {
        expect(searchNextValid(row, { x: 0, y: 0 }, 'x', 1, whole))
            .toEqual({ coord: { x: 2, y: 0 }, wrapped: false, steps: 2 });
    });

    it('should wrap past the upper edge of the bound', () => {
        expect(searchNextValid(row, { x: 2, y: 0 }, 'x', 1, whole))
            .toEqual({ coord: { x: 0, y: 0 }, wrapped: true, steps: 2 });
    });

    it('should wrap past the lower edge of the bound', () => {
        expect(searchNextValid(row, { x: 0, y: 0 }, 'x', -1, whole))
            .toEqual({ coord: { x: 2, y: 0 }, wrapped: true, steps: 2 });
    });

    it('should come back to the start when it is the only occupied cell', () => {
        const lonely = occupancyFromRows(['#...']);

        expect(searchNextValid(lonely, { x: 0, y: 0 }, 'x', 1, whole))
            .toEqual({ coord: { x: 0, y: 0 }, wrapped: true, steps: 4 });
    });

    it('should give up after one full lap over an empty line', () => {
        const empty = occupancyFromRows(['....']);

        expect(searchNextValid(empty, { x: 1, y: 0 }, 'x', 1, whole))
            .toEqual({ coord: { x: 1, y: 0 }, wrapped: false, steps: 4 });
    });

    it('should never look outside the bound', () => {
        const grid = occupancyFromRows(['##.#']);

        expect(searchNextValid(grid, { x: 1, y: 0 }, 'x', 1, { min: 0, max: 1 }))
            .toEqual({ coord: { x: 0, y: 0 }, wrapped: true, steps: 1 });
    });

    it('should stay put in an empty bound', () => {
        expect(searchNextValid(row, { x: 0, y: 0 }, 'x', 1, { min: 2, max: 1 }))
            .toEqual({ coord: { x: 0, y: 0 }, wrapped: false, steps: 0 });
    });

    it('should search along y and keep x', () => {
        const column = occupancyFromRows(['.#', '..', '.#']);

        expect(searchNextValid(column, { x: 1, y: 0 }, 'y', 1, { min: 0, max: 2 }))
            .toEqual({ coord: { x: 1, y: 2 }, wrapped: false, steps: 2 });
    });
});

describe('repeated search', () => {
    function visitOrder(
        grid: OccupancyGrid,
        start: GridCoord,
        axis: Axis,
        direction: Step,
        bound: AxisBound,
        count: number
    ): number[] {
        const visited: number[] = [];
        let current = start;
        for (let i = 0; i < count; i++) {
            current = findNextValid(grid, current, axis, direction, bound);
            visited.push(current[axis]);
        }
        return visited;
    }

    it('should visit every occupied cell of the bound before repeating', () => {
        const row = occupancyFromRows(['#.##.#']);

        expect(visitOrder(row, { x: 0, y: 0 }, 'x', 1, { min: 0, max: 5 }, 5)).toEqual([2, 3, 5, 0, 2]);
    });

    it('should cycle in reverse order when stepping backwards', () => {
        const row = occupancyFromRows(['#.##.#']);

        expect(visitOrder(row, { x: 0, y: 0 }, 'x', -1, { min: 0, max: 5 }, 4)).toEqual([5, 3, 2, 0]);
    });

    it('should cycle along y as well', () => {
        // top row first: y = 3, 2, 1, 0
        const column = occupancyFromRows(['#', '#', '.', '#']);

        expect(visitOrder(column, { x: 0, y: 0 }, 'y', 1, { min: 0, max: 3 }, 4)).toEqual([2, 3, 0, 2]);
    });
});

describe('findNextValid', () => {
    it('should return only the coordinate', () => {
        const row = occupancyFromRows(['#.#.']);

        expect(findNextValid(row, { x: 2, y: 0 }, 'x', -1, { min: 0, max: 3 })).toEqual({ x: 0, y: 0 });
    });
});
