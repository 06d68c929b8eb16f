import { describe, it, expect } from 'vitest';
import { OccupancyGrid } from '@/game/grid/occupancy-grid';
import { boundSpan, computeSplitBounds, isWithinBounds } from '@/game/grid/bounds';
import { occupancyFromRows } from './helpers/test-levels';

describe('OccupancyGrid', () => {
    it('should report occupied cells with y growing upwards', () => {
        const grid = occupancyFromRows(['#.', '.#']);

        expect(grid.isOccupied({ x: 0, y: 1 })).toBe(true);
        expect(grid.isOccupied({ x: 1, y: 0 })).toBe(true);
        expect(grid.isOccupied({ x: 0, y: 0 })).toBe(false);
        expect(grid.isOccupied({ x: 1, y: 1 })).toBe(false);
    });

    it('should treat cells outside the grid as empty', () => {
        const grid = occupancyFromRows(['##', '##']);

        expect(grid.isOccupied({ x: -1, y: 0 })).toBe(false);
        expect(grid.isOccupied({ x: 2, y: 0 })).toBe(false);
        expect(grid.isOccupied({ x: 0, y: 2 })).toBe(false);
        expect(grid.isInside({ x: 1, y: 1 })).toBe(true);
        expect(grid.isInside({ x: 1, y: -1 })).toBe(false);
    });

    it('should count occupied cells', () => {
        expect(occupancyFromRows(['#.#.', '..##']).occupiedCount).toBe(4);
    });

    it('should keep its own copy of the cell data', () => {
        const cells = new Uint8Array([1, 0]);
        const grid = new OccupancyGrid(2, 1, cells);

        cells[1] = 1;

        expect(grid.isOccupied({ x: 1, y: 0 })).toBe(false);
    });

    it('should reject cell data of the wrong size', () => {
        expect(() => new OccupancyGrid(3, 2, new Uint8Array(5))).toThrow(RangeError);
        expect(() => new OccupancyGrid(3, 2, new Uint8Array(5))).toThrow('Grid data has 5 cells, expected 6');
    });

    it('should index rows from the bottom', () => {
        const grid = new OccupancyGrid(4, 3, new Uint8Array(12));

        expect(grid.toIndex(0, 0)).toBe(0);
        expect(grid.toIndex(3, 0)).toBe(3);
        expect(grid.toIndex(1, 2)).toBe(9);
    });
});

describe('bounds', () => {
    it('should split along x into left and right halves', () => {
        expect(computeSplitBounds('x', 6, 3)).toEqual({
            left: { x: { min: 0, max: 2 }, y: { min: 0, max: 2 } },
            right: { x: { min: 3, max: 5 }, y: { min: 0, max: 2 } },
        });
    });

    it('should give the upper half to the left character on a y split', () => {
        expect(computeSplitBounds('y', 3, 4)).toEqual({
            left: { x: { min: 0, max: 2 }, y: { min: 2, max: 3 } },
            right: { x: { min: 0, max: 2 }, y: { min: 0, max: 1 } },
        });
    });

    it('should measure inclusive spans', () => {
        expect(boundSpan({ min: 3, max: 5 })).toBe(3);
        expect(boundSpan({ min: 0, max: 0 })).toBe(1);
    });

    it('should check containment on both axes', () => {
        const { left } = computeSplitBounds('x', 4, 2);

        expect(isWithinBounds({ x: 1, y: 1 }, left)).toBe(true);
        expect(isWithinBounds({ x: 2, y: 1 }, left)).toBe(false);
        expect(isWithinBounds({ x: 0, y: 2 }, left)).toBe(false);
    });
});
