import type { GridCoord } from '../coordinates';

/**
 * Which cells of the level's bounding box are playable.
 * Backed by a flat Uint8Array indexed as y * width + x; never changes after construction.
 */
export class OccupancyGrid {
    public readonly width: number;
    public readonly height: number;
    private readonly cells: Uint8Array;

    constructor(width: number, height: number, cells: Uint8Array) {
        if (cells.length !== width * height) {
            throw new RangeError(`Grid data has ${cells.length} cells, expected ${width * height}`);
        }
        this.width = width;
        this.height = height;
        this.cells = Uint8Array.from(cells);
    }

    public toIndex(x: number, y: number): number {
        return y * this.width + x;
    }

    public isInside(coord: GridCoord): boolean {
        return coord.x >= 0 && coord.x < this.width && coord.y >= 0 && coord.y < this.height;
    }

    /** False for cells outside the grid */
    public isOccupied(coord: GridCoord): boolean {
        return this.isInside(coord) && this.cells[this.toIndex(coord.x, coord.y)] !== 0;
    }

    public get occupiedCount(): number {
        let count = 0;
        for (const cell of this.cells) {
            if (cell !== 0) count++;
        }
        return count;
    }
}
