/**
 * Core coordinate types used throughout the game.
 * This is a base module with no dependencies to avoid circular imports.
 */

/** Grid cell coordinate; y grows upward (row 0 of a layout is the top) */
export interface GridCoord {
    readonly x: number;
    readonly y: number;
}

export type Axis = 'x' | 'y';

/** Anchored (canvas) position of a cell, origin at the grid centre */
export interface AnchoredPosition {
    x: number;
    y: number;
}

/** Convert grid coordinates to a string key for Map/Set lookups */
export function coordKey(coord: GridCoord): string {
    return coord.x + ',' + coord.y;
}

export function sameCoord(a: GridCoord, b: GridCoord): boolean {
    return a.x === b.x && a.y === b.y;
}

/** Return a copy of `coord` with `axis` set to `value` */
export function withAxis(coord: GridCoord, axis: Axis, value: number): GridCoord {
    return axis === 'x' ? { x: value, y: coord.y } : { x: coord.x, y: value };
}

/**
 * Map a grid cell to its anchored position so that the grid is centred on the origin.
 * The presentation layer places sprites and cell indicators with this.
 */
export function anchoredPosition(
    pos: GridCoord,
    width: number,
    height: number,
    cellSpacing: number
): AnchoredPosition {
    const offsetX = (width - 1) / 2;
    const offsetY = (height - 1) / 2;
    return {
        x: (pos.x - offsetX) * cellSpacing,
        y: (pos.y - offsetY) * cellSpacing,
    };
}
