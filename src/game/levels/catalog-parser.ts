/**
 * Parser for level catalogs stored as JSON.
 *
 * Expected shape:
 * ```json
 * [
 *   { "name": "corridor", "rows": ["100002"], "splitAxis": "x", "par": 2 },
 *   { "rows": ["1", "0", "0", "2"], "splitAxis": "y", "winCommand": "down" }
 * ]
 * ```
 * `winCommand` defaults to the command that pushes the left character toward the
 * other half: `right` for 'x' levels, `down` for 'y' levels.
 * Only the shape is checked here; geometry is validated by buildLevelLayout.
 */

import type { Axis } from '../coordinates';
import { Direction, isDirection } from '../directions';
import { LevelCatalogError } from './level-errors';
import type { LevelDefinition } from './types';

export function defaultWinCommand(splitAxis: Axis): Direction {
    return splitAxis === 'x' ? Direction.Right : Direction.Down;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRows(value: unknown, path: string): string[] {
    if (!Array.isArray(value)) {
        throw new LevelCatalogError(path, 'rows must be an array of strings');
    }
    return value.map((row, i) => {
        if (typeof row !== 'string') {
            throw new LevelCatalogError(`${path}[${i}]`, 'row must be a string');
        }
        return row;
    });
}

function parseSplitAxis(value: unknown, path: string): Axis {
    if (value === 'x' || value === 'y') {
        return value;
    }
    throw new LevelCatalogError(path, `splitAxis must be "x" or "y", got ${JSON.stringify(value)}`);
}

function parseLevel(value: unknown, path: string): LevelDefinition {
    if (!isRecord(value)) {
        throw new LevelCatalogError(path, 'level must be an object');
    }

    const rows = parseRows(value.rows, `${path}.rows`);
    const splitAxis = parseSplitAxis(value.splitAxis, `${path}.splitAxis`);

    let winCommand = defaultWinCommand(splitAxis);
    if (value.winCommand !== undefined) {
        if (!isDirection(value.winCommand)) {
            throw new LevelCatalogError(`${path}.winCommand`, `unknown command ${JSON.stringify(value.winCommand)}`);
        }
        winCommand = value.winCommand;
    }

    const level: LevelDefinition = { rows, splitAxis, winCommand };

    if (value.name !== undefined) {
        if (typeof value.name !== 'string') {
            throw new LevelCatalogError(`${path}.name`, 'name must be a string');
        }
        level.name = value.name;
    }

    if (value.par !== undefined) {
        if (typeof value.par !== 'number' || !Number.isInteger(value.par) || value.par < 1) {
            throw new LevelCatalogError(`${path}.par`, 'par must be a positive integer');
        }
        level.par = value.par;
    }

    return level;
}

/** Validate parsed JSON and turn it into level definitions */
export function parseLevelCatalog(json: unknown): LevelDefinition[] {
    if (!Array.isArray(json)) {
        throw new LevelCatalogError('', 'catalog must be an array of levels');
    }
    if (json.length === 0) {
        throw new LevelCatalogError('', 'catalog is empty');
    }
    return json.map((level, i) => parseLevel(level, `[${i}]`));
}
