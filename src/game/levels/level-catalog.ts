import { Direction } from '../directions';
import type { LevelCatalog } from './types';

/**
 * Built-in levels, played in order and wrapping after the last one.
 * '.' = not part of the level, '0' = floor, '1' / '2' = left / right start, 'X' = hazard marker.
 */
export const DEFAULT_LEVELS: LevelCatalog = [
    {
        name: 'corridor',
        rows: [
            '100002',
        ],
        splitAxis: 'x',
        winCommand: Direction.Right,
        par: 2,
    },
    {
        name: 'tower',
        rows: [
            '1',
            '0',
            '0',
            '2',
        ],
        splitAxis: 'y',
        winCommand: Direction.Down,
        par: 2,
    },
    {
        name: 'gap',
        rows: [
            '1000002.',
        ],
        splitAxis: 'x',
        winCommand: Direction.Right,
        par: 2,
    },
    {
        name: 'steps',
        rows: [
            '..0.',
            '0020',
            '1000',
        ],
        splitAxis: 'x',
        winCommand: Direction.Right,
        par: 4,
    },
    {
        name: 'wedge',
        rows: [
            '...002',
            '.00000',
            '.10000',
        ],
        splitAxis: 'x',
        winCommand: Direction.Right,
        par: 3,
    },
    {
        name: 'cross',
        rows: [
            '..00..',
            '001020',
            '..00..',
        ],
        splitAxis: 'x',
        winCommand: Direction.Right,
        par: 4,
    },
];
