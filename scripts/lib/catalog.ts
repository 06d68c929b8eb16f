import * as fs from 'fs';
import { DEFAULT_LEVELS } from '@/game/levels/level-catalog';
import { parseLevelCatalog } from '@/game/levels/catalog-parser';
import type { LevelCatalog } from '@/game/levels/types';

/** Built-in levels, or the catalog in the given JSON file */
export function loadCatalog(filePath: string | undefined): LevelCatalog {
    if (!filePath) {
        return DEFAULT_LEVELS;
    }
    const json: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return parseLevelCatalog(json);
}
