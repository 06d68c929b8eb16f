#!/usr/bin/env npx tsx

/**
 * Level catalog validator.
 *
 * Builds every level, solves it and compares the result with its declared par.
 *
 * Usage:
 *   npx tsx scripts/validate-levels.ts [catalog.json]
 *
 * Exits with code 1 when a level fails to build, cannot be solved or misses its par.
 */

import { LogHandler } from '@/utilities/log-handler';
import { buildLevelLayout } from '@/game/levels/level-layout';
import { solveLevel } from '@/game/session/level-solver';
import { loadCatalog } from './lib/catalog';

const log = new LogHandler('validate-levels');

function validate(catalogPath: string | undefined): number {
    const catalog = loadCatalog(catalogPath);
    let problems = 0;

    catalog.forEach((level, index) => {
        const name = level.name ?? `level ${index}`;
        try {
            const layout = buildLevelLayout(level, name);
            const solution = solveLevel(layout);

            if (!solution) {
                log.error(`${name}: no sequence of moves reaches the goal`);
                problems++;
                return;
            }

            const route = solution.commands.join(' ');
            if (level.par !== undefined && level.par !== solution.moveCount) {
                log.warn(`${name}: par is ${level.par} but the best solution takes ${solution.moveCount} (${route})`);
                problems++;
                return;
            }

            log.info(`${name}: ${layout.width}x${layout.height}, solved in ${solution.moveCount} (${route})`);
        } catch (e) {
            log.error(`${name}: failed to build`, e);
            problems++;
        }
    });

    return problems;
}

try {
    const problems = validate(process.argv[2]);
    if (problems > 0) {
        log.error(`${problems} level(s) with problems`);
        process.exitCode = 1;
    }
} catch (e) {
    log.error('Could not read the level catalog', e);
    process.exitCode = 1;
}
