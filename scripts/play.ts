#!/usr/bin/env npx tsx

/**
 * Terminal front end.
 *
 * Draws the level as text and feeds key presses to a LevelSession.
 * Settings are kept in .twin-halves-settings.json in the working directory.
 *
 * Usage:
 *   npx tsx scripts/play.ts [catalog.json]
 *
 * Keys: WASD / arrows move, Return or Space continues after a win,
 * L skips the level, Q or Escape quits.
 */

import * as path from 'path';
import * as readline from 'readline';
import { LogHandler } from '@/utilities/log-handler';
import { FileSettingsStorage } from '@/utilities/settings-storage';
import { gameSettings } from '@/game/game-settings';
import { LevelSession } from '@/game/session/level-session';
import { EventBus, EventSubscriptionManager } from '@/game/event-bus';
import { renderLevel } from '@/game/renderer/text-renderer';
import { InputAction, actionToCommand, getDefaultInputConfig, resolveInputAction } from '@/game/input';
import { loadCatalog } from './lib/catalog';

const log = new LogHandler('play');

function draw(session: LevelSession, footer: string): void {
    const level = session.layout.definition;
    const name = level.name ?? `level ${session.levelIndex}`;
    const par = level.par !== undefined ? ` / par ${level.par}` : '';

    const lines = [
        `${name} (${session.levelIndex + 1}/${session.levelCount})   moves: ${session.moveCount}${par}`,
        '',
        ...renderLevel(session.layout, session.positions).map(row => '  ' + row),
        '',
        footer,
    ];

    process.stdout.write('\x1b[2J\x1b[H' + lines.join('\n') + '\n');
}

function main(): void {
    gameSettings.useStorage(new FileSettingsStorage(path.join(process.cwd(), '.twin-halves-settings.json')));
    // the screen is redrawn on every key; keep log output off it
    LogHandler.getLogManager().setConsoleEnabled(false);

    const eventBus = new EventBus();
    const subscriptions = new EventSubscriptionManager();
    const session = new LevelSession({ catalog: loadCatalog(process.argv[2]), eventBus });
    const input = getDefaultInputConfig();
    const help = 'WASD/arrows move, L skips, Q quits';

    subscriptions.subscribe(eventBus, 'level:loaded', () => draw(session, help));
    subscriptions.subscribe(eventBus, 'positions:changed', () => {
        draw(session, help);
        // nothing is tweened in a terminal, release the lock right away
        if (session.state === 'animating') {
            session.applyCommand({ type: 'animation_complete' });
        }
    });
    subscriptions.subscribe(eventBus, 'level:winTriggered', ({ moveCount }) => {
        draw(session, `Solved in ${moveCount} moves. Press Return for the next level.`);
    });

    const quit = (): void => {
        subscriptions.unsubscribeAll();
        gameSettings.flush();
        if (process.stdin.isTTY) process.stdin.setRawMode(false);
        process.stdin.pause();
        process.stdout.write('\n');
    };

    readline.emitKeypressEvents(process.stdin);
    if (process.stdin.isTTY) process.stdin.setRawMode(true);

    process.stdin.on('keypress', (_str: string | undefined, key: readline.Key | undefined) => {
        if (!key?.name) return;

        const action = resolveInputAction(input, {
            key: key.name,
            ctrlKey: key.ctrl ?? false,
            shiftKey: key.shift ?? false,
        });
        if (action === InputAction.Quit) {
            quit();
            return;
        }

        const command = action !== null ? actionToCommand(action) : null;
        if (command) {
            session.applyCommand(command);
        }
    });

    draw(session, help);
}

try {
    main();
} catch (e) {
    LogHandler.getLogManager().setConsoleEnabled(true);
    log.error('Could not start the game', e);
    process.exitCode = 1;
}
