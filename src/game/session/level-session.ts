import { LogHandler } from '@/utilities/log-handler';
import { anchoredPosition, type AnchoredPosition, type GridCoord } from '../coordinates';
import type { Direction } from '../directions';
import {
    commandFailed,
    commandSuccess,
    type Command,
    type CommandResult,
} from '../commands';
import { EventBus } from '../event-bus';
import { gameSettings } from '../game-settings';
import { LevelCatalogError } from '../levels/level-errors';
import { buildLevelLayout, type LevelLayout } from '../levels/level-layout';
import type { LevelCatalog } from '../levels/types';
import { DEFAULT_LEVELS } from '../levels/level-catalog';
import { DualPlayerState, type PlayerPositions } from '../players/dual-player-state';
import { isWinningMove } from './win-condition';
import type { StateMachine } from '../util/state-machine';
import {
    acceptsMovement,
    sessionMachine,
    type SessionEvent,
    type SessionMachineContext,
    type SessionState,
} from './session-state';

export interface LevelSessionOptions {
    /** Levels in play order; defaults to the built-in catalog */
    catalog?: LevelCatalog;
    eventBus?: EventBus;
    /** First level; wraps modulo the catalog size */
    startIndex?: number;
    /** Enter 'animating' after each move until 'animation_complete' arrives */
    lockInputWhileAnimating?: boolean;
    /** Accept 'advance_level_debug' */
    allowDebugAdvance?: boolean;
    /** Distance between cell centres for anchorOf; read from the settings when omitted */
    cellSpacing?: number;
}

interface LoadedLevel {
    index: number;
    layout: LevelLayout;
    players: DualPlayerState;
}

function wrapIndex(index: number, size: number): number {
    if (!Number.isInteger(index)) {
        throw new RangeError(`Level index must be an integer, got ${index}`);
    }
    return ((index % size) + size) % size;
}

/**
 * Runs the level loop: load a level, take directional commands, detect the win,
 * advance. Everything happens synchronously inside applyCommand; the presentation
 * layer follows along through the event bus.
 */
export class LevelSession {
    private static log = new LogHandler('LevelSession');

    public readonly eventBus: EventBus;
    private readonly catalog: LevelCatalog;
    private readonly lockInputWhileAnimating: boolean;
    private readonly allowDebugAdvance: boolean;
    private readonly cellSpacing: number | undefined;
    private readonly machine: StateMachine<SessionState, SessionEvent, SessionMachineContext>;

    private current: LoadedLevel;
    private moves = 0;

    constructor(options: LevelSessionOptions = {}) {
        this.catalog = options.catalog ?? DEFAULT_LEVELS;
        if (this.catalog.length === 0) {
            throw new LevelCatalogError('', 'catalog is empty');
        }

        this.eventBus = options.eventBus ?? new EventBus();
        this.lockInputWhileAnimating = options.lockInputWhileAnimating ?? gameSettings.state.lockInputWhileAnimating;
        this.allowDebugAdvance = options.allowDebugAdvance ?? gameSettings.state.allowDebugAdvance;
        this.cellSpacing = options.cellSpacing;

        this.machine = sessionMachine.create(
            'loading',
            { log: LevelSession.log },
            (from, to) => this.eventBus.emit('session:stateChanged', { from, to })
        );

        // the first level is built before anything is emitted, so a bad layout throws from here
        this.current = this.prepare(options.startIndex ?? gameSettings.state.startLevelIndex);
        this.commit(this.current);
    }

    public get state(): SessionState {
        return this.machine.state;
    }

    public get levelIndex(): number {
        return this.current.index;
    }

    public get levelCount(): number {
        return this.catalog.length;
    }

    public get moveCount(): number {
        return this.moves;
    }

    public get layout(): LevelLayout {
        return this.current.layout;
    }

    public get positions(): PlayerPositions {
        return this.current.players.positions;
    }

    public get left(): GridCoord {
        return this.current.players.left;
    }

    public get right(): GridCoord {
        return this.current.players.right;
    }

    /** Anchored position of a cell on the current level, grid centred on the origin */
    public anchorOf(coord: GridCoord): AnchoredPosition {
        const { width, height } = this.current.layout;
        return anchoredPosition(coord, width, height, this.cellSpacing ?? gameSettings.state.cellSpacing);
    }

    /** Process one command to completion */
    public applyCommand(cmd: Command): CommandResult {
        switch (cmd.type) {
        case 'move':
            return this.move(cmd.direction);
        case 'animation_complete':
            return this.completeAnimation();
        case 'acknowledge_win':
            return this.acknowledgeWin();
        case 'advance_level_debug':
            return this.skipLevel();
        }
    }

    /**
     * Load the level at `index` (wrapped) from any state.
     * Throws InvalidLevelLayoutError without touching the session when the layout is bad.
     */
    public loadLevel(index: number): void {
        const next = this.prepare(index);
        this.machine.forceState('loading');
        this.commit(next);
    }

    private move(direction: Direction): CommandResult {
        if (!acceptsMovement(this.state)) {
            return this.ignore(`move ${direction}`);
        }

        const { layout, players } = this.current;
        this.moves++;

        if (isWinningMove(layout, players.positions, direction)) {
            this.machine.send('won');
            LevelSession.log.info(`Level ${this.current.index} solved in ${this.moves} moves`);
            this.eventBus.emit('level:winTriggered', { index: this.current.index, moveCount: this.moves });
            return commandSuccess([{ type: 'win_triggered', moveCount: this.moves }]);
        }

        const outcome = players.applyMove(direction);
        if (this.lockInputWhileAnimating) {
            this.machine.send('moved');
        }

        this.eventBus.emit('positions:changed', {
            left: outcome.left,
            right: outcome.right,
            direction,
            crossedBoundary: outcome.crossedBoundary,
        });

        return commandSuccess([{
            type: 'players_moved',
            left: outcome.left,
            right: outcome.right,
            crossedBoundary: outcome.crossedBoundary,
        }]);
    }

    private completeAnimation(): CommandResult {
        if (!this.machine.send('animationDone')) {
            return this.ignore('animation_complete');
        }
        return commandSuccess([{ type: 'input_unlocked' }]);
    }

    private acknowledgeWin(): CommandResult {
        if (!this.machine.can('acknowledged')) {
            return this.ignore('acknowledge_win');
        }
        return this.advance('acknowledged', false);
    }

    private skipLevel(): CommandResult {
        if (!this.allowDebugAdvance) {
            return this.ignore('advance_level_debug (disabled)');
        }
        if (!this.machine.can('skip')) {
            return this.ignore('advance_level_debug');
        }
        return this.advance('skip', true);
    }

    private advance(event: 'acknowledged' | 'skip', skipped: boolean): CommandResult {
        const previousIndex = this.current.index;
        const next = this.prepare(previousIndex + 1);

        this.eventBus.emit('level:advanced', { previousIndex, newIndex: next.index, skipped });
        this.machine.send(event);
        this.commit(next);

        return commandSuccess([{ type: 'level_loaded', index: next.index }]);
    }

    /** Build everything for a level without changing the session */
    private prepare(index: number): LoadedLevel {
        const wrapped = wrapIndex(index, this.catalog.length);
        const layout = buildLevelLayout(this.catalog[wrapped], `level ${wrapped}`);
        const players = new DualPlayerState(layout.grid, layout.bounds, {
            left: layout.leftStart,
            right: layout.rightStart,
        });
        return { index: wrapped, layout, players };
    }

    /** Install a prepared level; the machine must be in 'loading' */
    private commit(level: LoadedLevel): void {
        this.current = level;
        this.moves = 0;

        const { layout } = level;
        const name = layout.definition.name ?? `level ${level.index}`;
        LevelSession.log.info(`Loaded ${name} (#${level.index}, ${layout.width}x${layout.height}, split ${layout.splitAxis})`);

        this.eventBus.emit('level:loaded', {
            index: level.index,
            name,
            width: layout.width,
            height: layout.height,
            splitAxis: layout.splitAxis,
            occupiedCells: layout.occupiedCells,
            hazardCells: layout.hazardCells,
            leftStart: layout.leftStart,
            rightStart: layout.rightStart,
        });

        this.machine.send('loaded');
    }

    private ignore(what: string): CommandResult {
        LevelSession.log.debug(`Ignored ${what} while ${this.state}`);
        return commandFailed(`${what} is not accepted while ${this.state}`);
    }
}
