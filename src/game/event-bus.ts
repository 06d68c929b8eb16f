/**
 * Lightweight typed event bus between the session core and the presentation layer.
 * Renderers, audio and UI register handlers instead of being called by the core.
 */

import type { Axis, GridCoord } from './coordinates';
import type { Direction } from './directions';
import type { SessionState } from './session/session-state';

/** Event map defining all game events and their payloads */
export interface GameEvents {
    /** Emitted after a directional command moved the characters (including no-op moves) */
    'positions:changed': {
        left: GridCoord;
        right: GridCoord;
        direction: Direction;
        /** Either character wrapped around an edge of its half */
        crossedBoundary: boolean;
    };

    /** Emitted when a level has been built and the characters placed on their starts */
    'level:loaded': {
        index: number;
        name: string;
        width: number;
        height: number;
        splitAxis: Axis;
        occupiedCells: readonly GridCoord[];
        hazardCells: readonly GridCoord[];
        leftStart: GridCoord;
        rightStart: GridCoord;
    };

    /** Emitted when the win command closed the final gap */
    'level:winTriggered': {
        index: number;
        moveCount: number;
    };

    /** Emitted right before the next level is loaded */
    'level:advanced': {
        previousIndex: number;
        newIndex: number;
        /** True for the debug skip, false after an acknowledged win */
        skipped: boolean;
    };

    'session:stateChanged': {
        from: SessionState;
        to: SessionState;
    };
}

type EventHandler<T> = (payload: T) => void;

type HandlerMap = { [K in keyof GameEvents]?: Set<EventHandler<GameEvents[K]>> };

export class EventBus {
    private handlers: HandlerMap = {};

    /** Register an event handler */
    on<K extends keyof GameEvents>(event: K, handler: EventHandler<GameEvents[K]>): void {
        const handlerMap: { [P in K]?: Set<EventHandler<GameEvents[P]>> } = this.handlers;
        let handlers = handlerMap[event];
        if (!handlers) {
            handlers = new Set<EventHandler<GameEvents[K]>>();
            handlerMap[event] = handlers;
        }
        handlers.add(handler);
    }

    /** Remove an event handler */
    off<K extends keyof GameEvents>(event: K, handler: EventHandler<GameEvents[K]>): void {
        this.handlers[event]?.delete(handler);
    }

    /** Emit an event to all registered handlers */
    emit<K extends keyof GameEvents>(event: K, payload: GameEvents[K]): void {
        const handlers = this.handlers[event];
        if (!handlers) return;
        for (const handler of handlers) {
            handler(payload);
        }
    }

    /** Remove all handlers */
    clear(): void {
        this.handlers = {};
    }
}

/**
 * Tracks subscriptions so a presenter can drop all of them at once.
 *
 * @example
 * ```ts
 * const subscriptions = new EventSubscriptionManager();
 * subscriptions.subscribe(session.eventBus, 'positions:changed', (p) => view.moveTo(p.left, p.right));
 * // later
 * subscriptions.unsubscribeAll();
 * ```
 */
export class EventSubscriptionManager {
    private unsubscribers: Array<() => void> = [];

    subscribe<K extends keyof GameEvents>(
        eventBus: EventBus,
        event: K,
        handler: EventHandler<GameEvents[K]>,
    ): void {
        eventBus.on(event, handler);
        this.unsubscribers.push(() => eventBus.off(event, handler));
    }

    unsubscribeAll(): void {
        for (const unsubscribe of this.unsubscribers) {
            unsubscribe();
        }
        this.unsubscribers = [];
    }

    /** Number of active subscriptions */
    get count(): number {
        return this.unsubscribers.length;
    }
}
