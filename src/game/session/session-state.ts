import { LogHandler } from '@/utilities/log-handler';
import { defineStateMachine } from '../util/state-machine';

/**
 * Session lifecycle.
 *
 *   loading --loaded--> playing --moved--> animating --animationDone--> playing
 *                       playing --won--> winning --acknowledged--> loading
 *   playing | animating | winning --skip--> loading
 *
 * `animating` is only entered when input is locked while the presentation
 * layer plays a move; the session itself never waits on a timer.
 */
export type SessionState = 'loading' | 'playing' | 'animating' | 'winning';

export type SessionEvent = 'loaded' | 'moved' | 'animationDone' | 'won' | 'acknowledged' | 'skip';

export interface SessionMachineContext {
    log: LogHandler;
}

export const sessionMachine = defineStateMachine<SessionMachineContext, SessionEvent>()<SessionState>({
    loading: {
        transitions: { loaded: 'playing' },
    },
    playing: {
        transitions: { moved: 'animating', won: 'winning', skip: 'loading' },
    },
    animating: {
        transitions: { animationDone: 'playing', skip: 'loading' },
        onExit: (ctx, to) => ctx.log.debug(`input unlocked (-> ${to})`),
    },
    winning: {
        transitions: { acknowledged: 'loading', skip: 'loading' },
        onEnter: (ctx) => ctx.log.debug('movement suspended until the win is acknowledged'),
    },
});

/** States in which directional commands are accepted */
export function acceptsMovement(state: SessionState): boolean {
    return state === 'playing';
}
