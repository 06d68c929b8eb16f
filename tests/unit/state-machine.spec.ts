import { describe, it, expect, vi } from 'vitest';
import { defineStateMachine } from '@/game/util/state-machine';
import { sessionMachine, acceptsMovement } from '@/game/session/session-state';
import { LogHandler } from '@/utilities/log-handler';

interface DoorContext {
    entered: string[];
    exited: string[];
}

type DoorEvent = 'open' | 'close' | 'lock' | 'unlock';

const door = defineStateMachine<DoorContext, DoorEvent>()({
    closed: {
        transitions: { open: 'open', lock: 'locked' },
        onEnter: (ctx, from) => ctx.entered.push(`closed<-${from}`),
        onExit: (ctx, to) => ctx.exited.push(`closed->${to}`),
    },
    open: {
        transitions: { close: 'closed' },
        onEnter: (ctx, from) => ctx.entered.push(`open<-${from}`),
    },
    locked: {
        transitions: { unlock: 'closed' },
    },
});

function createDoor() {
    return door.create('closed', { entered: [], exited: [] });
}

describe('defineStateMachine', () => {
    it('should list its states', () => {
        expect(door.states).toEqual(['closed', 'open', 'locked']);
    });

    it('should not run onEnter for the initial state', () => {
        const sm = createDoor();

        expect(sm.state).toBe('closed');
        expect(sm.context.entered).toEqual([]);
    });

    it('should follow transitions and run hooks in exit-enter order', () => {
        const sm = createDoor();

        expect(sm.send('open')).toBe(true);
        expect(sm.send('close')).toBe(true);

        expect(sm.state).toBe('closed');
        expect(sm.context.exited).toEqual(['closed->open']);
        expect(sm.context.entered).toEqual(['open<-closed', 'closed<-open']);
    });

    it('should refuse events the current state does not accept', () => {
        const sm = createDoor();
        sm.send('lock');

        expect(sm.can('open')).toBe(false);
        expect(sm.send('open')).toBe(false);
        expect(sm.state).toBe('locked');
        expect(sm.can('unlock')).toBe(true);
    });

    it('should force a state and still run hooks', () => {
        const sm = createDoor();

        sm.forceState('open');

        expect(sm.state).toBe('open');
        expect(sm.context.entered).toEqual(['open<-closed']);
    });

    it('should ignore a forced transition to the current state', () => {
        const listener = vi.fn();
        const sm = door.create('closed', { entered: [], exited: [] }, listener);

        sm.forceState('closed');

        expect(listener).not.toHaveBeenCalled();
        expect(sm.context.exited).toEqual([]);
    });

    it('should report every change to the listener', () => {
        const listener = vi.fn();
        const sm = door.create('closed', { entered: [], exited: [] }, listener);

        sm.send('lock');
        sm.send('unlock');

        expect(listener.mock.calls).toEqual([['closed', 'locked'], ['locked', 'closed']]);
    });
});

describe('sessionMachine', () => {
    const log = new LogHandler('test');

    it('should only accept movement while playing', () => {
        expect(sessionMachine.states.filter(acceptsMovement)).toEqual(['playing']);
    });

    it('should run the win loop back to loading', () => {
        const sm = sessionMachine.create('loading', { log });

        sm.send('loaded');
        sm.send('won');
        expect(sm.can('moved')).toBe(false);
        sm.send('acknowledged');

        expect(sm.state).toBe('loading');
    });

    it('should lock and unlock around an animation', () => {
        const sm = sessionMachine.create('playing', { log });

        sm.send('moved');
        expect(sm.state).toBe('animating');
        expect(sm.can('won')).toBe(false);

        sm.send('animationDone');
        expect(sm.state).toBe('playing');
    });

    it('should accept a skip from every state but loading', () => {
        for (const state of sessionMachine.states) {
            const sm = sessionMachine.create(state, { log });
            expect(sm.can('skip')).toBe(state !== 'loading');
        }
    });
});
