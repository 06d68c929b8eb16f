/**
 * Lightweight declarative state machine utility.
 *
 * Usage:
 *   const definition = defineStateMachine<MyContext, 'start' | 'done'>()({
 *       idle: {
 *           transitions: { start: 'working' },
 *       },
 *       working: {
 *           transitions: { done: 'idle' },
 *           onEnter: (ctx) => ctx.log.debug('working'),
 *       },
 *   });
 *
 *   const sm = definition.create('idle', { log });
 *   sm.send('start');
 */

/** State configuration */
export interface StateConfig<TState extends string, TEvent extends string, TContext> {
    /** Valid transitions: { eventName: targetState } */
    transitions?: Partial<Record<TEvent, TState>>;
    /** Called when entering this state */
    onEnter?: (ctx: TContext, from: TState) => void;
    /** Called when leaving this state */
    onExit?: (ctx: TContext, to: TState) => void;
}

/** Called after every state change, hooks included */
export type TransitionListener<TState extends string> = (from: TState, to: TState) => void;

/** State machine definition (reusable template) */
export interface StateMachineDefinition<TState extends string, TEvent extends string, TContext> {
    /** Create a new state machine instance. The initial state's onEnter is not called. */
    create(
        initialState: TState,
        context: TContext,
        onTransition?: TransitionListener<TState>
    ): StateMachine<TState, TEvent, TContext>;
    /** Get all defined states */
    states: readonly TState[];
}

/** State machine instance */
export interface StateMachine<TState extends string, TEvent extends string, TContext> {
    readonly state: TState;
    /** Context object (mutable) */
    readonly context: TContext;
    /** Check if an event is accepted in the current state */
    can(event: TEvent): boolean;
    /** Send an event. Returns true if a transition occurred. */
    send(event: TEvent): boolean;
    /** Force transition to a state (bypasses transition rules, still calls hooks) */
    forceState(state: TState): void;
}

/**
 * Define a state machine. Use curried form for type inference:
 *   defineStateMachine<MyContext, MyEvent>()({ ... })
 */
export function defineStateMachine<TContext, TEvent extends string>() {
    return function <TState extends string>(
        config: Record<TState, StateConfig<TState, TEvent, TContext>>
    ): StateMachineDefinition<TState, TEvent, TContext> {
        const states = Object.keys(config) as TState[];

        return {
            states,
            create(
                initialState: TState,
                context: TContext,
                onTransition?: TransitionListener<TState>
            ): StateMachine<TState, TEvent, TContext> {
                let currentState = initialState;

                const transitionTo = (newState: TState): boolean => {
                    if (newState === currentState) return false;

                    const previous = currentState;
                    config[previous].onExit?.(context, newState);

                    currentState = newState;
                    config[newState].onEnter?.(context, previous);

                    onTransition?.(previous, newState);
                    return true;
                };

                return {
                    get state() {
                        return currentState;
                    },

                    get context() {
                        return context;
                    },

                    can(event: TEvent): boolean {
                        return config[currentState].transitions?.[event] !== undefined;
                    },

                    send(event: TEvent): boolean {
                        const target = config[currentState].transitions?.[event];
                        if (target === undefined) return false;
                        return transitionTo(target);
                    },

                    forceState(state: TState): void {
                        transitionTo(state);
                    },
                };
            },
        };
    };
}
