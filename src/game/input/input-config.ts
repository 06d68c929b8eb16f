import { Direction } from '../directions';
import { moveCommand, type Command } from '../commands';
import { InputAction, type KeyboardData } from './input-actions';

/**
 * A key binding maps a key combination to an action.
 */
export interface KeyBinding {
    action: InputAction;
    /** Key name, lower case */
    key: string;
    /** Require shift to be held */
    shift?: boolean;
    /** Require ctrl to be held */
    ctrl?: boolean;
}

export interface InputConfig {
    bindings: KeyBinding[];
}

/**
 * Default input configuration: WASD or arrows to move, L to skip a level,
 * Return or Space to continue after a win.
 */
export function getDefaultInputConfig(): InputConfig {
    return {
        bindings: [
            { action: InputAction.MoveLeft, key: 'a' },
            { action: InputAction.MoveRight, key: 'd' },
            { action: InputAction.MoveUp, key: 'w' },
            { action: InputAction.MoveDown, key: 's' },

            { action: InputAction.MoveLeft, key: 'left' },
            { action: InputAction.MoveRight, key: 'right' },
            { action: InputAction.MoveUp, key: 'up' },
            { action: InputAction.MoveDown, key: 'down' },

            { action: InputAction.AcknowledgeWin, key: 'return' },
            { action: InputAction.AcknowledgeWin, key: 'space' },
            { action: InputAction.AdvanceLevelDebug, key: 'l' },

            { action: InputAction.Quit, key: 'q' },
            { action: InputAction.Quit, key: 'escape' },
            { action: InputAction.Quit, key: 'c', ctrl: true },
        ],
    };
}

/**
 * Merge user bindings with defaults. User bindings win for keys they define.
 */
export function mergeInputConfig(user: Partial<InputConfig>, base: InputConfig = getDefaultInputConfig()): InputConfig {
    if (!user.bindings) {
        return { bindings: [...base.bindings] };
    }
    const overridden = new Set(user.bindings.map(bindingKey));
    return {
        bindings: [
            ...user.bindings,
            ...base.bindings.filter(b => !overridden.has(bindingKey(b))),
        ],
    };
}

function bindingKey(binding: KeyBinding): string {
    return `${binding.ctrl ? 'ctrl+' : ''}${binding.shift ? 'shift+' : ''}${binding.key}`;
}

export function matchesKeyBinding(binding: KeyBinding, data: KeyboardData): boolean {
    return binding.key === data.key.toLowerCase()
        && (binding.ctrl ?? false) === data.ctrlKey
        && (binding.shift ?? false) === data.shiftKey;
}

/** First action bound to the pressed key, or null */
export function resolveInputAction(config: InputConfig, data: KeyboardData): InputAction | null {
    const binding = config.bindings.find(b => matchesKeyBinding(b, data));
    return binding ? binding.action : null;
}

const ACTION_COMMANDS: Partial<Record<InputAction, Command>> = {
    [InputAction.MoveLeft]: moveCommand(Direction.Left),
    [InputAction.MoveRight]: moveCommand(Direction.Right),
    [InputAction.MoveUp]: moveCommand(Direction.Up),
    [InputAction.MoveDown]: moveCommand(Direction.Down),
    [InputAction.AcknowledgeWin]: { type: 'acknowledge_win' },
    [InputAction.AdvanceLevelDebug]: { type: 'advance_level_debug' },
};

/** Session command for an action; null for front-end actions such as Quit */
export function actionToCommand(action: InputAction): Command | null {
    return ACTION_COMMANDS[action] ?? null;
}
