/**
 * All possible input actions in the game.
 * Actions are decoupled from specific keys - bindings are configurable.
 */
export enum InputAction {
    // Movement (mirrored for the right character)
    MoveLeft = 'move_left',
    MoveRight = 'move_right',
    MoveUp = 'move_up',
    MoveDown = 'move_down',

    // Level progression
    AcknowledgeWin = 'acknowledge_win',
    AdvanceLevelDebug = 'advance_level_debug',

    // Front end
    Quit = 'quit',
}

/**
 * Keyboard event data, as delivered by a terminal keypress or a DOM KeyboardEvent
 */
export interface KeyboardData {
    /** Key name, lower case ('a', 'left', 'return', ...) */
    key: string;
    shiftKey: boolean;
    ctrlKey: boolean;
}
