import type { GridCoord } from '../coordinates';
import type { Direction } from '../directions';

// === Movement ===

export interface MoveCommand {
    type: 'move';
    direction: Direction;
}

/** Presentation finished playing the last move; releases the input lock */
export interface AnimationCompleteCommand {
    type: 'animation_complete';
}

// === Level progression ===

export interface AcknowledgeWinCommand {
    type: 'acknowledge_win';
}

/** Skip to the next level without solving the current one */
export interface AdvanceLevelDebugCommand {
    type: 'advance_level_debug';
}

/**
 * Union type of all session commands.
 */
export type Command =
    | MoveCommand
    | AnimationCompleteCommand
    | AcknowledgeWinCommand
    | AdvanceLevelDebugCommand;

export type CommandType = Command['type'];

// === Command Result Types ===

/**
 * Effect produced by a command execution.
 * Used for debugging and replay.
 */
export type CommandEffect =
    | { type: 'players_moved'; left: GridCoord; right: GridCoord; crossedBoundary: boolean }
    | { type: 'win_triggered'; moveCount: number }
    | { type: 'level_loaded'; index: number }
    | { type: 'input_unlocked' };

/**
 * Result of command execution.
 * Ignored commands (wrong state) are not errors: they report success false and a reason.
 */
export interface CommandResult {
    /** Whether the command was accepted */
    success: boolean;

    /** Why the command was not accepted */
    error?: string;

    effects?: CommandEffect[];
}

/** Successful command result with no effects */
export const COMMAND_OK: CommandResult = { success: true };

/** Create a successful result with effects */
export function commandSuccess(effects?: CommandEffect[]): CommandResult {
    return effects ? { success: true, effects } : COMMAND_OK;
}

/** Create a failed result with error message */
export function commandFailed(error: string): CommandResult {
    return { success: false, error };
}

export function moveCommand(direction: Direction): MoveCommand {
    return { type: 'move', direction };
}

/**
 * Type guard for directional commands.
 */
export function isMovementCommand(cmd: Command): cmd is MoveCommand {
    return cmd.type === 'move';
}

/**
 * Type guard for commands that change the current level.
 */
export function isProgressionCommand(cmd: Command): cmd is AcknowledgeWinCommand | AdvanceLevelDebugCommand {
    return cmd.type === 'acknowledge_win' || cmd.type === 'advance_level_debug';
}
