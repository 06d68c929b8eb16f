/**
 * Commands Module — Public API
 *
 * All external code should import from this barrel file.
 */

export type {
    Command,
    CommandType,
    MoveCommand,
    AnimationCompleteCommand,
    AcknowledgeWinCommand,
    AdvanceLevelDebugCommand,
    CommandResult,
    CommandEffect,
} from './command-types';

export {
    isMovementCommand,
    isProgressionCommand,
    moveCommand,
    COMMAND_OK,
    commandSuccess,
    commandFailed,
} from './command-types';
