/**
 * Input Module — Public API
 */

export { InputAction, type KeyboardData } from './input-actions';
export {
    getDefaultInputConfig,
    mergeInputConfig,
    matchesKeyBinding,
    resolveInputAction,
    actionToCommand,
    type InputConfig,
    type KeyBinding,
} from './input-config';
