/**
 * Public API of the movement and level-progression core.
 */

export { anchoredPosition, coordKey, sameCoord, type Axis, type GridCoord, type AnchoredPosition } from './game/coordinates';
export { Direction, ALL_DIRECTIONS } from './game/directions';

export type { LevelDefinition, LevelCatalog } from './game/levels/types';
export { DEFAULT_LEVELS } from './game/levels/level-catalog';
export { parseLevelCatalog, defaultWinCommand } from './game/levels/catalog-parser';
export { buildLevelLayout, type LevelLayout } from './game/levels/level-layout';
export { InvalidLevelLayoutError, LevelCatalogError, type LayoutErrorReason } from './game/levels/level-errors';

export { OccupancyGrid } from './game/grid/occupancy-grid';
export { computeSplitBounds, type AxisBound, type PlayerBounds, type SplitBounds } from './game/grid/bounds';
export { findNextValid, searchNextValid, type WrapSearchResult } from './game/grid/wrap-search';

export { DualPlayerState, computeMove, type PlayerPositions, type MoveOutcome } from './game/players/dual-player-state';

export { LevelSession, type LevelSessionOptions } from './game/session/level-session';
export type { SessionState } from './game/session/session-state';
export { isWinningMove } from './game/session/win-condition';
export { solveLevel, type LevelSolution } from './game/session/level-solver';

export * from './game/commands';
export { EventBus, EventSubscriptionManager, type GameEvents } from './game/event-bus';
export { GameSettingsManager, gameSettings, type GameSettings } from './game/game-settings';
export { renderLevel } from './game/renderer/text-renderer';
export * from './game/input';

export { LogHandler } from './utilities/log-handler';
export { MemorySettingsStorage, FileSettingsStorage, type SettingsStorage } from './utilities/settings-storage';
