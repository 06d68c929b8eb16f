export type LayoutErrorReason =
    | 'empty'
    | 'odd_split_dimension'
    | 'unknown_cell'
    | 'missing_start'
    | 'duplicate_start'
    | 'start_outside_half'
    | 'invalid_win_command';

/** Thrown while building a level layout; nothing has been changed when it surfaces */
export class InvalidLevelLayoutError extends Error {
    public readonly reason: LayoutErrorReason;
    public readonly levelName: string;

    constructor(levelName: string, reason: LayoutErrorReason, msg: string) {
        super(`Invalid level layout "${levelName}": ${msg}`);
        this.name = 'InvalidLevelLayoutError';
        this.reason = reason;
        this.levelName = levelName;
    }
}

/** Malformed catalog data (not a single level's geometry) */
export class LevelCatalogError extends Error {
    public readonly path: string;

    constructor(path: string, msg: string) {
        super(path ? `${path}: ${msg}` : msg);
        this.name = 'LevelCatalogError';
        this.path = path;
    }
}
