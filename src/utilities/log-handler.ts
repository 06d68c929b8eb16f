import { LogManager, LogType } from './log-manager';

/** Anything a catch block can receive, as an Error */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

/**
 * Logger for one module. All handlers share one LogManager, so a front end can
 * silence the console or read the history in one place.
 */
export class LogHandler {
    private static manager = new LogManager();

    constructor(public readonly source: string) {}

    /** log an error; non-Error values thrown by callers are wrapped */
    public error(msg: string, exception?: unknown): void {
        this.push(LogType.Error, msg, exception === undefined ? undefined : toError(exception));
    }

    public warn(msg: string): void {
        this.push(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.push(LogType.Info, msg);
    }

    /** Objects are dumped as they are */
    public debug(msg: string | object): void {
        this.push(LogType.Debug, msg);
    }

    private push(type: LogType, msg: string | object, exception?: Error): void {
        LogHandler.manager.push({ type, source: this.source, msg, exception });
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }
}
