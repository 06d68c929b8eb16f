export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string | object;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

export interface LogManagerOptions {
    /** Messages kept for late listeners (default 100) */
    historySize?: number;
    /** Minimum interval between identical console lines in ms (default 1000) */
    throttleMs?: number;
    /** Clock used for throttling */
    now?: () => number;
}

/**
 * Frames that mark Node's async scheduling points.
 * Everything below the first one is runtime noise.
 */
const ASYNC_BOUNDARY_PATTERNS = [
    /processTicksAndRejections/,
    /process\.processImmediate/,
    /listOnTimeout/,
    /node:internal\/timers/,
];

/** Cut a stack trace at the first async boundary frame */
export function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const cut = lines.findIndex(line => ASYNC_BOUNDARY_PATTERNS.some(p => p.test(line.trim())));
    if (cut < 0) {
        return stack;
    }
    return [...lines.slice(0, cut), '    ... (async stack truncated)'].join('\n');
}

/** One console line: source, message, then the exception and its trimmed stack */
function formatMessage(msg: ILogMessage, text: string, suppressedNote: string): string {
    let formatted = msg.source + '\t' + text + suppressedNote;
    if (msg.exception) {
        formatted += '\n' + msg.exception.message;
        if (msg.exception.stack) {
            formatted += '\n' + cleanStackTrace(msg.exception.stack);
        }
    }
    return formatted;
}

interface ThrottleEntry {
    lastTime: number;
    suppressedCount: number;
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private consoleEnabled = true;

    private readonly historySize: number;
    private readonly throttleMs: number;
    private readonly now: () => number;

    /** source:type:msg -> last console write */
    private throttleState = new Map<string, ThrottleEntry>();

    constructor(options: LogManagerOptions = {}) {
        this.historySize = options.historySize ?? 100;
        this.throttleMs = options.throttleMs ?? 1000;
        this.now = options.now ?? (() => performance.now());
    }

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Turn console output on or off; history and listener are unaffected */
    public setConsoleEnabled(enabled: boolean): void {
        this.consoleEnabled = enabled;
    }

    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        this.log.push(msg);
        if (this.log.length > this.historySize) {
            this.log.shift();
        }

        this.listener?.(msg);

        if (this.consoleEnabled) {
            this.writeToConsole(msg);
        }
    }

    private writeToConsole(msg: ILogMessage): void {
        const text = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const throttleKey = `${msg.source}:${msg.type}:${text}`;
        const now = this.now();
        const entry = this.throttleState.get(throttleKey);

        if (entry && now - entry.lastTime < this.throttleMs) {
            entry.suppressedCount++;
            return;
        }

        const suppressedNote = entry && entry.suppressedCount > 0
            ? ` (${entry.suppressedCount} similar suppressed)`
            : '';
        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        const formatted = formatMessage(msg, text, suppressedNote);
        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.log(formatted);
            break;
        }
    }
}
