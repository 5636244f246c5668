export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    readonly level: LogLevel;
    readonly subsystem: string;
    readonly message: string;
    readonly timestamp: number;
    readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const DEFAULT_MIN_LEVEL: LogLevel = 'warn';

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_RANK, value);

/** Reads a level name such as `LOG_LEVEL=debug`; anything unrecognised yields the fallback. */
export const parseLogLevel = (value: string | undefined, fallback: LogLevel = DEFAULT_MIN_LEVEL): LogLevel => {
    const normalized = value?.trim().toLowerCase() ?? '';
    return isLogLevel(normalized) ? normalized : fallback;
};

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

const bindConsole = (method: LogLevel): ((...parts: unknown[]) => void) => {
    const { console } = globalThis;
    const candidate: ((...parts: unknown[]) => void) | undefined = console[method];
    return (candidate ?? console.log).bind(console);
};

// Sinks are bound per write so a replaced global console is honoured.
export const defaultLogWriter: LogWriter = (entry) => {
    const sink = bindConsole(entry.level);
    const prefix = `[${entry.level.toUpperCase()}][${entry.subsystem}]`;
    const timestamp = toIsoTimestamp(entry.timestamp);

    if (entry.context && Object.keys(entry.context).length > 0) {
        sink(`${timestamp} ${prefix} ${entry.message}`, entry.context);
        return;
    }

    sink(`${timestamp} ${prefix} ${entry.message}`);
};

export interface Logger {
    readonly debug: (message: string, context?: Record<string, unknown>) => void;
    readonly info: (message: string, context?: Record<string, unknown>) => void;
    readonly warn: (message: string, context?: Record<string, unknown>) => void;
    readonly error: (message: string, context?: Record<string, unknown>) => void;
    readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
    readonly writer?: LogWriter;
    readonly now?: NowFn;
    readonly minLevel?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

const createLoggerForLevel = (
    level: LogLevel,
    subsystem: string,
    writer: LogWriter,
    now: NowFn,
    minLevel: LogLevel,
): ((message: string, context?: Record<string, unknown>) => void) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
        return () => undefined;
    }

    return (message, context) => {
        writer({
            level,
            subsystem,
            message,
            context,
            timestamp: now(),
        });
    };
};

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
    const writer = options.writer ?? defaultLogWriter;
    const now = options.now ?? Date.now;
    const minLevel = options.minLevel ?? 'debug';
    const normalized = sanitizeSubsystem(subsystem);

    const child: Logger['child'] = (suffix) => {
        const combined = `${normalized}:${sanitizeSubsystem(suffix)}`;
        return createLogger(combined, { writer, now, minLevel });
    };

    return {
        debug: createLoggerForLevel('debug', normalized, writer, now, minLevel),
        info: createLoggerForLevel('info', normalized, writer, now, minLevel),
        warn: createLoggerForLevel('warn', normalized, writer, now, minLevel),
        error: createLoggerForLevel('error', normalized, writer, now, minLevel),
        child,
    };
};

const readEnvLevel = (): string | undefined =>
    typeof process !== 'undefined' ? process.env.LOG_LEVEL : undefined;

export const rootLogger = createLogger('seasons', { minLevel: parseLogLevel(readEnvLevel()) });
