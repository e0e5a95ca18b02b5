/**
 * fetch-session logger.
 * Levelled console logging, configured through FETCH_SESSION_LOG_LEVEL.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'debug';

export interface FetchSessionLogger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    debug: 3
};

function isLogLevel(value: string): value is LogLevel {
    return Object.keys(LOG_LEVELS).includes(value);
}

let currentLevel: LogLevel = 'warn';

const envLevel = process.env.FETCH_SESSION_LOG_LEVEL?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) {
    currentLevel = envLevel;
}

const PREFIX = process.env.FETCH_SESSION_LOG_PREFIX || '[fetch-session]';

const SENSITIVE_HEADERS = ['authorization', 'proxy-authorization', 'cookie', 'set-cookie'];

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
    if (isLogLevel(level)) {
        currentLevel = level;
    }
}

/**
 * Copy of `headers` with credential-bearing values replaced.
 */
export function redactHeaders(headers: Iterable<[string, string]>): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [name, value] of headers) {
        out[name] = SENSITIVE_HEADERS.includes(name.toLowerCase()) ? 'REDACTED' : value;
    }
    return out;
}

type Sink = (message: string, ...args: unknown[]) => void;

function emitter(level: Exclude<LogLevel, 'silent'>, sink: () => Sink): Sink {
    return (message, ...args) => {
        if (LOG_LEVELS[level] <= LOG_LEVELS[currentLevel]) {
            sink()(`${PREFIX} ${message}`, ...args);
        }
    };
}

// Console methods are looked up per call so test spies take effect.
const loggerInstance: FetchSessionLogger = {
    error: emitter('error', () => console.error),
    warn: emitter('warn', () => console.warn),
    debug: emitter('debug', () => console.debug)
};

export function getLogger(): FetchSessionLogger {
    return loggerInstance;
}
