/**
 * Structured logging with pluggable transports.
 *
 * Every module asks for a component logger (`planner.driver`, `controller.ws`, ...)
 * through `createComponentLogger`; the CLI decides the level and transports once
 * with `initLogging`.
 */

export const LOG_LEVELS = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    fatal: 5,
    silent: 6,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export const isLogLevel = (value: string): value is LogLevel => value in LOG_LEVELS;

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    component: string;
    message: string;
    data?: Record<string, unknown>;
    error?: { name: string; message: string; stack?: string };
}

export interface LogTransport {
    name: string;
    log(entry: LogEntry): void;
}

const COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    trace: COLORS.gray,
    debug: COLORS.cyan,
    info: COLORS.blue,
    warn: COLORS.yellow,
    error: COLORS.red,
    fatal: COLORS.red,
    silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
    trace: 'TRC',
    debug: 'DBG',
    info: 'INF',
    warn: 'WRN',
    error: 'ERR',
    fatal: 'FTL',
    silent: '   ',
};

/**
 * Formats an entry as `HH:MM:SS LVL [component] message {data}`.
 * Colors are only used when writing to a TTY.
 */
export function formatEntry(entry: LogEntry, colors: boolean = false): string {
    const paint = (text: string, color: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

    const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    let output = [
        paint(time, COLORS.dim),
        paint(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]),
        paint(`[${entry.component}]`, COLORS.magenta),
        entry.message,
    ].join(' ');

    if (entry.data && Object.keys(entry.data).length > 0) {
        output += ' ' + paint(JSON.stringify(entry.data), COLORS.dim);
    }
    if (entry.error) {
        output += '\n' + paint(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
    }
    return output;
}

export class ConsoleTransport implements LogTransport {
    name = 'console';
    private colors: boolean;

    constructor(options: { colors?: boolean } = {}) {
        this.colors = options.colors ?? process.stderr.isTTY === true;
    }

    log(entry: LogEntry): void {
        // stdout is reserved for rendered maps and exports
        process.stderr.write(formatEntry(entry, this.colors) + '\n');
    }
}

/** Keeps entries in memory. Used by tests to assert on what was logged. */
export class MemoryTransport implements LogTransport {
    name = 'memory';
    readonly entries: LogEntry[] = [];

    log(entry: LogEntry): void {
        this.entries.push(entry);
    }
}

export class Logger {
    constructor(
        readonly component: string,
        private readonly settings: { minLevel: LogLevel; transports: LogTransport[] }
    ) {}

    trace(message: string, data?: Record<string, unknown>): void {
        this.log('trace', message, data);
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.log('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.log('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.log('warn', message, data);
    }

    error(message: string, error?: unknown, data?: Record<string, unknown>): void {
        this.log('error', message, data, error);
    }

    fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
        this.log('fatal', message, data, error);
    }

    child(component: string): Logger {
        return new Logger(`${this.component}.${component}`, this.settings);
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
        if (LOG_LEVELS[level] < LOG_LEVELS[this.settings.minLevel]) return;

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            component: this.component,
            message,
        };
        if (data) entry.data = data;
        if (error !== undefined) {
            entry.error = error instanceof Error
                ? { name: error.name, message: error.message, stack: error.stack }
                : { name: 'Unknown', message: String(error) };
        }

        for (const transport of this.settings.transports) {
            try {
                transport.log(entry);
            } catch (e) {
                console.error(`[Logger] Transport ${transport.name} failed:`, e);
            }
        }
    }
}

// Shared by every component logger, so initLogging() reconfigures them all
const settings: { minLevel: LogLevel; transports: LogTransport[] } = {
    minLevel: 'info',
    transports: [new ConsoleTransport()],
};

export function initLogging(options: { minLevel?: LogLevel; transports?: LogTransport[] }): void {
    if (options.minLevel) settings.minLevel = options.minLevel;
    if (options.transports) settings.transports = options.transports;
}

export function createComponentLogger(component: string): Logger {
    return new Logger(component, settings);
}
