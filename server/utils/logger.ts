/**
 * Logger
 *
 * Levelled console logger shared by the host and every plugin.
 * Messages follow the "[Component] text key=value" convention; optional
 * metadata is appended as compact JSON.
 *
 * Level comes from LOG_LEVEL (debug | info | warn | error), defaulting to
 * debug outside production.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function resolveLevel(): LogLevel {
    const raw = (process.env.LOG_LEVEL || '').toLowerCase();
    if (isLogLevel(raw)) return raw;
    return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

class Logger {
    private readonly level: LogLevel = resolveLevel();

    debug(message: string, meta?: LogMeta): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: LogMeta): void {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: LogMeta): void {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: LogMeta): void {
        this.write('error', message, meta);
    }

    private write(level: LogLevel, message: string, meta?: LogMeta): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

        const timestamp = new Date().toISOString();
        let line = `${timestamp} ${level.toUpperCase().padEnd(5)} ${message}`;
        if (meta && Object.keys(meta).length > 0) {
            try {
                line += ` ${JSON.stringify(meta)}`;
            } catch {
                line += ' [unserializable meta]';
            }
        }

        if (level === 'error') {
            console.error(line);
        } else if (level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }
}

const logger = new Logger();

export default logger;
