/**
 * Logger
 *
 * Leveled console logger shared by every module.
 *
 * Messages follow the `[Component] text: key=value` convention. An optional
 * metadata object is appended as JSON. error/warn go to stderr.
 *
 * @module server/utils/logger
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export type LogMeta = Record<string, unknown>;

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
    error: 0,
    warn: 1,
    info: 2,
    verbose: 3,
    debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Format one log line.
 *
 * Format: `2026-01-01T10:30:00.000Z INFO  [Loop] Cycle started {"slides":3}`
 */
export function formatLine(level: LogLevel, message: string, meta?: LogMeta, now: Date = new Date()): string {
    const tag = level.toUpperCase().padEnd(5);
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${safeStringify(meta)}` : '';
    return `${now.toISOString()} ${tag} ${message}${suffix}`;
}

function safeStringify(meta: LogMeta): string {
    try {
        return JSON.stringify(meta);
    } catch {
        return '{"error":"LOG_SERIALIZATION_FAILED"}';
    }
}

class Logger {
    private level: LogLevel = 'info';

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    error(message: string, meta?: LogMeta): void {
        this.write('error', message, meta);
    }

    warn(message: string, meta?: LogMeta): void {
        this.write('warn', message, meta);
    }

    info(message: string, meta?: LogMeta): void {
        this.write('info', message, meta);
    }

    verbose(message: string, meta?: LogMeta): void {
        this.write('verbose', message, meta);
    }

    debug(message: string, meta?: LogMeta): void {
        this.write('debug', message, meta);
    }

    /**
     * Startup banner. Always printed regardless of level.
     */
    startup(appName: string, details: Record<string, string | number | boolean> = {}): void {
        const lines = [appName];
        for (const [key, value] of Object.entries(details)) {
            lines.push(`  ${key}: ${value}`);
        }
        process.stdout.write(lines.join('\n') + '\n');
    }

    private write(level: LogLevel, message: string, meta?: LogMeta): void {
        if (LEVEL_PRIORITY[level] > LEVEL_PRIORITY[this.level]) return;

        const line = formatLine(level, message, meta) + '\n';
        if (level === 'error' || level === 'warn') {
            process.stderr.write(line);
        } else {
            process.stdout.write(line);
        }
    }
}

const logger = new Logger();

export default logger;
