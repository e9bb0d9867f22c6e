/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * LOG_LEVEL (debug, info, warn, error, silent) sets the lowest level written.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

export class Logger {
    /**
     * Log debug message with context
     */
    debug(message: string, meta?: LogMeta) {
        if (this.enabled('debug')) {
            console.debug(this.formatLog('DEBUG', message, meta));
        }
    }

    /**
     * Log info message with context
     */
    info(message: string, meta?: LogMeta) {
        if (this.enabled('info')) {
            console.info(this.formatLog('INFO', message, meta));
        }
    }

    /**
     * Log warning message with context
     */
    warn(message: string, meta?: LogMeta) {
        if (this.enabled('warn')) {
            console.warn(this.formatLog('WARN', message, meta));
        }
    }

    /**
     * Log failure message with context
     */
    error(message: string, meta?: LogMeta) {
        if (this.enabled('error')) {
            console.error(this.formatLog('ERROR', message, meta));
        }
    }

    /**
     * Level is read on every call so tests and .env loading can change it after import
     */
    private get level(): LogLevel {
        const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
        return isLogLevel(configured) ? configured : 'info';
    }

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(level: string, message: string, meta?: LogMeta): string {
        const timestamp = new Date().toISOString();

        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp,
                level,
                message,
                ...(meta && { meta }),
            });
        } else {
            // Pretty format for development
            const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
            return `${level} ${message}${metaStr}`;
        }
    }
}

/**
 * Turn an unknown thrown value into loggable fields
 */
export function describeError(error: unknown): LogMeta {
    if (error instanceof Error) {
        return { error: error.message, errorName: error.name, stack: error.stack };
    }
    return { error: String(error) };
}

/**
 * Global logger instance for infrastructure components
 * Use this for server startup and middleware
 */
export const logger = new Logger();
