/**
 * Logging for plan-query
 * Structured console logging with an in-memory buffer for diagnostics
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    context?: Record<string, unknown>;
    stack?: string;
}

const EMOJI: Record<LogLevel, string> = { debug: '🔍', info: 'ℹ️', warn: '⚠️', error: '❌' };
const COLOR: Record<LogLevel, string> = { debug: '\x1b[36m', info: '\x1b[32m', warn: '\x1b[33m', error: '\x1b[31m' };
const RESET = '\x1b[0m';

export class Logger {
    private logs: LogEntry[] = [];
    private maxLogs = 1000;

    private get isDevelopment(): boolean {
        return process.env.NODE_ENV !== 'production';
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error) {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            context,
            stack: error?.stack
        };

        this.logs.push(entry);
        if (this.logs.length > this.maxLogs) {
            this.logs.shift();
        }

        const line = `${COLOR[level]}${EMOJI[level]} [${level.toUpperCase()}]${RESET} ${message}`;
        const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
        write(line, context || '');

        if (error?.stack && this.isDevelopment) console.error(error.stack);
    }

    debug(message: string, context?: Record<string, unknown>) {
        if (this.isDevelopment) this.log('debug', message, context);
    }

    info(message: string, context?: Record<string, unknown>) {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>) {
        this.log('warn', message, context);
    }

    error(message: string, contextOrError?: Record<string, unknown> | Error) {
        const isError = contextOrError instanceof Error;
        this.log('error', message, isError ? { error: contextOrError.message } : contextOrError, isError ? contextOrError : undefined);
    }

    getLogs(): LogEntry[] {
        return [...this.logs];
    }

    getLogsByLevel(level: LogLevel): LogEntry[] {
        return this.logs.filter(log => log.level === level);
    }

    clear() {
        this.logs = [];
    }
}

export const logger = new Logger();
