import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { appConfig } from '../config/app.config';
import type { LogLevelName } from '../interfaces/config.interface';

export enum LogLevel {
    SILENT = -1,
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3
}

interface LogEntry {
    timestamp: string;
    level: string;
    message: string;
    meta?: unknown;
}

export interface LoggerOptions {
    level: LogLevelName;
    directory: string;
    writeToFile: boolean;
}

export class Logger {
    private logLevel: LogLevel;
    private readonly logDirectory: string;
    private readonly writeToFile: boolean;

    constructor(options: LoggerOptions) {
        this.logLevel = this.parseLogLevel(options.level);
        this.logDirectory = options.directory;
        this.writeToFile = options.writeToFile;
    }

    setLevel(level: LogLevelName): void {
        this.logLevel = this.parseLogLevel(level);
    }

    private parseLogLevel(level: string): LogLevel {
        switch (level.toLowerCase()) {
            case 'silent': return LogLevel.SILENT;
            case 'error': return LogLevel.ERROR;
            case 'warn': return LogLevel.WARN;
            case 'info': return LogLevel.INFO;
            case 'debug': return LogLevel.DEBUG;
            default: return LogLevel.INFO;
        }
    }

    private formatLogEntry(level: string, message: string, meta?: unknown): LogEntry {
        return {
            timestamp: new Date().toISOString(),
            level: level.toUpperCase(),
            message,
            ...(meta !== undefined && { meta: this.serializeMeta(meta) })
        };
    }

    // Error instances carry no enumerable fields, so JSON.stringify would drop them
    private serializeMeta(meta: unknown): unknown {
        if (meta instanceof Error) {
            return { name: meta.name, message: meta.message, stack: meta.stack };
        }
        return meta;
    }

    private writeLog(logEntry: LogEntry): void {
        // Console output with colors
        const colors: Record<string, string> = {
            ERROR: '\x1b[31m',  // Red
            WARN: '\x1b[33m',   // Yellow
            INFO: '\x1b[36m',   // Cyan
            DEBUG: '\x1b[90m'   // Gray
        };

        const reset = '\x1b[0m';
        const color = colors[logEntry.level] ?? reset;
        const consoleMessage = `${color}[${logEntry.timestamp}] ${logEntry.level}: ${logEntry.message}${reset}`;

        if (logEntry.meta !== undefined) {
            console.log(consoleMessage, logEntry.meta);
        } else {
            console.log(consoleMessage);
        }

        if (this.writeToFile) {
            if (!existsSync(this.logDirectory)) {
                mkdirSync(this.logDirectory, { recursive: true });
            }
            const logFile = join(this.logDirectory, `app-${logEntry.timestamp.split('T')[0]}.log`);
            appendFileSync(logFile, JSON.stringify(logEntry) + '\n');
        }
    }

    error(message: string, meta?: unknown): void {
        if (this.logLevel >= LogLevel.ERROR) {
            this.writeLog(this.formatLogEntry('error', message, meta));
        }
    }

    warn(message: string, meta?: unknown): void {
        if (this.logLevel >= LogLevel.WARN) {
            this.writeLog(this.formatLogEntry('warn', message, meta));
        }
    }

    info(message: string, meta?: unknown): void {
        if (this.logLevel >= LogLevel.INFO) {
            this.writeLog(this.formatLogEntry('info', message, meta));
        }
    }

    debug(message: string, meta?: unknown): void {
        if (this.logLevel >= LogLevel.DEBUG) {
            this.writeLog(this.formatLogEntry('debug', message, meta));
        }
    }
}

export const logger = new Logger({
    level: appConfig.logging.level,
    directory: appConfig.logging.directory,
    writeToFile: appConfig.server.environment === 'production'
});
