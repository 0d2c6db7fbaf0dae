// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Centralizes logging to ensure:
 * 1. Structured output (timestamps, levels, namespaces)
 * 2. Secret redaction (bot tokens, API keys)
 * 3. Configurable verbosity
 */

import { ENV } from '../../config/env';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LEVEL_NAMES: Record<NonNullable<typeof ENV.LOG_LEVEL>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

function initialLevel(): LogLevel {
    if (ENV.LOG_LEVEL) return LEVEL_NAMES[ENV.LOG_LEVEL];
    return ENV.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

/**
 * A logger bound to one namespace, e.g. `modules.reminders`.
 */
export class ScopedLogger {
    constructor(public readonly namespace: string) { }

    public debug(message: unknown, context?: unknown): void {
        Logger.debug(this.namespace, message, context);
    }

    public info(message: unknown, context?: unknown): void {
        Logger.info(this.namespace, message, context);
    }

    public warn(message: unknown, context?: unknown): void {
        Logger.warn(this.namespace, message, context);
    }

    public error(message: unknown, error?: unknown): void {
        Logger.error(this.namespace, message, error);
    }

    public child(name: string): ScopedLogger {
        return new ScopedLogger(`${this.namespace}.${name}`);
    }
}

export class Logger {
    private static currentLevel: LogLevel = initialLevel();

    /**
     * Chat bot tokens (three dot-separated base64url segments) and sk- style API keys
     */
    private static SECRET_REGEX = /[\w-]{23,28}\.[\w-]{6,7}\.[\w-]{27,40}|sk-[a-zA-Z0-9_-]{20,}/g;

    /**
     * Redacts secrets from string or object
     */
    private static redact(message: unknown): unknown {
        if (typeof message === 'string') {
            return message.replace(this.SECRET_REGEX, '[REDACTED]');
        } else if (typeof message === 'object' && message !== null) {
            try {
                const str = JSON.stringify(message);
                const redacted = str.replace(this.SECRET_REGEX, '[REDACTED]');
                return JSON.parse(redacted);
            } catch {
                // Circular structures are logged as-is
                return message;
            }
        }
        return message;
    }

    private static formatMessage(level: string, namespace: string, message: unknown, context?: unknown): string {
        const timestamp = new Date().toISOString();
        const safeMessage = this.redact(message);

        let log = `[${timestamp}] [${level}] [${namespace}] ${typeof safeMessage === 'string' ? safeMessage : JSON.stringify(safeMessage)}`;

        if (context !== undefined) {
            log += ` ${JSON.stringify(this.redact(context))}`;
        }

        return log;
    }

    public static setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    public static getLevel(): LogLevel {
        return this.currentLevel;
    }

    public static scope(namespace: string): ScopedLogger {
        return new ScopedLogger(namespace);
    }

    public static debug(namespace: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', namespace, message, context));
        }
    }

    public static info(namespace: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', namespace, message, context));
        }
    }

    public static warn(namespace: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', namespace, message, context));
        }
    }

    public static error(namespace: string, message: unknown, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof Error) {
                errorDetails = ` Stack: ${error.stack}`;
            } else if (error !== undefined) {
                errorDetails = ` Details: ${JSON.stringify(this.redact(error))}`;
            }

            console.error(this.formatMessage('ERROR', namespace, message) + errorDetails);
        }
    }
}
