/**
 * Logging utilities to standardize console output
 */

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
    component?: string;
    operation?: string;
    fieldName?: string;
    model?: string;
    expression?: string;
    [key: string]: unknown;
}

export function parseLogLevel(name: LogLevelName): LogLevel {
    switch (name) {
        case 'debug':
            return LogLevel.DEBUG;
        case 'info':
            return LogLevel.INFO;
        case 'warn':
            return LogLevel.WARN;
        case 'error':
            return LogLevel.ERROR;
    }
}

class Logger {
    private level: LogLevel = LogLevel.WARN;
    private prefix: string = '';

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    setPrefix(prefix: string): void {
        this.prefix = prefix;
    }

    isEnabled(level: LogLevel): boolean {
        return level >= this.level;
    }

    private formatMessage(level: string, message: string, context?: LogContext): string {
        const timestamp = new Date().toISOString();
        const contextStr = context ? ` [${Object.entries(context).map(([k, v]) => `${k}=${v}`).join(', ')}]` : '';
        const prefixStr = this.prefix ? `[${this.prefix}] ` : '';
        return `${prefixStr}${timestamp} [${level}] ${message}${contextStr}`;
    }

    debug(message: string, context?: LogContext): void {
        if (this.isEnabled(LogLevel.DEBUG)) {
            console.debug(this.formatMessage('DEBUG', message, context));
        }
    }

    info(message: string, context?: LogContext): void {
        if (this.isEnabled(LogLevel.INFO)) {
            console.log(this.formatMessage('INFO', message, context));
        }
    }

    warn(message: string, context?: LogContext): void {
        if (this.isEnabled(LogLevel.WARN)) {
            console.warn(this.formatMessage('WARN', message, context));
        }
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        if (this.isEnabled(LogLevel.ERROR)) {
            const errorMsg = error ? (error instanceof Error ? error.message : String(error)) : '';
            const fullMessage = errorMsg ? `${message}: ${errorMsg}` : message;
            console.error(this.formatMessage('ERROR', fullMessage, context));
        }
    }

    // Field identity specific logging
    expressionRejected(reason: string, expression: string, context?: LogContext): void {
        this.debug(`Rejected accessor expression: ${reason}`, { ...context, operation: 'analyzeMemberAccess', expression });
    }

    accessorResolved(fieldName: string, model: string, context?: LogContext): void {
        this.debug(`Resolved accessor to ${model}.${fieldName}`, { ...context, operation: 'fromExpression', fieldName, model });
    }
}

// Export singleton instance
export const logger = new Logger();

// Export convenience functions
export const logExpressionRejected = (reason: string, expression: string, context?: LogContext) => logger.expressionRejected(reason, expression, context);
export const logAccessorResolved = (fieldName: string, model: string, context?: LogContext) => logger.accessorResolved(fieldName, model, context);
