import * as winston from 'winston';
import * as path from 'path';
import { trace } from '@opentelemetry/api';
import { config } from '../config/env';

// Log levels enum
export enum BasicLogLevel {
    OFF = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4
}

// Basic log context interface
export interface BasicLogContext {
    component?: string;
    operation?: string;
    projectId?: string;
    correlationId?: string;
    [key: string]: unknown;
}

/**
 * Basic Logger Service
 *
 * Static winston wrapper used for all non-request-scoped logging.
 * Console output is human readable; file output is one JSON record per line.
 */
export class BasicLoggerService {
    private static instance: BasicLoggerService;
    private logger: winston.Logger;
    private logLevel: BasicLogLevel;

    private constructor() {
        this.logLevel = BasicLoggerService.parseLogLevel(config.logging.level);
        this.logger = this.createLogger();
    }

    /**
     * Get singleton instance
     */
    public static getInstance(): BasicLoggerService {
        if (!BasicLoggerService.instance) {
            BasicLoggerService.instance = new BasicLoggerService();
        }
        return BasicLoggerService.instance;
    }

    static parseLogLevel(level: string | undefined): BasicLogLevel {
        switch ((level || 'INFO').toUpperCase()) {
            case 'OFF': return BasicLogLevel.OFF;
            case 'ERROR': return BasicLogLevel.ERROR;
            case 'WARN': return BasicLogLevel.WARN;
            case 'INFO': return BasicLogLevel.INFO;
            case 'DEBUG': return BasicLogLevel.DEBUG;
            default: return BasicLogLevel.INFO;
        }
    }

    /**
     * Create Winston logger instance
     */
    private createLogger(): winston.Logger {
        const { combine, timestamp, printf, colorize, errors, json } = winston.format;

        // Inject the active span so log lines can be joined with traces
        const traceFormat = winston.format((info) => {
            const span = trace.getActiveSpan();
            if (span) {
                const spanContext = span.spanContext();
                info.trace_id = spanContext.traceId;
                info.span_id = spanContext.spanId;
            }
            return info;
        });

        const consoleFormat = printf(({ level, message, timestamp, component, operation, stack, ...metadata }) => {
            let msg = `${String(timestamp)} [${level}]`;

            if (component) {
                msg += ` [${String(component)}]`;
            }

            if (operation) {
                msg += ` [${String(operation)}]`;
            }

            msg += `: ${String(message)}`;

            if (Object.keys(metadata).length > 0) {
                msg += ` ${BasicLoggerService.safeStringify(metadata)}`;
            }

            if (stack) {
                msg += `\n${String(stack)}`;
            }

            return msg;
        });

        const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
            new winston.transports.Console({
                format: combine(colorize(), consoleFormat),
            }),
        ];

        if (config.logging.toFile) {
            const logsDir = path.resolve(process.cwd(), config.logging.filePath);
            transports.push(
                new winston.transports.File({
                    filename: path.join(logsDir, 'error.log'),
                    level: 'error',
                    format: json(),
                }),
                new winston.transports.File({
                    filename: path.join(logsDir, 'combined.log'),
                    format: json(),
                }),
            );
        }

        return winston.createLogger({
            level: this.getWinstonLevel(),
            silent: this.logLevel === BasicLogLevel.OFF,
            format: combine(
                errors({ stack: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
                traceFormat(),
            ),
            transports,
        });
    }

    /**
     * Convert custom log level to Winston level
     */
    private getWinstonLevel(): string {
        switch (this.logLevel) {
            case BasicLogLevel.ERROR: return 'error';
            case BasicLogLevel.WARN: return 'warn';
            case BasicLogLevel.INFO: return 'info';
            case BasicLogLevel.DEBUG: return 'debug';
            default: return 'info';
        }
    }

    /**
     * JSON.stringify that survives circular references and Error values
     */
    static safeStringify(obj: unknown): string {
        const seen = new WeakSet<object>();
        try {
            return JSON.stringify(obj, (_key, value: unknown) => {
                if (value instanceof Error) {
                    return {
                        name: value.name,
                        message: value.message,
                        stack: value.stack,
                    };
                }
                if (typeof value === 'object' && value !== null) {
                    if (seen.has(value)) {
                        return '[Circular]';
                    }
                    seen.add(value);
                }
                return value;
            });
        } catch {
            return '[Unable to stringify]';
        }
    }

    private isLevelEnabled(level: BasicLogLevel): boolean {
        return this.logLevel >= level;
    }

    private write(level: BasicLogLevel, winstonLevel: string, message: string, context: BasicLogContext): void {
        if (!this.isLevelEnabled(level)) return;
        this.logger.log(winstonLevel, message, context);
    }

    // ===== STATIC LOGGING METHODS =====

    static error(message: string, context: BasicLogContext = {}): void {
        BasicLoggerService.getInstance().write(BasicLogLevel.ERROR, 'error', message, context);
    }

    static warn(message: string, context: BasicLogContext = {}): void {
        BasicLoggerService.getInstance().write(BasicLogLevel.WARN, 'warn', message, context);
    }

    static info(message: string, context: BasicLogContext = {}): void {
        BasicLoggerService.getInstance().write(BasicLogLevel.INFO, 'info', message, context);
    }

    static debug(message: string, context: BasicLogContext = {}): void {
        BasicLoggerService.getInstance().write(BasicLogLevel.DEBUG, 'debug', message, context);
    }

    /**
     * Log an error object with its stack
     */
    static logError(error: Error, context: BasicLogContext = {}): void {
        BasicLoggerService.error(error.message, {
            ...context,
            errorName: error.name,
            stack: error.stack,
        });
    }

    /**
     * Log the duration of an operation
     */
    static logPerformance(operation: string, duration: number, context: BasicLogContext = {}): void {
        BasicLoggerService.info(`Performance: ${operation} completed in ${duration}ms`, {
            ...context,
            operation,
            duration,
            type: 'performance',
        });
    }
}
