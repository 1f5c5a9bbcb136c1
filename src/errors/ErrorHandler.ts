import { ZodError } from 'zod';
import { ServiceError } from '../shared/BaseService';
import { loggingService } from '../services/logging.service';
import { captureError } from '../config/sentry';

export enum ErrorSeverity {
    LOW = 'low',
    MEDIUM = 'medium',
    HIGH = 'high',
    CRITICAL = 'critical'
}

export enum ErrorCategory {
    VALIDATION = 'validation',
    DATABASE = 'database',
    EXTERNAL_SERVICE = 'external_service',
    BUSINESS_LOGIC = 'business_logic',
    SYSTEM = 'system',
    NETWORK = 'network',
    TIMEOUT = 'timeout'
}

export interface ErrorContext {
    projectId?: string;
    requestId?: string;
    operation?: string;
    component?: string;
    additionalData?: Record<string, unknown>;
}

export interface ProcessedError {
    id: string;
    message: string;
    code: string;
    statusCode: number;
    severity: ErrorSeverity;
    category: ErrorCategory;
    context: ErrorContext;
    timestamp: Date;
    stack?: string;
    shouldRetry: boolean;
    retryAfter?: number;
}

interface Classification {
    code: string;
    statusCode: number;
    category: ErrorCategory;
}

const MONGO_DUPLICATE_KEY = 11000;

function errorCode(error: Error): unknown {
    return 'code' in error ? error.code : undefined;
}

const CODE_CATEGORIES: Record<string, ErrorCategory> = {
    VALIDATION_ERROR: ErrorCategory.VALIDATION,
    RECOMMENDATION_UNAVAILABLE: ErrorCategory.BUSINESS_LOGIC,
    TRANSACTION_FAILED: ErrorCategory.DATABASE,
    PRICING_UNAVAILABLE: ErrorCategory.EXTERNAL_SERVICE
};

const MESSAGE_RULES: Array<{ pattern: RegExp } & Classification> = [
    { pattern: /econnrefused|network/i, code: 'NETWORK_ERROR', statusCode: 503, category: ErrorCategory.NETWORK },
    { pattern: /timeout|exceeded.*time/i, code: 'TIMEOUT_ERROR', statusCode: 408, category: ErrorCategory.TIMEOUT },
    { pattern: /mongo|database|transaction/i, code: 'DATABASE_ERROR', statusCode: 500, category: ErrorCategory.DATABASE },
    { pattern: /validation|invalid/i, code: 'VALIDATION_ERROR', statusCode: 400, category: ErrorCategory.VALIDATION }
];

/**
 * Centralized Error Handler
 *
 * Turns anything thrown by the engine, its stores or the driver into a
 * categorized ServiceError, logs it by severity and forwards HIGH and
 * CRITICAL ones to Sentry.
 */
export class ErrorHandler {
    private static errorCount = new Map<string, number>();
    private static lastErrorTime = new Map<string, number>();

    public static processError(error: unknown, context: ErrorContext = {}): ProcessedError {
        const message = error instanceof Error ? error.message : String(error ?? 'Unknown error occurred');
        const { code, statusCode, category } = this.classify(error, message);
        const severity = this.determineSeverity(statusCode, category);

        const processed: ProcessedError = {
            id: this.generateErrorId(),
            message,
            code,
            statusCode,
            severity,
            category,
            context,
            timestamp: new Date(),
            stack: error instanceof Error ? error.stack : undefined,
            ...this.determineRetryBehavior(category, statusCode, context.component ?? 'unknown')
        };

        this.logError(processed);
        this.reportError(processed, error);
        this.trackErrorPattern(processed);

        return processed;
    }

    /**
     * ServiceErrors are logged and returned as-is; anything else is wrapped
     */
    public static createServiceError(error: unknown, context: ErrorContext = {}): ServiceError {
        const processed = this.processError(error, context);
        if (error instanceof ServiceError) {
            return error;
        }

        return new ServiceError(processed.message, processed.code, processed.statusCode, {
            ...processed.context,
            errorId: processed.id,
            category: processed.category,
            severity: processed.severity
        });
    }

    public static async handleAsync<T>(operation: () => Promise<T>, context: ErrorContext = {}): Promise<T> {
        try {
            return await operation();
        } catch (error) {
            throw this.createServiceError(error, context);
        }
    }

    private static classify(error: unknown, message: string): Classification {
        if (error instanceof ServiceError) {
            return {
                code: error.code,
                statusCode: error.statusCode,
                category: CODE_CATEGORIES[error.code] ?? this.classifyMessage(message).category
            };
        }

        if (error instanceof ZodError) {
            return { code: 'VALIDATION_ERROR', statusCode: 400, category: ErrorCategory.VALIDATION };
        }

        if (error instanceof Error) {
            // A document we built failed its own mongoose schema
            if (error.name === 'ValidationError' || error.name === 'CastError') {
                return { code: 'DOCUMENT_VALIDATION_ERROR', statusCode: 500, category: ErrorCategory.DATABASE };
            }

            if (error.name === 'MongoServerError' && errorCode(error) === MONGO_DUPLICATE_KEY) {
                return { code: 'DUPLICATE_KEY', statusCode: 409, category: ErrorCategory.DATABASE };
            }

            if (error.name === 'MongoNetworkError' || error.name === 'MongoServerSelectionError') {
                return { code: 'DATABASE_UNAVAILABLE', statusCode: 503, category: ErrorCategory.NETWORK };
            }
        }

        return this.classifyMessage(message);
    }

    private static classifyMessage(message: string): Classification {
        const rule = MESSAGE_RULES.find(candidate => candidate.pattern.test(message));
        if (rule) {
            return { code: rule.code, statusCode: rule.statusCode, category: rule.category };
        }
        return { code: 'INTERNAL_ERROR', statusCode: 500, category: ErrorCategory.SYSTEM };
    }

    private static determineSeverity(statusCode: number, category: ErrorCategory): ErrorSeverity {
        if (statusCode >= 500) {
            return category === ErrorCategory.DATABASE || category === ErrorCategory.SYSTEM
                ? ErrorSeverity.CRITICAL
                : ErrorSeverity.HIGH;
        }
        if (statusCode >= 400) {
            return ErrorSeverity.MEDIUM;
        }
        return ErrorSeverity.LOW;
    }

    private static determineRetryBehavior(
        category: ErrorCategory,
        statusCode: number,
        component: string
    ): { shouldRetry: boolean; retryAfter?: number } {
        if (category === ErrorCategory.VALIDATION || category === ErrorCategory.BUSINESS_LOGIC) {
            return { shouldRetry: false };
        }

        if (category === ErrorCategory.TIMEOUT || statusCode === 408) {
            return { shouldRetry: true, retryAfter: 5000 };
        }

        // Client errors other than timeouts will fail the same way again
        if (statusCode >= 400 && statusCode < 500) {
            return { shouldRetry: false };
        }

        if (category === ErrorCategory.NETWORK || category === ErrorCategory.DATABASE) {
            const previous = this.errorCount.get(`${component}_${category}`) ?? 0;
            return {
                shouldRetry: previous < 3,
                retryAfter: Math.min(1000 * Math.pow(2, previous), 30000)
            };
        }

        return { shouldRetry: false };
    }

    private static logError(error: ProcessedError): void {
        const logData = {
            errorId: error.id,
            code: error.code,
            category: error.category,
            severity: error.severity,
            component: error.context.component,
            operation: error.context.operation,
            projectId: error.context.projectId,
            requestId: error.context.requestId,
            shouldRetry: error.shouldRetry,
            retryAfter: error.retryAfter,
            additionalData: error.context.additionalData
        };

        switch (error.severity) {
            case ErrorSeverity.CRITICAL:
            case ErrorSeverity.HIGH:
                loggingService.error(`${error.severity.toUpperCase()}: ${error.message}`, logData);
                break;
            case ErrorSeverity.MEDIUM:
                loggingService.warn(error.message, logData);
                break;
            case ErrorSeverity.LOW:
                loggingService.info(error.message, logData);
                break;
        }
    }

    private static reportError(processed: ProcessedError, original: unknown): void {
        if (processed.severity !== ErrorSeverity.CRITICAL && processed.severity !== ErrorSeverity.HIGH) {
            return;
        }

        try {
            const tags: Record<string, string> = {
                errorCategory: processed.category,
                errorSeverity: processed.severity,
                errorCode: processed.code
            };
            if (processed.context.component) {
                tags.component = processed.context.component;
            }

            captureError(original instanceof Error ? original : new Error(processed.message), {
                tags,
                extra: {
                    errorId: processed.id,
                    projectId: processed.context.projectId,
                    operation: processed.context.operation,
                    additionalData: processed.context.additionalData
                },
                level: processed.severity === ErrorSeverity.CRITICAL ? 'fatal' : 'error'
            });
        } catch (reportingError) {
            loggingService.warn('Failed to report error to Sentry', {
                errorId: processed.id,
                reportingError: reportingError instanceof Error ? reportingError.message : String(reportingError)
            });
        }
    }

    private static trackErrorPattern(error: ProcessedError): void {
        const patternKey = `${error.context.component ?? 'unknown'}_${error.category}`;
        const count = (this.errorCount.get(patternKey) ?? 0) + 1;

        this.errorCount.set(patternKey, count);
        this.lastErrorTime.set(patternKey, Date.now());

        if (count % 10 === 0) {
            loggingService.warn('Repeated error pattern', {
                pattern: patternKey,
                count,
                component: error.context.component,
                recentErrorId: error.id
            });
        }
    }

    private static generateErrorId(): string {
        return `err_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
    }

    public static getErrorStats(): {
        errorCounts: Record<string, number>;
        recentErrors: Array<{ pattern: string; count: number; lastOccurrence: Date }>;
    } {
        const recentErrors = [...this.errorCount.entries()]
            .map(([pattern, count]) => ({
                pattern,
                count,
                lastOccurrence: new Date(this.lastErrorTime.get(pattern) ?? 0)
            }))
            .sort((a, b) => b.lastOccurrence.getTime() - a.lastOccurrence.getTime());

        return {
            errorCounts: Object.fromEntries(this.errorCount),
            recentErrors: recentErrors.slice(0, 20)
        };
    }

    public static resetTracking(): void {
        this.errorCount.clear();
        this.lastErrorTime.clear();
    }
}
