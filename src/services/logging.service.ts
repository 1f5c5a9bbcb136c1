import * as Sentry from '@sentry/node';
import { BasicLoggerService } from './basic-logger.service';
import { addBreadcrumb } from '../config/sentry';

export interface LogContext {
    requestId?: string;
    projectId?: string;
    correlationId?: string;
    component?: string;
    operation?: string;
    [key: string]: unknown;
}

export interface PerformanceMetric {
    operation: string;
    duration: number;
    success: boolean;
    error?: string;
    metadata?: Record<string, unknown>;
}

export interface BusinessEvent {
    event: string;
    category: string;
    value?: number;
    currency?: string;
    metadata?: Record<string, unknown>;
}

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'apiKey'];
const ESSENTIAL_FIELDS = ['component', 'operation', 'projectId', 'requestId', 'error'];

export class LoggingService {

    // ===== BASIC LOGGING METHODS =====

    info(message: string, context: LogContext = {}): void {
        BasicLoggerService.info(message, context);
        this.addSentryBreadcrumb(message, 'info', 'log', context);
    }

    error(message: string, context: LogContext = {}): void {
        BasicLoggerService.error(message, context);
        this.addSentryBreadcrumb(message, 'error', 'log', context);
    }

    warn(message: string, context: LogContext = {}): void {
        BasicLoggerService.warn(message, context);
        this.addSentryBreadcrumb(message, 'warning', 'log', context);
    }

    debug(message: string, context: LogContext = {}): void {
        BasicLoggerService.debug(message, context);
        this.addSentryBreadcrumb(message, 'debug', 'log', context);
    }

    // ===== SPECIALIZED LOGGING METHODS =====

    logError(error: Error, context: LogContext = {}): void {
        BasicLoggerService.logError(error, context);
        this.addSentryBreadcrumb(error.message, 'error', 'exception', context);
    }

    logPerformance(metric: PerformanceMetric, context: LogContext = {}): void {
        BasicLoggerService.logPerformance(metric.operation, metric.duration, {
            ...context,
            success: metric.success,
            error: metric.error,
            ...metric.metadata,
        });
    }

    logBusiness(event: BusinessEvent, context: LogContext = {}): void {
        BasicLoggerService.info(`Business event: ${event.event}`, {
            ...context,
            category: event.category,
            value: event.value,
            currency: event.currency,
            type: 'business',
            ...event.metadata,
        });
        this.addSentryBreadcrumb(event.event, 'info', event.category, context);
    }

    // ===== SENTRY INTEGRATION =====

    private addSentryBreadcrumb(
        message: string,
        level: Sentry.SeverityLevel,
        category: string,
        data: LogContext
    ): void {
        // Skip debug logs in production
        if (level === 'debug' && process.env.NODE_ENV === 'production') {
            return;
        }

        const breadcrumbData: Record<string, unknown> = { ...data };
        for (const field of SENSITIVE_FIELDS) {
            delete breadcrumbData[field];
        }

        // Keep breadcrumbs small
        if (BasicLoggerService.safeStringify(breadcrumbData).length > 1000) {
            const filtered: Record<string, unknown> = { _truncated: true };
            for (const field of ESSENTIAL_FIELDS) {
                if (breadcrumbData[field] !== undefined) {
                    filtered[field] = breadcrumbData[field];
                }
            }
            addBreadcrumb(message, category, level, filtered);
            return;
        }

        addBreadcrumb(message, category, level, breadcrumbData);
    }
}

// Create singleton instance
export const loggingService = new LoggingService();
