import * as Sentry from '@sentry/node';
import { config } from './env';

let sentryEnabled = false;

/**
 * Initialize Sentry when SENTRY_DSN is set. Safe to call more than once.
 */
export function initializeSentry(): boolean {
    const { dsn, environment, release, sampleRate, debug, serverName } = config.sentry;
    if (!dsn) {
        return false;
    }
    if (sentryEnabled) {
        return true;
    }

    Sentry.init({
        dsn,
        environment,
        release,
        sampleRate,
        debug,
        serverName,
        integrations: [
            Sentry.mongooseIntegration(),
            Sentry.onUncaughtExceptionIntegration(),
            Sentry.onUnhandledRejectionIntegration(),
        ],
        initialScope: {
            tags: { component: 'optimization-engine' },
        },
        maxBreadcrumbs: 100,
        attachStacktrace: true,
        normalizeDepth: 5,
        maxValueLength: 1000,
    });

    sentryEnabled = true;
    return true;
}

export function isSentryEnabled(): boolean {
    return sentryEnabled;
}

export function addBreadcrumb(
    message: string,
    category: string,
    level: Sentry.SeverityLevel = 'info',
    data?: Record<string, unknown>
): void {
    if (!sentryEnabled) return;

    Sentry.addBreadcrumb({
        message,
        category,
        level,
        data,
        timestamp: Date.now() / 1000,
    });
}

/**
 * Capture an error with tags and extras on an isolated scope
 */
export function captureError(
    error: Error,
    context?: {
        tags?: Record<string, string>;
        extra?: Record<string, unknown>;
        level?: Sentry.SeverityLevel;
    }
): string | undefined {
    if (!sentryEnabled) return undefined;

    return Sentry.withScope(scope => {
        if (context?.tags) scope.setTags(context.tags);
        if (context?.extra) scope.setExtras(context.extra);
        if (context?.level) scope.setLevel(context.level);
        return Sentry.captureException(error);
    });
}

/**
 * Flush pending events before the process exits
 */
export async function flushSentry(timeoutMs: number = 2000): Promise<void> {
    if (!sentryEnabled) return;
    await Sentry.flush(timeoutMs);
}
