import { EventEmitter } from 'events';
import { LRUCache } from 'lru-cache';
import { loggingService } from '../services/logging.service';

export type ServiceLogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface ServiceCacheOptions {
    max: number;
    /** Entry lifetime in milliseconds */
    ttl: number;
}

const LOG_WRITERS: Record<ServiceLogLevel, (message: string, meta: Record<string, unknown>) => void> = {
    info: (message, meta) => loggingService.info(message, meta),
    warn: (message, meta) => loggingService.warn(message, meta),
    error: (message, meta) => loggingService.error(message, meta),
    debug: (message, meta) => loggingService.debug(message, meta)
};

/**
 * Base class for engine services.
 * Services emit their lifecycle events, log under their own component name
 * and may keep an LRU cache of values of a single shape.
 */
export abstract class BaseService<TCached extends object = object> extends EventEmitter {
    protected readonly serviceName: string;
    protected readonly cache: LRUCache<string, TCached> | null;

    constructor(serviceName: string, cacheOptions?: ServiceCacheOptions) {
        super();
        this.serviceName = serviceName;
        this.cache = cacheOptions
            ? new LRUCache<string, TCached>({ max: cacheOptions.max, ttl: cacheOptions.ttl, updateAgeOnGet: true })
            : null;
        this.setMaxListeners(20);
    }

    protected async getCachedOrExecute(key: string, load: () => Promise<TCached>): Promise<TCached> {
        const cached = this.cache?.get(key);
        if (cached !== undefined) {
            return cached;
        }

        const value = await load();
        this.cache?.set(key, value);
        return value;
    }

    protected clearCachePattern(pattern: string): void {
        if (!this.cache) return;

        const regex = new RegExp(pattern);
        for (const key of [...this.cache.keys()]) {
            if (regex.test(key)) this.cache.delete(key);
        }
    }

    /**
     * Run fn and record its duration, success or failure as a performance log
     */
    protected async timed<T>(operation: string, fn: () => Promise<T>, metadata: Record<string, unknown> = {}): Promise<T> {
        const startedAt = Date.now();
        const record = (success: boolean, error?: string): void => {
            loggingService.logPerformance({
                operation: `${this.serviceName}.${operation}`,
                duration: Date.now() - startedAt,
                success,
                error,
                metadata
            }, { component: this.serviceName });
        };

        try {
            const result = await fn();
            record(true);
            return result;
        } catch (error) {
            record(false, error instanceof Error ? error.message : String(error));
            throw error;
        }
    }

    protected logOperation(
        level: ServiceLogLevel,
        message: string,
        operation: string,
        metadata: Record<string, unknown> = {}
    ): void {
        LOG_WRITERS[level](message, { component: this.serviceName, operation, ...metadata });
    }
}

/**
 * Error carrying a stable code and HTTP-style status for callers
 */
export class ServiceError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ServiceError';
        Error.captureStackTrace?.(this, this.constructor);
    }

    toJSON(): { name: string; message: string; code: string; statusCode: number; context?: Record<string, unknown> } {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            statusCode: this.statusCode,
            context: this.context
        };
    }
}
