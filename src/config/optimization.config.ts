/**
 * Optimization Engine Configuration
 *
 * Thresholds and floors shared by the baseline, anomaly, pattern, suggestion
 * and recommendation components. Each component receives its configuration
 * through its constructor.
 */

import { z } from 'zod';

export interface PriorityCutoffs {
    high: number; // $/month
    medium: number; // $/month
}

export interface OptimizationConfig {
    baselines: {
        minSamples: number;
        defaultDays: number;
    };
    anomalies: {
        recentHours: number;
        zScoreThreshold: number;
        highSeverityZScore: number;
        errorRateRatio: number;
        highSeverityErrorRatio: number;
    };
    caching: {
        minOccurrences: number;
        minMonthlySavings: number;
    };
    modelDowngrade: {
        minCalls: number;
        minPeriodCost: number;
        minMonthlySavings: number;
        maxAlternatives: number;
    };
    errorReduction: {
        minCalls: number;
        minErrors: number;
        defaultErrorRate: number;
        errorRateRatio: number;
        minMonthlyWaste: number;
    };
    latency: {
        minCalls: number;
        zScoreThreshold: number;
        highSeverityZScore: number;
    };
    priority: PriorityCutoffs;
    recommendations: {
        cooldownDays: number;
        persistTopN: number;
        learnedSourceMinImplementations: number;
    };
}

export type OptimizationConfigOverrides = {
    [K in keyof OptimizationConfig]?: Partial<OptimizationConfig[K]>;
};

/**
 * Default configuration
 */
export const DEFAULT_OPTIMIZATION_CONFIG: OptimizationConfig = {
    baselines: {
        minSamples: 10,
        defaultDays: 30,
    },
    anomalies: {
        recentHours: 24,
        zScoreThreshold: 2.0,
        highSeverityZScore: 3.0,
        errorRateRatio: 1.5,
        highSeverityErrorRatio: 2.0,
    },
    caching: {
        minOccurrences: 5,
        minMonthlySavings: 1.0,
    },
    modelDowngrade: {
        minCalls: 10,
        minPeriodCost: 0.01,
        minMonthlySavings: 1.0,
        maxAlternatives: 3,
    },
    errorReduction: {
        minCalls: 10,
        minErrors: 3,
        defaultErrorRate: 0.02,
        errorRateRatio: 1.5,
        minMonthlyWaste: 0.5,
    },
    latency: {
        minCalls: 10,
        zScoreThreshold: 2.0,
        highSeverityZScore: 3.0,
    },
    priority: {
        high: 50,
        medium: 10,
    },
    recommendations: {
        cooldownDays: 14,
        persistTopN: 10,
        learnedSourceMinImplementations: 3,
    },
};

const positiveNumber = z.coerce.number().positive();
const nonNegativeNumber = z.coerce.number().nonnegative();
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
    OPTIMIZATION_COOLDOWN_DAYS: positiveNumber.optional(),
    OPTIMIZATION_PERSIST_TOP_N: positiveInt.optional(),
    OPTIMIZATION_ANOMALY_Z_THRESHOLD: positiveNumber.optional(),
    OPTIMIZATION_ANOMALY_RECENT_HOURS: positiveNumber.optional(),
    OPTIMIZATION_BASELINE_MIN_SAMPLES: positiveInt.optional(),
    OPTIMIZATION_CACHING_MIN_OCCURRENCES: z.coerce.number().int().min(2).optional(),
    OPTIMIZATION_CACHING_MIN_SAVINGS: nonNegativeNumber.optional(),
    OPTIMIZATION_PRIORITY_HIGH: positiveNumber.optional(),
    OPTIMIZATION_PRIORITY_MEDIUM: positiveNumber.optional(),
});

/**
 * Merge overrides onto the defaults, section by section
 */
export function createOptimizationConfig(overrides: OptimizationConfigOverrides = {}): OptimizationConfig {
    const base = DEFAULT_OPTIMIZATION_CONFIG;
    const merged: OptimizationConfig = {
        baselines: { ...base.baselines, ...overrides.baselines },
        anomalies: { ...base.anomalies, ...overrides.anomalies },
        caching: { ...base.caching, ...overrides.caching },
        modelDowngrade: { ...base.modelDowngrade, ...overrides.modelDowngrade },
        errorReduction: { ...base.errorReduction, ...overrides.errorReduction },
        latency: { ...base.latency, ...overrides.latency },
        priority: { ...base.priority, ...overrides.priority },
        recommendations: { ...base.recommendations, ...overrides.recommendations },
    };

    const { valid, errors } = validateOptimizationConfig(merged);
    if (!valid) {
        throw new Error(`Invalid optimization configuration: ${errors.join('; ')}`);
    }

    return merged;
}

/**
 * Build configuration from OPTIMIZATION_* environment variables
 */
export function loadOptimizationConfig(source: NodeJS.ProcessEnv = process.env): OptimizationConfig {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid optimization environment: ${details.join('; ')}`);
    }

    const vars = parsed.data;
    return createOptimizationConfig({
        baselines: vars.OPTIMIZATION_BASELINE_MIN_SAMPLES !== undefined
            ? { minSamples: vars.OPTIMIZATION_BASELINE_MIN_SAMPLES }
            : undefined,
        anomalies: {
            ...(vars.OPTIMIZATION_ANOMALY_Z_THRESHOLD !== undefined && { zScoreThreshold: vars.OPTIMIZATION_ANOMALY_Z_THRESHOLD }),
            ...(vars.OPTIMIZATION_ANOMALY_RECENT_HOURS !== undefined && { recentHours: vars.OPTIMIZATION_ANOMALY_RECENT_HOURS }),
        },
        caching: {
            ...(vars.OPTIMIZATION_CACHING_MIN_OCCURRENCES !== undefined && { minOccurrences: vars.OPTIMIZATION_CACHING_MIN_OCCURRENCES }),
            ...(vars.OPTIMIZATION_CACHING_MIN_SAVINGS !== undefined && { minMonthlySavings: vars.OPTIMIZATION_CACHING_MIN_SAVINGS }),
        },
        priority: {
            ...(vars.OPTIMIZATION_PRIORITY_HIGH !== undefined && { high: vars.OPTIMIZATION_PRIORITY_HIGH }),
            ...(vars.OPTIMIZATION_PRIORITY_MEDIUM !== undefined && { medium: vars.OPTIMIZATION_PRIORITY_MEDIUM }),
        },
        recommendations: {
            ...(vars.OPTIMIZATION_COOLDOWN_DAYS !== undefined && { cooldownDays: vars.OPTIMIZATION_COOLDOWN_DAYS }),
            ...(vars.OPTIMIZATION_PERSIST_TOP_N !== undefined && { persistTopN: vars.OPTIMIZATION_PERSIST_TOP_N }),
        },
    });
}

/**
 * Validate configuration
 */
export function validateOptimizationConfig(cfg: OptimizationConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (cfg.priority.medium >= cfg.priority.high) {
        errors.push('Medium priority cutoff must be below the high priority cutoff');
    }

    if (cfg.anomalies.highSeverityZScore < cfg.anomalies.zScoreThreshold) {
        errors.push('High severity z-score must not be below the anomaly z-score threshold');
    }

    if (cfg.latency.highSeverityZScore < cfg.latency.zScoreThreshold) {
        errors.push('High severity latency z-score must not be below the latency z-score threshold');
    }

    if (cfg.anomalies.highSeverityErrorRatio < cfg.anomalies.errorRateRatio) {
        errors.push('High severity error ratio must not be below the error rate ratio');
    }

    if (cfg.caching.minOccurrences < 2) {
        errors.push('Caching minimum occurrences must be at least 2');
    }

    if (cfg.baselines.minSamples < 2) {
        errors.push('Baselines need at least 2 samples for a standard deviation');
    }

    if (cfg.recommendations.cooldownDays <= 0) {
        errors.push('Recommendation cooldown must be positive');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}
