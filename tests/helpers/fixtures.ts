import { Baseline, Recommendation, UsageEventRecord } from '../../src/types/optimization.types';
import { ModelPricingEntry } from '../../src/types/store.types';
import { Clock } from '../../src/services/baselineComputer.service';

export const PROJECT_ID = 'proj-test';
export const NOW = new Date('2026-03-15T12:00:00.000Z');
export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export function fixedClock(at: Date = NOW): Clock {
    return () => new Date(at.getTime());
}

/**
 * Clock the test can move forward
 */
export function movableClock(start: Date = NOW): { clock: Clock; advance: (ms: number) => void } {
    let current = start.getTime();
    return {
        clock: () => new Date(current),
        advance: (ms: number) => {
            current += ms;
        }
    };
}

export function hoursAgo(hours: number, from: Date = NOW): Date {
    return new Date(from.getTime() - hours * HOUR_MS);
}

export function daysAgo(days: number, from: Date = NOW): Date {
    return new Date(from.getTime() - days * DAY_MS);
}

export function createEvent(overrides: Partial<UsageEventRecord> = {}): UsageEventRecord {
    return {
        projectId: PROJECT_ID,
        agentName: 'support-bot',
        model: 'gpt-4o',
        inputTokens: 1000,
        outputTokens: 500,
        cost: 0.01,
        latencyMs: 1000,
        timestamp: daysAgo(2),
        success: true,
        inputHash: null,
        ...overrides
    };
}

/**
 * `count` events spread one hour apart, ending `startHoursAgo` hours before NOW
 */
export function createEvents(
    count: number,
    overrides: Partial<UsageEventRecord> = {},
    startHoursAgo: number = 48
): UsageEventRecord[] {
    return Array.from({ length: count }, (_, i) =>
        createEvent({ timestamp: hoursAgo(startHoursAgo + i), ...overrides })
    );
}

export function createBaseline(overrides: Partial<Baseline> = {}): Baseline {
    return {
        projectId: PROJECT_ID,
        agentName: 'support-bot',
        model: 'gpt-4o',
        avgCostPerCall: 0.01,
        stddevCostPerCall: 0.002,
        avgInputTokens: 1000,
        stddevInputTokens: 100,
        avgOutputTokens: 500,
        stddevOutputTokens: 50,
        avgLatencyMs: 1000,
        stddevLatencyMs: 200,
        avgDailyCalls: 20,
        avgErrorRate: 0.02,
        sampleCount: 100,
        lastCalculatedAt: daysAgo(1),
        ...overrides
    };
}

export function createRecommendation(overrides: Partial<Recommendation> = {}): Recommendation {
    return {
        id: 'rec-1',
        projectId: PROJECT_ID,
        type: 'model_downgrade',
        title: 'Switch support-bot from gpt-4o to gpt-4o-mini',
        description: 'Test recommendation',
        agentName: 'support-bot',
        model: 'gpt-4o',
        alternativeModel: 'gpt-4o-mini',
        estimatedMonthlySavings: 20,
        estimatedSavingsPercent: 40,
        metricsSnapshot: null,
        status: 'pending',
        createdAt: daysAgo(1),
        expiresAt: new Date(NOW.getTime() + 13 * DAY_MS),
        implementedAt: null,
        dismissedAt: null,
        dismissFeedback: null,
        actualMonthlySavings: null,
        savingsRecordedAt: null,
        ...overrides
    };
}

export const TEST_PRICING: ModelPricingEntry[] = [
    { modelId: 'premium-large', provider: 'acme', inputPricePer1K: 0.01, outputPricePer1K: 0.03, tier: 'flagship', isActive: true },
    { modelId: 'standard-medium', provider: 'acme', inputPricePer1K: 0.005, outputPricePer1K: 0.015, tier: 'standard', isActive: true },
    { modelId: 'budget-small', provider: 'acme', inputPricePer1K: 0.001, outputPricePer1K: 0.002, tier: 'economy', isActive: true },
    { modelId: 'retired-model', provider: 'acme', inputPricePer1K: 0.0001, outputPricePer1K: 0.0001, tier: 'economy', isActive: false }
];
