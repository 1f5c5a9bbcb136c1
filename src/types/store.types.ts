import type { ClientSession } from 'mongoose';
import type {
    Baseline,
    BaselineFilter,
    BaselineKey,
    Recommendation,
    RecommendationStatus,
    SuggestionType,
    TimeWindow,
} from './optimization.types';

/**
 * Session handed to stores inside a unit of work. In-process stores get null.
 */
export type StoreSession = ClientSession | null;

export type TransactionResult<T> =
    | { success: true; data: T }
    | { success: false; error: string; cause: unknown };

export interface TransactionManager {
    executeTransaction<T>(
        operation: (session: StoreSession) => Promise<T>,
        operationName?: string
    ): Promise<TransactionResult<T>>;
}

// ===== EVENT AGGREGATES =====

export interface AgentModelAggregate {
    agentName: string;
    model: string;
    callCount: number;
    errorCount: number;
    totalCost: number;
    failedCost: number;
    totalInputTokens: number;
    totalOutputTokens: number;
    avgCostPerCall: number;
    stddevCostPerCall: number;
    avgInputTokens: number;
    stddevInputTokens: number;
    avgOutputTokens: number;
    stddevOutputTokens: number;
    avgLatencyMs: number;
    stddevLatencyMs: number;
}

export interface DailyCallCount {
    agentName: string;
    model: string;
    /** UTC calendar day, YYYY-MM-DD */
    day: string;
    callCount: number;
}

export interface InputHashGroup {
    agentName: string;
    inputHash: string;
    occurrences: number;
    totalCost: number;
}

export interface AgentCallTotal {
    agentName: string;
    callCount: number;
}

export interface UsageOverview {
    totalCalls: number;
    totalCost: number;
}

/**
 * Windowed, grouped statistics over the read-only event store.
 * Standard deviations are sample deviations; groups of one report 0.
 */
export interface EventAggregator {
    aggregateByAgentModel(projectId: string, window: TimeWindow, filter?: BaselineFilter): Promise<AgentModelAggregate[]>;
    dailyCallCounts(projectId: string, window: TimeWindow): Promise<DailyCallCount[]>;
    inputHashGroups(projectId: string, window: TimeWindow, minOccurrences: number): Promise<InputHashGroup[]>;
    callsByAgent(projectId: string, window: TimeWindow): Promise<AgentCallTotal[]>;
    overview(projectId: string, window: TimeWindow): Promise<UsageOverview>;
}

// ===== BASELINES =====

export interface BaselineStore {
    upsert(baseline: Baseline, session: StoreSession): Promise<Baseline>;
    find(key: BaselineKey, session?: StoreSession): Promise<Baseline | null>;
    list(projectId: string, filter?: BaselineFilter, session?: StoreSession): Promise<Baseline[]>;
    count(projectId: string, session?: StoreSession): Promise<number>;
}

// ===== RECOMMENDATIONS =====

export interface RecommendationKey {
    projectId: string;
    type: SuggestionType;
    agentName: string | null;
    model: string | null;
}

export type RecommendationTransition =
    | { status: 'implemented'; implementedAt: Date }
    | { status: 'dismissed'; dismissedAt: Date; dismissFeedback: string | null };

export interface RecommendationStatusSummary {
    type: SuggestionType;
    status: RecommendationStatus;
    count: number;
    estimatedSavings: number;
    /** Rows with recorded actual savings */
    measuredCount: number;
    measuredEstimatedSavings: number;
    actualSavings: number;
}

export interface ImplementedAlternativeSummary {
    alternativeModel: string;
    count: number;
    estimatedSavings: number;
    measuredCount: number;
    measuredEstimatedSavings: number;
    actualSavings: number;
}

/**
 * Thrown by stores when an insert collides with the pending-key unique index
 */
export class DuplicatePendingRecommendationError extends Error {
    constructor(public readonly key: RecommendationKey) {
        super(`A pending recommendation already exists for ${key.type}/${key.agentName ?? '-'}/${key.model ?? '-'}`);
        this.name = 'DuplicatePendingRecommendationError';
    }
}

export interface RecommendationStore {
    insert(recommendation: Recommendation, session: StoreSession): Promise<Recommendation>;
    findById(id: string, session?: StoreSession): Promise<Recommendation | null>;
    findActivePending(key: RecommendationKey, now: Date, session?: StoreSession): Promise<Recommendation | null>;
    /** Mark pending rows whose expiry has passed as expired; returns the number changed */
    expireStale(projectId: string, now: Date, key: RecommendationKey | null, session: StoreSession): Promise<number>;
    /** Conditional update: applies only to a pending, unexpired row of the project */
    transition(
        id: string,
        projectId: string,
        now: Date,
        update: RecommendationTransition,
        session: StoreSession
    ): Promise<Recommendation | null>;
    /** Applies only to an implemented row of the project */
    recordActualSavings(
        id: string,
        projectId: string,
        amount: number,
        now: Date,
        session: StoreSession
    ): Promise<Recommendation | null>;
    listPending(projectId: string, now: Date, session?: StoreSession): Promise<Recommendation[]>;
    summarizeByTypeAndStatus(projectId: string, session?: StoreSession): Promise<RecommendationStatusSummary[]>;
    summarizeImplementedAlternatives(model: string, session?: StoreSession): Promise<ImplementedAlternativeSummary[]>;
}

// ===== PRICING =====

export type ModelTier = 'flagship' | 'standard' | 'economy';

export interface ModelPricingEntry {
    modelId: string;
    provider: string;
    inputPricePer1K: number;
    outputPricePer1K: number;
    tier: ModelTier;
    isActive: boolean;
}

export interface ModelPricingStore {
    listActive(): Promise<ModelPricingEntry[]>;
}
