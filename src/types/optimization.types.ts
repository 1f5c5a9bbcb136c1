/**
 * Optimization engine domain types
 */

export type Priority = 'high' | 'medium' | 'low';

export type QualityImpact = 'minimal' | 'moderate' | 'significant';

export type SuggestionType =
    | 'model_downgrade'
    | 'caching'
    | 'prompt_optimization'
    | 'error_reduction'
    | 'anomaly_alert';

export const SUGGESTION_TYPES: readonly SuggestionType[] = [
    'model_downgrade',
    'caching',
    'prompt_optimization',
    'error_reduction',
    'anomaly_alert',
] as const;

export type RecommendationStatus = 'pending' | 'implemented' | 'dismissed' | 'expired';

export const RECOMMENDATION_STATUSES: readonly RecommendationStatus[] = [
    'pending',
    'implemented',
    'dismissed',
    'expired',
] as const;

export interface TimeWindow {
    start: Date;
    end: Date;
}

// ===== EVENTS =====

/**
 * A single LLM call as recorded by the ingestion pipeline. Read-only here.
 */
export interface UsageEventRecord {
    projectId: string;
    agentName: string;
    model: string;
    inputTokens: number;
    outputTokens: number;
    cost: number;
    latencyMs: number;
    timestamp: Date;
    success: boolean;
    inputHash?: string | null;
}

// ===== BASELINES =====

export interface BaselineKey {
    projectId: string;
    agentName: string;
    model: string;
}

export interface Baseline extends BaselineKey {
    avgCostPerCall: number;
    stddevCostPerCall: number;
    avgInputTokens: number;
    stddevInputTokens: number;
    avgOutputTokens: number;
    stddevOutputTokens: number;
    avgLatencyMs: number;
    stddevLatencyMs: number;
    avgDailyCalls: number;
    avgErrorRate: number;
    sampleCount: number;
    lastCalculatedAt: Date;
}

export interface BaselineFilter {
    agentName?: string;
    model?: string;
}

export interface BaselineComputationReport {
    projectId: string;
    days: number;
    window: TimeWindow | null;
    baselinesComputed: number;
    groupsSkipped: number;
    baselines: Baseline[];
}

// ===== ANOMALIES =====

interface AnomalyBase {
    agentName: string;
    model: string;
    recentCalls: number;
    currentValue: number;
    baselineMean: number;
    baselineStddev: number;
    severity: Priority;
    isAnomaly: boolean;
}

export interface ZScoreAnomaly extends AnomalyBase {
    metricName: 'cost_per_call' | 'latency_ms';
    zScore: number;
}

export interface ErrorRateAnomaly extends AnomalyBase {
    metricName: 'error_rate';
    zScore: null;
    /** current / baseline; null when the baseline error rate is zero */
    ratio: number | null;
}

export type Anomaly = ZScoreAnomaly | ErrorRateAnomaly;

export type AnomalyMetricName = Anomaly['metricName'];

// ===== CACHING =====

export interface CachingOpportunity {
    agentName: string;
    uniquePatterns: number;
    totalCalls: number;
    duplicateCalls: number;
    duplicateRate: number;
    estimatedMonthlySavings: number;
}

export interface CachingAnalysisOptions {
    minOccurrences?: number;
    minSavings?: number;
    days?: number;
}

// ===== PRICING =====

export interface AlternativeSavings {
    inputPer1K: number;
    outputPer1K: number;
    percentage: number;
}

export type AlternativeSource = 'learned' | 'dynamic';

export interface ModelAlternative {
    model: string;
    provider: string;
    savings: AlternativeSavings;
    qualityImpact: QualityImpact;
    source: AlternativeSource;
    confidenceScore: number;
    timesImplemented: number;
    savingsAccuracy: number | null;
}

// ===== SUGGESTIONS =====

export interface ModelDowngradeMetrics {
    kind: 'model_downgrade';
    currentCalls: number;
    currentMonthlyCost: number;
    avgOutputTokens: number;
    avgInputTokens: number;
    savingsPercentage: number;
    qualityImpact: QualityImpact;
    source: AlternativeSource;
    confidenceScore: number;
    timesImplemented: number;
    savingsAccuracy: number | null;
}

export interface CachingMetrics {
    kind: 'caching';
    uniquePatterns: number;
    totalCalls: number;
    duplicateCalls: number;
    duplicateRate: number;
}

export interface AnomalyMetrics {
    kind: 'anomaly_alert';
    metricName: AnomalyMetricName;
    currentValue: number;
    baselineMean: number;
    baselineStddev: number;
    zScore: number | null;
    ratio: number | null;
}

export interface ErrorReductionMetrics {
    kind: 'error_reduction';
    totalCalls: number;
    errorCount: number;
    errorRate: number;
    baselineErrorRate: number;
    wastedCost: number;
}

export interface LatencyMetrics {
    kind: 'prompt_optimization';
    avgLatencyMs: number;
    baselineLatencyMs: number;
    zScore: number;
    avgInputTokens: number;
}

export type SuggestionMetrics =
    | ModelDowngradeMetrics
    | CachingMetrics
    | AnomalyMetrics
    | ErrorReductionMetrics
    | LatencyMetrics;

interface SuggestionBase<TType extends SuggestionType, TMetrics extends SuggestionMetrics> {
    type: TType;
    title: string;
    description: string;
    agentName: string | null;
    model: string | null;
    alternativeModel: string | null;
    estimatedSavingsMonthly: number;
    estimatedSavingsPercent: number;
    priority: Priority;
    actionItems: string[];
    metrics: TMetrics;
}

export type ModelDowngradeSuggestion = SuggestionBase<'model_downgrade', ModelDowngradeMetrics>;
export type CachingSuggestion = SuggestionBase<'caching', CachingMetrics>;
export type AnomalySuggestion = SuggestionBase<'anomaly_alert', AnomalyMetrics>;
export type ErrorReductionSuggestion = SuggestionBase<'error_reduction', ErrorReductionMetrics>;
export type LatencySuggestion = SuggestionBase<'prompt_optimization', LatencyMetrics>;

export type Suggestion =
    | ModelDowngradeSuggestion
    | CachingSuggestion
    | AnomalySuggestion
    | ErrorReductionSuggestion
    | LatencySuggestion;

export interface SuggestionOptions {
    days?: number;
    includeLowPriority?: boolean;
}

export type EmptyReason = 'no_data' | 'insufficient_data' | 'no_baselines' | 'optimized';

export interface SuggestionTypeBreakdown {
    count: number;
    savings: number;
}

export interface OptimizationSummary {
    totalPotentialSavingsMonthly: number;
    totalPotentialSavingsPercent: number;
    currentMonthlySpend: number;
    suggestionCount: number;
    highPriorityCount: number;
    byType: Partial<Record<SuggestionType, SuggestionTypeBreakdown>>;
    effectiveness: RecommendationEffectiveness;
    suggestions: Suggestion[];
    hasData: boolean;
    hasBaselines: boolean;
    eventCount: number;
    emptyReason: EmptyReason | null;
}

// ===== RECOMMENDATIONS =====

export interface Recommendation {
    id: string;
    projectId: string;
    type: SuggestionType;
    title: string;
    description: string;
    agentName: string | null;
    model: string | null;
    alternativeModel: string | null;
    estimatedMonthlySavings: number;
    estimatedSavingsPercent: number;
    metricsSnapshot: SuggestionMetrics | null;
    status: RecommendationStatus;
    createdAt: Date;
    expiresAt: Date;
    implementedAt: Date | null;
    dismissedAt: Date | null;
    dismissFeedback: string | null;
    actualMonthlySavings: number | null;
    savingsRecordedAt: Date | null;
}

export interface CreateRecommendationInput {
    projectId: string;
    type: SuggestionType;
    title: string;
    description: string;
    agentName: string | null;
    model: string | null;
    alternativeModel?: string | null;
    estimatedMonthlySavings: number;
    estimatedSavingsPercent: number;
    metricsSnapshot?: SuggestionMetrics | null;
}

export interface CreateRecommendationResult {
    recommendation: Recommendation;
    created: boolean;
}

/** Status that blocked the action; 'pending' only when recording savings before implementation */
export type UnavailableReason = 'pending' | 'implemented' | 'dismissed' | 'expired';

export type RecommendationActionResult =
    | { status: 'ok'; recommendation: Recommendation }
    | { status: 'not_found' }
    | { status: 'unavailable'; reason: UnavailableReason };

export interface RecommendationTypeEffectiveness {
    total: number;
    implemented: number;
    dismissed: number;
}

export interface RecommendationEffectiveness {
    total: number;
    pending: number;
    implemented: number;
    dismissed: number;
    expired: number;
    implementationRate: number;
    estimatedSavingsImplemented: number;
    actualSavingsRecorded: number;
    savingsAccuracy: number | null;
    byType: Partial<Record<SuggestionType, RecommendationTypeEffectiveness>>;
}

export interface AlternativeOutcome {
    alternativeModel: string;
    timesImplemented: number;
    estimatedSavings: number;
    actualSavings: number;
    measuredCount: number;
    /** actual / estimated over measured rows; null until one is measured */
    savingsAccuracy: number | null;
}

/**
 * Realized outcomes of past model switches, per alternative model
 */
export interface AlternativeOutcomeSource {
    getAlternativeOutcomes(model: string): Promise<AlternativeOutcome[]>;
}

/**
 * Pricing collaborator: ranked cheaper alternatives for a model at a token profile
 */
export interface PricingProvider {
    discoverAlternatives(
        model: string,
        avgInputTokens: number,
        avgOutputTokens: number,
        maxResults: number
    ): Promise<ModelAlternative[]>;
}
