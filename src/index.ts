import { createOptimizationConfig, OptimizationConfig, OptimizationConfigOverrides, loadOptimizationConfig } from './config/optimization.config';
import { Clock, BaselineComputer, systemClock } from './services/baselineComputer.service';
import { AnomalyDetector } from './services/anomalyDetector.service';
import { PatternAnalyzer } from './services/patternAnalyzer.service';
import { ModelPricingService } from './services/modelPricing.service';
import { RecommendationTracker } from './services/recommendationTracker.service';
import { SuggestionSynthesizer } from './services/suggestionSynthesizer.service';
import { OptimizationService } from './services/optimization.service';
import { ModelDowngradeAnalyzer } from './services/analyzers/modelDowngrade.analyzer';
import { CachingAnalyzer } from './services/analyzers/caching.analyzer';
import { AnomalyAnalyzer } from './services/analyzers/anomaly.analyzer';
import { ErrorReductionAnalyzer } from './services/analyzers/errorReduction.analyzer';
import { LatencyAnalyzer } from './services/analyzers/latency.analyzer';
import { MongoEventAggregator } from './services/stores/mongoEventAggregator';
import { MongoBaselineStore } from './services/stores/mongoBaselineStore';
import { MongoRecommendationStore } from './services/stores/mongoRecommendationStore';
import { MongoModelPricingStore } from './services/stores/mongoModelPricingStore';
import { StaticModelPricingStore } from './services/stores/staticModelPricingStore';
import { MongoTransactionManager } from './utils/mongoTransactionManager';
import {
    BaselineStore,
    EventAggregator,
    ModelPricingStore,
    RecommendationStore,
    TransactionManager
} from './types/store.types';

export * from './types/optimization.types';
export * from './types/store.types';
export * from './config';
export * from './errors/optimizationErrors';
export { ErrorHandler, ErrorCategory, ErrorSeverity } from './errors/ErrorHandler';
export { ServiceError } from './shared/BaseService';
export { loggingService } from './services/logging.service';
export { RECOMMENDATION_EVENTS } from './services/recommendationTracker.service';
export type { RecommendationExpiredEvent } from './services/recommendationTracker.service';
export type {
    SuggestionsOptionsInput,
    SummaryOptionsInput,
    ComputeBaselinesOptionsInput,
    BaselineFilterInput,
    CachingOptionsInput,
    SuggestionsResult,
    CachingOpportunitiesResult
} from './services/optimization.service';
export type { SuggestionAnalyzer, AnalyzerContext } from './services/analyzers/types';
export {
    BaselineComputer,
    AnomalyDetector,
    PatternAnalyzer,
    ModelPricingService,
    RecommendationTracker,
    SuggestionSynthesizer,
    OptimizationService,
    ModelDowngradeAnalyzer,
    CachingAnalyzer,
    AnomalyAnalyzer,
    ErrorReductionAnalyzer,
    LatencyAnalyzer,
    MongoEventAggregator,
    MongoBaselineStore,
    MongoRecommendationStore,
    MongoModelPricingStore,
    StaticModelPricingStore,
    MongoTransactionManager
};
export type { Clock };

export interface OptimizationEngineStores {
    aggregator: EventAggregator;
    baselines: BaselineStore;
    recommendations: RecommendationStore;
    pricing: ModelPricingStore;
    transactions: TransactionManager;
}

export interface OptimizationEngineOptions {
    /** Where model prices come from: the bundled catalog or the model_pricing collection */
    pricingSource?: 'static' | 'database';
    config?: OptimizationConfig | OptimizationConfigOverrides;
    stores?: Partial<OptimizationEngineStores>;
    clock?: Clock;
}

export interface OptimizationEngine {
    config: OptimizationConfig;
    service: OptimizationService;
    baselineComputer: BaselineComputer;
    anomalyDetector: AnomalyDetector;
    patternAnalyzer: PatternAnalyzer;
    pricing: ModelPricingService;
    tracker: RecommendationTracker;
    synthesizer: SuggestionSynthesizer;
}

/**
 * Wire the engine. Unspecified stores default to the MongoDB implementations;
 * the caller connects the database first (see connectDatabase).
 */
export function createOptimizationEngine(options: OptimizationEngineOptions = {}): OptimizationEngine {
    const config = options.config === undefined
        ? loadOptimizationConfig()
        : createOptimizationConfig(options.config);
    const clock = options.clock ?? systemClock;

    const aggregator = options.stores?.aggregator ?? new MongoEventAggregator();
    const baselineStore = options.stores?.baselines ?? new MongoBaselineStore();
    const recommendationStore = options.stores?.recommendations ?? new MongoRecommendationStore();
    const pricingStore = options.stores?.pricing ??
        (options.pricingSource === 'database' ? new MongoModelPricingStore() : new StaticModelPricingStore());
    const transactions = options.stores?.transactions ?? new MongoTransactionManager();

    const baselineComputer = new BaselineComputer(aggregator, baselineStore, config, clock);
    const anomalyDetector = new AnomalyDetector(aggregator, baselineStore, config, clock);
    const patternAnalyzer = new PatternAnalyzer(aggregator, config, clock);
    const tracker = new RecommendationTracker(recommendationStore, config, clock);
    const pricing = new ModelPricingService(pricingStore, tracker, config);

    const synthesizer = new SuggestionSynthesizer(
        aggregator,
        baselineComputer,
        [
            new ModelDowngradeAnalyzer(pricing, config),
            new CachingAnalyzer(patternAnalyzer, config),
            new AnomalyAnalyzer(anomalyDetector, config),
            new ErrorReductionAnalyzer(config),
            new LatencyAnalyzer(config)
        ],
        tracker,
        config,
        clock
    );

    const service = new OptimizationService(
        transactions,
        baselineComputer,
        patternAnalyzer,
        synthesizer,
        tracker,
        config
    );

    return { config, service, baselineComputer, anomalyDetector, patternAnalyzer, pricing, tracker, synthesizer };
}
