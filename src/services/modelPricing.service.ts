import { BaseService, ServiceError } from '../shared/BaseService';
import { DEFAULT_OPTIMIZATION_CONFIG, OptimizationConfig } from '../config/optimization.config';
import {
    AlternativeOutcome,
    AlternativeOutcomeSource,
    ModelAlternative,
    PricingProvider,
    QualityImpact
} from '../types/optimization.types';
import { ModelPricingEntry, ModelPricingStore, ModelTier } from '../types/store.types';
import { roundTo } from '../utils/optimizationMath';

const CATALOG_CACHE_KEY = 'catalog:active';

const TIER_RANK: Record<ModelTier, number> = {
    economy: 0,
    standard: 1,
    flagship: 2
};

const BASE_CONFIDENCE: Record<QualityImpact, number> = {
    minimal: 0.8,
    moderate: 0.6,
    significant: 0.4
};

/**
 * Model Pricing Service
 *
 * Finds cheaper catalog models for a model at a given token profile and
 * scores them with the realized outcomes of earlier switches.
 */
export class ModelPricingService extends BaseService<ModelPricingEntry[]> implements PricingProvider {
    private readonly learnedMinImplementations: number;

    constructor(
        private readonly store: ModelPricingStore,
        private readonly outcomes: AlternativeOutcomeSource | null = null,
        config: OptimizationConfig = DEFAULT_OPTIMIZATION_CONFIG,
        cacheTtlMs: number = 10 * 60 * 1000
    ) {
        super('ModelPricingService', { max: 100, ttl: cacheTtlMs });
        this.learnedMinImplementations = config.recommendations.learnedSourceMinImplementations;
    }

    /**
     * Rank cheaper active models by estimated savings at the given profile
     */
    async discoverAlternatives(
        model: string,
        avgInputTokens: number,
        avgOutputTokens: number,
        maxResults: number
    ): Promise<ModelAlternative[]> {
        if (maxResults <= 0) return [];

        const catalog = await this.getCatalog();
        const current = this.findModel(catalog, model);
        if (!current) {
            this.logOperation('debug', 'Model not in pricing catalog', 'discoverAlternatives', { model });
            return [];
        }

        const currentCost = this.profileCost(current, avgInputTokens, avgOutputTokens);
        const candidates = catalog
            .filter(entry => entry.modelId !== current.modelId)
            .map(entry => ({
                entry,
                profileSavings: currentCost - this.profileCost(entry, avgInputTokens, avgOutputTokens)
            }))
            .filter(candidate => candidate.profileSavings > 0);

        if (candidates.length === 0) return [];

        const outcomes = await this.loadOutcomes(model);

        return candidates
            .sort((a, b) => b.profileSavings - a.profileSavings)
            .slice(0, maxResults)
            .map(({ entry, profileSavings }): ModelAlternative => {
                const qualityImpact = this.qualityImpact(current.tier, entry.tier);
                const outcome = outcomes.get(entry.modelId);
                const timesImplemented = outcome?.timesImplemented ?? 0;
                const savingsAccuracy = outcome?.savingsAccuracy ?? null;

                return {
                    model: entry.modelId,
                    provider: entry.provider,
                    savings: {
                        inputPer1K: current.inputPricePer1K - entry.inputPricePer1K,
                        outputPer1K: current.outputPricePer1K - entry.outputPricePer1K,
                        percentage: currentCost > 0 ? roundTo((profileSavings / currentCost) * 100, 1) : 0
                    },
                    qualityImpact,
                    source: timesImplemented >= this.learnedMinImplementations ? 'learned' : 'dynamic',
                    confidenceScore: this.confidence(qualityImpact, timesImplemented, savingsAccuracy),
                    timesImplemented,
                    savingsAccuracy
                };
            });
    }

    /**
     * Drop the cached catalog so the next lookup reads the store again
     */
    invalidateCatalog(): void {
        this.clearCachePattern('^catalog:');
    }

    private async getCatalog(): Promise<ModelPricingEntry[]> {
        try {
            return await this.getCachedOrExecute(CATALOG_CACHE_KEY, () => this.store.listActive());
        } catch (error) {
            throw new ServiceError(
                `Model pricing catalog unavailable: ${error instanceof Error ? error.message : String(error)}`,
                'PRICING_UNAVAILABLE',
                503
            );
        }
    }

    private findModel(catalog: ModelPricingEntry[], model: string): ModelPricingEntry | undefined {
        const exact = catalog.find(entry => entry.modelId === model);
        if (exact) return exact;
        const lower = model.toLowerCase();
        return catalog.find(entry => entry.modelId.toLowerCase() === lower);
    }

    /**
     * Price of one call at the profile; with no token profile, compare list prices
     */
    private profileCost(entry: ModelPricingEntry, avgInputTokens: number, avgOutputTokens: number): number {
        if (avgInputTokens <= 0 && avgOutputTokens <= 0) {
            return entry.inputPricePer1K + entry.outputPricePer1K;
        }
        return (Math.max(0, avgInputTokens) / 1000) * entry.inputPricePer1K +
            (Math.max(0, avgOutputTokens) / 1000) * entry.outputPricePer1K;
    }

    private qualityImpact(currentTier: ModelTier, alternativeTier: ModelTier): QualityImpact {
        const distance = TIER_RANK[currentTier] - TIER_RANK[alternativeTier];
        if (distance <= 0) return 'minimal';
        if (distance === 1) return 'moderate';
        return 'significant';
    }

    private confidence(qualityImpact: QualityImpact, timesImplemented: number, savingsAccuracy: number | null): number {
        let score = BASE_CONFIDENCE[qualityImpact] + Math.min(0.15, timesImplemented * 0.03);
        if (savingsAccuracy !== null) {
            score = (score + Math.min(1, Math.max(0, savingsAccuracy))) / 2;
        }
        return roundTo(Math.min(1, Math.max(0, score)), 2);
    }

    private async loadOutcomes(model: string): Promise<Map<string, AlternativeOutcome>> {
        if (!this.outcomes) return new Map();

        try {
            const outcomes = await this.outcomes.getAlternativeOutcomes(model);
            return new Map(outcomes.map(outcome => [outcome.alternativeModel, outcome]));
        } catch (error) {
            // Outcome history only adjusts confidence
            this.logOperation('warn', 'Alternative outcome lookup failed', 'discoverAlternatives', {
                model,
                error: error instanceof Error ? error.message : String(error)
            });
            return new Map();
        }
    }
}
