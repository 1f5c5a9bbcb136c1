import { z } from 'zod';
import { BaseService } from '../shared/BaseService';
import { DEFAULT_OPTIMIZATION_CONFIG, OptimizationConfig } from '../config/optimization.config';
import { ErrorHandler } from '../errors/ErrorHandler';
import { RecommendationUnavailableError, ValidationServiceError } from '../errors/optimizationErrors';
import { unwrapTransaction } from '../utils/mongoTransactionManager';
import { roundTo } from '../utils/optimizationMath';
import {
    Baseline,
    BaselineComputationReport,
    CachingOpportunity,
    OptimizationSummary,
    Recommendation,
    RecommendationActionResult,
    RecommendationEffectiveness,
    Suggestion
} from '../types/optimization.types';
import { StoreSession, TransactionManager } from '../types/store.types';
import { BaselineComputer } from './baselineComputer.service';
import { PatternAnalyzer } from './patternAnalyzer.service';
import { RecommendationTracker } from './recommendationTracker.service';
import { SuggestionSynthesizer } from './suggestionSynthesizer.service';

// ===== INPUT SCHEMAS =====

const projectIdSchema = z.string().trim().min(1, 'projectId is required');
const recommendationIdSchema = z.string().trim().min(1, 'recommendationId is required');

const suggestionsOptionsSchema = z.object({
    days: z.number().int().min(1).max(90).default(30),
    includeLowPriority: z.boolean().default(true),
    persist: z.boolean().default(false)
});

const summaryOptionsSchema = z.object({
    days: z.number().int().min(1).max(90).default(30)
});

const computeBaselinesOptionsSchema = z.object({
    days: z.number().int().min(7).max(90).default(30)
});

const baselineFilterSchema = z.object({
    agentName: z.string().trim().min(1).optional(),
    model: z.string().trim().min(1).optional()
});

const cachingOptionsSchema = z.object({
    minOccurrences: z.number().int().min(2).default(5)
});

const dismissFeedbackSchema = z.string().trim().max(1000).nullable().default(null);

const actualSavingsSchema = z.number().finite().nonnegative();

export type SuggestionsOptionsInput = z.input<typeof suggestionsOptionsSchema>;
export type SummaryOptionsInput = z.input<typeof summaryOptionsSchema>;
export type ComputeBaselinesOptionsInput = z.input<typeof computeBaselinesOptionsSchema>;
export type BaselineFilterInput = z.input<typeof baselineFilterSchema>;
export type CachingOptionsInput = z.input<typeof cachingOptionsSchema>;

export interface SuggestionsResult {
    suggestions: Suggestion[];
    persistedRecommendations: Recommendation[];
}

export interface CachingOpportunitiesResult {
    opportunities: CachingOpportunity[];
    totalPotentialSavingsMonthly: number;
}

function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, field: string): z.output<T> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue =>
            issue.path.length > 0 ? `${field}.${issue.path.join('.')}: ${issue.message}` : `${field}: ${issue.message}`
        );
        throw new ValidationServiceError(`Invalid ${field}`, issues);
    }
    return parsed.data;
}

/**
 * Rounded view of a baseline for callers
 */
function toBaselineView(baseline: Baseline): Baseline {
    return {
        ...baseline,
        avgCostPerCall: roundTo(baseline.avgCostPerCall, 6),
        stddevCostPerCall: roundTo(baseline.stddevCostPerCall, 6),
        avgInputTokens: roundTo(baseline.avgInputTokens, 1),
        stddevInputTokens: roundTo(baseline.stddevInputTokens, 1),
        avgOutputTokens: roundTo(baseline.avgOutputTokens, 1),
        stddevOutputTokens: roundTo(baseline.stddevOutputTokens, 1),
        avgLatencyMs: roundTo(baseline.avgLatencyMs, 1),
        stddevLatencyMs: roundTo(baseline.stddevLatencyMs, 1),
        avgDailyCalls: roundTo(baseline.avgDailyCalls, 1),
        avgErrorRate: roundTo(baseline.avgErrorRate, 4)
    };
}

/**
 * Optimization Service
 *
 * Entry points for the API layer. Validates input, runs each operation in a
 * single unit of work and routes failures through ErrorHandler.
 */
export class OptimizationService extends BaseService {

    constructor(
        private readonly transactions: TransactionManager,
        private readonly baselineComputer: BaselineComputer,
        private readonly patternAnalyzer: PatternAnalyzer,
        private readonly synthesizer: SuggestionSynthesizer,
        private readonly tracker: RecommendationTracker,
        private readonly config: OptimizationConfig = DEFAULT_OPTIMIZATION_CONFIG
    ) {
        super('OptimizationService');
    }

    async getSuggestions(projectId: string, options: SuggestionsOptionsInput = {}): Promise<SuggestionsResult> {
        return this.run('getSuggestions', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const { days, includeLowPriority, persist } = parseInput(suggestionsOptionsSchema, options, 'options');

            return this.inTransaction('getSuggestions', async session => {
                const suggestions = await this.synthesizer.generateSuggestions(id, { days, includeLowPriority }, session);

                const persistedRecommendations: Recommendation[] = [];
                if (persist) {
                    for (const suggestion of suggestions.slice(0, this.config.recommendations.persistTopN)) {
                        const { recommendation } = await this.tracker.createRecommendation({
                            projectId: id,
                            type: suggestion.type,
                            title: suggestion.title,
                            description: suggestion.description,
                            agentName: suggestion.agentName,
                            model: suggestion.model,
                            alternativeModel: suggestion.alternativeModel,
                            estimatedMonthlySavings: suggestion.estimatedSavingsMonthly,
                            estimatedSavingsPercent: suggestion.estimatedSavingsPercent,
                            metricsSnapshot: suggestion.metrics
                        }, this.config.recommendations.cooldownDays, session);
                        persistedRecommendations.push(recommendation);
                    }
                }

                return { suggestions, persistedRecommendations };
            });
        });
    }

    async getSummary(projectId: string, options: SummaryOptionsInput = {}): Promise<OptimizationSummary> {
        return this.run('getSummary', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const { days } = parseInput(summaryOptionsSchema, options, 'options');

            return this.inTransaction('getSummary', session => this.synthesizer.getSummary(id, days, session));
        });
    }

    async computeBaselines(
        projectId: string,
        options: ComputeBaselinesOptionsInput = {}
    ): Promise<BaselineComputationReport> {
        return this.run('computeBaselines', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const { days } = parseInput(computeBaselinesOptionsSchema, options, 'options');

            const report = await this.inTransaction('computeBaselines', session =>
                this.baselineComputer.computeBaselines(id, days, session)
            );
            return { ...report, baselines: report.baselines.map(toBaselineView) };
        });
    }

    async getBaselines(projectId: string, filter: BaselineFilterInput = {}): Promise<Baseline[]> {
        return this.run('getBaselines', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const parsedFilter = parseInput(baselineFilterSchema, filter, 'filter');

            const baselines = await this.inTransaction('getBaselines', session =>
                this.baselineComputer.listBaselines(id, parsedFilter, session)
            );
            return baselines.map(toBaselineView);
        });
    }

    async getCachingOpportunities(
        projectId: string,
        options: CachingOptionsInput = {}
    ): Promise<CachingOpportunitiesResult> {
        return this.run('getCachingOpportunities', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const { minOccurrences } = parseInput(cachingOptionsSchema, options, 'options');

            const opportunities = await this.patternAnalyzer.analyzeCachingOpportunities(id, { minOccurrences });
            const rounded = opportunities.map(opportunity => ({
                ...opportunity,
                duplicateRate: roundTo(opportunity.duplicateRate, 1),
                estimatedMonthlySavings: roundTo(opportunity.estimatedMonthlySavings, 2)
            }));

            return {
                opportunities: rounded,
                totalPotentialSavingsMonthly: roundTo(
                    opportunities.reduce((sum, opportunity) => sum + opportunity.estimatedMonthlySavings, 0),
                    2
                )
            };
        });
    }

    async listPending(projectId: string): Promise<Recommendation[]> {
        return this.run('listPending', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            return this.inTransaction('listPending', session => this.tracker.getPendingRecommendations(id, session));
        });
    }

    async implement(projectId: string, recommendationId: string): Promise<Recommendation> {
        return this.run('implement', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const recId = parseInput(recommendationIdSchema, recommendationId, 'recommendationId');

            const result = await this.inTransaction('implement', session =>
                this.tracker.markImplemented(recId, id, session)
            );
            return this.requireActionable(recId, result);
        });
    }

    async dismiss(projectId: string, recommendationId: string, feedback?: string | null): Promise<Recommendation> {
        return this.run('dismiss', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const recId = parseInput(recommendationIdSchema, recommendationId, 'recommendationId');
            const parsedFeedback = parseInput(dismissFeedbackSchema, feedback ?? null, 'feedback');

            const result = await this.inTransaction('dismiss', session =>
                this.tracker.markDismissed(recId, id, parsedFeedback || null, session)
            );
            return this.requireActionable(recId, result);
        });
    }

    async getEffectiveness(projectId: string): Promise<RecommendationEffectiveness> {
        return this.run('getEffectiveness', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            return this.inTransaction('getEffectiveness', session =>
                this.tracker.getRecommendationEffectiveness(id, session)
            );
        });
    }

    async recordActualSavings(
        projectId: string,
        recommendationId: string,
        actualMonthlySavings: number
    ): Promise<Recommendation> {
        return this.run('recordActualSavings', projectId, async () => {
            const id = parseInput(projectIdSchema, projectId, 'projectId');
            const recId = parseInput(recommendationIdSchema, recommendationId, 'recommendationId');
            const amount = parseInput(actualSavingsSchema, actualMonthlySavings, 'actualMonthlySavings');

            const result = await this.inTransaction('recordActualSavings', session =>
                this.tracker.recordActualSavings(recId, id, amount, session)
            );
            return this.requireActionable(recId, result);
        });
    }

    private requireActionable(recommendationId: string, result: RecommendationActionResult): Recommendation {
        switch (result.status) {
            case 'ok':
                return result.recommendation;
            case 'not_found':
                throw new RecommendationUnavailableError(recommendationId, 'not_found');
            case 'unavailable':
                throw new RecommendationUnavailableError(recommendationId, result.reason);
        }
    }

    private async inTransaction<T>(operationName: string, operation: (session: StoreSession) => Promise<T>): Promise<T> {
        const result = await this.transactions.executeTransaction(operation, `${this.serviceName}.${operationName}`);
        return unwrapTransaction(result, operationName);
    }

    private async run<T>(operation: string, projectId: unknown, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            throw ErrorHandler.createServiceError(error, {
                projectId: typeof projectId === 'string' ? projectId : undefined,
                operation,
                component: this.serviceName
            });
        }
    }
}
