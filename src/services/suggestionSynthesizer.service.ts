import { BaseService } from '../shared/BaseService';
import { DEFAULT_OPTIMIZATION_CONFIG, OptimizationConfig } from '../config/optimization.config';
import {
    Baseline,
    EmptyReason,
    OptimizationSummary,
    RecommendationEffectiveness,
    Suggestion,
    SuggestionOptions,
    SuggestionType,
    SuggestionTypeBreakdown
} from '../types/optimization.types';
import { EventAggregator, StoreSession } from '../types/store.types';
import { groupKey, roundTo, toMonthly } from '../utils/optimizationMath';
import { AnalyzerContext, SuggestionAnalyzer } from './analyzers/types';
import { BaselineComputer, Clock, systemClock } from './baselineComputer.service';

const DAY_MS = 24 * 60 * 60 * 1000;
const SUMMARY_TOP_SUGGESTIONS = 5;

export interface EffectivenessSource {
    getRecommendationEffectiveness(projectId: string, session?: StoreSession): Promise<RecommendationEffectiveness>;
}

/**
 * Apply the output precision: money 2 dp, percentages 1 dp, metric fields per kind
 */
export function roundSuggestion(suggestion: Suggestion): Suggestion {
    const estimatedSavingsMonthly = roundTo(suggestion.estimatedSavingsMonthly, 2);
    const estimatedSavingsPercent = roundTo(suggestion.estimatedSavingsPercent, 1);

    switch (suggestion.type) {
        case 'model_downgrade':
            return {
                ...suggestion,
                estimatedSavingsMonthly,
                estimatedSavingsPercent,
                metrics: {
                    ...suggestion.metrics,
                    currentMonthlyCost: roundTo(suggestion.metrics.currentMonthlyCost, 2),
                    avgOutputTokens: roundTo(suggestion.metrics.avgOutputTokens, 1),
                    avgInputTokens: roundTo(suggestion.metrics.avgInputTokens, 1),
                    savingsPercentage: roundTo(suggestion.metrics.savingsPercentage, 1)
                }
            };
        case 'caching':
            return {
                ...suggestion,
                estimatedSavingsMonthly,
                estimatedSavingsPercent,
                metrics: {
                    ...suggestion.metrics,
                    duplicateRate: roundTo(suggestion.metrics.duplicateRate, 1)
                }
            };
        case 'anomaly_alert':
            return {
                ...suggestion,
                estimatedSavingsMonthly,
                estimatedSavingsPercent,
                metrics: {
                    ...suggestion.metrics,
                    currentValue: roundTo(suggestion.metrics.currentValue, 4),
                    baselineMean: roundTo(suggestion.metrics.baselineMean, 4),
                    baselineStddev: roundTo(suggestion.metrics.baselineStddev, 4),
                    zScore: suggestion.metrics.zScore === null ? null : roundTo(suggestion.metrics.zScore, 2),
                    ratio: suggestion.metrics.ratio === null ? null : roundTo(suggestion.metrics.ratio, 2)
                }
            };
        case 'error_reduction':
            return {
                ...suggestion,
                estimatedSavingsMonthly,
                estimatedSavingsPercent,
                metrics: {
                    ...suggestion.metrics,
                    errorRate: roundTo(suggestion.metrics.errorRate, 2),
                    baselineErrorRate: roundTo(suggestion.metrics.baselineErrorRate, 2),
                    wastedCost: roundTo(suggestion.metrics.wastedCost, 4)
                }
            };
        case 'prompt_optimization':
            return {
                ...suggestion,
                estimatedSavingsMonthly,
                estimatedSavingsPercent,
                metrics: {
                    ...suggestion.metrics,
                    avgLatencyMs: roundTo(suggestion.metrics.avgLatencyMs, 0),
                    baselineLatencyMs: roundTo(suggestion.metrics.baselineLatencyMs, 0),
                    zScore: roundTo(suggestion.metrics.zScore, 2),
                    avgInputTokens: roundTo(suggestion.metrics.avgInputTokens, 0)
                }
            };
    }
}

/**
 * Suggestion Synthesizer
 *
 * Runs every analyzer over a shared context and assembles one ranked list.
 * A failing analyzer is logged and contributes nothing. Writes nothing except
 * the one-time baseline bootstrap.
 */
export class SuggestionSynthesizer extends BaseService {

    constructor(
        private readonly aggregator: EventAggregator,
        private readonly baselineComputer: BaselineComputer,
        private readonly analyzers: SuggestionAnalyzer[],
        private readonly effectiveness: EffectivenessSource,
        private readonly config: OptimizationConfig = DEFAULT_OPTIMIZATION_CONFIG,
        private readonly clock: Clock = systemClock
    ) {
        super('SuggestionSynthesizer');
    }

    async generateSuggestions(
        projectId: string,
        options: SuggestionOptions = {},
        session: StoreSession = null
    ): Promise<Suggestion[]> {
        const days = options.days ?? this.config.baselines.defaultDays;
        const includeLowPriority = options.includeLowPriority ?? true;

        if (days <= 0) return [];

        return this.timed('generateSuggestions', async () => {
            await this.baselineComputer.ensureBaselinesExist(projectId, days, session);

            const ctx = await this.buildContext(projectId, days, session);

            // Sequential: a transaction session carries one operation at a time
            let suggestions: Suggestion[] = [];
            for (const analyzer of this.analyzers) {
                suggestions.push(...await this.runAnalyzer(analyzer, ctx));
            }

            if (!includeLowPriority) {
                suggestions = suggestions.filter(suggestion => suggestion.priority !== 'low');
            }

            // Array.prototype.sort is stable, so ties keep analyzer order
            return suggestions
                .map(roundSuggestion)
                .sort((a, b) => b.estimatedSavingsMonthly - a.estimatedSavingsMonthly);
        }, { projectId, days });
    }

    async getSummary(
        projectId: string,
        days: number = this.config.baselines.defaultDays,
        session: StoreSession = null
    ): Promise<OptimizationSummary> {
        const suggestions = await this.generateSuggestions(projectId, { days, includeLowPriority: true }, session);

        const now = this.clock();
        const window = { start: new Date(now.getTime() - Math.max(days, 0) * DAY_MS), end: now };
        const overview = await this.aggregator.overview(projectId, window);
        const hasBaselines = await this.baselineComputer.hasBaselines(projectId, session);
        const effectiveness = await this.effectiveness.getRecommendationEffectiveness(projectId, session);

        const totalSavings = suggestions.reduce((sum, suggestion) => sum + suggestion.estimatedSavingsMonthly, 0);
        const monthlySpend = toMonthly(overview.totalCost, days);
        const savingsPercent = monthlySpend > 0 ? (totalSavings / monthlySpend) * 100 : 0;

        const byType: Partial<Record<SuggestionType, SuggestionTypeBreakdown>> = {};
        for (const suggestion of suggestions) {
            const entry = byType[suggestion.type] ?? { count: 0, savings: 0 };
            entry.count += 1;
            entry.savings = roundTo(entry.savings + suggestion.estimatedSavingsMonthly, 2);
            byType[suggestion.type] = entry;
        }

        return {
            totalPotentialSavingsMonthly: roundTo(totalSavings, 2),
            totalPotentialSavingsPercent: roundTo(savingsPercent, 1),
            currentMonthlySpend: roundTo(monthlySpend, 2),
            suggestionCount: suggestions.length,
            highPriorityCount: suggestions.filter(suggestion => suggestion.priority === 'high').length,
            byType,
            effectiveness,
            suggestions: suggestions.slice(0, SUMMARY_TOP_SUGGESTIONS),
            hasData: overview.totalCalls > 0,
            hasBaselines,
            eventCount: overview.totalCalls,
            emptyReason: suggestions.length === 0
                ? this.classifyEmpty(overview.totalCalls, hasBaselines)
                : null
        };
    }

    private classifyEmpty(eventCount: number, hasBaselines: boolean): EmptyReason {
        if (eventCount === 0) return 'no_data';
        if (!hasBaselines && eventCount < this.config.baselines.minSamples) return 'insufficient_data';
        if (!hasBaselines) return 'no_baselines';
        return 'optimized';
    }

    private async buildContext(projectId: string, days: number, session: StoreSession): Promise<AnalyzerContext> {
        const now = this.clock();
        const window = { start: new Date(now.getTime() - days * DAY_MS), end: now };

        const aggregates = await this.aggregator.aggregateByAgentModel(projectId, window);
        const baselines = await this.baselineComputer.listBaselines(projectId, {}, session);

        return {
            projectId,
            days,
            window,
            aggregates,
            baselines: new Map(baselines.map((baseline): [string, Baseline] =>
                [groupKey(baseline.agentName, baseline.model), baseline]
            )),
            session
        };
    }

    private async runAnalyzer(analyzer: SuggestionAnalyzer, ctx: AnalyzerContext): Promise<Suggestion[]> {
        try {
            return await analyzer.analyze(ctx);
        } catch (error) {
            this.logOperation('error', 'Analyzer failed, continuing without it', 'generateSuggestions', {
                projectId: ctx.projectId,
                analyzer: analyzer.name,
                error: error instanceof Error ? error.message : String(error)
            });
            return [];
        }
    }
}
