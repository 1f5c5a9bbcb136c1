import { BaseService } from '../../shared/BaseService';
import { OptimizationConfig } from '../../config/optimization.config';
import { CachingOpportunity, CachingSuggestion } from '../../types/optimization.types';
import { PatternAnalyzer } from '../patternAnalyzer.service';
import { AnalyzerContext, SuggestionAnalyzer, formatCount, priorityForSavings } from './types';

/**
 * Turns duplicate-input clusters into response caching suggestions
 */
export class CachingAnalyzer extends BaseService implements SuggestionAnalyzer<CachingSuggestion> {
    readonly name = 'caching' as const;

    constructor(
        private readonly patterns: PatternAnalyzer,
        private readonly config: OptimizationConfig
    ) {
        super('CachingAnalyzer');
    }

    async analyze(ctx: AnalyzerContext): Promise<CachingSuggestion[]> {
        const opportunities = await this.patterns.analyzeCachingOpportunities(ctx.projectId, {
            minOccurrences: this.config.caching.minOccurrences,
            minSavings: this.config.caching.minMonthlySavings,
            days: ctx.days
        });

        return opportunities.map(opportunity => this.buildSuggestion(opportunity));
    }

    private buildSuggestion(opportunity: CachingOpportunity): CachingSuggestion {
        const { agentName, duplicateRate, estimatedMonthlySavings } = opportunity;

        return {
            type: 'caching',
            title: `Add caching for ${agentName}`,
            description:
                `Agent '${agentName}' has ${duplicateRate.toFixed(1)}% duplicate queries. ` +
                'Implementing response caching could save approximately ' +
                `$${estimatedMonthlySavings.toFixed(2)}/month based on observed patterns.`,
            agentName,
            model: null,
            alternativeModel: null,
            estimatedSavingsMonthly: estimatedMonthlySavings,
            estimatedSavingsPercent: duplicateRate,
            priority: priorityForSavings(estimatedMonthlySavings, this.config.priority),
            actionItems: buildCachingActions(opportunity),
            metrics: {
                kind: 'caching',
                uniquePatterns: opportunity.uniquePatterns,
                totalCalls: opportunity.totalCalls,
                duplicateCalls: opportunity.duplicateCalls,
                duplicateRate
            }
        };
    }
}

function buildCachingActions(opportunity: CachingOpportunity): string[] {
    const { agentName, duplicateRate, uniquePatterns, duplicateCalls } = opportunity;
    const actions: string[] = [];

    const cacheSize = Math.min(uniquePatterns * 2, 10000);
    actions.push(
        `Implement cache with size ${formatCount(cacheSize)} entries - ` +
        `you have ${formatCount(uniquePatterns)} unique query patterns`
    );

    if (duplicateRate > 50) {
        actions.push(`High duplicate rate (${duplicateRate.toFixed(0)}%) - use aggressive caching with 1-hour TTL`);
    } else if (duplicateRate > 20) {
        actions.push(`Moderate duplicates (${duplicateRate.toFixed(0)}%) - use 30-minute TTL with LRU eviction`);
    } else {
        actions.push(`Use 15-minute TTL for ${agentName} cache`);
    }

    if (duplicateCalls > 100) {
        actions.push(
            `Add semantic similarity matching - ${formatCount(duplicateCalls)} ` +
            'duplicate calls may have slight variations'
        );
    }

    actions.push(`Log cache hits/misses for ${agentName} to measure effectiveness`);

    return actions;
}
