import { BaseService } from '../../shared/BaseService';
import { OptimizationConfig } from '../../config/optimization.config';
import { ErrorReductionSuggestion } from '../../types/optimization.types';
import { AgentModelAggregate } from '../../types/store.types';
import { groupKey, toMonthly } from '../../utils/optimizationMath';
import { AnalyzerContext, SuggestionAnalyzer, priorityForSavings } from './types';

/**
 * Flags (agent, model) groups whose error rate is well above their baseline
 * and prices the spend lost on failed calls
 */
export class ErrorReductionAnalyzer extends BaseService implements SuggestionAnalyzer<ErrorReductionSuggestion> {
    readonly name = 'error_reduction' as const;

    constructor(private readonly config: OptimizationConfig) {
        super('ErrorReductionAnalyzer');
    }

    async analyze(ctx: AnalyzerContext): Promise<ErrorReductionSuggestion[]> {
        const { minCalls, minErrors, defaultErrorRate, errorRateRatio, minMonthlyWaste } = this.config.errorReduction;
        const suggestions: ErrorReductionSuggestion[] = [];

        for (const group of ctx.aggregates) {
            if (group.callCount < minCalls || group.errorCount < minErrors) continue;

            const errorRate = group.errorCount / group.callCount;
            const baseline = ctx.baselines.get(groupKey(group.agentName, group.model));
            const baselineErrorRate = baseline ? baseline.avgErrorRate : defaultErrorRate;

            if (errorRate <= baselineErrorRate * errorRateRatio) continue;

            const monthlyWasted = toMonthly(group.failedCost, ctx.days);
            if (monthlyWasted < minMonthlyWaste) continue;

            suggestions.push(this.buildSuggestion(group, errorRate, baselineErrorRate, monthlyWasted));
        }

        return suggestions;
    }

    private buildSuggestion(
        group: AgentModelAggregate,
        errorRate: number,
        baselineErrorRate: number,
        monthlyWasted: number
    ): ErrorReductionSuggestion {
        return {
            type: 'error_reduction',
            title: `Reduce errors in ${group.agentName}`,
            description:
                `Agent '${group.agentName}' using ${group.model} has ${(errorRate * 100).toFixed(1)}% error rate ` +
                `(baseline: ${(baselineErrorRate * 100).toFixed(1)}%), wasting ` +
                `$${monthlyWasted.toFixed(2)}/month on failed calls.`,
            agentName: group.agentName,
            model: group.model,
            alternativeModel: null,
            estimatedSavingsMonthly: monthlyWasted,
            estimatedSavingsPercent: errorRate * 100,
            priority: priorityForSavings(monthlyWasted, this.config.priority),
            actionItems: buildErrorActions(
                group.agentName,
                group.model,
                errorRate,
                baselineErrorRate,
                group.errorCount,
                monthlyWasted
            ),
            metrics: {
                kind: 'error_reduction',
                totalCalls: group.callCount,
                errorCount: group.errorCount,
                errorRate: errorRate * 100,
                baselineErrorRate: baselineErrorRate * 100,
                wastedCost: group.failedCost
            }
        };
    }
}

function buildErrorActions(
    agent: string,
    model: string,
    errorRate: number,
    baselineErrorRate: number,
    errorCount: number,
    monthlyWasted: number
): string[] {
    const actions: string[] = [];
    const errorIncrease = baselineErrorRate > 0
        ? ((errorRate - baselineErrorRate) / baselineErrorRate) * 100
        : 0;

    if (errorRate > 0.10) {
        actions.push(
            `Critical: ${(errorRate * 100).toFixed(1)}% error rate on ${agent} - ` +
            `query last ${errorCount} failed requests for common patterns`
        );
    } else {
        actions.push(`Error rate ${errorIncrease.toFixed(0)}% above baseline - review ${agent} error logs from past 24 hours`);
    }

    if (errorCount > 50) {
        actions.push(`Implement retry with exponential backoff for ${model} - ${errorCount} failures may be transient`);
    }

    if (monthlyWasted > 10) {
        actions.push(`Add pre-call validation for ${agent} - $${monthlyWasted.toFixed(2)}/month wasted on failed requests`);
    }

    actions.push(`Consider adding fallback model for ${agent} when ${model} fails`);

    return actions;
}
