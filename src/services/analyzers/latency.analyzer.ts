import { BaseService } from '../../shared/BaseService';
import { OptimizationConfig } from '../../config/optimization.config';
import { Baseline, LatencySuggestion } from '../../types/optimization.types';
import { AgentModelAggregate } from '../../types/store.types';
import { groupKey } from '../../utils/optimizationMath';
import { AnalyzerContext, SuggestionAnalyzer } from './types';

/**
 * Flags groups whose average latency sits well above baseline and points at
 * prompt size as the lever
 */
export class LatencyAnalyzer extends BaseService implements SuggestionAnalyzer<LatencySuggestion> {
    readonly name = 'prompt_optimization' as const;

    constructor(private readonly config: OptimizationConfig) {
        super('LatencyAnalyzer');
    }

    async analyze(ctx: AnalyzerContext): Promise<LatencySuggestion[]> {
        const { minCalls, zScoreThreshold } = this.config.latency;
        const suggestions: LatencySuggestion[] = [];

        for (const group of ctx.aggregates) {
            if (group.callCount < minCalls) continue;

            const baseline = ctx.baselines.get(groupKey(group.agentName, group.model));
            if (!baseline || baseline.stddevLatencyMs <= 0) continue;

            const zScore = (group.avgLatencyMs - baseline.avgLatencyMs) / baseline.stddevLatencyMs;
            if (zScore < zScoreThreshold) continue;

            suggestions.push(this.buildSuggestion(group, baseline, zScore));
        }

        return suggestions;
    }

    private buildSuggestion(group: AgentModelAggregate, baseline: Baseline, zScore: number): LatencySuggestion {
        const { highSeverityZScore } = this.config.latency;

        return {
            type: 'prompt_optimization',
            title: `Optimize prompts for ${group.agentName}`,
            description:
                `Agent '${group.agentName}' has elevated latency ` +
                `(${group.avgLatencyMs.toFixed(0)}ms vs ${baseline.avgLatencyMs.toFixed(0)}ms baseline) ` +
                `with ${group.avgInputTokens.toFixed(0)} average input tokens. ` +
                'Consider shortening prompts or using streaming.',
            agentName: group.agentName,
            model: group.model,
            alternativeModel: null,
            estimatedSavingsMonthly: 0,
            estimatedSavingsPercent: 0,
            priority: zScore > highSeverityZScore ? 'high' : 'medium',
            actionItems: buildLatencyActions(
                group.agentName,
                group.model,
                group.avgLatencyMs,
                baseline.avgLatencyMs,
                group.avgInputTokens,
                zScore,
                highSeverityZScore
            ),
            metrics: {
                kind: 'prompt_optimization',
                avgLatencyMs: group.avgLatencyMs,
                baselineLatencyMs: baseline.avgLatencyMs,
                zScore,
                avgInputTokens: group.avgInputTokens
            }
        };
    }
}

function buildLatencyActions(
    agent: string,
    model: string,
    avgLatency: number,
    baselineLatency: number,
    avgInputTokens: number,
    zScore: number,
    severeZScore: number = 3
): string[] {
    const actions: string[] = [];
    const latencyIncrease = avgLatency - baselineLatency;

    if (avgInputTokens > 2000) {
        actions.push(`Reduce prompt size for ${agent} - currently ${avgInputTokens.toFixed(0)} tokens, aim for <2000 tokens`);
    }

    if (latencyIncrease > 1000) {
        actions.push(`Latency increased by ${latencyIncrease.toFixed(0)}ms - check if ${model} is experiencing provider-side delays`);
    }

    if (zScore > severeZScore) {
        actions.push(
            `Severe latency issue (${zScore.toFixed(1)}σ) - consider switching to faster ` +
            `model variant or enabling streaming for ${agent}`
        );
    } else {
        actions.push(`Enable response streaming for ${agent} to improve perceived latency`);
    }

    actions.push(`Profile ${agent} prompt construction to identify bottlenecks`);

    return actions;
}
