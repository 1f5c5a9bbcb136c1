import { BaseService } from '../../shared/BaseService';
import { OptimizationConfig } from '../../config/optimization.config';
import {
    ModelAlternative,
    ModelDowngradeSuggestion,
    PricingProvider,
    QualityImpact
} from '../../types/optimization.types';
import { AgentModelAggregate } from '../../types/store.types';
import { toMonthly } from '../../utils/optimizationMath';
import { AnalyzerContext, SuggestionAnalyzer, formatCount, priorityForSavings } from './types';

interface SwitchCandidate {
    alternative: ModelAlternative;
    monthlySavings: number;
}

/**
 * Model Downgrade Analyzer
 *
 * For every (model, agent) group with enough volume, asks the pricing
 * collaborator for cheaper models at the group's average token profile and
 * suggests the first one whose monthly savings clear the floor.
 */
export class ModelDowngradeAnalyzer extends BaseService implements SuggestionAnalyzer<ModelDowngradeSuggestion> {
    readonly name = 'model_downgrade' as const;

    constructor(
        private readonly pricing: PricingProvider,
        private readonly config: OptimizationConfig
    ) {
        super('ModelDowngradeAnalyzer');
    }

    async analyze(ctx: AnalyzerContext): Promise<ModelDowngradeSuggestion[]> {
        const { minCalls, minPeriodCost } = this.config.modelDowngrade;
        const suggestions: ModelDowngradeSuggestion[] = [];

        const groups = [...ctx.aggregates].sort((a, b) =>
            a.model.localeCompare(b.model) || a.agentName.localeCompare(b.agentName)
        );

        for (const group of groups) {
            if (group.callCount < minCalls || group.totalCost < minPeriodCost) {
                continue;
            }

            let alternatives: ModelAlternative[];
            try {
                alternatives = await this.pricing.discoverAlternatives(
                    group.model,
                    Math.trunc(group.avgInputTokens),
                    Math.trunc(group.avgOutputTokens),
                    this.config.modelDowngrade.maxAlternatives
                );
            } catch (error) {
                this.logOperation('warn', 'Pricing lookup failed, skipping model group', 'analyze', {
                    projectId: ctx.projectId,
                    agentName: group.agentName,
                    model: group.model,
                    error: error instanceof Error ? error.message : String(error)
                });
                continue;
            }

            const candidate = this.pickAlternative(group, alternatives, ctx.days);
            if (candidate) {
                suggestions.push(this.buildSuggestion(group, candidate, ctx.days));
            }
        }

        return suggestions;
    }

    private pickAlternative(
        group: AgentModelAggregate,
        alternatives: ModelAlternative[],
        days: number
    ): SwitchCandidate | null {
        for (const alternative of alternatives) {
            const periodSavings =
                (group.totalInputTokens / 1000) * alternative.savings.inputPer1K +
                (group.totalOutputTokens / 1000) * alternative.savings.outputPer1K;

            if (periodSavings <= 0) continue;

            const monthlySavings = toMonthly(periodSavings, days);
            if (monthlySavings < this.config.modelDowngrade.minMonthlySavings) continue;

            return { alternative, monthlySavings };
        }
        return null;
    }

    private buildSuggestion(
        group: AgentModelAggregate,
        { alternative, monthlySavings }: SwitchCandidate,
        days: number
    ): ModelDowngradeSuggestion {
        const monthlyCost = toMonthly(group.totalCost, days);
        const savingsPercent = monthlyCost > 0 ? (monthlySavings / monthlyCost) * 100 : 0;

        return {
            type: 'model_downgrade',
            title: `Consider ${alternative.model} for ${group.agentName}`,
            description:
                `Agent '${group.agentName}' uses ${group.model} with average output of ` +
                `${group.avgOutputTokens.toFixed(0)} tokens. Switching to ${alternative.model} could reduce costs.`,
            agentName: group.agentName,
            model: group.model,
            alternativeModel: alternative.model,
            estimatedSavingsMonthly: monthlySavings,
            estimatedSavingsPercent: savingsPercent,
            priority: priorityForSavings(monthlySavings, this.config.priority),
            actionItems: buildModelSwitchActions(
                group.agentName,
                group.model,
                alternative.model,
                monthlySavings,
                alternative.qualityImpact,
                group.callCount
            ),
            metrics: {
                kind: 'model_downgrade',
                currentCalls: group.callCount,
                currentMonthlyCost: monthlyCost,
                avgOutputTokens: group.avgOutputTokens,
                avgInputTokens: group.avgInputTokens,
                savingsPercentage: alternative.savings.percentage,
                qualityImpact: alternative.qualityImpact,
                source: alternative.source,
                confidenceScore: alternative.confidenceScore,
                timesImplemented: alternative.timesImplemented,
                savingsAccuracy: alternative.savingsAccuracy
            }
        };
    }
}

function buildModelSwitchActions(
    agent: string,
    currentModel: string,
    alternativeModel: string,
    monthlySavings: number,
    qualityImpact: QualityImpact,
    calls: number
): string[] {
    const actions: string[] = [];

    switch (qualityImpact) {
        case 'minimal':
            actions.push(`Run A/B test: route 10% of ${agent} traffic to ${alternativeModel} and compare output quality scores`);
            break;
        case 'moderate':
            actions.push(`Evaluate ${alternativeModel} on your ${agent} test suite - expect some quality differences`);
            break;
        case 'significant':
            actions.push(`Thoroughly test ${alternativeModel} - significant capability differences expected vs ${currentModel}`);
            break;
    }

    if (calls > 1000) {
        actions.push(`With ${formatCount(calls)} calls/period, implement gradual rollout: 10% → 25% → 50% → 100% over 2 weeks`);
    } else {
        actions.push(`Switch ${agent} configuration from ${currentModel} to ${alternativeModel}`);
    }

    actions.push(`Monitor ${agent} error rates and user feedback for 48 hours after switch`);

    if (monthlySavings > 100) {
        actions.push(`Expected savings: $${monthlySavings.toFixed(2)}/month - prioritize this migration`);
    }

    return actions;
}
