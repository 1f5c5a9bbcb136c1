import { BaseService } from '../shared/BaseService';
import { DEFAULT_OPTIMIZATION_CONFIG, OptimizationConfig } from '../config/optimization.config';
import { CachingAnalysisOptions, CachingOpportunity } from '../types/optimization.types';
import { EventAggregator, InputHashGroup } from '../types/store.types';
import { toMonthly } from '../utils/optimizationMath';
import { Clock, systemClock } from './baselineComputer.service';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Pattern Analyzer
 *
 * Finds repeated inputs (same input hash) per agent and estimates what a
 * response cache would have saved.
 */
export class PatternAnalyzer extends BaseService {

    constructor(
        private readonly aggregator: EventAggregator,
        private readonly config: OptimizationConfig = DEFAULT_OPTIMIZATION_CONFIG,
        private readonly clock: Clock = systemClock
    ) {
        super('PatternAnalyzer');
    }

    async analyzeCachingOpportunities(
        projectId: string,
        options: CachingAnalysisOptions = {}
    ): Promise<CachingOpportunity[]> {
        const minOccurrences = options.minOccurrences ?? this.config.caching.minOccurrences;
        const minSavings = options.minSavings ?? this.config.caching.minMonthlySavings;
        const days = options.days ?? this.config.baselines.defaultDays;

        if (days <= 0) return [];

        const now = this.clock();
        const window = { start: new Date(now.getTime() - days * DAY_MS), end: now };

        const groups = await this.aggregator.inputHashGroups(projectId, window, minOccurrences);
        if (groups.length === 0) return [];

        const agentTotals = await this.aggregator.callsByAgent(projectId, window);
        const totalsByAgent = new Map(agentTotals.map(total => [total.agentName, total.callCount]));

        const byAgent = new Map<string, InputHashGroup[]>();
        for (const group of groups) {
            const list = byAgent.get(group.agentName);
            if (list) {
                list.push(group);
            } else {
                byAgent.set(group.agentName, [group]);
            }
        }

        const opportunities: CachingOpportunity[] = [];
        for (const [agentName, hashes] of byAgent) {
            const uniquePatterns = hashes.length;
            const duplicateCalls = hashes.reduce((sum, hash) => sum + (hash.occurrences - 1), 0);
            const qualifyingCalls = hashes.reduce((sum, hash) => sum + hash.occurrences, 0);
            // Every repeat after the first would have been a cache hit
            const periodSavings = hashes.reduce(
                (sum, hash) => sum + (hash.totalCost / hash.occurrences) * (hash.occurrences - 1),
                0
            );

            const totalCalls = Math.max(totalsByAgent.get(agentName) ?? 0, qualifyingCalls);
            const duplicateRate = totalCalls > 0
                ? Math.min(100, Math.max(0, (duplicateCalls / totalCalls) * 100))
                : 0;
            const estimatedMonthlySavings = toMonthly(periodSavings, days);

            if (estimatedMonthlySavings < minSavings) continue;

            opportunities.push({
                agentName,
                uniquePatterns,
                totalCalls,
                duplicateCalls,
                duplicateRate,
                estimatedMonthlySavings
            });
        }

        opportunities.sort((a, b) => b.estimatedMonthlySavings - a.estimatedMonthlySavings);

        this.logOperation('debug', 'Caching opportunities analyzed', 'analyzeCachingOpportunities', {
            projectId,
            days,
            minOccurrences,
            opportunities: opportunities.length
        });

        return opportunities;
    }
}
