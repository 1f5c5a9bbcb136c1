import { BaseService } from '../shared/BaseService';
import { groupKey } from '../utils/optimizationMath';
import { DEFAULT_OPTIMIZATION_CONFIG, OptimizationConfig } from '../config/optimization.config';
import {
    Baseline,
    BaselineComputationReport,
    BaselineFilter,
    TimeWindow
} from '../types/optimization.types';
import { BaselineStore, DailyCallCount, EventAggregator, StoreSession } from '../types/store.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Baseline Computer
 *
 * Builds per (project, agent, model) usage baselines from historical events.
 * Groups below the minimum sample count are skipped without error.
 */
export class BaselineComputer extends BaseService {

    constructor(
        private readonly aggregator: EventAggregator,
        private readonly store: BaselineStore,
        private readonly config: OptimizationConfig = DEFAULT_OPTIMIZATION_CONFIG,
        private readonly clock: Clock = systemClock
    ) {
        super('BaselineComputer');
    }

    /**
     * Recompute and upsert baselines from events in [now - days, now]
     */
    async computeBaselines(
        projectId: string,
        days: number = this.config.baselines.defaultDays,
        session: StoreSession = null
    ): Promise<BaselineComputationReport> {
        if (days <= 0) {
            return { projectId, days, window: null, baselinesComputed: 0, groupsSkipped: 0, baselines: [] };
        }

        return this.timed('computeBaselines', async () => {
            const now = this.clock();
            const window: TimeWindow = { start: new Date(now.getTime() - days * DAY_MS), end: now };

            const [aggregates, dailyCounts] = await Promise.all([
                this.aggregator.aggregateByAgentModel(projectId, window),
                this.aggregator.dailyCallCounts(projectId, window)
            ]);

            const dailyByGroup = this.groupDailyCounts(dailyCounts);
            const baselines: Baseline[] = [];
            let groupsSkipped = 0;

            for (const group of aggregates) {
                if (group.callCount < this.config.baselines.minSamples) {
                    groupsSkipped++;
                    continue;
                }

                const daily = dailyByGroup.get(groupKey(group.agentName, group.model)) ?? [];
                const avgDailyCalls = daily.length > 0
                    ? daily.reduce((sum, count) => sum + count, 0) / daily.length
                    : 0;

                const baseline = await this.store.upsert({
                    projectId,
                    agentName: group.agentName,
                    model: group.model,
                    avgCostPerCall: group.avgCostPerCall,
                    stddevCostPerCall: group.stddevCostPerCall,
                    avgInputTokens: group.avgInputTokens,
                    stddevInputTokens: group.stddevInputTokens,
                    avgOutputTokens: group.avgOutputTokens,
                    stddevOutputTokens: group.stddevOutputTokens,
                    avgLatencyMs: group.avgLatencyMs,
                    stddevLatencyMs: group.stddevLatencyMs,
                    avgDailyCalls,
                    avgErrorRate: group.callCount > 0 ? group.errorCount / group.callCount : 0,
                    sampleCount: group.callCount,
                    lastCalculatedAt: now
                }, session);

                baselines.push(baseline);
            }

            this.logOperation('info', 'Baselines computed', 'computeBaselines', {
                projectId,
                days,
                baselinesComputed: baselines.length,
                groupsSkipped
            });

            return {
                projectId,
                days,
                window,
                baselinesComputed: baselines.length,
                groupsSkipped,
                baselines
            };
        }, { projectId, days });
    }

    /**
     * Compute baselines only when the project has none yet
     */
    async ensureBaselinesExist(
        projectId: string,
        days: number = this.config.baselines.defaultDays,
        session: StoreSession = null
    ): Promise<BaselineComputationReport | null> {
        if (await this.hasBaselines(projectId, session)) {
            return null;
        }

        this.logOperation('info', 'No baselines found, bootstrapping', 'ensureBaselinesExist', { projectId, days });
        return this.computeBaselines(projectId, days, session);
    }

    async hasBaselines(projectId: string, session: StoreSession = null): Promise<boolean> {
        return (await this.store.count(projectId, session)) > 0;
    }

    async getBaseline(
        projectId: string,
        agentName: string,
        model: string,
        session: StoreSession = null
    ): Promise<Baseline | null> {
        return this.store.find({ projectId, agentName, model }, session);
    }

    async listBaselines(
        projectId: string,
        filter: BaselineFilter = {},
        session: StoreSession = null
    ): Promise<Baseline[]> {
        return this.store.list(projectId, filter, session);
    }

    private groupDailyCounts(rows: DailyCallCount[]): Map<string, number[]> {
        const grouped = new Map<string, number[]>();
        for (const row of rows) {
            const key = groupKey(row.agentName, row.model);
            const counts = grouped.get(key);
            if (counts) {
                counts.push(row.callCount);
            } else {
                grouped.set(key, [row.callCount]);
            }
        }
        return grouped;
    }
}
