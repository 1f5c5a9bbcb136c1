import { PipelineStage } from 'mongoose';
import { UsageEvent } from '../../models/UsageEvent';
import { BaselineFilter, TimeWindow } from '../../types/optimization.types';
import {
    AgentCallTotal,
    AgentModelAggregate,
    DailyCallCount,
    EventAggregator,
    InputHashGroup,
    UsageOverview
} from '../../types/store.types';

interface AgentModelRow {
    _id: { agentName: string; model: string };
    callCount: number;
    errorCount: number;
    totalCost: number;
    failedCost: number;
    totalInputTokens: number;
    totalOutputTokens: number;
    avgCostPerCall: number;
    stddevCostPerCall: number | null;
    avgInputTokens: number;
    stddevInputTokens: number | null;
    avgOutputTokens: number;
    stddevOutputTokens: number | null;
    avgLatencyMs: number;
    stddevLatencyMs: number | null;
}

interface DailyRow {
    _id: { agentName: string; model: string; day: string };
    callCount: number;
}

interface HashRow {
    _id: { agentName: string; inputHash: string };
    occurrences: number;
    totalCost: number;
}

interface AgentRow {
    _id: string;
    callCount: number;
}

interface OverviewRow {
    _id: null;
    totalCalls: number;
    totalCost: number;
}

/**
 * EventAggregator over the usage_events collection.
 * $stdDevSamp yields null for single-document groups; those report 0.
 */
export class MongoEventAggregator implements EventAggregator {

    private windowMatch(projectId: string, window: TimeWindow): Record<string, unknown> {
        return {
            projectId,
            timestamp: { $gte: window.start, $lte: window.end }
        };
    }

    async aggregateByAgentModel(
        projectId: string,
        window: TimeWindow,
        filter: BaselineFilter = {}
    ): Promise<AgentModelAggregate[]> {
        const match: Record<string, unknown> = this.windowMatch(projectId, window);
        if (filter.agentName) match.agentName = filter.agentName;
        if (filter.model) match.model = filter.model;

        const pipeline: PipelineStage[] = [
            { $match: match },
            {
                $group: {
                    _id: { agentName: '$agentName', model: '$model' },
                    callCount: { $sum: 1 },
                    errorCount: { $sum: { $cond: ['$success', 0, 1] } },
                    totalCost: { $sum: '$cost' },
                    failedCost: { $sum: { $cond: ['$success', 0, '$cost'] } },
                    totalInputTokens: { $sum: '$inputTokens' },
                    totalOutputTokens: { $sum: '$outputTokens' },
                    avgCostPerCall: { $avg: '$cost' },
                    stddevCostPerCall: { $stdDevSamp: '$cost' },
                    avgInputTokens: { $avg: '$inputTokens' },
                    stddevInputTokens: { $stdDevSamp: '$inputTokens' },
                    avgOutputTokens: { $avg: '$outputTokens' },
                    stddevOutputTokens: { $stdDevSamp: '$outputTokens' },
                    avgLatencyMs: { $avg: '$latencyMs' },
                    stddevLatencyMs: { $stdDevSamp: '$latencyMs' }
                }
            },
            { $sort: { '_id.agentName': 1, '_id.model': 1 } }
        ];

        const rows = await UsageEvent.aggregate<AgentModelRow>(pipeline);

        return rows.map(row => ({
            agentName: row._id.agentName,
            model: row._id.model,
            callCount: row.callCount,
            errorCount: row.errorCount,
            totalCost: row.totalCost,
            failedCost: row.failedCost,
            totalInputTokens: row.totalInputTokens,
            totalOutputTokens: row.totalOutputTokens,
            avgCostPerCall: row.avgCostPerCall,
            stddevCostPerCall: row.stddevCostPerCall ?? 0,
            avgInputTokens: row.avgInputTokens,
            stddevInputTokens: row.stddevInputTokens ?? 0,
            avgOutputTokens: row.avgOutputTokens,
            stddevOutputTokens: row.stddevOutputTokens ?? 0,
            avgLatencyMs: row.avgLatencyMs,
            stddevLatencyMs: row.stddevLatencyMs ?? 0
        }));
    }

    async dailyCallCounts(projectId: string, window: TimeWindow): Promise<DailyCallCount[]> {
        const rows = await UsageEvent.aggregate<DailyRow>([
            { $match: this.windowMatch(projectId, window) },
            {
                $group: {
                    _id: {
                        agentName: '$agentName',
                        model: '$model',
                        day: { $dateToString: { format: '%Y-%m-%d', date: '$timestamp' } }
                    },
                    callCount: { $sum: 1 }
                }
            },
            { $sort: { '_id.day': 1 } }
        ]);

        return rows.map(row => ({
            agentName: row._id.agentName,
            model: row._id.model,
            day: row._id.day,
            callCount: row.callCount
        }));
    }

    async inputHashGroups(projectId: string, window: TimeWindow, minOccurrences: number): Promise<InputHashGroup[]> {
        const rows = await UsageEvent.aggregate<HashRow>([
            {
                $match: {
                    ...this.windowMatch(projectId, window),
                    inputHash: { $nin: [null, ''] }
                }
            },
            {
                $group: {
                    _id: { agentName: '$agentName', inputHash: '$inputHash' },
                    occurrences: { $sum: 1 },
                    totalCost: { $sum: '$cost' }
                }
            },
            { $match: { occurrences: { $gte: minOccurrences } } },
            { $sort: { '_id.agentName': 1, occurrences: -1 } }
        ]);

        return rows.map(row => ({
            agentName: row._id.agentName,
            inputHash: row._id.inputHash,
            occurrences: row.occurrences,
            totalCost: row.totalCost
        }));
    }

    async callsByAgent(projectId: string, window: TimeWindow): Promise<AgentCallTotal[]> {
        const rows = await UsageEvent.aggregate<AgentRow>([
            { $match: this.windowMatch(projectId, window) },
            { $group: { _id: '$agentName', callCount: { $sum: 1 } } }
        ]);

        return rows.map(row => ({ agentName: row._id, callCount: row.callCount }));
    }

    async overview(projectId: string, window: TimeWindow): Promise<UsageOverview> {
        const rows = await UsageEvent.aggregate<OverviewRow>([
            { $match: this.windowMatch(projectId, window) },
            { $group: { _id: null, totalCalls: { $sum: 1 }, totalCost: { $sum: '$cost' } } }
        ]);

        return {
            totalCalls: rows[0]?.totalCalls ?? 0,
            totalCost: rows[0]?.totalCost ?? 0
        };
    }
}
