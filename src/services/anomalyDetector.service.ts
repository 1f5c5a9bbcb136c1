import { BaseService } from '../shared/BaseService';
import { groupKey } from '../utils/optimizationMath';
import { DEFAULT_OPTIMIZATION_CONFIG, OptimizationConfig } from '../config/optimization.config';
import {
    Anomaly,
    Baseline,
    ErrorRateAnomaly,
    Priority,
    ZScoreAnomaly
} from '../types/optimization.types';
import { AgentModelAggregate, BaselineStore, EventAggregator, StoreSession } from '../types/store.types';
import { Clock, systemClock } from './baselineComputer.service';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Anomaly Detector
 *
 * Compares the trailing window of each (agent, model) against its stored
 * baseline. Cost and latency use z-scores; error rate uses a ratio test.
 * Every evaluated metric is returned; callers filter on isAnomaly.
 */
export class AnomalyDetector extends BaseService {

    constructor(
        private readonly aggregator: EventAggregator,
        private readonly baselines: BaselineStore,
        private readonly config: OptimizationConfig = DEFAULT_OPTIMIZATION_CONFIG,
        private readonly clock: Clock = systemClock
    ) {
        super('AnomalyDetector');
    }

    async detectAnomalies(
        projectId: string,
        recentHours: number = this.config.anomalies.recentHours,
        session: StoreSession = null
    ): Promise<Anomaly[]> {
        if (recentHours <= 0) return [];

        const baselines = await this.baselines.list(projectId, {}, session);
        if (baselines.length === 0) {
            return [];
        }

        const now = this.clock();
        const recent = await this.aggregator.aggregateByAgentModel(projectId, {
            start: new Date(now.getTime() - recentHours * HOUR_MS),
            end: now
        });
        const recentByKey = new Map(recent.map(group => [groupKey(group.agentName, group.model), group]));

        const anomalies: Anomaly[] = [];
        for (const baseline of baselines) {
            const group = recentByKey.get(groupKey(baseline.agentName, baseline.model));
            if (!group || group.callCount === 0) continue;

            anomalies.push(...this.evaluate(baseline, group));
        }

        const flagged = anomalies.filter(anomaly => anomaly.isAnomaly).length;
        if (flagged > 0) {
            this.logOperation('info', 'Anomalies detected', 'detectAnomalies', {
                projectId,
                recentHours,
                evaluated: anomalies.length,
                flagged
            });
        }

        return anomalies;
    }

    private evaluate(baseline: Baseline, group: AgentModelAggregate): Anomaly[] {
        const results: Anomaly[] = [];

        const cost = this.zScoreAnomaly('cost_per_call', group, group.avgCostPerCall,
            baseline.avgCostPerCall, baseline.stddevCostPerCall);
        if (cost) results.push(cost);

        const latency = this.zScoreAnomaly('latency_ms', group, group.avgLatencyMs,
            baseline.avgLatencyMs, baseline.stddevLatencyMs);
        if (latency) results.push(latency);

        results.push(this.errorRateAnomaly(group, baseline.avgErrorRate));

        return results;
    }

    /**
     * Null when the baseline has no spread
     */
    private zScoreAnomaly(
        metricName: ZScoreAnomaly['metricName'],
        group: AgentModelAggregate,
        currentValue: number,
        baselineMean: number,
        baselineStddev: number
    ): ZScoreAnomaly | null {
        if (baselineStddev <= 0) return null;

        const { zScoreThreshold, highSeverityZScore } = this.config.anomalies;
        const zScore = (currentValue - baselineMean) / baselineStddev;
        const magnitude = Math.abs(zScore);

        let severity: Priority = 'low';
        if (magnitude > highSeverityZScore) {
            severity = 'high';
        } else if (magnitude >= zScoreThreshold) {
            severity = 'medium';
        }

        return {
            metricName,
            agentName: group.agentName,
            model: group.model,
            recentCalls: group.callCount,
            currentValue,
            baselineMean,
            baselineStddev,
            zScore,
            severity,
            isAnomaly: magnitude >= zScoreThreshold
        };
    }

    private errorRateAnomaly(group: AgentModelAggregate, baselineRate: number): ErrorRateAnomaly {
        const { errorRateRatio, highSeverityErrorRatio } = this.config.anomalies;
        const currentValue = group.callCount > 0 ? group.errorCount / group.callCount : 0;
        const ratio = baselineRate > 0 ? currentValue / baselineRate : null;
        const isAnomaly = currentValue > baselineRate * errorRateRatio;

        let severity: Priority = 'low';
        if (isAnomaly) {
            const severe = ratio === null ? group.errorCount > 0 : ratio > highSeverityErrorRatio;
            severity = severe ? 'high' : 'medium';
        }

        return {
            metricName: 'error_rate',
            agentName: group.agentName,
            model: group.model,
            recentCalls: group.callCount,
            currentValue,
            baselineMean: baselineRate,
            baselineStddev: 0,
            zScore: null,
            ratio,
            severity,
            isAnomaly
        };
    }
}
