import { BaseService } from '../../shared/BaseService';
import { OptimizationConfig } from '../../config/optimization.config';
import { Anomaly, AnomalySuggestion } from '../../types/optimization.types';
import { AnomalyDetector } from '../anomalyDetector.service';
import { AnalyzerContext, SuggestionAnalyzer } from './types';

const METRIC_LABELS: Record<Anomaly['metricName'], string> = {
    cost_per_call: 'cost',
    latency_ms: 'latency',
    error_rate: 'error'
};

/**
 * Surfaces flagged anomalies of the trailing window as alerts
 */
export class AnomalyAnalyzer extends BaseService implements SuggestionAnalyzer<AnomalySuggestion> {
    readonly name = 'anomaly_alert' as const;

    constructor(
        private readonly detector: AnomalyDetector,
        private readonly config: OptimizationConfig
    ) {
        super('AnomalyAnalyzer');
    }

    async analyze(ctx: AnalyzerContext): Promise<AnomalySuggestion[]> {
        const anomalies = await this.detector.detectAnomalies(
            ctx.projectId,
            this.config.anomalies.recentHours,
            ctx.session
        );

        return anomalies
            .filter(anomaly => anomaly.isAnomaly)
            .map(anomaly => this.buildSuggestion(anomaly));
    }

    private buildSuggestion(anomaly: Anomaly): AnomalySuggestion {
        const context = `${anomaly.agentName}/${anomaly.model}`;

        return {
            type: 'anomaly_alert',
            title: `Anomaly detected: ${METRIC_LABELS[anomaly.metricName]} for ${context}`,
            description: describeAnomaly(anomaly, context),
            agentName: anomaly.agentName,
            model: anomaly.model,
            alternativeModel: null,
            estimatedSavingsMonthly: 0,
            estimatedSavingsPercent: 0,
            priority: anomaly.severity,
            actionItems: buildAnomalyActions(anomaly, context, this.config.anomalies.highSeverityZScore),
            metrics: {
                kind: 'anomaly_alert',
                metricName: anomaly.metricName,
                currentValue: anomaly.currentValue,
                baselineMean: anomaly.baselineMean,
                baselineStddev: anomaly.baselineStddev,
                zScore: anomaly.zScore,
                ratio: anomaly.metricName === 'error_rate' ? anomaly.ratio : null
            }
        };
    }
}

function direction(zScore: number): string {
    return zScore > 0 ? 'higher' : 'lower';
}

function describeAnomaly(anomaly: Anomaly, context: string): string {
    switch (anomaly.metricName) {
        case 'cost_per_call':
            return `Cost per call is ${Math.abs(anomaly.zScore).toFixed(1)} standard deviations ` +
                `${direction(anomaly.zScore)} than normal for ${context}. ` +
                `Current: $${anomaly.currentValue.toFixed(4)}, Baseline: $${anomaly.baselineMean.toFixed(4)}`;
        case 'latency_ms':
            return `Latency is ${Math.abs(anomaly.zScore).toFixed(1)} standard deviations ` +
                `${direction(anomaly.zScore)} than normal for ${context}. ` +
                `Current: ${anomaly.currentValue.toFixed(0)}ms, Baseline: ${anomaly.baselineMean.toFixed(0)}ms`;
        case 'error_rate':
            return `Error rate is elevated for ${context}. ` +
                `Current: ${(anomaly.currentValue * 100).toFixed(1)}%, Baseline: ${(anomaly.baselineMean * 100).toFixed(1)}%`;
    }
}

function buildAnomalyActions(anomaly: Anomaly, context: string, urgentZScore: number = 3): string[] {
    const actions: string[] = [];
    const deviationPct = anomaly.baselineMean !== 0
        ? Math.abs((anomaly.currentValue - anomaly.baselineMean) / anomaly.baselineMean * 100)
        : 0;

    switch (anomaly.metricName) {
        case 'cost_per_call':
            if (anomaly.zScore > 0) {
                actions.push(`Cost increased ${deviationPct.toFixed(0)}% for ${context} - check for prompt length changes or model switches`);
                actions.push(`Compare recent ${context} token counts to baseline`);
            } else {
                actions.push(`Cost decreased ${deviationPct.toFixed(0)}% for ${context} - verify functionality is not degraded`);
            }
            break;
        case 'latency_ms':
            if (anomaly.zScore > 0) {
                actions.push(`Latency increased ${deviationPct.toFixed(0)}% for ${context} - check provider status page for incidents`);
                actions.push('Review recent prompt changes that may have increased token count');
            } else {
                actions.push(`Latency improved for ${context} - no action needed`);
            }
            break;
        case 'error_rate':
            actions.push(`Error rate at ${(anomaly.currentValue * 100).toFixed(1)}% for ${context} - check API logs for specific error types`);
            actions.push(`Verify input validation is working for ${context}`);
            break;
    }

    if (anomaly.zScore !== null && Math.abs(anomaly.zScore) > urgentZScore) {
        actions.push(`Urgent: ${Math.abs(anomaly.zScore).toFixed(1)}σ deviation requires immediate investigation`);
    }

    return actions;
}
