/**
 * Suggestion analyzer plugin interface
 */

import type { PriorityCutoffs } from '../../config/optimization.config';
import type { Baseline, Priority, Suggestion, SuggestionType, TimeWindow } from '../../types/optimization.types';
import type { AgentModelAggregate, StoreSession } from '../../types/store.types';
import { roundTo } from '../../utils/optimizationMath';

export interface AnalyzerContext {
    projectId: string;
    days: number;
    window: TimeWindow;
    /** Per (agent, model) aggregates over the window, shared across analyzers */
    aggregates: AgentModelAggregate[];
    /** Stored baselines keyed by groupKey(agentName, model) */
    baselines: Map<string, Baseline>;
    session: StoreSession;
}

export interface SuggestionAnalyzer<TSuggestion extends Suggestion = Suggestion> {
    readonly name: SuggestionType;
    analyze(ctx: AnalyzerContext): Promise<TSuggestion[]>;
}

/**
 * Priority bucket for a monthly dollar amount, judged at the cent precision it is reported with
 */
export function priorityForSavings(monthly: number, cutoffs: PriorityCutoffs): Priority {
    const reported = roundTo(monthly, 2);
    if (reported >= cutoffs.high) return 'high';
    if (reported >= cutoffs.medium) return 'medium';
    return 'low';
}

export function formatCount(value: number): string {
    return Math.round(value).toLocaleString('en-US');
}
