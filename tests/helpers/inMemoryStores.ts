import {
    Baseline,
    BaselineFilter,
    BaselineKey,
    Recommendation,
    TimeWindow,
    UsageEventRecord
} from '../../src/types/optimization.types';
import {
    AgentCallTotal,
    AgentModelAggregate,
    BaselineStore,
    DailyCallCount,
    DuplicatePendingRecommendationError,
    EventAggregator,
    ImplementedAlternativeSummary,
    InputHashGroup,
    ModelPricingEntry,
    ModelPricingStore,
    RecommendationKey,
    RecommendationStatusSummary,
    RecommendationStore,
    RecommendationTransition,
    StoreSession,
    TransactionManager,
    TransactionResult,
    UsageOverview
} from '../../src/types/store.types';

function mean(values: number[]): number {
    return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

/** Sample standard deviation; 0 for fewer than two values, like $stdDevSamp mapped from null */
function sampleStddev(values: number[]): number {
    if (values.length < 2) return 0;
    const avg = mean(values);
    const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
    return Math.sqrt(squared / (values.length - 1));
}

function inWindow(event: UsageEventRecord, projectId: string, window: TimeWindow): boolean {
    const time = event.timestamp.getTime();
    return event.projectId === projectId && time >= window.start.getTime() && time <= window.end.getTime();
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

interface Snapshottable {
    snapshot(): () => void;
}

/**
 * Event aggregator over an array of events, computing what the MongoDB pipelines compute
 */
export class InMemoryEventAggregator implements EventAggregator {
    readonly events: UsageEventRecord[] = [];

    add(...events: UsageEventRecord[]): this {
        this.events.push(...events);
        return this;
    }

    async aggregateByAgentModel(
        projectId: string,
        window: TimeWindow,
        filter: BaselineFilter = {}
    ): Promise<AgentModelAggregate[]> {
        const groups = new Map<string, UsageEventRecord[]>();
        for (const event of this.events) {
            if (!inWindow(event, projectId, window)) continue;
            if (filter.agentName && event.agentName !== filter.agentName) continue;
            if (filter.model && event.model !== filter.model) continue;
            const key = `${event.agentName}\u0000${event.model}`;
            const list = groups.get(key);
            if (list) list.push(event);
            else groups.set(key, [event]);
        }

        return [...groups.values()]
            .map(list => {
                const costs = list.map(event => event.cost);
                const inputs = list.map(event => event.inputTokens);
                const outputs = list.map(event => event.outputTokens);
                const latencies = list.map(event => event.latencyMs);
                const failed = list.filter(event => !event.success);
                return {
                    agentName: list[0].agentName,
                    model: list[0].model,
                    callCount: list.length,
                    errorCount: failed.length,
                    totalCost: costs.reduce((sum, cost) => sum + cost, 0),
                    failedCost: failed.reduce((sum, event) => sum + event.cost, 0),
                    totalInputTokens: inputs.reduce((sum, value) => sum + value, 0),
                    totalOutputTokens: outputs.reduce((sum, value) => sum + value, 0),
                    avgCostPerCall: mean(costs),
                    stddevCostPerCall: sampleStddev(costs),
                    avgInputTokens: mean(inputs),
                    stddevInputTokens: sampleStddev(inputs),
                    avgOutputTokens: mean(outputs),
                    stddevOutputTokens: sampleStddev(outputs),
                    avgLatencyMs: mean(latencies),
                    stddevLatencyMs: sampleStddev(latencies)
                };
            })
            .sort((a, b) => compareText(a.agentName, b.agentName) || compareText(a.model, b.model));
    }

    async dailyCallCounts(projectId: string, window: TimeWindow): Promise<DailyCallCount[]> {
        const counts = new Map<string, DailyCallCount>();
        for (const event of this.events) {
            if (!inWindow(event, projectId, window)) continue;
            const day = event.timestamp.toISOString().slice(0, 10);
            const key = `${event.agentName}\u0000${event.model}\u0000${day}`;
            const row = counts.get(key);
            if (row) row.callCount++;
            else counts.set(key, { agentName: event.agentName, model: event.model, day, callCount: 1 });
        }
        return [...counts.values()].sort((a, b) => compareText(a.day, b.day));
    }

    async inputHashGroups(projectId: string, window: TimeWindow, minOccurrences: number): Promise<InputHashGroup[]> {
        const groups = new Map<string, InputHashGroup>();
        for (const event of this.events) {
            if (!inWindow(event, projectId, window) || !event.inputHash) continue;
            const key = `${event.agentName}\u0000${event.inputHash}`;
            const group = groups.get(key);
            if (group) {
                group.occurrences++;
                group.totalCost += event.cost;
            } else {
                groups.set(key, {
                    agentName: event.agentName,
                    inputHash: event.inputHash,
                    occurrences: 1,
                    totalCost: event.cost
                });
            }
        }
        return [...groups.values()]
            .filter(group => group.occurrences >= minOccurrences)
            .sort((a, b) => compareText(a.agentName, b.agentName) || b.occurrences - a.occurrences);
    }

    async callsByAgent(projectId: string, window: TimeWindow): Promise<AgentCallTotal[]> {
        const totals = new Map<string, number>();
        for (const event of this.events) {
            if (!inWindow(event, projectId, window)) continue;
            totals.set(event.agentName, (totals.get(event.agentName) ?? 0) + 1);
        }
        return [...totals.entries()].map(([agentName, callCount]) => ({ agentName, callCount }));
    }

    async overview(projectId: string, window: TimeWindow): Promise<UsageOverview> {
        const events = this.events.filter(event => inWindow(event, projectId, window));
        return {
            totalCalls: events.length,
            totalCost: events.reduce((sum, event) => sum + event.cost, 0)
        };
    }
}

export class InMemoryBaselineStore implements BaselineStore, Snapshottable {
    private rows = new Map<string, Baseline>();

    private static keyOf(key: BaselineKey): string {
        return `${key.projectId}\u0000${key.agentName}\u0000${key.model}`;
    }

    async upsert(baseline: Baseline, _session: StoreSession): Promise<Baseline> {
        const stored = { ...baseline };
        this.rows.set(InMemoryBaselineStore.keyOf(baseline), stored);
        return { ...stored };
    }

    async find(key: BaselineKey): Promise<Baseline | null> {
        const row = this.rows.get(InMemoryBaselineStore.keyOf(key));
        return row ? { ...row } : null;
    }

    async list(projectId: string, filter: BaselineFilter = {}): Promise<Baseline[]> {
        return [...this.rows.values()]
            .filter(row => row.projectId === projectId)
            .filter(row => !filter.agentName || row.agentName === filter.agentName)
            .filter(row => !filter.model || row.model === filter.model)
            .sort((a, b) => compareText(a.agentName, b.agentName) || compareText(a.model, b.model))
            .map(row => ({ ...row }));
    }

    async count(projectId: string): Promise<number> {
        return [...this.rows.values()].filter(row => row.projectId === projectId).length;
    }

    snapshot(): () => void {
        const saved = new Map(this.rows);
        return () => {
            this.rows = saved;
        };
    }
}

function sameKey(row: Recommendation, key: RecommendationKey): boolean {
    return row.projectId === key.projectId &&
        row.type === key.type &&
        row.agentName === key.agentName &&
        row.model === key.model;
}

/**
 * Recommendation store enforcing one pending row per key, like the partial unique index
 */
export class InMemoryRecommendationStore implements RecommendationStore, Snapshottable {
    private rows = new Map<string, Recommendation>();

    get size(): number {
        return this.rows.size;
    }

    all(): Recommendation[] {
        return [...this.rows.values()].map(row => ({ ...row }));
    }

    /** Test hook: write a row as-is, bypassing the pending index */
    seed(recommendation: Recommendation): void {
        this.rows.set(recommendation.id, { ...recommendation });
    }

    async insert(recommendation: Recommendation, _session: StoreSession): Promise<Recommendation> {
        const key: RecommendationKey = {
            projectId: recommendation.projectId,
            type: recommendation.type,
            agentName: recommendation.agentName,
            model: recommendation.model
        };
        const clash = [...this.rows.values()].some(row => row.status === 'pending' && sameKey(row, key));
        if (recommendation.status === 'pending' && clash) {
            throw new DuplicatePendingRecommendationError(key);
        }
        this.rows.set(recommendation.id, { ...recommendation });
        return { ...recommendation };
    }

    async findById(id: string): Promise<Recommendation | null> {
        const row = this.rows.get(id);
        return row ? { ...row } : null;
    }

    async findActivePending(key: RecommendationKey, now: Date): Promise<Recommendation | null> {
        const row = [...this.rows.values()].find(candidate =>
            candidate.status === 'pending' && sameKey(candidate, key) && candidate.expiresAt > now
        );
        return row ? { ...row } : null;
    }

    async expireStale(projectId: string, now: Date, key: RecommendationKey | null, _session: StoreSession): Promise<number> {
        let changed = 0;
        for (const [id, row] of this.rows) {
            const matches = key ? sameKey(row, key) : row.projectId === projectId;
            if (matches && row.status === 'pending' && row.expiresAt <= now) {
                this.rows.set(id, { ...row, status: 'expired' });
                changed++;
            }
        }
        return changed;
    }

    async transition(
        id: string,
        projectId: string,
        now: Date,
        update: RecommendationTransition,
        _session: StoreSession
    ): Promise<Recommendation | null> {
        const row = this.rows.get(id);
        if (!row || row.projectId !== projectId || row.status !== 'pending' || row.expiresAt <= now) {
            return null;
        }
        const updated: Recommendation = { ...row, ...update };
        this.rows.set(id, updated);
        return { ...updated };
    }

    async recordActualSavings(
        id: string,
        projectId: string,
        amount: number,
        now: Date,
        _session: StoreSession
    ): Promise<Recommendation | null> {
        const row = this.rows.get(id);
        if (!row || row.projectId !== projectId || row.status !== 'implemented') {
            return null;
        }
        const updated: Recommendation = { ...row, actualMonthlySavings: amount, savingsRecordedAt: now };
        this.rows.set(id, updated);
        return { ...updated };
    }

    async listPending(projectId: string, now: Date): Promise<Recommendation[]> {
        return [...this.rows.values()]
            .filter(row => row.projectId === projectId && row.status === 'pending' && row.expiresAt > now)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .map(row => ({ ...row }));
    }

    async summarizeByTypeAndStatus(projectId: string): Promise<RecommendationStatusSummary[]> {
        const summaries = new Map<string, RecommendationStatusSummary>();
        for (const row of this.rows.values()) {
            if (row.projectId !== projectId) continue;
            const key = `${row.type}\u0000${row.status}`;
            const summary = summaries.get(key) ?? {
                type: row.type,
                status: row.status,
                count: 0,
                estimatedSavings: 0,
                measuredCount: 0,
                measuredEstimatedSavings: 0,
                actualSavings: 0
            };
            summary.count++;
            summary.estimatedSavings += row.estimatedMonthlySavings;
            if (row.actualMonthlySavings !== null) {
                summary.measuredCount++;
                summary.measuredEstimatedSavings += row.estimatedMonthlySavings;
                summary.actualSavings += row.actualMonthlySavings;
            }
            summaries.set(key, summary);
        }
        return [...summaries.values()];
    }

    async summarizeImplementedAlternatives(model: string): Promise<ImplementedAlternativeSummary[]> {
        const summaries = new Map<string, ImplementedAlternativeSummary>();
        for (const row of this.rows.values()) {
            if (row.type !== 'model_downgrade' || row.model !== model || row.status !== 'implemented') continue;
            if (row.alternativeModel === null) continue;
            const summary = summaries.get(row.alternativeModel) ?? {
                alternativeModel: row.alternativeModel,
                count: 0,
                estimatedSavings: 0,
                measuredCount: 0,
                measuredEstimatedSavings: 0,
                actualSavings: 0
            };
            summary.count++;
            summary.estimatedSavings += row.estimatedMonthlySavings;
            if (row.actualMonthlySavings !== null) {
                summary.measuredCount++;
                summary.measuredEstimatedSavings += row.estimatedMonthlySavings;
                summary.actualSavings += row.actualMonthlySavings;
            }
            summaries.set(row.alternativeModel, summary);
        }
        return [...summaries.values()].sort((a, b) => b.count - a.count);
    }

    snapshot(): () => void {
        const saved = new Map(this.rows);
        return () => {
            this.rows = saved;
        };
    }
}

export class InMemoryModelPricingStore implements ModelPricingStore {
    listActiveCalls = 0;

    constructor(private readonly entries: ModelPricingEntry[]) {}

    async listActive(): Promise<ModelPricingEntry[]> {
        this.listActiveCalls++;
        return this.entries.filter(entry => entry.isActive);
    }
}

/**
 * Unit of work over in-memory stores: state is restored when the operation throws
 */
export class InMemoryTransactionManager implements TransactionManager {
    committed = 0;
    rolledBack = 0;

    constructor(private readonly stores: Snapshottable[]) {}

    async executeTransaction<T>(
        operation: (session: StoreSession) => Promise<T>
    ): Promise<TransactionResult<T>> {
        const restores = this.stores.map(store => store.snapshot());
        try {
            const data = await operation(null);
            this.committed++;
            return { success: true, data };
        } catch (error) {
            restores.forEach(restore => restore());
            this.rolledBack++;
            return {
                success: false,
                error: error instanceof Error ? error.message : String(error),
                cause: error
            };
        }
    }
}
