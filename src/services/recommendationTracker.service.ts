import { BaseService } from '../shared/BaseService';
import { DEFAULT_OPTIMIZATION_CONFIG, OptimizationConfig } from '../config/optimization.config';
import { loggingService } from './logging.service';
import { v4 as uuidv4 } from 'uuid';
import {
    AlternativeOutcome,
    AlternativeOutcomeSource,
    CreateRecommendationInput,
    CreateRecommendationResult,
    Recommendation,
    RecommendationActionResult,
    RecommendationEffectiveness,
    RecommendationTypeEffectiveness,
    SuggestionType
} from '../types/optimization.types';
import {
    DuplicatePendingRecommendationError,
    RecommendationKey,
    RecommendationStore,
    RecommendationTransition,
    StoreSession
} from '../types/store.types';
import { roundTo } from '../utils/optimizationMath';
import { Clock, systemClock } from './baselineComputer.service';
import { EffectivenessSource } from './suggestionSynthesizer.service';

const DAY_MS = 24 * 60 * 60 * 1000;

export const RECOMMENDATION_EVENTS = {
    CREATED: 'recommendation:created',
    IMPLEMENTED: 'recommendation:implemented',
    DISMISSED: 'recommendation:dismissed',
    EXPIRED: 'recommendation:expired',
    SAVINGS_RECORDED: 'recommendation:savings_recorded'
} as const;

export interface RecommendationExpiredEvent {
    projectId: string;
    count: number;
}

/**
 * Recommendation Tracker
 *
 * Lifecycle of persisted recommendations:
 *   pending -> implemented | dismissed | expired
 * Terminal states never change. Expiry is applied lazily whenever rows are
 * created, listed or summarized; there is no sweeper.
 *
 * Emits RECOMMENDATION_EVENTS after each store write.
 */
export class RecommendationTracker extends BaseService implements EffectivenessSource, AlternativeOutcomeSource {

    constructor(
        private readonly store: RecommendationStore,
        private readonly config: OptimizationConfig = DEFAULT_OPTIMIZATION_CONFIG,
        private readonly clock: Clock = systemClock
    ) {
        super('RecommendationTracker');
    }

    /**
     * Insert a pending recommendation unless one is already pending for the same
     * (project, type, agent, model)
     */
    async createRecommendation(
        input: CreateRecommendationInput,
        cooldownDays: number = this.config.recommendations.cooldownDays,
        session: StoreSession = null
    ): Promise<CreateRecommendationResult> {
        const now = this.clock();
        const key: RecommendationKey = {
            projectId: input.projectId,
            type: input.type,
            agentName: input.agentName,
            model: input.model
        };

        await this.expire(input.projectId, now, key, session);

        const existing = await this.store.findActivePending(key, now, session);
        if (existing) {
            this.logOperation('debug', 'Pending recommendation exists, skipping insert', 'createRecommendation', {
                projectId: input.projectId,
                recommendationId: existing.id,
                type: input.type
            });
            return { recommendation: existing, created: false };
        }

        const recommendation: Recommendation = {
            id: uuidv4(),
            projectId: input.projectId,
            type: input.type,
            title: input.title,
            description: input.description,
            agentName: input.agentName,
            model: input.model,
            alternativeModel: input.alternativeModel ?? null,
            estimatedMonthlySavings: input.estimatedMonthlySavings,
            estimatedSavingsPercent: input.estimatedSavingsPercent,
            metricsSnapshot: input.metricsSnapshot ?? null,
            status: 'pending',
            createdAt: now,
            expiresAt: new Date(now.getTime() + cooldownDays * DAY_MS),
            implementedAt: null,
            dismissedAt: null,
            dismissFeedback: null,
            actualMonthlySavings: null,
            savingsRecordedAt: null
        };

        try {
            const inserted = await this.store.insert(recommendation, session);
            this.logOperation('info', 'Recommendation created', 'createRecommendation', {
                projectId: inserted.projectId,
                recommendationId: inserted.id,
                type: inserted.type,
                estimatedMonthlySavings: inserted.estimatedMonthlySavings
            });
            this.emit(RECOMMENDATION_EVENTS.CREATED, inserted);
            return { recommendation: inserted, created: true };
        } catch (error) {
            if (!(error instanceof DuplicatePendingRecommendationError)) {
                throw error;
            }

            // A concurrent writer won the unique pending index. Inside a MongoDB
            // transaction the duplicate key aborts it, so this read fails and
            // withTransaction retries the callback, which then takes the dedup path above.
            const winner = await this.store.findActivePending(key, now, session);
            if (!winner) {
                throw error;
            }
            return { recommendation: winner, created: false };
        }
    }

    async markImplemented(
        recommendationId: string,
        projectId: string,
        session: StoreSession = null
    ): Promise<RecommendationActionResult> {
        const now = this.clock();
        const result = await this.applyTransition(recommendationId, projectId, now, {
            status: 'implemented',
            implementedAt: now
        }, session);

        if (result.status === 'ok') {
            loggingService.logBusiness({
                event: 'recommendation_implemented',
                category: 'optimization',
                value: result.recommendation.estimatedMonthlySavings,
                currency: 'USD',
                metadata: { recommendationId, type: result.recommendation.type }
            }, { projectId, component: this.serviceName });
            this.emit(RECOMMENDATION_EVENTS.IMPLEMENTED, result.recommendation);
        }

        return result;
    }

    async markDismissed(
        recommendationId: string,
        projectId: string,
        feedback: string | null = null,
        session: StoreSession = null
    ): Promise<RecommendationActionResult> {
        const now = this.clock();
        const result = await this.applyTransition(recommendationId, projectId, now, {
            status: 'dismissed',
            dismissedAt: now,
            dismissFeedback: feedback
        }, session);

        if (result.status === 'ok') {
            this.logOperation('info', 'Recommendation dismissed', 'markDismissed', {
                projectId,
                recommendationId,
                hasFeedback: feedback !== null
            });
            this.emit(RECOMMENDATION_EVENTS.DISMISSED, result.recommendation);
        }

        return result;
    }

    /**
     * Pending, unexpired rows, newest first
     */
    async getPendingRecommendations(projectId: string, session: StoreSession = null): Promise<Recommendation[]> {
        const now = this.clock();
        await this.expire(projectId, now, null, session);
        return this.store.listPending(projectId, now, session);
    }

    /**
     * Store realized monthly savings for an implemented recommendation
     */
    async recordActualSavings(
        recommendationId: string,
        projectId: string,
        actualMonthlySavings: number,
        session: StoreSession = null
    ): Promise<RecommendationActionResult> {
        const now = this.clock();
        const updated = await this.store.recordActualSavings(
            recommendationId,
            projectId,
            actualMonthlySavings,
            now,
            session
        );

        if (updated) {
            this.logOperation('info', 'Actual savings recorded', 'recordActualSavings', {
                projectId,
                recommendationId,
                estimated: updated.estimatedMonthlySavings,
                actual: actualMonthlySavings
            });
            this.emit(RECOMMENDATION_EVENTS.SAVINGS_RECORDED, updated);
            return { status: 'ok', recommendation: updated };
        }

        const current = await this.store.findById(recommendationId, session);
        if (!current || current.projectId !== projectId) {
            return { status: 'not_found' };
        }
        // Only 'implemented' rows are updated, so any status here blocked the write
        return { status: 'unavailable', reason: current.status };
    }

    async getRecommendationEffectiveness(
        projectId: string,
        session: StoreSession = null
    ): Promise<RecommendationEffectiveness> {
        await this.expire(projectId, this.clock(), null, session);
        const rows = await this.store.summarizeByTypeAndStatus(projectId, session);

        const counts = { pending: 0, implemented: 0, dismissed: 0, expired: 0 };
        const byType: Partial<Record<SuggestionType, RecommendationTypeEffectiveness>> = {};
        let estimatedSavingsImplemented = 0;
        let actualSavingsRecorded = 0;
        let measuredEstimated = 0;
        let measuredCount = 0;

        for (const row of rows) {
            counts[row.status] += row.count;

            const typeEntry = byType[row.type] ?? { total: 0, implemented: 0, dismissed: 0 };
            typeEntry.total += row.count;
            if (row.status === 'implemented') typeEntry.implemented += row.count;
            if (row.status === 'dismissed') typeEntry.dismissed += row.count;
            byType[row.type] = typeEntry;

            if (row.status === 'implemented') {
                estimatedSavingsImplemented += row.estimatedSavings;
                actualSavingsRecorded += row.actualSavings;
                measuredEstimated += row.measuredEstimatedSavings;
                measuredCount += row.measuredCount;
            }
        }

        const total = counts.pending + counts.implemented + counts.dismissed + counts.expired;
        const resolved = counts.implemented + counts.dismissed + counts.expired;

        return {
            total,
            ...counts,
            implementationRate: resolved > 0 ? roundTo((counts.implemented / resolved) * 100, 1) : 0,
            estimatedSavingsImplemented: roundTo(estimatedSavingsImplemented, 2),
            actualSavingsRecorded: roundTo(actualSavingsRecorded, 2),
            savingsAccuracy: measuredCount > 0 && measuredEstimated > 0
                ? roundTo(actualSavingsRecorded / measuredEstimated, 2)
                : null,
            byType
        };
    }

    /**
     * Implemented model switches away from `model`, across all projects
     */
    async getAlternativeOutcomes(model: string, session: StoreSession = null): Promise<AlternativeOutcome[]> {
        const rows = await this.store.summarizeImplementedAlternatives(model, session);
        return rows.map(row => ({
            alternativeModel: row.alternativeModel,
            timesImplemented: row.count,
            estimatedSavings: roundTo(row.estimatedSavings, 2),
            actualSavings: roundTo(row.actualSavings, 2),
            measuredCount: row.measuredCount,
            savingsAccuracy: row.measuredCount > 0 && row.measuredEstimatedSavings > 0
                ? roundTo(row.actualSavings / row.measuredEstimatedSavings, 2)
                : null
        }));
    }

    private async applyTransition(
        recommendationId: string,
        projectId: string,
        now: Date,
        update: RecommendationTransition,
        session: StoreSession
    ): Promise<RecommendationActionResult> {
        const updated = await this.store.transition(recommendationId, projectId, now, update, session);
        if (updated) {
            return { status: 'ok', recommendation: updated };
        }

        const current = await this.store.findById(recommendationId, session);
        if (!current || current.projectId !== projectId) {
            return { status: 'not_found' };
        }

        if (current.status === 'pending') {
            // Past its expiry but not yet marked
            await this.expire(projectId, now, {
                projectId,
                type: current.type,
                agentName: current.agentName,
                model: current.model
            }, session);
            return { status: 'unavailable', reason: 'expired' };
        }

        return { status: 'unavailable', reason: current.status };
    }

    private async expire(
        projectId: string,
        now: Date,
        key: RecommendationKey | null,
        session: StoreSession
    ): Promise<void> {
        const count = await this.store.expireStale(projectId, now, key, session);
        if (count > 0) {
            this.logOperation('info', 'Expired stale recommendations', 'expire', { projectId, count });
            const event: RecommendationExpiredEvent = { projectId, count };
            this.emit(RECOMMENDATION_EVENTS.EXPIRED, event);
        }
    }
}
