import { RecommendationTracker, RECOMMENDATION_EVENTS } from '../src/services/recommendationTracker.service';
import { createOptimizationConfig } from '../src/config/optimization.config';
import { CreateRecommendationInput, Recommendation } from '../src/types/optimization.types';
import { DuplicatePendingRecommendationError } from '../src/types/store.types';
import { InMemoryRecommendationStore } from './helpers/inMemoryStores';
import { DAY_MS, NOW, PROJECT_ID, createRecommendation, movableClock } from './helpers/fixtures';

function input(overrides: Partial<CreateRecommendationInput> = {}): CreateRecommendationInput {
    return {
        projectId: PROJECT_ID,
        type: 'model_downgrade',
        title: 'Consider gpt-4o-mini for support-bot',
        description: 'Switching could reduce costs.',
        agentName: 'support-bot',
        model: 'gpt-4o',
        alternativeModel: 'gpt-4o-mini',
        estimatedMonthlySavings: 25,
        estimatedSavingsPercent: 40,
        ...overrides
    };
}

describe('RecommendationTracker', () => {
    const config = createOptimizationConfig();
    let store: InMemoryRecommendationStore;
    let time: ReturnType<typeof movableClock>;
    let tracker: RecommendationTracker;

    beforeEach(() => {
        store = new InMemoryRecommendationStore();
        time = movableClock();
        tracker = new RecommendationTracker(store, config, time.clock);
    });

    describe('createRecommendation', () => {
        it('should create a pending recommendation expiring after the cooldown', async () => {
            const { recommendation, created } = await tracker.createRecommendation(input());

            expect(created).toBe(true);
            expect(recommendation.status).toBe('pending');
            expect(recommendation.id).toMatch(/^[0-9a-f-]{36}$/);
            expect(recommendation.createdAt.getTime()).toBe(NOW.getTime());
            expect(recommendation.expiresAt.getTime()).toBe(NOW.getTime() + 14 * DAY_MS);
            expect(recommendation.actualMonthlySavings).toBeNull();
        });

        it('should keep exactly one pending row for repeated creation within the cooldown', async () => {
            const first = await tracker.createRecommendation(input());
            time.advance(3 * DAY_MS);
            const second = await tracker.createRecommendation(input({ estimatedMonthlySavings: 99 }));

            expect(second.created).toBe(false);
            expect(second.recommendation.id).toBe(first.recommendation.id);
            expect(second.recommendation.estimatedMonthlySavings).toBe(25);
            expect(store.size).toBe(1);
        });

        it('should treat different keys independently', async () => {
            await tracker.createRecommendation(input());
            await tracker.createRecommendation(input({ model: 'gpt-4-turbo' }));
            await tracker.createRecommendation(input({ type: 'caching', model: null, alternativeModel: null }));

            expect(store.size).toBe(3);
        });

        it('should expire the old row and create a fresh one after the cooldown', async () => {
            const first = await tracker.createRecommendation(input(), 7);
            time.advance(7 * DAY_MS);
            const second = await tracker.createRecommendation(input(), 7);

            expect(second.created).toBe(true);
            expect(second.recommendation.id).not.toBe(first.recommendation.id);
            expect((await store.findById(first.recommendation.id))?.status).toBe('expired');
        });

        it('should return the winning row when a concurrent insert collides', async () => {
            const winner = createRecommendation({ id: 'rec-winner', createdAt: NOW });
            const racingStore = new InMemoryRecommendationStore();
            const originalInsert = racingStore.insert.bind(racingStore);
            jest.spyOn(racingStore, 'insert').mockImplementationOnce(async (recommendation, session) => {
                await originalInsert(winner, session);
                return originalInsert(recommendation, session);
            });
            const racingTracker = new RecommendationTracker(racingStore, config, time.clock);

            const result = await racingTracker.createRecommendation(input());

            expect(result).toEqual({ recommendation: winner, created: false });
            expect(racingStore.size).toBe(1);
        });

        it('should rethrow insert failures other than duplicates', async () => {
            jest.spyOn(store, 'insert').mockRejectedValueOnce(new Error('write conflict'));

            await expect(tracker.createRecommendation(input())).rejects.toThrow('write conflict');
        });

        it('should emit a created event', async () => {
            const listener = jest.fn();
            tracker.on(RECOMMENDATION_EVENTS.CREATED, listener);

            const { recommendation } = await tracker.createRecommendation(input());

            expect(listener).toHaveBeenCalledWith(recommendation);
        });
    });

    describe('markImplemented / markDismissed', () => {
        let pending: Recommendation;

        beforeEach(async () => {
            pending = (await tracker.createRecommendation(input())).recommendation;
        });

        it('should implement a pending recommendation', async () => {
            const listener = jest.fn();
            tracker.on(RECOMMENDATION_EVENTS.IMPLEMENTED, listener);

            const result = await tracker.markImplemented(pending.id, PROJECT_ID);

            expect(result.status).toBe('ok');
            const stored = await store.findById(pending.id);
            expect(stored?.status).toBe('implemented');
            expect(stored?.implementedAt?.getTime()).toBe(NOW.getTime());
            expect(listener).toHaveBeenCalledTimes(1);
        });

        it('should dismiss with feedback', async () => {
            const result = await tracker.markDismissed(pending.id, PROJECT_ID, 'Quality too low for our use case');

            expect(result.status).toBe('ok');
            const stored = await store.findById(pending.id);
            expect(stored?.status).toBe('dismissed');
            expect(stored?.dismissFeedback).toBe('Quality too low for our use case');
        });

        it('should report a dismissed recommendation as unavailable and leave it unchanged', async () => {
            await tracker.markDismissed(pending.id, PROJECT_ID);

            const result = await tracker.markImplemented(pending.id, PROJECT_ID);

            expect(result).toEqual({ status: 'unavailable', reason: 'dismissed' });
            expect((await store.findById(pending.id))?.status).toBe('dismissed');
        });

        it('should not dismiss an implemented recommendation', async () => {
            await tracker.markImplemented(pending.id, PROJECT_ID);

            expect(await tracker.markDismissed(pending.id, PROJECT_ID)).toEqual({ status: 'unavailable', reason: 'implemented' });
            expect((await store.findById(pending.id))?.status).toBe('implemented');
        });

        it('should expire a pending row past its expiry and report it unavailable', async () => {
            const listener = jest.fn();
            tracker.on(RECOMMENDATION_EVENTS.EXPIRED, listener);
            time.advance(15 * DAY_MS);

            const result = await tracker.markImplemented(pending.id, PROJECT_ID);

            expect(result).toEqual({ status: 'unavailable', reason: 'expired' });
            expect((await store.findById(pending.id))?.status).toBe('expired');
            expect(listener).toHaveBeenCalledWith({ projectId: PROJECT_ID, count: 1 });
        });

        it('should report unknown ids and other projects as not found', async () => {
            expect(await tracker.markImplemented('missing-id', PROJECT_ID)).toEqual({ status: 'not_found' });
            expect(await tracker.markImplemented(pending.id, 'other-project')).toEqual({ status: 'not_found' });
            expect((await store.findById(pending.id))?.status).toBe('pending');
        });
    });

    describe('getPendingRecommendations', () => {
        it('should list unexpired pending rows newest first and expire the rest', async () => {
            store.seed(createRecommendation({ id: 'old', createdAt: new Date(NOW.getTime() - 20 * DAY_MS), expiresAt: new Date(NOW.getTime() - DAY_MS) }));
            store.seed(createRecommendation({ id: 'older-live', type: 'caching', createdAt: new Date(NOW.getTime() - 2 * DAY_MS) }));
            store.seed(createRecommendation({ id: 'newest', type: 'error_reduction', createdAt: new Date(NOW.getTime() - DAY_MS) }));
            store.seed(createRecommendation({ id: 'done', type: 'prompt_optimization', status: 'implemented' }));

            const pending = await tracker.getPendingRecommendations(PROJECT_ID);

            expect(pending.map(rec => rec.id)).toEqual(['newest', 'older-live']);
            expect((await store.findById('old'))?.status).toBe('expired');
        });
    });

    describe('recordActualSavings', () => {
        it('should record savings on implemented recommendations', async () => {
            const { recommendation } = await tracker.createRecommendation(input());
            await tracker.markImplemented(recommendation.id, PROJECT_ID);
            time.advance(DAY_MS);

            const result = await tracker.recordActualSavings(recommendation.id, PROJECT_ID, 18.5);

            expect(result.status).toBe('ok');
            const stored = await store.findById(recommendation.id);
            expect(stored?.actualMonthlySavings).toBe(18.5);
            expect(stored?.savingsRecordedAt?.getTime()).toBe(NOW.getTime() + DAY_MS);
        });

        it('should refuse to record savings before implementation', async () => {
            const { recommendation } = await tracker.createRecommendation(input());

            expect(await tracker.recordActualSavings(recommendation.id, PROJECT_ID, 10))
                .toEqual({ status: 'unavailable', reason: 'pending' });
            expect(await tracker.recordActualSavings('missing-id', PROJECT_ID, 10)).toEqual({ status: 'not_found' });
        });
    });

    describe('getRecommendationEffectiveness', () => {
        it('should summarize outcomes by status and type', async () => {
            store.seed(createRecommendation({ id: 'a', status: 'implemented', estimatedMonthlySavings: 20, actualMonthlySavings: 15 }));
            store.seed(createRecommendation({ id: 'b', status: 'implemented', estimatedMonthlySavings: 10 }));
            store.seed(createRecommendation({ id: 'c', status: 'dismissed', type: 'caching' }));
            store.seed(createRecommendation({ id: 'd', status: 'pending', type: 'error_reduction' }));
            store.seed(createRecommendation({ id: 'e', status: 'pending', type: 'prompt_optimization', expiresAt: new Date(NOW.getTime() - 1) }));

            const effectiveness = await tracker.getRecommendationEffectiveness(PROJECT_ID);

            expect(effectiveness).toEqual({
                total: 5,
                pending: 1,
                implemented: 2,
                dismissed: 1,
                expired: 1,
                implementationRate: 50,
                estimatedSavingsImplemented: 30,
                actualSavingsRecorded: 15,
                savingsAccuracy: 0.75,
                byType: {
                    model_downgrade: { total: 2, implemented: 2, dismissed: 0 },
                    caching: { total: 1, implemented: 0, dismissed: 1 },
                    error_reduction: { total: 1, implemented: 0, dismissed: 0 },
                    prompt_optimization: { total: 1, implemented: 0, dismissed: 0 }
                }
            });
        });

        it('should report zeros for a project without recommendations', async () => {
            const effectiveness = await tracker.getRecommendationEffectiveness(PROJECT_ID);

            expect(effectiveness.total).toBe(0);
            expect(effectiveness.implementationRate).toBe(0);
            expect(effectiveness.savingsAccuracy).toBeNull();
        });
    });

    describe('getAlternativeOutcomes', () => {
        it('should aggregate implemented switches per alternative model across projects', async () => {
            store.seed(createRecommendation({ id: 'a', status: 'implemented', estimatedMonthlySavings: 20, actualMonthlySavings: 10 }));
            store.seed(createRecommendation({ id: 'b', projectId: 'another', status: 'implemented', estimatedMonthlySavings: 30 }));
            store.seed(createRecommendation({ id: 'c', status: 'dismissed' }));
            store.seed(createRecommendation({ id: 'd', status: 'implemented', alternativeModel: 'budget-small' }));

            const outcomes = await tracker.getAlternativeOutcomes('gpt-4o');

            expect(outcomes).toEqual([
                {
                    alternativeModel: 'gpt-4o-mini',
                    timesImplemented: 2,
                    estimatedSavings: 50,
                    actualSavings: 10,
                    measuredCount: 1,
                    savingsAccuracy: 0.5
                },
                {
                    alternativeModel: 'budget-small',
                    timesImplemented: 1,
                    estimatedSavings: 20,
                    actualSavings: 0,
                    measuredCount: 0,
                    savingsAccuracy: null
                }
            ]);
        });
    });

    it('should surface the duplicate error type from stores', () => {
        const error = new DuplicatePendingRecommendationError({
            projectId: PROJECT_ID,
            type: 'caching',
            agentName: 'support-bot',
            model: null
        });

        expect(error.message).toBe('A pending recommendation already exists for caching/support-bot/-');
    });
});
