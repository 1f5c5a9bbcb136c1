import { OptimizationRecommendation } from '../src/models/OptimizationRecommendation';
import { MongoRecommendationStore } from '../src/services/stores/mongoRecommendationStore';
import { NOW, PROJECT_ID } from './helpers/fixtures';

describe('MongoRecommendationStore.expireStale', () => {
    let updateMany: jest.SpyInstance;

    beforeEach(() => {
        updateMany = jest.spyOn(OptimizationRecommendation, 'updateMany').mockResolvedValue({
            acknowledged: true,
            matchedCount: 2,
            modifiedCount: 2,
            upsertedCount: 0,
            upsertedId: null
        });
    });

    afterEach(() => {
        updateMany.mockRestore();
    });

    it('should run outside a session when none is given', async () => {
        const expired = await new MongoRecommendationStore().expireStale(PROJECT_ID, NOW, null, null);

        expect(expired).toBe(2);
        expect(updateMany).toHaveBeenCalledWith(
            { projectId: PROJECT_ID, status: 'pending', expiresAt: { $lte: NOW } },
            { $set: { status: 'expired' } },
            { session: undefined }
        );
    });

    it('should narrow the update to one recommendation key', async () => {
        await new MongoRecommendationStore().expireStale(
            PROJECT_ID,
            NOW,
            { projectId: PROJECT_ID, type: 'caching', agentName: 'support-bot', model: 'gpt-4o' },
            null
        );

        expect(updateMany).toHaveBeenCalledWith(
            {
                projectId: PROJECT_ID,
                type: 'caching',
                agentName: 'support-bot',
                model: 'gpt-4o',
                status: 'pending',
                expiresAt: { $lte: NOW }
            },
            { $set: { status: 'expired' } },
            { session: undefined }
        );
    });
});
