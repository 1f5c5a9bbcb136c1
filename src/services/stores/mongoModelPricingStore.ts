import { IModelPricing, ModelPricing } from '../../models/ModelPricing';
import { ModelPricingEntry, ModelPricingStore } from '../../types/store.types';

export class MongoModelPricingStore implements ModelPricingStore {

    async listActive(): Promise<ModelPricingEntry[]> {
        const docs = await ModelPricing.find({ isActive: true }).lean<IModelPricing[]>();
        return docs.map(doc => ({
            modelId: doc.modelId,
            provider: doc.provider,
            inputPricePer1K: doc.inputPricePer1K,
            outputPricePer1K: doc.outputPricePer1K,
            tier: doc.tier,
            isActive: doc.isActive
        }));
    }

    /**
     * Insert or refresh catalog rows; returns the number of rows written
     */
    async upsertMany(entries: ModelPricingEntry[]): Promise<number> {
        if (entries.length === 0) return 0;

        const result = await ModelPricing.bulkWrite(entries.map(entry => ({
            updateOne: {
                filter: { modelId: entry.modelId },
                update: { $set: { ...entry, lastUpdated: new Date() } },
                upsert: true
            }
        })));

        return result.upsertedCount + result.modifiedCount;
    }
}
