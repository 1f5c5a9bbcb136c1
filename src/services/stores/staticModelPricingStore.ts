import { z } from 'zod';
import catalog from '../../data/model-pricing.json';
import { ModelPricingEntry, ModelPricingStore } from '../../types/store.types';

const pricingEntrySchema = z.object({
    modelId: z.string().min(1),
    provider: z.string().min(1),
    inputPricePer1K: z.number().nonnegative(),
    outputPricePer1K: z.number().nonnegative(),
    tier: z.enum(['flagship', 'standard', 'economy']),
    isActive: z.boolean().default(true)
});

const pricingCatalogSchema = z.array(pricingEntrySchema);

/**
 * Validate raw catalog data into pricing entries
 */
export function parsePricingCatalog(raw: unknown): ModelPricingEntry[] {
    const parsed = pricingCatalogSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid model pricing catalog: ${details.join('; ')}`);
    }
    return parsed.data;
}

/**
 * Bundled list prices from src/data/model-pricing.json
 */
export function loadBundledPricingCatalog(): ModelPricingEntry[] {
    return parsePricingCatalog(catalog);
}

/**
 * In-process pricing catalog, used when no pricing collection is available
 */
export class StaticModelPricingStore implements ModelPricingStore {
    private readonly entries: ModelPricingEntry[];

    constructor(entries: ModelPricingEntry[] = loadBundledPricingCatalog()) {
        this.entries = entries;
    }

    async listActive(): Promise<ModelPricingEntry[]> {
        return this.entries.filter(entry => entry.isActive);
    }
}
