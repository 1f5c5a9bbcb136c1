/**
 * Seed the model_pricing collection from the bundled catalog
 * - Upserts by modelId, so reruns refresh prices in place
 */

import { connectDatabase, disconnectDatabase } from '../config/database';
import { flushSentry, initializeSentry } from '../config/sentry';
import { ErrorHandler } from '../errors/ErrorHandler';
import { loggingService } from '../services/logging.service';
import { MongoModelPricingStore } from '../services/stores/mongoModelPricingStore';
import { loadBundledPricingCatalog } from '../services/stores/staticModelPricingStore';

const context = { component: 'SeedModelPricing', operation: 'seedModelPricing' };

async function seedModelPricing(): Promise<void> {
    let exitCode = 0;
    initializeSentry();

    try {
        await connectDatabase();

        const entries = loadBundledPricingCatalog();
        loggingService.info(`Seeding ${entries.length} model pricing entries`, context);

        const written = await new MongoModelPricingStore().upsertMany(entries);
        loggingService.info(`Model pricing seeded: ${written} rows written`, context);
    } catch (error) {
        ErrorHandler.processError(error, context);
        exitCode = 1;
    } finally {
        await disconnectDatabase();
        await flushSentry();
    }

    process.exit(exitCode);
}

void seedModelPricing();
