import mongoose from 'mongoose';
import { loggingService } from '../services/logging.service';
import { StoreSession, TransactionManager, TransactionResult } from '../types/store.types';
import { TransactionFailedError } from '../errors/optimizationErrors';
import { ServiceError } from '../shared/BaseService';

/**
 * MongoTransactionManager
 * Runs a unit of work inside a MongoDB session transaction.
 * Requires a replica set or sharded cluster; standalone servers reject transactions.
 */
export class MongoTransactionManager implements TransactionManager {

    /**
     * Execute operations within a MongoDB transaction
     * Handles session lifecycle automatically
     */
    async executeTransaction<T>(
        operation: (session: StoreSession) => Promise<T>,
        operationName?: string
    ): Promise<TransactionResult<T>> {
        const session = await mongoose.startSession();

        try {
            // withTransaction may rerun the callback on transient errors; keep the last result
            const holder: { result?: { value: T } } = {};

            await session.withTransaction(async () => {
                holder.result = { value: await operation(session) };
            });

            if (!holder.result) {
                throw new Error('Transaction committed without running the operation');
            }

            if (operationName) {
                loggingService.debug('MongoDB transaction completed successfully', {
                    operation: operationName
                });
            }

            return {
                success: true,
                data: holder.result.value
            };

        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);

            if (operationName) {
                loggingService.error('MongoDB transaction failed', {
                    operation: operationName,
                    error: errorMessage
                });
            }

            return {
                success: false,
                error: errorMessage,
                cause: error
            };

        } finally {
            await session.endSession();
        }
    }
}

/**
 * Return the data of a successful transaction or rethrow its failure.
 * ServiceErrors raised inside the unit of work pass through unchanged.
 */
export function unwrapTransaction<T>(result: TransactionResult<T>, operationName: string): T {
    if (result.success) {
        return result.data;
    }

    if (result.cause instanceof ServiceError) {
        throw result.cause;
    }

    throw new TransactionFailedError(operationName, result.error, result.cause);
}
