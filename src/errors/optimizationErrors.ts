import { ServiceError } from '../shared/BaseService';
import { UnavailableReason } from '../types/optimization.types';

export const RECOMMENDATION_UNAVAILABLE_MESSAGE =
    'This recommendation is no longer available. It may have expired or already been actioned.';

/**
 * Caller supplied out-of-range or malformed input
 */
export class ValidationServiceError extends ServiceError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, 'VALIDATION_ERROR', 400, { issues });
        this.name = 'ValidationServiceError';
    }
}

/**
 * Recommendation does not exist, belongs to another project, or is no longer pending
 */
export class RecommendationUnavailableError extends ServiceError {
    constructor(recommendationId: string, reason: 'not_found' | UnavailableReason) {
        super(RECOMMENDATION_UNAVAILABLE_MESSAGE, 'RECOMMENDATION_UNAVAILABLE', 404, {
            recommendationId,
            reason
        });
        this.name = 'RecommendationUnavailableError';
    }
}

export class TransactionFailedError extends ServiceError {
    constructor(operation: string, detail: string, public readonly originalError?: unknown) {
        super(`Transaction ${operation} failed: ${detail}`, 'TRANSACTION_FAILED', 500, { operation });
        this.name = 'TransactionFailedError';
    }
}
