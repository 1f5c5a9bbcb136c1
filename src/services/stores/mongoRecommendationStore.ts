import mongoose from 'mongoose';
import {
    IOptimizationRecommendation,
    OptimizationRecommendation
} from '../../models/OptimizationRecommendation';
import { Recommendation, RecommendationStatus, SuggestionType } from '../../types/optimization.types';
import {
    DuplicatePendingRecommendationError,
    ImplementedAlternativeSummary,
    RecommendationKey,
    RecommendationStatusSummary,
    RecommendationStore,
    RecommendationTransition,
    StoreSession
} from '../../types/store.types';

const DUPLICATE_KEY_CODE = 11000;

interface StatusRow {
    _id: { type: SuggestionType; status: RecommendationStatus };
    count: number;
    estimatedSavings: number;
    measuredCount: number;
    measuredEstimatedSavings: number;
    actualSavings: number;
}

interface AlternativeRow {
    _id: string;
    count: number;
    estimatedSavings: number;
    measuredCount: number;
    measuredEstimatedSavings: number;
    actualSavings: number;
}

function toRecommendation(doc: IOptimizationRecommendation): Recommendation {
    return {
        id: doc._id,
        projectId: doc.projectId,
        type: doc.type,
        title: doc.title,
        description: doc.description,
        agentName: doc.agentName ?? null,
        model: doc.model ?? null,
        alternativeModel: doc.alternativeModel ?? null,
        estimatedMonthlySavings: doc.estimatedMonthlySavings,
        estimatedSavingsPercent: doc.estimatedSavingsPercent,
        metricsSnapshot: doc.metricsSnapshot ?? null,
        status: doc.status,
        createdAt: doc.createdAt,
        expiresAt: doc.expiresAt,
        implementedAt: doc.implementedAt ?? null,
        dismissedAt: doc.dismissedAt ?? null,
        dismissFeedback: doc.dismissFeedback ?? null,
        actualMonthlySavings: doc.actualMonthlySavings ?? null,
        savingsRecordedAt: doc.savingsRecordedAt ?? null
    };
}

function isDuplicateKeyError(error: unknown): boolean {
    return error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY_CODE;
}

function keyQuery(key: RecommendationKey): RecommendationKey {
    return {
        projectId: key.projectId,
        type: key.type,
        agentName: key.agentName,
        model: key.model
    };
}

// Rows carrying a realized-savings figure
const hasActualSavings = { $gt: ['$actualMonthlySavings', null] };

export class MongoRecommendationStore implements RecommendationStore {

    async insert(recommendation: Recommendation, session: StoreSession): Promise<Recommendation> {
        const { id, ...fields } = recommendation;
        try {
            const [doc] = await OptimizationRecommendation.create([{ _id: id, ...fields }], { session });
            return toRecommendation(doc.toObject<IOptimizationRecommendation>());
        } catch (error) {
            if (isDuplicateKeyError(error)) {
                throw new DuplicatePendingRecommendationError({
                    projectId: recommendation.projectId,
                    type: recommendation.type,
                    agentName: recommendation.agentName,
                    model: recommendation.model
                });
            }
            throw error;
        }
    }

    async findById(id: string, session: StoreSession = null): Promise<Recommendation | null> {
        const doc = await OptimizationRecommendation.findById(id)
            .session(session)
            .lean<IOptimizationRecommendation>();
        return doc ? toRecommendation(doc) : null;
    }

    async findActivePending(key: RecommendationKey, now: Date, session: StoreSession = null): Promise<Recommendation | null> {
        const doc = await OptimizationRecommendation.findOne({
            ...keyQuery(key),
            status: 'pending',
            expiresAt: { $gt: now }
        }).session(session).lean<IOptimizationRecommendation>();
        return doc ? toRecommendation(doc) : null;
    }

    async expireStale(
        projectId: string,
        now: Date,
        key: RecommendationKey | null,
        session: StoreSession
    ): Promise<number> {
        const result = await OptimizationRecommendation.updateMany(
            {
                ...(key ? keyQuery(key) : { projectId }),
                status: 'pending',
                expiresAt: { $lte: now }
            },
            { $set: { status: 'expired' } },
            { session: session ?? undefined }
        );
        return result.modifiedCount;
    }

    async transition(
        id: string,
        projectId: string,
        now: Date,
        update: RecommendationTransition,
        session: StoreSession
    ): Promise<Recommendation | null> {
        const doc = await OptimizationRecommendation.findOneAndUpdate(
            { _id: id, projectId, status: 'pending', expiresAt: { $gt: now } },
            { $set: update },
            { new: true, session }
        ).lean<IOptimizationRecommendation>();
        return doc ? toRecommendation(doc) : null;
    }

    async recordActualSavings(
        id: string,
        projectId: string,
        amount: number,
        now: Date,
        session: StoreSession
    ): Promise<Recommendation | null> {
        const doc = await OptimizationRecommendation.findOneAndUpdate(
            { _id: id, projectId, status: 'implemented' },
            { $set: { actualMonthlySavings: amount, savingsRecordedAt: now } },
            { new: true, session }
        ).lean<IOptimizationRecommendation>();
        return doc ? toRecommendation(doc) : null;
    }

    async listPending(projectId: string, now: Date, session: StoreSession = null): Promise<Recommendation[]> {
        const docs = await OptimizationRecommendation.find({
            projectId,
            status: 'pending',
            expiresAt: { $gt: now }
        })
            .sort({ createdAt: -1 })
            .session(session)
            .lean<IOptimizationRecommendation[]>();
        return docs.map(toRecommendation);
    }

    async summarizeByTypeAndStatus(projectId: string, session: StoreSession = null): Promise<RecommendationStatusSummary[]> {
        const rows = await OptimizationRecommendation.aggregate<StatusRow>([
            { $match: { projectId } },
            {
                $group: {
                    _id: { type: '$type', status: '$status' },
                    count: { $sum: 1 },
                    estimatedSavings: { $sum: '$estimatedMonthlySavings' },
                    measuredCount: { $sum: { $cond: [hasActualSavings, 1, 0] } },
                    measuredEstimatedSavings: { $sum: { $cond: [hasActualSavings, '$estimatedMonthlySavings', 0] } },
                    actualSavings: { $sum: { $ifNull: ['$actualMonthlySavings', 0] } }
                }
            }
        ]).session(session);

        return rows.map(row => ({
            type: row._id.type,
            status: row._id.status,
            count: row.count,
            estimatedSavings: row.estimatedSavings,
            measuredCount: row.measuredCount,
            measuredEstimatedSavings: row.measuredEstimatedSavings,
            actualSavings: row.actualSavings
        }));
    }

    async summarizeImplementedAlternatives(model: string, session: StoreSession = null): Promise<ImplementedAlternativeSummary[]> {
        const rows = await OptimizationRecommendation.aggregate<AlternativeRow>([
            {
                $match: {
                    type: 'model_downgrade',
                    model,
                    status: 'implemented',
                    alternativeModel: { $ne: null }
                }
            },
            {
                $group: {
                    _id: '$alternativeModel',
                    count: { $sum: 1 },
                    estimatedSavings: { $sum: '$estimatedMonthlySavings' },
                    measuredCount: { $sum: { $cond: [hasActualSavings, 1, 0] } },
                    measuredEstimatedSavings: { $sum: { $cond: [hasActualSavings, '$estimatedMonthlySavings', 0] } },
                    actualSavings: { $sum: { $ifNull: ['$actualMonthlySavings', 0] } }
                }
            },
            { $sort: { count: -1 } }
        ]).session(session);

        return rows.map(row => ({
            alternativeModel: row._id,
            count: row.count,
            estimatedSavings: row.estimatedSavings,
            measuredCount: row.measuredCount,
            measuredEstimatedSavings: row.measuredEstimatedSavings,
            actualSavings: row.actualSavings
        }));
    }
}
