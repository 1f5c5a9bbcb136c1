import mongoose, { Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import {
    RECOMMENDATION_STATUSES,
    RecommendationStatus,
    SUGGESTION_TYPES,
    SuggestionMetrics,
    SuggestionType
} from '../types/optimization.types';

export interface IOptimizationRecommendation {
    _id: string;
    projectId: string;
    type: SuggestionType;
    title: string;
    description: string;
    agentName: string | null;
    model: string | null;
    alternativeModel: string | null;
    estimatedMonthlySavings: number;
    estimatedSavingsPercent: number;
    metricsSnapshot: SuggestionMetrics | null;
    status: RecommendationStatus;
    createdAt: Date;
    expiresAt: Date;
    implementedAt: Date | null;
    dismissedAt: Date | null;
    dismissFeedback: string | null;
    actualMonthlySavings: number | null;
    savingsRecordedAt: Date | null;
}

const optimizationRecommendationSchema = new Schema<IOptimizationRecommendation>({
    _id: {
        type: String,
        default: () => uuidv4()
    },
    projectId: {
        type: String,
        required: true
    },
    type: {
        type: String,
        enum: [...SUGGESTION_TYPES],
        required: true
    },
    title: {
        type: String,
        required: true
    },
    description: {
        type: String,
        required: true
    },
    agentName: {
        type: String,
        default: null
    },
    model: {
        type: String,
        default: null
    },
    alternativeModel: {
        type: String,
        default: null
    },
    estimatedMonthlySavings: {
        type: Number,
        required: true,
        min: 0,
        default: 0
    },
    estimatedSavingsPercent: {
        type: Number,
        required: true,
        min: 0,
        default: 0
    },
    metricsSnapshot: {
        type: Schema.Types.Mixed,
        default: null
    },
    status: {
        type: String,
        enum: [...RECOMMENDATION_STATUSES],
        required: true,
        default: 'pending'
    },
    createdAt: {
        type: Date,
        required: true
    },
    expiresAt: {
        type: Date,
        required: true
    },
    implementedAt: {
        type: Date,
        default: null
    },
    dismissedAt: {
        type: Date,
        default: null
    },
    dismissFeedback: {
        type: String,
        default: null,
        maxlength: 2000
    },
    actualMonthlySavings: {
        type: Number,
        default: null
    },
    savingsRecordedAt: {
        type: Date,
        default: null
    }
}, {
    collection: 'optimization_recommendations',
    minimize: false
});

// At most one pending row per (project, type, agent, model); closes the create race
optimizationRecommendationSchema.index(
    { projectId: 1, type: 1, agentName: 1, model: 1 },
    { unique: true, partialFilterExpression: { status: 'pending' }, name: 'unique_pending_recommendation' }
);
optimizationRecommendationSchema.index({ projectId: 1, status: 1, createdAt: -1 });
optimizationRecommendationSchema.index({ type: 1, model: 1, status: 1 });

export const OptimizationRecommendation = mongoose.model<IOptimizationRecommendation>(
    'OptimizationRecommendation',
    optimizationRecommendationSchema
);
