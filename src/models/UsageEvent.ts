import mongoose, { Schema } from 'mongoose';

/**
 * One recorded LLM call. Written by the ingestion pipeline; the optimization
 * engine only aggregates over it.
 */
export interface IUsageEvent {
    projectId: string;
    agentName: string;
    model: string;
    inputTokens: number;
    outputTokens: number;
    cost: number;
    latencyMs: number;
    timestamp: Date;
    success: boolean;
    // Normalized-input fingerprint, absent when the caller did not hash the prompt
    inputHash?: string | null;
}

const usageEventSchema = new Schema<IUsageEvent>({
    projectId: {
        type: String,
        required: true
    },
    agentName: {
        type: String,
        required: true
    },
    model: {
        type: String,
        required: true
    },
    inputTokens: {
        type: Number,
        required: true,
        min: 0,
        default: 0
    },
    outputTokens: {
        type: Number,
        required: true,
        min: 0,
        default: 0
    },
    cost: {
        type: Number,
        required: true,
        min: 0,
        default: 0
    },
    latencyMs: {
        type: Number,
        required: true,
        min: 0,
        default: 0
    },
    timestamp: {
        type: Date,
        required: true,
        default: Date.now
    },
    success: {
        type: Boolean,
        required: true,
        default: true
    },
    inputHash: {
        type: String,
        default: null
    }
}, {
    collection: 'usage_events'
});

// Windowed aggregations per project, agent and model
usageEventSchema.index({ projectId: 1, timestamp: -1 });
usageEventSchema.index({ projectId: 1, agentName: 1, model: 1, timestamp: -1 });

// Duplicate-input detection
usageEventSchema.index({ projectId: 1, agentName: 1, inputHash: 1, timestamp: -1 }, { sparse: true });

export const UsageEvent = mongoose.model<IUsageEvent>('UsageEvent', usageEventSchema);
