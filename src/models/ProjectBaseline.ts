import mongoose, { Schema } from 'mongoose';

export interface IProjectBaseline {
    projectId: string;
    agentName: string;
    model: string;
    avgCostPerCall: number;
    stddevCostPerCall: number;
    avgInputTokens: number;
    stddevInputTokens: number;
    avgOutputTokens: number;
    stddevOutputTokens: number;
    avgLatencyMs: number;
    stddevLatencyMs: number;
    avgDailyCalls: number;
    avgErrorRate: number;
    sampleCount: number;
    lastCalculatedAt: Date;
}

const statField = {
    type: Number,
    required: true,
    min: 0,
    default: 0
};

const projectBaselineSchema = new Schema<IProjectBaseline>({
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
    avgCostPerCall: statField,
    stddevCostPerCall: statField,
    avgInputTokens: statField,
    stddevInputTokens: statField,
    avgOutputTokens: statField,
    stddevOutputTokens: statField,
    avgLatencyMs: statField,
    stddevLatencyMs: statField,
    avgDailyCalls: statField,
    avgErrorRate: {
        type: Number,
        required: true,
        min: 0,
        max: 1,
        default: 0
    },
    sampleCount: {
        type: Number,
        required: true,
        min: 0
    },
    lastCalculatedAt: {
        type: Date,
        required: true
    }
}, {
    timestamps: true,
    collection: 'project_baselines'
});

// One baseline per (project, agent, model)
projectBaselineSchema.index({ projectId: 1, agentName: 1, model: 1 }, { unique: true });

export const ProjectBaseline = mongoose.model<IProjectBaseline>('ProjectBaseline', projectBaselineSchema);
