import mongoose, { Schema } from 'mongoose';

/**
 * Per-model list prices used to discover cheaper alternatives
 */
export interface IModelPricing {
    modelId: string;
    provider: string;
    // Dollars per 1K tokens
    inputPricePer1K: number;
    outputPricePer1K: number;
    tier: 'flagship' | 'standard' | 'economy';
    isActive: boolean;
    lastUpdated: Date;
}

const modelPricingSchema = new Schema<IModelPricing>({
    modelId: {
        type: String,
        required: true,
        unique: true,
        index: true
    },
    provider: {
        type: String,
        required: true,
        index: true
    },
    inputPricePer1K: {
        type: Number,
        required: true,
        min: 0
    },
    outputPricePer1K: {
        type: Number,
        required: true,
        min: 0
    },
    tier: {
        type: String,
        enum: ['flagship', 'standard', 'economy'],
        required: true
    },
    isActive: {
        type: Boolean,
        default: true,
        index: true
    },
    lastUpdated: {
        type: Date,
        default: Date.now
    }
}, {
    timestamps: true,
    collection: 'model_pricing'
});

export const ModelPricing = mongoose.model<IModelPricing>('ModelPricing', modelPricingSchema);
