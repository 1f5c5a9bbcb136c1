import { ProjectBaseline, IProjectBaseline } from '../../models/ProjectBaseline';
import { Baseline, BaselineFilter, BaselineKey } from '../../types/optimization.types';
import { BaselineStore, StoreSession } from '../../types/store.types';

function toBaseline(doc: IProjectBaseline): Baseline {
    return {
        projectId: doc.projectId,
        agentName: doc.agentName,
        model: doc.model,
        avgCostPerCall: doc.avgCostPerCall,
        stddevCostPerCall: doc.stddevCostPerCall,
        avgInputTokens: doc.avgInputTokens,
        stddevInputTokens: doc.stddevInputTokens,
        avgOutputTokens: doc.avgOutputTokens,
        stddevOutputTokens: doc.stddevOutputTokens,
        avgLatencyMs: doc.avgLatencyMs,
        stddevLatencyMs: doc.stddevLatencyMs,
        avgDailyCalls: doc.avgDailyCalls,
        avgErrorRate: doc.avgErrorRate,
        sampleCount: doc.sampleCount,
        lastCalculatedAt: doc.lastCalculatedAt
    };
}

export class MongoBaselineStore implements BaselineStore {

    async upsert(baseline: Baseline, session: StoreSession): Promise<Baseline> {
        const { projectId, agentName, model } = baseline;
        const doc = await ProjectBaseline.findOneAndUpdate(
            { projectId, agentName, model },
            { $set: { ...baseline } },
            { upsert: true, new: true, session }
        ).lean<IProjectBaseline>();

        return doc ? toBaseline(doc) : baseline;
    }

    async find(key: BaselineKey, session: StoreSession = null): Promise<Baseline | null> {
        const doc = await ProjectBaseline.findOne({
            projectId: key.projectId,
            agentName: key.agentName,
            model: key.model
        }).session(session).lean<IProjectBaseline>();

        return doc ? toBaseline(doc) : null;
    }

    async list(projectId: string, filter: BaselineFilter = {}, session: StoreSession = null): Promise<Baseline[]> {
        const query: { projectId: string; agentName?: string; model?: string } = { projectId };
        if (filter.agentName) query.agentName = filter.agentName;
        if (filter.model) query.model = filter.model;

        const docs = await ProjectBaseline.find(query)
            .sort({ agentName: 1, model: 1 })
            .session(session)
            .lean<IProjectBaseline[]>();

        return docs.map(toBaseline);
    }

    async count(projectId: string, session: StoreSession = null): Promise<number> {
        return ProjectBaseline.countDocuments({ projectId }).session(session);
    }
}
