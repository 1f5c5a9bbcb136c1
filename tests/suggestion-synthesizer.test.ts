import { SuggestionSynthesizer, EffectivenessSource, roundSuggestion } from '../src/services/suggestionSynthesizer.service';
import { BaselineComputer } from '../src/services/baselineComputer.service';
import { AnalyzerContext, SuggestionAnalyzer } from '../src/services/analyzers/types';
import { createOptimizationConfig } from '../src/config/optimization.config';
import {
    ErrorReductionSuggestion,
    Priority,
    RecommendationEffectiveness,
    Suggestion,
    SuggestionType
} from '../src/types/optimization.types';
import { InMemoryBaselineStore, InMemoryEventAggregator } from './helpers/inMemoryStores';
import { PROJECT_ID, createEvents, fixedClock } from './helpers/fixtures';

const EMPTY_EFFECTIVENESS: RecommendationEffectiveness = {
    total: 0,
    pending: 0,
    implemented: 0,
    dismissed: 0,
    expired: 0,
    implementationRate: 0,
    estimatedSavingsImplemented: 0,
    actualSavingsRecorded: 0,
    savingsAccuracy: null,
    byType: {}
};

function suggestion(title: string, savings: number, priority: Priority = 'medium'): ErrorReductionSuggestion {
    return {
        type: 'error_reduction',
        title,
        description: `${title} description`,
        agentName: 'bot',
        model: 'gpt-4',
        alternativeModel: null,
        estimatedSavingsMonthly: savings,
        estimatedSavingsPercent: 10,
        priority,
        actionItems: [],
        metrics: {
            kind: 'error_reduction',
            totalCalls: 20,
            errorCount: 5,
            errorRate: 25,
            baselineErrorRate: 2,
            wastedCost: 1
        }
    };
}

type StubAnalyzer = SuggestionAnalyzer & { analyze: jest.Mock<Promise<Suggestion[]>, [AnalyzerContext]> };

function stubAnalyzer(name: SuggestionType, result: Suggestion[] | Error): StubAnalyzer {
    return {
        name,
        analyze: jest.fn(async (_ctx: AnalyzerContext) => {
            if (result instanceof Error) throw result;
            return result;
        })
    };
}

describe('SuggestionSynthesizer', () => {
    const config = createOptimizationConfig();
    let aggregator: InMemoryEventAggregator;
    let baselines: InMemoryBaselineStore;
    let effectiveness: EffectivenessSource;

    beforeEach(() => {
        aggregator = new InMemoryEventAggregator();
        baselines = new InMemoryBaselineStore();
        effectiveness = { getRecommendationEffectiveness: jest.fn().mockResolvedValue(EMPTY_EFFECTIVENESS) };
    });

    function synthesizer(analyzers: SuggestionAnalyzer[]): SuggestionSynthesizer {
        const computer = new BaselineComputer(aggregator, baselines, config, fixedClock());
        return new SuggestionSynthesizer(aggregator, computer, analyzers, effectiveness, config, fixedClock());
    }

    describe('generateSuggestions', () => {
        it('should sort by monthly savings and keep analyzer order on ties', async () => {
            const suggestions = await synthesizer([
                stubAnalyzer('error_reduction', [suggestion('a1', 5), suggestion('a2', 20)]),
                stubAnalyzer('prompt_optimization', [suggestion('b1', 5), suggestion('b2', 50)])
            ]).generateSuggestions(PROJECT_ID);

            expect(suggestions.map(s => s.title)).toEqual(['b2', 'a2', 'a1', 'b1']);
        });

        it('should drop low priority suggestions on request', async () => {
            const analyzers = [stubAnalyzer('error_reduction', [
                suggestion('keep', 20, 'medium'),
                suggestion('drop', 2, 'low'),
                suggestion('urgent', 80, 'high')
            ])];

            const all = await synthesizer(analyzers).generateSuggestions(PROJECT_ID);
            const filtered = await synthesizer(analyzers).generateSuggestions(PROJECT_ID, { includeLowPriority: false });

            expect(all).toHaveLength(3);
            expect(filtered.map(s => s.title)).toEqual(['urgent', 'keep']);
        });

        it('should round money and metrics on the way out', async () => {
            const raw = suggestion('raw', 3.14159);
            raw.estimatedSavingsPercent = 12.36;
            raw.metrics.errorRate = 12.3456;
            raw.metrics.wastedCost = 0.123456;

            const [result] = await synthesizer([stubAnalyzer('error_reduction', [raw])]).generateSuggestions(PROJECT_ID);

            expect(result.estimatedSavingsMonthly).toBe(3.14);
            expect(result.estimatedSavingsPercent).toBe(12.4);
            expect(result.metrics).toEqual({
                kind: 'error_reduction',
                totalCalls: 20,
                errorCount: 5,
                errorRate: 12.35,
                baselineErrorRate: 2,
                wastedCost: 0.1235
            });
        });

        it('should continue past a failing analyzer', async () => {
            const suggestions = await synthesizer([
                stubAnalyzer('model_downgrade', new Error('pricing offline')),
                stubAnalyzer('error_reduction', [suggestion('survivor', 12)])
            ]).generateSuggestions(PROJECT_ID);

            expect(suggestions.map(s => s.title)).toEqual(['survivor']);
        });

        it('should bootstrap baselines once and pass them to analyzers', async () => {
            aggregator.add(...createEvents(12));
            const analyzer = stubAnalyzer('error_reduction', []);
            const engine = synthesizer([analyzer]);

            await engine.generateSuggestions(PROJECT_ID, { days: 30 });

            expect(await baselines.count(PROJECT_ID)).toBe(1);
            const [ctx] = analyzer.analyze.mock.calls[0];
            expect(ctx.days).toBe(30);
            expect(ctx.aggregates).toHaveLength(1);
            expect([...ctx.baselines.keys()]).toEqual(['support-bot::gpt-4o']);
        });

        it('should return nothing for a non-positive window without running analyzers', async () => {
            const analyzer = stubAnalyzer('error_reduction', [suggestion('never', 10)]);

            expect(await synthesizer([analyzer]).generateSuggestions(PROJECT_ID, { days: 0 })).toEqual([]);
            expect(analyzer.analyze).not.toHaveBeenCalled();
        });
    });

    describe('getSummary', () => {
        it('should total savings against monthly spend and keep the top five', async () => {
            // $10 over 30 days
            aggregator.add(...createEvents(10, { cost: 1 }));
            const found = [
                suggestion('s1', 1, 'high'),
                suggestion('s2', 1),
                suggestion('s3', 1),
                suggestion('s4', 1),
                suggestion('s5', 1),
                suggestion('s6', 1)
            ];

            const summary = await synthesizer([stubAnalyzer('error_reduction', found)]).getSummary(PROJECT_ID, 30);

            expect(summary.totalPotentialSavingsMonthly).toBe(6);
            expect(summary.currentMonthlySpend).toBe(10);
            expect(summary.totalPotentialSavingsPercent).toBe(60);
            expect(summary.suggestionCount).toBe(6);
            expect(summary.highPriorityCount).toBe(1);
            expect(summary.byType).toEqual({ error_reduction: { count: 6, savings: 6 } });
            expect(summary.suggestions.map(s => s.title)).toEqual(['s1', 's2', 's3', 's4', 's5']);
            expect(summary.hasData).toBe(true);
            expect(summary.eventCount).toBe(10);
            expect(summary.emptyReason).toBeNull();
            expect(summary.effectiveness).toBe(EMPTY_EFFECTIVENESS);
        });

        it('should report no_data for a project without events', async () => {
            const summary = await synthesizer([]).getSummary(PROJECT_ID, 30);

            expect(summary.emptyReason).toBe('no_data');
            expect(summary.eventCount).toBe(0);
            expect(summary.hasData).toBe(false);
            expect(summary.hasBaselines).toBe(false);
            expect(summary.currentMonthlySpend).toBe(0);
            expect(summary.totalPotentialSavingsPercent).toBe(0);
        });

        it('should report insufficient_data below the baseline sample floor', async () => {
            aggregator.add(...createEvents(5));

            const summary = await synthesizer([]).getSummary(PROJECT_ID, 30);

            expect(summary.emptyReason).toBe('insufficient_data');
            expect(summary.eventCount).toBe(5);
        });

        it('should report no_baselines when no single group has enough calls', async () => {
            aggregator.add(...createEvents(6, { agentName: 'agent-a' }));
            aggregator.add(...createEvents(6, { agentName: 'agent-b' }));

            const summary = await synthesizer([]).getSummary(PROJECT_ID, 30);

            expect(summary.emptyReason).toBe('no_baselines');
        });

        it('should report optimized when baselines exist and nothing was found', async () => {
            aggregator.add(...createEvents(12));

            const summary = await synthesizer([stubAnalyzer('error_reduction', [])]).getSummary(PROJECT_ID, 30);

            expect(summary.hasBaselines).toBe(true);
            expect(summary.emptyReason).toBe('optimized');
        });
    });
});

describe('roundSuggestion', () => {
    it('should keep a null z-score on error rate anomalies', () => {
        const rounded = roundSuggestion({
            type: 'anomaly_alert',
            title: 'Anomaly detected: error_rate for bot/gpt-4',
            description: '',
            agentName: 'bot',
            model: 'gpt-4',
            alternativeModel: null,
            estimatedSavingsMonthly: 0,
            estimatedSavingsPercent: 0,
            priority: 'high',
            actionItems: [],
            metrics: {
                kind: 'anomaly_alert',
                metricName: 'error_rate',
                currentValue: 0.333333,
                baselineMean: 0.1,
                baselineStddev: 0,
                zScore: null,
                ratio: 3.33333
            }
        });

        expect(rounded.metrics).toMatchObject({ currentValue: 0.3333, zScore: null, ratio: 3.33 });
    });
});

