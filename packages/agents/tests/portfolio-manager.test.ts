import { describe, it, expect } from 'vitest';
import {
  PortfolioManager, collectSignals, narrativeConflictLevel,
} from '../agents/portfolio-manager.js';
import type { ManagerContext } from '../agents/manager-support.js';
import { AnalysisRun } from '../orchestrator/run-context.js';
import { LocalSituationMemory, type SituationMemory } from '../memory/situation-memory.js';
import type { StageMapping } from '../types/analysis.js';
import type { VerdictProducer } from '../utils/verdict-producer.js';
import { ScriptedProducer, stageOutput, verdictJson, type Responder } from './fixtures.js';

// Technical Buy 0.75, Fundamental Buy 0.75, News Sell 0.5
// weights 1/7, 4/7, 2/7 -> S = 2.75 / 4.75
function stages(): StageMapping {
  return {
    market_report: stageOutput('market', verdictJson({ analyst: 'Market Analyst' })),
    fundamentals_report: stageOutput('fundamentals', verdictJson({ analyst: 'Fundamentals Analyst' })),
    news_report: stageOutput('news', verdictJson({
      analyst: 'News Analyst', recommendation: 'Sell', conviction: 0.5,
      conviction_category: 'Medium', confidence_level: 'Medium',
    })),
  };
}

function context(producer: VerdictProducer | null, memory: SituationMemory | null = null): ManagerContext {
  return {
    run: new AnalysisRun({ ticker: 'AAPL', asOf: '2024-05-10', selected: ['market', 'news', 'fundamentals'] }),
    producer,
    reviewer: null,
    memory,
    memoryMatches: 2,
    maxTokens: 2048,
  };
}

const narrative = (summary: Record<string, unknown>): Responder => () => JSON.stringify({
  module: 'AnalystAggregation',
  summary: { overall_signal: 'Bullish', bullish_strength: 0.9, bearish_strength: 0.1, interpretation: 'Mostly aligned.', ...summary },
  pm_direction: 'Sell',
  pm_composite_score: -0.9,
  pm_base_conviction: 0.1,
});

describe('collectSignals', () => {
  it('reads every parsable report under its aggregation name and drops the rest', () => {
    const mapping: StageMapping = { ...stages(), sentiment_report: stageOutput('sentiment', 'bullish chatter') };
    const { signals, dropped } = collectSignals(mapping);

    expect(signals.map(s => s.analyst)).toEqual(['Technical', 'News', 'Fundamental']);
    expect(dropped).toEqual(['Sentiment Analyst']);
  });
});

describe('narrativeConflictLevel', () => {
  it('accepts only finite values in [0,1]', () => {
    expect(narrativeConflictLevel({ summary: { conflict_level: 0.2 } })).toBe(0.2);
    expect(narrativeConflictLevel({ summary: { conflict_level: 1.5 } })).toBeNull();
    expect(narrativeConflictLevel({ summary: { conflict_level: '0.2' } })).toBeNull();
    expect(narrativeConflictLevel({ summary: 'none' })).toBeNull();
    expect(narrativeConflictLevel(null)).toBeNull();
  });
});

describe('PortfolioManager', () => {
  it('aggregates deterministically without a producer', async () => {
    const ctx = context(null);
    const plan = await new PortfolioManager(0.33).run(ctx, stages());

    expect(plan.narrative).toBeNull();
    expect(plan.aggregate).toMatchObject({
      direction: 'Buy',
      compositeScore: 0.5789,
      baseConviction: 0.75,
      bullishStrength: 0.75,
      bearishStrength: 0.5,
      holdStrength: 0,
      conflictLevel: 0.4211,
    });
    expect(ctx.run.warnings).toEqual([]);
  });

  it('warns about reports it cannot aggregate', async () => {
    const ctx = context(null);
    const mapping: StageMapping = { ...stages(), sentiment_report: stageOutput('sentiment', '{"analyst":"Sentiment Analyst","error":"timeout"}') };

    const plan = await new PortfolioManager(0.33).run(ctx, mapping);

    expect(plan.aggregate.inputs).toHaveLength(3);
    expect(ctx.run.warnings).toEqual(['Portfolio Manager: Sentiment Analyst report dropped from aggregation']);
  });

  it('holds with a warning when nothing is usable', async () => {
    const ctx = context(null);
    const plan = await new PortfolioManager(0.33).run(ctx, { market_report: stageOutput('market', 'n/a') });

    expect(plan.aggregate.direction).toBe('Hold');
    expect(plan.aggregate.conflictLevel).toBe(0);
    expect(ctx.run.warnings).toEqual([
      'Portfolio Manager: Market Analyst report dropped from aggregation',
      'Portfolio Manager: No valid analyst entries provided.',
    ]);
  });

  it('overwrites every numeric field of the narrative from the aggregate', async () => {
    const producer = new ScriptedProducer(narrative({ conflict_level: 0.4211 }));
    const ctx = context(producer);
    const plan = await new PortfolioManager(0.33).run(ctx, stages());

    expect(plan.aggregate.conflictLevel).toBe(0.4211);
    expect(ctx.run.warnings).toEqual([]);
    expect(plan.narrative).toMatchObject({
      module: 'AnalystAggregation',
      summary: {
        overall_signal: 'Bullish',
        bullish_strength: 0.75,
        bearish_strength: 0.5,
        conflict_level: 0.4211,
        interpretation: 'Mostly aligned.',
      },
      hold_strength: 0,
      pm_direction: 'Buy',
      pm_composite_score: 0.5789,
      pm_base_conviction: 0.75,
      pm_threshold: 0.33,
    });
  });

  it('infers the conflict level when the narrative gives an unusable one', async () => {
    const producer = new ScriptedProducer(narrative({ conflict_level: 1.5 }));
    const ctx = context(producer);
    const plan = await new PortfolioManager(0.33).run(ctx, stages());

    expect(plan.aggregate.conflictLevel).toBe(0.4211);
    expect(ctx.run.warnings).toEqual([]);
  });

  it('keeps the inferred conflict level over a different narrative one and warns', async () => {
    const producer = new ScriptedProducer(narrative({ conflict_level: 0.2 }));
    const ctx = context(producer);
    const plan = await new PortfolioManager(0.33).run(ctx, stages());

    expect(plan.aggregate.conflictLevel).toBe(0.4211);
    expect(plan.narrative).toMatchObject({ summary: { conflict_level: 0.4211 } });
    expect(ctx.run.warnings).toEqual([
      'Portfolio Manager: narrative conflict level 0.2 replaced with inferred 0.4211',
    ]);
  });

  it('hands the precomputed aggregate and the reports to the narrative prompt', async () => {
    const producer = new ScriptedProducer(narrative({}));
    await new PortfolioManager(0.33).run(context(producer), stages());

    const [request] = producer.ofType('pm');
    expect(request.prompt).toContain('"pm_composite_score":0.5789,"pm_direction":"Buy"');
    expect(request.prompt).toContain('- Social/Sentiment: (not available)');
    expect(request.prompt).toContain('- Use past reflections if relevant: (none)');
    expect(request.maxTokens).toBe(2048);
  });

  it('keeps the aggregate when the narrative call fails', async () => {
    const ctx = context(new ScriptedProducer(() => {
      throw new Error('overloaded');
    }));
    const plan = await new PortfolioManager(0.33).run(ctx, stages());

    expect(plan.narrative).toBeNull();
    expect(plan.aggregate.direction).toBe('Buy');
    expect(ctx.run.warnings).toEqual(['Portfolio Manager: narrative synthesis failed (overloaded)']);
  });

  it('records a narrative that is not JSON', async () => {
    const ctx = context(new ScriptedProducer(() => 'Bullish overall.'));
    const plan = await new PortfolioManager(0.33).run(ctx, stages());

    expect(plan.narrative).toBeNull();
    expect(ctx.run.warnings).toEqual(['Portfolio Manager: narrative is not a JSON object']);
  });

  it('adds recalled recommendations to the prompt', async () => {
    const memory = new LocalSituationMemory();
    await memory.store(verdictJson({ analyst: 'Market Analyst' }), 'Trimmed after the breakout failed.');
    const producer = new ScriptedProducer(narrative({}));

    await new PortfolioManager(0.33).run(context(producer, memory), stages());

    expect(producer.ofType('pm')[0].prompt).toContain('- Use past reflections if relevant: Trimmed after the breakout failed.');
  });

  it('records a memory failure and carries on', async () => {
    const memory: SituationMemory = {
      store: () => Promise.reject(new Error('db down')),
      retrieveSimilar: () => Promise.reject(new Error('db down')),
    };
    const ctx = context(new ScriptedProducer(narrative({})), memory);

    const plan = await new PortfolioManager(0.33).run(ctx, stages());

    expect(plan.narrative).not.toBeNull();
    expect(ctx.run.warnings).toEqual(['Portfolio Manager: situation memory unavailable (db down)']);
  });
});
