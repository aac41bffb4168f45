import { describe, it, expect } from 'vitest';
import { parseAnalyzeArgs, renderSummary } from '../src/cli.js';
import { ConfigurationError } from '../orchestrator/errors.js';
import { pmDirectionalScore } from '../scoring/pm-score.js';
import { finalizeRiskDecision } from '../scoring/risk-adjustment.js';
import { parseVerdict } from '../utils/verdict-schema.js';
import type { RunSnapshot } from '../types/analysis.js';
import { stageOutput, verdict, verdictJson } from './fixtures.js';

const stripAnsi = (text: string): string => text.replace(/\x1b\[[0-9;]*m/g, '');

describe('parseAnalyzeArgs', () => {
  it('reads the ticker and date', () => {
    expect(parseAnalyzeArgs(['AAPL', '2024-05-10'])).toEqual({
      ticker: 'AAPL', asOf: '2024-05-10', specialists: undefined, json: false, help: false,
    });
  });

  it('accepts a specialist subset in both flag forms', () => {
    expect(parseAnalyzeArgs(['NVDA', '2024-05-10', '--analysts', 'market, News', '--json'])).toMatchObject({
      specialists: ['market', 'news'], json: true,
    });
    expect(parseAnalyzeArgs(['--analysts=sentiment', 'NVDA', '2024-05-10']).specialists).toEqual(['sentiment']);
  });

  it('allows --help without positionals', () => {
    expect(parseAnalyzeArgs(['--help'])).toMatchObject({ help: true, ticker: '', asOf: '' });
  });

  it('rejects unknown specialists', () => {
    expect(() => parseAnalyzeArgs(['AAPL', '2024-05-10', '--analysts', 'market,macro']))
      .toThrow('Unknown specialists: macro. Valid: market, sentiment, news, fundamentals');
  });

  it('rejects unknown options, a missing list and the wrong number of arguments', () => {
    expect(() => parseAnalyzeArgs(['AAPL', '2024-05-10', '--verbose'])).toThrow('Unknown option --verbose');
    expect(() => parseAnalyzeArgs(['AAPL', '2024-05-10', '--analysts'])).toThrow('--analysts needs a comma-separated list');
    expect(() => parseAnalyzeArgs(['AAPL'])).toThrow(ConfigurationError);
  });
});

describe('renderSummary', () => {
  it('prints the decision, the PM aggregate and one line per specialist', () => {
    const parsed = parseVerdict(verdict());
    if (!parsed.ok) throw new Error('fixture verdict must parse');
    const aggregate = pmDirectionalScore([{ analyst: 'Technical', recommendation: 'Buy', conviction: 0.75 }]);
    const snapshot: RunSnapshot = {
      runId: 'run-1',
      ticker: 'AAPL',
      asOf: '2024-05-10',
      status: 'completed',
      selected: ['market', 'valuation'],
      stages: {
        market_report: { ...stageOutput('market', verdictJson()), verdict: parsed.verdict, reviewStatus: 'unchanged' },
      },
      timings: {
        market: { startedAt: 0, endedAt: 1500, elapsedMs: 1500 },
        total: { startedAt: 0, endedAt: 4000, elapsedMs: 4000 },
      },
      investmentPlan: { aggregate, narrative: null },
      finalDecision: finalizeRiskDecision(null, aggregate, 'fallback'),
      warnings: ['Risk Manager: risk draft unavailable; using PM aggregate only'],
      createdAt: new Date(0),
    };

    const lines = stripAnsi(renderSummary(snapshot)).split('\n');

    expect(lines).toContain('  AAPL as of 2024-05-10 run run-1');
    expect(lines).toContain('  Buy | conviction 0.75 (base 0.75, risk Low)');
    expect(lines).toContain('  PM composite 1.0000 | threshold 0.33 | bull 0.7500 | bear 0.0000 | hold 0.0000');
    expect(lines).toContain(`    ${'Market Analyst'.padEnd(22, ' ')} Buy 0.75 unchanged, 1.5s`);
    expect(lines).toContain(`    ${'Valuation Analyst'.padEnd(22, ' ')} no report`);
    expect(lines).toContain('  1 warning(s):');
    expect(lines).toContain('    ● Risk Manager: risk draft unavailable; using PM aggregate only');
    expect(lines).toContain('  Timings: gate - | pm - | risk - | total 4.0s');
  });
});
