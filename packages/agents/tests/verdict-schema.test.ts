import { describe, it, expect } from 'vitest';
import { categoryMatchesConviction, checkVerdictConsistency, parseVerdict } from '../utils/verdict-schema.js';
import { verdict } from './fixtures.js';

describe('parseVerdict', () => {
  it('accepts a complete verdict', () => {
    const result = parseVerdict(verdict());
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.verdict.recommendation).toBe('Buy');
      expect(result.verdict.conviction).toBe(0.75);
    }
  });

  it('normalises case and numeric strings', () => {
    const result = parseVerdict(verdict({
      recommendation: ' sell ',
      conviction: '0.5',
      conviction_category: 'medium',
      confidence_level: 'MEDIUM',
      time_horizon: 6,
    }));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.verdict).toMatchObject({
        recommendation: 'Sell',
        conviction: 0.5,
        conviction_category: 'Medium',
        confidence_level: 'Medium',
        time_horizon: '6',
      });
    }
  });

  it('reports missing evidence lists and out-of-range scores', () => {
    const result = parseVerdict(verdict({ key_factors: ['one'], data_quality: 1.4 }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues.map(i => i.split(':')[0]).sort()).toEqual(['data_quality', 'key_factors']);
    }
  });

  it('rejects an unknown recommendation', () => {
    expect(parseVerdict(verdict({ recommendation: 'Accumulate' })).ok).toBe(false);
  });
});

describe('checkVerdictConsistency', () => {
  it('finds nothing wrong with a matching category and confidence', () => {
    const result = parseVerdict(verdict());
    expect(result.ok && checkVerdictConsistency(result.verdict)).toEqual([]);
  });

  it('reports a conviction outside its category and a differing confidence level', () => {
    const result = parseVerdict(verdict({ conviction: 0.5, confidence_level: 'Medium' }));
    if (!result.ok) throw new Error('fixture should parse');
    expect(checkVerdictConsistency(result.verdict)).toEqual([
      'conviction 0.5 is outside High (0.75 ± 0.1)',
      'confidence_level Medium differs from conviction_category High',
    ]);
  });
});

describe('categoryMatchesConviction', () => {
  it('allows the ±0.1 adjustment band around each anchor', () => {
    expect(categoryMatchesConviction('Medium', 0.6)).toBe(true);
    expect(categoryMatchesConviction('Medium', 0.65)).toBe(false);
    expect(categoryMatchesConviction('Low', 0.15)).toBe(true);
    expect(categoryMatchesConviction('High', 0.85)).toBe(true);
  });
});
