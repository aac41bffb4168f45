import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, parseSpecialistList } from '../config/index.js';
import { ConfigurationError } from '../orchestrator/errors.js';

describe('parseSpecialistList', () => {
  it('lower-cases, trims and de-duplicates names', () => {
    expect(parseSpecialistList(' Market, news ,market,,')).toEqual({ kinds: ['market', 'news'], unknown: [] });
  });

  it('reports unknown names and valuation, which is not selectable', () => {
    expect(parseSpecialistList('market,macro,valuation')).toEqual({
      kinds: ['market'],
      unknown: ['macro', 'valuation'],
    });
  });
});

describe('loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ ...DEFAULT_CONFIG, anthropicApiKey: undefined });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ STOCKDESK_PM_THRESHOLD: '  ', STOCKDESK_ANALYSTS: '' }).pmThreshold).toBe(0.33);
  });

  it('parses numbers, flags and the specialist list', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-secret',
      STOCKDESK_PM_THRESHOLD: '0.25',
      STOCKDESK_ANALYSTS: 'news,fundamentals',
      STOCKDESK_MEMORY_BACKEND: 'postgres',
      STOCKDESK_MEMORY_MATCHES: '3',
      STOCKDESK_REMEMBER_DECISIONS: 'yes',
    });
    expect(config).toMatchObject({
      anthropicApiKey: 'test-secret',
      pmThreshold: 0.25,
      analysts: ['news', 'fundamentals'],
      memoryBackend: 'postgres',
      memoryMatches: 3,
      rememberDecisions: true,
    });
  });

  it('rejects an out-of-range threshold with the offending key', () => {
    try {
      loadConfig({ STOCKDESK_PM_THRESHOLD: '2' });
      expect.unreachable('loadConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0].startsWith('STOCKDESK_PM_THRESHOLD:')).toBe(true);
      }
    }
  });

  it('rejects unknown specialists', () => {
    expect(() => loadConfig({ STOCKDESK_ANALYSTS: 'market,macro' }))
      .toThrow('Invalid configuration: STOCKDESK_ANALYSTS has unknown specialists: macro');
  });

  it('rejects an unknown memory backend', () => {
    expect(() => loadConfig({ STOCKDESK_MEMORY_BACKEND: 'redis' })).toThrow(ConfigurationError);
  });
});
