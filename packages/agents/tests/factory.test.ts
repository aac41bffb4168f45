import { describe, it, expect } from 'vitest';
import { createOrchestrator, createProducers } from '../orchestrator/factory.js';
import { ConfigurationError } from '../orchestrator/errors.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { AnthropicVerdictProducer } from '../utils/verdict-producer.js';
import { FakeProvider, ScriptedProducer, echoReview, verdictJson } from './fixtures.js';

describe('createProducers', () => {
  it('requires an API key', () => {
    expect(() => createProducers(DEFAULT_CONFIG)).toThrow(ConfigurationError);
  });

  it('builds one producer per model tier', () => {
    const { quick, deep } = createProducers({ ...DEFAULT_CONFIG, anthropicApiKey: 'test-secret' });

    expect(quick).toBeInstanceOf(AnthropicVerdictProducer);
    expect(deep).toBeInstanceOf(AnthropicVerdictProducer);
    if (quick instanceof AnthropicVerdictProducer && deep instanceof AnthropicVerdictProducer) {
      expect(quick.model).toBe(DEFAULT_CONFIG.quickModel);
      expect(deep.model).toBe(DEFAULT_CONFIG.deepModel);
    }
  });
});

describe('createOrchestrator', () => {
  it('runs with injected collaborators and no API key', async () => {
    const producer = new ScriptedProducer((request, kind) =>
      kind.type === 'review' ? echoReview(request, kind) : verdictJson({ analyst: kind.type === 'specialist' ? kind.label : '' }));
    const orchestrator = await createOrchestrator(
      { ...DEFAULT_CONFIG, analysts: ['market'] },
      { dataProvider: new FakeProvider(), quickProducer: producer, deepProducer: null },
    );

    const snapshot = await orchestrator.analyze('AAPL', '2024-05-10');

    expect(snapshot.selected).toEqual(['market', 'valuation']);
    expect(snapshot.finalDecision?.finalRecommendation).toBe('Buy');
  });
});
