// Wires an Orchestrator from StockdeskConfig: FMP market data, Anthropic producers
// and the configured situation memory backend

import { FmpMarketDataProvider } from '@stockdesk/market-data';
import type { StockdeskConfig } from '../config/index.js';
import { createSituationMemory } from '../config/database.js';
import type { DomainEvent } from '../types/events.js';
import type { MarketDataProvider } from '../utils/market-data.js';
import { AnthropicVerdictProducer, type VerdictProducer } from '../utils/verdict-producer.js';
import { ConfigurationError } from './errors.js';
import { Orchestrator } from './coordinator.js';

export interface OrchestratorOverrides {
  dataProvider?: MarketDataProvider;
  quickProducer?: VerdictProducer;
  deepProducer?: VerdictProducer | null;
  onEvent?: (event: DomainEvent) => void;
}

export function createProducers(config: StockdeskConfig): { quick: VerdictProducer; deep: VerdictProducer } {
  const apiKey = config.anthropicApiKey;
  if (!apiKey) {
    throw new ConfigurationError('ANTHROPIC_API_KEY is required to run specialists', ['ANTHROPIC_API_KEY: missing']);
  }
  return {
    quick: new AnthropicVerdictProducer({ apiKey, model: config.quickModel, maxTokens: config.maxTokens }),
    deep: new AnthropicVerdictProducer({ apiKey, model: config.deepModel, maxTokens: config.maxTokens }),
  };
}

export async function createOrchestrator(
  config: StockdeskConfig,
  overrides: OrchestratorOverrides = {},
): Promise<Orchestrator> {
  let quick = overrides.quickProducer;
  let deep = overrides.deepProducer;
  if (!quick) {
    const producers = createProducers(config);
    quick = producers.quick;
    if (deep === undefined) deep = producers.deep;
  }

  return new Orchestrator({
    dataProvider: overrides.dataProvider ?? new FmpMarketDataProvider(),
    quickProducer: quick,
    deepProducer: deep,
    memory: await createSituationMemory(config.memoryBackend),
    config,
    onEvent: overrides.onEvent,
  });
}
