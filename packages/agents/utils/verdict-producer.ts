// Verdict producer - language-model access behind a one-method interface
// Uses the Anthropic SDK; specialists and reviewers only see complete()

import type Anthropic from '@anthropic-ai/sdk';

export interface VerdictRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
}

export interface VerdictProducer {
  /** Resolve to the raw response text; may be empty */
  complete(request: VerdictRequest): Promise<string>;
}

export interface AnthropicProducerOptions {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

export class AnthropicVerdictProducer implements VerdictProducer {
  private clientPromise: Promise<Anthropic> | null = null;

  constructor(private readonly options: AnthropicProducerOptions) {}

  get model(): string {
    return this.options.model;
  }

  // Lazy-load the SDK so scoring-only callers never pay for it
  private getClient(): Promise<Anthropic> {
    if (!this.clientPromise) {
      const { apiKey } = this.options;
      this.clientPromise = import('@anthropic-ai/sdk').then(mod => new mod.default({ apiKey }));
    }
    return this.clientPromise;
  }

  async complete(request: VerdictRequest): Promise<string> {
    const client = await this.getClient();
    const response = await client.messages.create({
      model: this.options.model,
      max_tokens: request.maxTokens ?? this.options.maxTokens ?? 4096,
      system: request.system,
      messages: [{ role: 'user', content: request.prompt }],
    });

    return response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('')
      .trim();
  }
}
