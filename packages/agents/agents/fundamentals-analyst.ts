// Fundamentals Analyst - shared statement bundle plus insider activity

import {
  BaseAnalyst, clipStatements, type AnalystContext, type AnalystPayload, type GatherState,
} from './base-analyst.js';
import { CLIP_BUDGETS, clipText } from '../utils/clip-text.js';

export class FundamentalsAnalyst extends BaseAnalyst {
  protected readonly role =
    'You are a fundamental analyst reviewing the provided fundamentals, statements and insider data for the company. '
    + 'Assess profitability, balance-sheet strength, cash generation and insider behaviour.';

  constructor() {
    super('fundamentals');
  }

  protected async gather(ctx: AnalystContext, state: GatherState): Promise<AnalystPayload> {
    const { provider, run } = ctx;
    const { ticker, asOf } = run;

    const bundle = await this.sharedFinancials(ctx, state);
    const [insiderSentiment, insiderTransactions] = await Promise.all([
      this.call(ctx, state, 'get_insider_sentiment', { ticker, asOf },
        () => provider.getInsiderSentiment(ticker, asOf)),
      this.call(ctx, state, 'get_insider_transactions', { ticker, asOf },
        () => provider.getInsiderTransactions(ticker, asOf)),
    ]);

    return {
      ...clipStatements(bundle),
      insider_sentiment: clipText(insiderSentiment, 'insider_sentiment', CLIP_BUDGETS.insider),
      insider_transactions: clipText(insiderTransactions, 'insider_transactions', CLIP_BUDGETS.insider),
    };
  }

  protected humanPrompt(ticker: string, asOf: string, payloadJson: string): string {
    return `Ticker: ${ticker}\nDate: ${asOf}\nFundamentals payload (JSON):\n${payloadJson}`;
  }
}
