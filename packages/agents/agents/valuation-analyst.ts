// Valuation Analyst - intrinsic value from the shared statements, current price and peers
// Always scheduled; never required by the join gate

import {
  BaseAnalyst, clipStatements, type AnalystContext, type AnalystPayload, type GatherState,
} from './base-analyst.js';
import { CLIP_BUDGETS, clipText } from '../utils/clip-text.js';

export class ValuationAnalyst extends BaseAnalyst {
  protected readonly role =
    'You are a valuation analyst performing intrinsic value assessment with a 12-24 month horizon. '
    + 'Estimate a fair value range from the statements, compare it with the current price and peer context, '
    + 'and state the margin of safety.';

  protected readonly isValuation = true;

  constructor() {
    super('valuation');
  }

  protected async gather(ctx: AnalystContext, state: GatherState): Promise<AnalystPayload> {
    const { provider, run } = ctx;
    const { ticker, asOf } = run;

    const [bundle, currentPrice, peers] = await Promise.all([
      this.sharedFinancials(ctx, state),
      this.call(ctx, state, 'get_stock_data', { ticker, start: asOf, end: asOf },
        () => provider.getStockData(ticker, asOf, asOf)),
      this.call(ctx, state, 'get_peers', { ticker }, () => provider.getPeers(ticker)),
    ]);

    return {
      ...clipStatements(bundle),
      current_price: clipText(currentPrice, 'current_price', CLIP_BUDGETS.currentPrice),
      peer_companies: clipText(peers, 'peer_companies', CLIP_BUDGETS.peers),
    };
  }

  protected humanPrompt(ticker: string, asOf: string, payloadJson: string): string {
    return `Ticker: ${ticker}\nDate: ${asOf}\nValuation payload (JSON):\n${payloadJson}`;
  }
}
