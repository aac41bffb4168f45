// Market Analyst - price window plus a fixed technical indicator set
// Data: getStockData over the market lookback, getIndicator per indicator

import { shiftDays } from '@stockdesk/market-data';
import { BaseAnalyst, type AnalystContext, type AnalystPayload, type GatherState } from './base-analyst.js';
import { CLIP_BUDGETS, clipText } from '../utils/clip-text.js';

export const MARKET_INDICATORS = ['rsi', 'sma', 'ema', 'adx', 'standarddeviation', 'williams'] as const;

export class MarketAnalyst extends BaseAnalyst {
  protected readonly role =
    'You are a market/technical analyst selecting the most relevant indicators for current conditions. '
    + 'Use the provided price window and indicator payloads to judge trend, momentum, volatility and '
    + 'support/resistance, and translate them into a trading leaning.';

  constructor() {
    super('market');
  }

  protected async gather(ctx: AnalystContext, state: GatherState): Promise<AnalystPayload> {
    const { provider, run, settings } = ctx;
    const { ticker, asOf } = run;
    const start = shiftDays(asOf, -settings.marketLookbackDays);

    const [priceWindow, ...indicatorResults] = await Promise.all([
      this.call(ctx, state, 'get_stock_data', { ticker, start, end: asOf },
        () => provider.getStockData(ticker, start, asOf)),
      ...MARKET_INDICATORS.map(indicator =>
        this.call(ctx, state, 'get_indicators', { ticker, indicator, asOf, lookBack: settings.indicatorLookbackDays },
          () => provider.getIndicator(ticker, indicator, asOf, settings.indicatorLookbackDays))),
    ]);

    const indicators: Record<string, string> = {};
    MARKET_INDICATORS.forEach((name, i) => {
      indicators[name] = clipText(indicatorResults[i], `indicator:${name}`, CLIP_BUDGETS.indicator);
    });

    return {
      price_window: clipText(priceWindow, 'price_window', CLIP_BUDGETS.priceWindow),
      indicators,
    };
  }

  protected humanPrompt(ticker: string, asOf: string, payloadJson: string): string {
    return `Ticker: ${ticker}\nDate: ${asOf}\nMarket data payload (JSON):\n${payloadJson}`;
  }
}
