// News Analyst - company headlines plus global/macro headlines over the news lookback

import { shiftDays } from '@stockdesk/market-data';
import { BaseAnalyst, type AnalystContext, type AnalystPayload, type GatherState } from './base-analyst.js';
import { CLIP_BUDGETS, clipText } from '../utils/clip-text.js';

const GLOBAL_NEWS_LIMIT = 10;

export class NewsAnalyst extends BaseAnalyst {
  protected readonly role =
    "You are a news researcher assessing the past week's headlines relevant to the ticker. "
    + 'Extract catalysts, macro context and momentum of coverage, and translate the news impact into a trading leaning.';

  constructor() {
    super('news');
  }

  protected async gather(ctx: AnalystContext, state: GatherState): Promise<AnalystPayload> {
    const { provider, run, settings } = ctx;
    const { ticker, asOf } = run;
    const start = shiftDays(asOf, -settings.newsLookbackDays);

    const [news, globalNews] = await Promise.all([
      this.call(ctx, state, 'get_news', { ticker, start, end: asOf }, () => provider.getNews(ticker, start, asOf)),
      this.call(ctx, state, 'get_global_news', { asOf, lookBack: settings.newsLookbackDays, limit: GLOBAL_NEWS_LIMIT },
        () => provider.getGlobalNews(asOf, settings.newsLookbackDays, GLOBAL_NEWS_LIMIT)),
    ]);

    return {
      company_news: clipText(news, 'company_news', CLIP_BUDGETS.news),
      global_news: clipText(globalNews, 'global_news', CLIP_BUDGETS.news),
    };
  }

  protected humanPrompt(ticker: string, asOf: string, payloadJson: string): string {
    return `Ticker: ${ticker}\nDate: ${asOf}\nNews payload (JSON):\n${payloadJson}`;
  }
}
