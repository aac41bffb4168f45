// Sentiment Analyst - recent company headlines and insider sentiment

import { shiftDays } from '@stockdesk/market-data';
import { BaseAnalyst, type AnalystContext, type AnalystPayload, type GatherState } from './base-analyst.js';
import { CLIP_BUDGETS, clipText } from '../utils/clip-text.js';

export class SentimentAnalyst extends BaseAnalyst {
  protected readonly role =
    "You are a social/news sentiment analyst reviewing the past week's chatter for a company. "
    + 'Use the provided payload to extract sentiment, momentum of sentiment and notable narratives.';

  constructor() {
    super('sentiment');
  }

  protected async gather(ctx: AnalystContext, state: GatherState): Promise<AnalystPayload> {
    const { provider, run, settings } = ctx;
    const { ticker, asOf } = run;
    const start = shiftDays(asOf, -settings.newsLookbackDays);

    const [news, insiderSentiment] = await Promise.all([
      this.call(ctx, state, 'get_news', { ticker, start, end: asOf }, () => provider.getNews(ticker, start, asOf)),
      this.call(ctx, state, 'get_insider_sentiment', { ticker, asOf },
        () => provider.getInsiderSentiment(ticker, asOf)),
    ]);

    return {
      news: clipText(news, 'news', CLIP_BUDGETS.news),
      insider_sentiment: clipText(insiderSentiment, 'insider_sentiment', CLIP_BUDGETS.insider),
    };
  }

  protected humanPrompt(ticker: string, asOf: string, payloadJson: string): string {
    return `Ticker: ${ticker}\nDate: ${asOf}\nSentiment payload (JSON):\n${payloadJson}`;
  }
}
