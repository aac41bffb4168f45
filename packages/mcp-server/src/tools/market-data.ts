import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { z } from "zod";
import type { MarketDataProvider } from "@stockdesk/agents";
import {
  DateRangeSchema,
  GlobalNewsSchema,
  IndicatorSchema,
  StatementSchema,
  SymbolAsOfSchema,
  SymbolSchema,
} from "../schemas/market-data.js";
import { coerceNumbers, respond } from "../formatters/response.js";

export interface MarketDataTool {
  name: string;
  description: string;
  schema: z.AnyZodObject;
  run: (provider: MarketDataProvider, params: unknown) => Promise<unknown>;
}

/** The provider resolves error payloads instead of rejecting; surface them as tool errors */
export function unwrap(payload: unknown): unknown {
  if (typeof payload === "object" && payload !== null) {
    const error = Reflect.get(payload, "error");
    if (typeof error === "string") throw new Error(error);
  }
  return payload;
}

export const MARKET_DATA_TOOLS: readonly MarketDataTool[] = [
  {
    name: "stock_data",
    description: "Get daily OHLCV price rows for a ticker between two dates (inclusive), oldest first.",
    schema: DateRangeSchema,
    run: async (provider, params) => {
      const { ticker, start_date, end_date } = DateRangeSchema.parse(params);
      return unwrap(await provider.getStockData(ticker.toUpperCase(), start_date, end_date));
    },
  },
  {
    name: "indicators",
    description: "Get a technical indicator series (rsi, sma, ema, adx, standarddeviation, williams) for the look-back window ending at as_of.",
    schema: IndicatorSchema,
    run: async (provider, params) => {
      const { ticker, indicator, as_of, look_back_days } = IndicatorSchema.parse(coerceNumbers(params));
      return unwrap(await provider.getIndicator(ticker.toUpperCase(), indicator, as_of, look_back_days));
    },
  },
  {
    name: "fundamentals",
    description: "Get the company profile and recent key metrics, excluding anything reported after as_of.",
    schema: SymbolAsOfSchema,
    run: async (provider, params) => {
      const { ticker, as_of } = SymbolAsOfSchema.parse(params);
      return unwrap(await provider.getFundamentals(ticker.toUpperCase(), as_of));
    },
  },
  {
    name: "peer_companies",
    description: "Get peer tickers: the provider's peer list, else sector peers from the company profile, else index ETFs.",
    schema: SymbolSchema,
    run: async (provider, params) => {
      const { ticker } = SymbolSchema.parse(params);
      return unwrap(await provider.getPeers(ticker));
    },
  },
  {
    name: "balance_sheet",
    description: "Get recent balance sheets (quarterly or annual) filed on or before as_of.",
    schema: StatementSchema,
    run: async (provider, params) => {
      const { ticker, freq, as_of } = StatementSchema.parse(params);
      return unwrap(await provider.getBalanceSheet(ticker.toUpperCase(), freq, as_of));
    },
  },
  {
    name: "cashflow",
    description: "Get recent cash flow statements (quarterly or annual) filed on or before as_of.",
    schema: StatementSchema,
    run: async (provider, params) => {
      const { ticker, freq, as_of } = StatementSchema.parse(params);
      return unwrap(await provider.getCashflow(ticker.toUpperCase(), freq, as_of));
    },
  },
  {
    name: "income_statement",
    description: "Get recent income statements (quarterly or annual) filed on or before as_of.",
    schema: StatementSchema,
    run: async (provider, params) => {
      const { ticker, freq, as_of } = StatementSchema.parse(params);
      return unwrap(await provider.getIncomeStatement(ticker.toUpperCase(), freq, as_of));
    },
  },
  {
    name: "news",
    description: "Get company news articles published between two dates (inclusive).",
    schema: DateRangeSchema,
    run: async (provider, params) => {
      const { ticker, start_date, end_date } = DateRangeSchema.parse(params);
      return unwrap(await provider.getNews(ticker.toUpperCase(), start_date, end_date));
    },
  },
  {
    name: "global_news",
    description: "Get general market headlines from the look-back window ending at as_of.",
    schema: GlobalNewsSchema,
    run: async (provider, params) => {
      const { as_of, look_back_days, limit } = GlobalNewsSchema.parse(coerceNumbers(params));
      return unwrap(await provider.getGlobalNews(as_of, look_back_days, limit));
    },
  },
  {
    name: "insider_sentiment",
    description: "Get quarterly insider trading statistics up to the quarter containing as_of.",
    schema: SymbolAsOfSchema,
    run: async (provider, params) => {
      const { ticker, as_of } = SymbolAsOfSchema.parse(params);
      return unwrap(await provider.getInsiderSentiment(ticker.toUpperCase(), as_of));
    },
  },
  {
    name: "insider_transactions",
    description: "Get insider transactions dated on or before as_of.",
    schema: SymbolAsOfSchema,
    run: async (provider, params) => {
      const { ticker, as_of } = SymbolAsOfSchema.parse(params);
      return unwrap(await provider.getInsiderTransactions(ticker.toUpperCase(), as_of));
    },
  },
];

export function registerMarketDataTools(server: McpServer, provider: MarketDataProvider) {
  for (const tool of MARKET_DATA_TOOLS) {
    server.tool(
      tool.name,
      tool.description,
      tool.schema.shape,
      async (params: unknown) => respond(() => tool.run(provider, params)),
    );
  }
}
