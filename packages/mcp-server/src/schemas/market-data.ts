import { z } from "zod";
import { IsoDateSchema, TickerSchema } from "./analysis.js";

export const SymbolSchema = z.object({
  ticker: TickerSchema,
});

export const SymbolAsOfSchema = SymbolSchema.extend({
  as_of: IsoDateSchema.describe("As-of date (YYYY-MM-DD); later records are excluded"),
});

export const DateRangeSchema = SymbolSchema.extend({
  start_date: IsoDateSchema.describe("Start date (YYYY-MM-DD)"),
  end_date: IsoDateSchema.describe("End date (YYYY-MM-DD)"),
});

export const IndicatorSchema = SymbolAsOfSchema.extend({
  indicator: z.string().min(1).describe("rsi, sma, ema, adx, standarddeviation or williams"),
  look_back_days: z.number().int().min(1).max(365).default(60).describe("Days of history before as_of"),
});

export const StatementSchema = SymbolAsOfSchema.extend({
  freq: z.enum(["quarterly", "annual"]).default("quarterly").describe("Reporting frequency"),
});

export const GlobalNewsSchema = z.object({
  as_of: IsoDateSchema.describe("As-of date (YYYY-MM-DD)"),
  look_back_days: z.number().int().min(1).max(90).default(7).describe("Days of headlines before as_of"),
  limit: z.number().int().min(1).max(50).default(5).describe("Maximum headlines"),
});
