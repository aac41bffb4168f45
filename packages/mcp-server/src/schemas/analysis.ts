import { z } from "zod";

export const TickerSchema = z.string().trim().min(1).max(10).describe("Stock ticker symbol (e.g., AAPL)");

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD").describe("Date (YYYY-MM-DD)");

export const StartAnalysisSchema = z.object({
  ticker: TickerSchema,
  date: IsoDateSchema.describe("Analysis date (YYYY-MM-DD); no data after it is used"),
  analysts: z.array(z.enum(["market", "sentiment", "news", "fundamentals"])).min(1).optional()
    .describe("Specialists to run; defaults to the configured set. Valuation always runs alongside"),
});

export const GetAnalysisSchema = z.object({
  task_id: z.string().min(1).describe("Task ID returned by start_analysis"),
});

export const ListTasksSchema = z.object({
  limit: z.number().int().min(1).max(100).default(10).describe("Maximum tasks to return, newest first"),
});

export type StartAnalysisInput = z.infer<typeof StartAnalysisSchema>;
