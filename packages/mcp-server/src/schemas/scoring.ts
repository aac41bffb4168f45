import { z } from "zod";
import { DEFAULT_PM_THRESHOLD } from "@stockdesk/agents";

export const AnalystSignalSchema = z.object({
  analyst: z.string().optional().describe("Analyst label; its role sets the weight (e.g., Fundamental, Valuation, Technical, News)"),
  name: z.string().optional().describe("Alias for analyst"),
  recommendation: z.string().describe("Buy, Hold or Sell (case-insensitive); other values are skipped"),
  conviction: z.union([z.number(), z.string()]).optional().describe("Conviction in [0,1]; clamped, unreadable values count as 0"),
});

export const PmScoreSchema = z.object({
  analysts: z.array(AnalystSignalSchema).default([]).describe("Analyst signals to aggregate. Weights come from the role, never from the input"),
  threshold: z.number().min(0).max(1).default(DEFAULT_PM_THRESHOLD).describe("Direction threshold: Buy at or above it, Sell at or below its negative"),
});

const factor = (description: string) => z.number().describe(`${description}; clamped to [0,1]`);

export const RiskConvictionSchema = z.object({
  base_conviction: z.number().min(0).max(1).optional()
    .describe("PM base conviction C_PM. When omitted: max(bullish_strength, bearish_strength), else 0.5"),
  bullish_strength: z.number().min(0).max(1).optional().describe("PM bullish strength"),
  bearish_strength: z.number().min(0).max(1).optional().describe("PM bearish strength"),
  risk_factor_rc: factor("Company-specific risk R_c"),
  valuation_uncertainty: factor("Valuation uncertainty V_u"),
  sentiment_risk_score: factor("Sentiment and narrative risk S_r"),
  risk_factor_rm: z.union([z.number(), z.literal("None")]).default("None").describe("Macro/sector risk M_r, or None"),
  disagreement: factor("Analyst disagreement D").default(0),
});

export type PmScoreInput = z.infer<typeof PmScoreSchema>;
export type RiskConvictionInput = z.infer<typeof RiskConvictionSchema>;
