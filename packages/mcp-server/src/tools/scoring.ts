import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  aggregateToRecord,
  clamp01,
  computeAdjustedConviction,
  deriveRiskLevel,
  inferConflictLevel,
  pmDirectionalScore,
  resolveBaseConviction,
  roundTo,
  withConflictLevel,
} from "@stockdesk/agents";
import {
  PmScoreSchema,
  RiskConvictionSchema,
  type PmScoreInput,
  type RiskConvictionInput,
} from "../schemas/scoring.js";
import { coerceNumbers, respond } from "../formatters/response.js";

/** Deterministic PM aggregate; the name field is accepted as an alias for analyst */
export function pmScore(input: PmScoreInput): Record<string, unknown> {
  const signals = input.analysts.map(entry => ({
    analyst: entry.analyst ?? entry.name ?? "",
    recommendation: entry.recommendation,
    conviction: entry.conviction,
  }));
  const aggregate = pmDirectionalScore(signals, input.threshold);
  return aggregateToRecord(withConflictLevel(aggregate, inferConflictLevel(aggregate.inputs)));
}

export function riskAdjustedConviction(input: RiskConvictionInput): Record<string, unknown> {
  const hasStrengths = input.bullish_strength !== undefined || input.bearish_strength !== undefined;
  const basePm = input.base_conviction ?? resolveBaseConviction(hasStrengths
    ? { bullishStrength: input.bullish_strength ?? 0, bearishStrength: input.bearish_strength ?? 0 }
    : null);

  const factors = {
    basePm,
    companyRisk: clamp01(input.risk_factor_rc),
    valuationUncertainty: clamp01(input.valuation_uncertainty),
    sentimentRisk: clamp01(input.sentiment_risk_score),
    macroRisk: input.risk_factor_rm === "None" ? "None" as const : clamp01(input.risk_factor_rm),
    disagreement: clamp01(input.disagreement),
  };
  const macro = factors.macroRisk === "None" ? 0 : factors.macroRisk;

  return {
    original_conviction: roundTo(basePm, 2),
    adjusted_conviction: computeAdjustedConviction(factors),
    risk_level: deriveRiskLevel([
      factors.companyRisk, factors.valuationUncertainty, factors.sentimentRisk, macro, factors.disagreement,
    ]),
    risk_factor_rc: factors.companyRisk,
    valuation_uncertainty: factors.valuationUncertainty,
    sentiment_risk_score: factors.sentimentRisk,
    risk_factor_rm: factors.macroRisk,
    disagreement: factors.disagreement,
  };
}

export function registerScoringTools(server: McpServer) {
  server.tool(
    "pm_directional_score",
    "Aggregate analyst signals into the Portfolio Manager composite score. Weights come from each analyst's role (Fundamental 0.40, Valuation 0.30, Sentiment 0.20, News 0.20, Technical 0.10, Macro 0.10, anything else 1.0, normalised over the valid entries). Returns the composite score in [-1,1], direction (Buy/Hold/Sell by threshold), base conviction, bull/bear/hold strengths, per-input weights and the inferred conflict level.",
    PmScoreSchema.shape,
    async (params) => respond(() => pmScore(PmScoreSchema.parse(coerceNumbers(params)))),
  );

  server.tool(
    "risk_adjusted_conviction",
    "Apply the multiplicative risk decay to a PM base conviction: C_PM x (1-R_c) x (1-V_u) x (1-S_r) x (1-M_r) x (1-D), rounded to 2 decimals. Missing base conviction falls back to max(bullish, bearish) strength, then 0.5. Returns original and adjusted conviction, the derived risk level and the clamped factors.",
    RiskConvictionSchema.shape,
    async (params) => respond(() => riskAdjustedConviction(RiskConvictionSchema.parse(coerceNumbers(params)))),
  );
}
