// Prompt text shared by the specialists, reviewer, portfolio manager and risk manager

export const ANALYST_OUTPUT_TEMPLATE = `{
  "analyst": "",
  "recommendation": "<Buy | Hold | Sell>",
  "conviction": <0.25 | 0.50 | 0.75>,
  "conviction_category": "<Low | Medium | High>",
  "evidence_strength": 0.0,
  "signal_clarity": 0.0,
  "data_quality": 0.0,
  "uncertainty_penalty": 0.0,
  "key_factors": ["...", "...", "..."],
  "risks": ["...", "..."],
  "overall_comment": "<concise overall takeaway>",
  "time_horizon": "<in months>",
  "confidence_level": "<Low | Medium | High>",
  "data_sources": ["...", "..."]
}`;

export function outputFormatInstructions(analystLabel: string, isValuation = false): string {
  const overallRule = isValuation
    ? 'In "overall_comment", include a concise valuation takeaway (intrinsic value range, margin of safety, and peer context).'
    : 'In "overall_comment", add a concise 1-2 sentence takeaway that synthesizes your recommendation and why it matters right now.';

  return [
    'Return output EXACTLY in this JSON structure (no markdown, no code fences, no extra text):',
    ANALYST_OUTPUT_TEMPLATE,
    `- Set "analyst" to "${analystLabel}".`,
    '- "recommendation" must be one of: Buy, Hold, or Sell.',
    '- Score evidence_strength, signal_clarity, data_quality, and uncertainty_penalty on 0-1. Choose a conviction_category of Low, Medium, or High and set conviction accordingly: Low=0.25, Medium=0.50, High=0.75 (adjust by ±0.1 if the evidence is clearly weaker/stronger but keep within [0,1]). Set confidence_level to match the conviction_category.',
    '- Choose the final recommendation consistent with the scored evidence and risks.',
    '- Include at least 5 concise "key_factors" driving the view and at least 2 "risks".',
    `- ${overallRule}`,
    '- "time_horizon" should be a months string (e.g., "3", "6-12").',
    '- "confidence_level" must be Low, Medium, or High.',
    '- "data_sources" should cite the datasets you used (e.g., "prices", "indicators", "fundamentals", "news").',
    'Do not add prose before or after the JSON.',
  ].join('\n');
}

export function specialistSystemPrompt(role: string, ticker: string, asOf: string, formatBlock: string): string {
  return [
    'You are a helpful AI assistant, collaborating with other assistants.',
    'Do not call any tools; a single JSON payload with the data is provided.',
    'If the payload contains errors, still use what is available.',
    'Respond ONLY with the required JSON object.',
    role,
    '',
    formatBlock,
    '',
    `For your reference, the current date is ${asOf}. The company we want to look at is ${ticker}.`,
  ].join('\n');
}

export function selfConsistencySystem(label: string): string {
  return `You are a quality-check reviewer for the ${label}. `
    + 'You will receive a draft JSON output with conviction and a recommendation. '
    + 'Re-evaluate the conviction score and recommendation against the evidence and risks described. '
    + 'Adjust only if needed. '
    + 'Return ONLY the final JSON object (no extra text, no markdown).';
}

export function selfConsistencyPrompt(draftJson: string, instructions?: string): string {
  const parts = [
    `Draft JSON to review:\n${draftJson}`,
    'Re-evaluate the conviction score and recommendation. Is it justified by the evidence and risks? '
      + 'Adjust only if necessary. Keep every other field exactly as it is. Return the final JSON only.',
  ];
  if (instructions) parts.push(instructions);
  return parts.join('\n\n');
}

export const PM_NARRATIVE_SCHEMA = `{
  "module": "AnalystAggregation",
  "summary": {
    "overall_signal": "<Bullish | Bearish | Mixed>",
    "bullish_strength": 0.0,
    "bearish_strength": 0.0,
    "conflict_level": 0.0,
    "interpretation": ""
  },
  "bullish_indicators": [{"indicator": "", "source_analyst": "", "conviction": 0.0}],
  "bearish_indicators": [{"indicator": "", "source_analyst": "", "conviction": 0.0}],
  "conflicting_indicators": [
    {"topic": "", "bullish_evidence": "", "bearish_evidence": "", "analysts_involved": ["", ""]}
  ],
  "pm_direction": "<Buy|Hold|Sell>",
  "pm_composite_score": 0.0,
  "pm_base_conviction": 0.0,
  "pm_threshold": 0.33,
  "pm_inputs": []
}`;

export const PM_SYSTEM = 'You are the PM Engine, aggregating analyst outputs into a single JSON. '
  + 'Use ONLY the provided analyst reports. Return JSON only, no markdown.';

export function pmNarrativePrompt(input: {
  aggregateJson: string;
  pastRecommendations: string;
  reports: Array<{ name: string; report: string }>;
}): string {
  const reportLines = input.reports.map(r => `- ${r.name}: ${r.report || '(not available)'}`).join('\n');
  return [
    'Return JSON exactly in this schema:',
    PM_NARRATIVE_SCHEMA,
    '',
    'Instructions:',
    '- Derive bullish/bearish strengths in [0,1] from analyst convictions; conflict_level in [0,1] based on divergence.',
    `- Use this precomputed PM scoring as the primary calculation and reflect it in the output: ${input.aggregateJson}`,
    '- Interpretation must explain why views align or conflict.',
    '- Use at least 2 bullish_indicators and 2 bearish_indicators when present.',
    `- Use past reflections if relevant: ${input.pastRecommendations || '(none)'}`,
    '',
    'Analyst reports to ingest:',
    reportLines,
  ].join('\n');
}

export const RISK_SYSTEM = 'You are the Risk Manager for a single-stock review. '
  + 'Evaluate risks and adjust the PM Engine conviction using the required formula. Use only the provided evidence.';

export const RISK_OUTPUT_SCHEMA = `{
  "risk_level": "<Low|Medium|High>",
  "original_conviction": <float>,
  "adjusted_conviction": <float>,
  "risk_factor_rc": <float>,
  "risk_factor_rm": <float or "None">,
  "disagreement": <float>,
  "valuation_uncertainty": <float>,
  "sentiment_risk_score": <float>,
  "macro_risk_warning": "<string or 'None'>",
  "final_recommendation": "<Buy|Hold|Sell>",
  "risk_factors": {
    "company_specific": "",
    "volatility_risk": "",
    "valuation_uncertainty": "",
    "sentiment_risk": "",
    "analyst_disagreement": ""
  },
  "recommendation_adjustment": "",
  "explanation": ""
}`;

export interface RiskPromptInput {
  bullish: number;
  bearish: number;
  conflict: number | 'unknown';
  basePm: number;
  direction: string;
  planJson: string;
  pastRecommendations: string;
  reports: Array<{ name: string; report: string }>;
}

export function riskPrompt(input: RiskPromptInput): string {
  const reportLines = input.reports.map(r => `- ${r.name}: ${r.report || '(not available)'}`).join('\n');
  return [
    'PM Engine summary (use as priors):',
    `- Bullish strength: ${input.bullish}`,
    `- Bearish strength: ${input.bearish}`,
    `- Conflict level (D): ${input.conflict}`,
    `- Base conviction from PM Engine (C_PM): ${input.basePm}`,
    `- PM recommendation (do NOT change it): ${input.direction}`,
    `- Full PM Engine output: ${input.planJson}`,
    '',
    'Assess, each in [0,1]: company-specific risk R_c (risk_factor_rc), valuation uncertainty V_u,',
    'sentiment and narrative risk S_r (sentiment_risk_score), macro/sector risk M_r (risk_factor_rm, or "None"),',
    'and analyst disagreement D (use the conflict level when present).',
    '',
    'C_final = C_PM * (1 - R_c) * (1 - V_u) * (1 - S_r) * (1 - M_r) * (1 - D), rounded to two decimals.',
    '',
    'Data you can use:',
    reportLines,
    `- Past lessons: ${input.pastRecommendations || '(none)'}`,
    '',
    'Return STRICT JSON only in this shape:',
    RISK_OUTPUT_SCHEMA,
    `- final_recommendation MUST equal the PM recommendation: ${input.direction}. Only adjust conviction.`,
    '- Make recommendation_adjustment explicit (e.g., de-risk to Hold, trim size).',
    '- For each entry in risk_factors, include a brief rationale.',
  ].join('\n');
}

export function riskVerifierInstructions(input: Pick<RiskPromptInput, 'bullish' | 'bearish' | 'conflict' | 'basePm' | 'direction'>): string {
  return [
    'You are verifying the Risk Manager output. Inputs you must respect:',
    `- Bullish strength: ${input.bullish}`,
    `- Bearish strength: ${input.bearish}`,
    `- Conflict level (D): ${input.conflict}`,
    `- Base conviction C_PM: ${input.basePm}`,
    `- final_recommendation MUST equal ${input.direction}.`,
    'If any field is missing or inconsistent with the formula, fix it. Clamp numeric values to [0,1].',
  ].join('\n');
}
