// Payload clipping - bounds each upstream payload before it reaches a prompt

export const CLIP_BUDGETS = {
  statement: 12_000,
  insider: 6_000,
  priceWindow: 8_000,
  indicator: 4_000,
  currentPrice: 2_000,
  peers: 4_000,
  news: 12_000,
} as const;

/** Render any payload as prompt text; strings pass through, everything else is JSON */
export function stringifyPayload(payload: unknown): string {
  if (payload === null || payload === undefined) return '';
  if (typeof payload === 'string') return payload;
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}

/**
 * Truncate to `maxChars`, appending a marker with the omitted character count.
 * Text at or under the budget is returned unchanged.
 */
export function clipText(payload: unknown, label: string, maxChars: number = CLIP_BUDGETS.priceWindow): string {
  const text = stringifyPayload(payload);
  if (text.length <= maxChars) return text;
  const omitted = text.length - maxChars;
  return `${text.slice(0, maxChars)}\n\n...[truncated ${label}, ${omitted} chars omitted]...`;
}
