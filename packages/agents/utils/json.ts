// Lenient JSON extraction for language-model output
// Accepts bare JSON, fenced code blocks and JSON embedded in prose

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Index of the brace closing the object opened at `start`, honouring strings */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Extract the first JSON object from free text.
 * Returns null for empty input or when no parsable object is present.
 */
export function extractJsonObject(text: string | null | undefined): Record<string, unknown> | null {
  if (!text) return null;
  const trimmed = text.trim();
  if (!trimmed) return null;

  const direct = tryParseObject(trimmed);
  if (direct) return direct;

  const fenced = FENCE.exec(trimmed);
  if (fenced) {
    const inner = tryParseObject(fenced[1].trim());
    if (inner) return inner;
  }

  let start = trimmed.indexOf('{');
  while (start !== -1) {
    const end = matchingBrace(trimmed, start);
    if (end === -1) return null;
    const candidate = tryParseObject(trimmed.slice(start, end + 1));
    if (candidate) return candidate;
    start = trimmed.indexOf('{', start + 1);
  }
  return null;
}
