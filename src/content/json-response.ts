// Helpers for pulling JSON out of model responses

const OPENING_FENCE = /^```(?:json|markdown|md)?[ \t]*\n?/i;

/**
 * Remove a surrounding ``` fence (with or without a language tag).
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length < 6 || !OPENING_FENCE.test(trimmed) || !trimmed.endsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(OPENING_FENCE, '').slice(0, -3).trim();
}

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * First fenced ```json block, then the whole text, then the outermost {...} span.
 */
export function extractJsonObject(text: string): unknown {
  const fenced = /```json\s*([\s\S]*?)\s*```/i.exec(text);
  if (fenced) {
    const parsed = tryParseJson(fenced[1]);
    if (parsed !== undefined) return parsed;
  }

  const whole = tryParseJson(text.trim());
  if (whole !== undefined) return whole;

  const span = text.match(/\{[\s\S]*\}/);
  return span ? tryParseJson(span[0]) : undefined;
}
