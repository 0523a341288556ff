function asObject(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return value as Record<string, unknown>;
}

function tryParse(text: string): Record<string, unknown> | null {
  try {
    return asObject(JSON.parse(text));
  } catch {
    return null;
  }
}

/**
 * Reads the top-level JSON object out of a model reply: bare JSON, JSON wrapped in a
 * markdown fence, or the first `{...}` span of a chatty answer.
 */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  const candidate = String(text || "")
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  if (!candidate) return null;

  const direct = tryParse(candidate);
  if (direct) return direct;

  const match = candidate.match(/\{[\s\S]*\}/);
  return match ? tryParse(match[0]) : null;
}
