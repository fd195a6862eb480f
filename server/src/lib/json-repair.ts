/**
 * Extracts a JSON object from an LLM reply that may be wrapped in markdown
 * fences, surrounded by prose, or carry trailing commas.
 * Returns null when nothing parseable is found; callers treat that as a failure.
 */
export function parseModelJson(text: string): unknown {
  if (!text || typeof text !== 'string') return null;

  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start >= 0 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
    const extracted = tryParse(cleaned);
    if (extracted !== undefined) return extracted;
  }

  const noTrailing = tryParse(cleaned.replace(/,\s*([\]}])/g, '$1'));
  if (noTrailing !== undefined) return noTrailing;

  return null;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate) as unknown;
  } catch {
    return undefined;
  }
}
