// Helpers for reading JSON out of free-form model replies

/** Strip reasoning tags some models wrap around their output */
export function stripThinking(text: string): string {
  return text
    .replace(/<think>[\s\S]*?<\/think>/gi, '')
    .replace(/<thinking>[\s\S]*?<\/thinking>/gi, '')
    .trim();
}

/**
 * Find the first JSON object in a reply.
 * Tries the whole text, then a fenced ```json block, then the outermost braces.
 * Returns undefined when nothing parses to a plain object.
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const cleaned = stripThinking(text);
  const candidates: string[] = [cleaned];

  const fenced = cleaned.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) {
    candidates.push(fenced[1].trim());
  }

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(cleaned.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isPlainObject(parsed)) {
        return parsed;
      }
    } catch {
      // Try the next candidate
    }
  }

  return undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Cut without splitting a surrogate pair */
function cutText(text: string, maxChars: number): string {
  let end = maxChars;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    end--;
  }
  return `${text.slice(0, end)}… [truncated ${text.length - end} chars]`;
}

/**
 * Drop trailing items from the first array field until the JSON fits,
 * recording how many were left out
 */
function dropTrailingItems(value: object, maxChars: number): string | undefined {
  const entries: [string, unknown][] = Object.entries(value);
  const listEntry = entries.find(([, field]) => Array.isArray(field));
  if (!listEntry) return undefined;

  const [key, list] = listEntry;
  if (!Array.isArray(list)) return undefined;

  for (let keep = list.length - 1; keep >= 0; keep--) {
    const text = JSON.stringify({ ...value, [key]: list.slice(0, keep), omitted: list.length - keep });
    if (text.length <= maxChars) {
      return text;
    }
  }
  return undefined;
}

/** Compact JSON for observations, cut to a character budget */
export function toObservationText(value: unknown, maxChars = 4000): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  if (text.length <= maxChars) {
    return text;
  }

  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const trimmed = dropTrailingItems(value, maxChars);
    if (trimmed !== undefined) {
      return trimmed;
    }
  }
  return cutText(text, maxChars);
}
