// Recovers a JSON object from model output that may be wrapped in prose or code fences.

export function extractBalancedObject(s: string): string | null {
  let depth = 0;
  let start = -1;
  let inStr = false;
  let escaped = false;
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (inStr) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inStr = false;
      }
      continue;
    }
    if (ch === '"') {
      inStr = true;
      continue;
    }
    if (ch === "{") {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === "}" && depth > 0) {
      depth--;
      if (depth === 0 && start !== -1) return s.slice(start, i + 1);
    }
  }
  return null;
}

export function stripCodeFences(s: string): string {
  const fenced = s.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return fenced ? fenced[1].trim() : s.trim();
}

export class ModelJsonParseError extends Error {
  constructor(message: string, readonly preview: string) {
    super(message);
    this.name = "ModelJsonParseError";
  }
}

/**
 * Parses model output into a JSON value. When the request seeded the response with `prefill`,
 * the backend returns only the continuation, so the prefill is put back in front first.
 */
export function parseModelJson(raw: string, prefill: string | null = null): unknown {
  const text = prefill && !raw.trimStart().startsWith(prefill) ? prefill + raw : raw;
  const candidates = [text.trim(), stripCodeFences(text)];
  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      const extracted = extractBalancedObject(candidate);
      if (!extracted) continue;
      try {
        return JSON.parse(extracted);
      } catch {
        continue;
      }
    }
  }
  throw new ModelJsonParseError("Model output is not valid JSON", text.slice(0, 160));
}
