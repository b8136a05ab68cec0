export function jsonOnlySystemPrompt(instruction: string): string {
  return [
    "You MUST output ONLY valid JSON.",
    "No markdown. No prose. No code fences.",
    `JSON shape: ${instruction}`
  ].join("\n");
}

/**
 * First balanced `{...}` in `text`, honouring string literals and escapes.
 * Returns null when no object closes.
 */
export function extractFirstJsonObject(text: string): string | null {
  let start = text.indexOf("{");

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === "{") depth += 1;
      else if (ch === "}") {
        depth -= 1;
        if (depth === 0) return text.slice(start, i + 1);
      }
    }

    start = text.indexOf("{", start + 1);
  }

  return null;
}

/**
 * Whole-text JSON first, then the first embedded object. Null when neither
 * parses.
 */
export function safeJsonParse(text: string): unknown {
  const t = text.trim();
  try {
    return JSON.parse(t);
  } catch {
    const candidate = extractFirstJsonObject(t);
    if (!candidate) return null;
    try {
      return JSON.parse(candidate);
    } catch {
      return null;
    }
  }
}
