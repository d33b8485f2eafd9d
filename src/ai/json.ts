/**
 * Locate structured JSON inside free-form model output.
 *
 * Models often wrap the object they were asked for in prose or code fences.
 * These helpers return the first balanced span, tracking string literals so
 * braces inside quoted values do not end the span early.
 */

function balancedSpan(text: string, open: "{" | "[", close: "}" | "]"): string | null {
  let start = text.indexOf(open);

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === "\\") {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === open) {
        depth++;
      } else if (ch === close) {
        depth--;
        if (depth === 0) {
          return text.slice(start, i + 1);
        }
      }
    }

    // Unterminated from this opener; try the next one
    start = text.indexOf(open, start + 1);
  }

  return null;
}

/**
 * First balanced `{...}` span, or null
 */
export function extractJsonObject(text: string): string | null {
  return balancedSpan(text, "{", "}");
}

/**
 * First balanced `[...]` span, or null
 */
export function extractJsonArray(text: string): string | null {
  return balancedSpan(text, "[", "]");
}

/**
 * Parse the first balanced object in `text`. Returns undefined when there is
 * none or it is not valid JSON.
 */
export function parseEmbeddedObject(text: string): unknown {
  const span = extractJsonObject(text);
  if (span === null) return undefined;
  try {
    return JSON.parse(span) as unknown;
  } catch {
    return undefined;
  }
}

/**
 * Parse the first balanced array in `text`. Returns undefined when there is
 * none or it is not valid JSON.
 */
export function parseEmbeddedArray(text: string): unknown {
  const span = extractJsonArray(text);
  if (span === null) return undefined;
  try {
    return JSON.parse(span) as unknown;
  } catch {
    return undefined;
  }
}
