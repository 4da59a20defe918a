/**
 * Parsing of free-text decision answers
 */

const LIST_MARKER = /^(?:\d+\s*[.):]|[-*•])\s*/;

/**
 * Split a numbered or bulleted list into its items. Lines without a list
 * marker are ignored unless no line carries one.
 */
export function parsePlanText(text: string): string[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const marked = lines.filter((line) => LIST_MARKER.test(line));
  const items = marked.length > 0 ? marked : lines;

  return items
    .map((line) => line.replace(LIST_MARKER, '').replace(/\*\*/g, '').trim())
    .filter((line) => line.length > 0);
}

/**
 * Strip the wrapping models tend to put around a single name
 */
export function cleanName(text: string): string {
  return text
    .trim()
    .replace(/^["'`]+|["'`]+$/g, '')
    .replace(/[.!]+$/, '')
    .trim();
}

/**
 * Match an answer against the allowed names exactly
 */
export function parseToolAnswer(text: string, allowed: readonly string[]): string | undefined {
  const name = cleanName(text);
  return allowed.includes(name) ? name : undefined;
}

/**
 * Comma separated names, kept only when allowed, without duplicates
 */
export function parseIngredientAnswer(
  text: string,
  allowed: readonly string[]
): { accepted: string[]; rejected: string[] } {
  const accepted: string[] = [];
  const rejected: string[] = [];
  for (const part of text.split(/[,\n]/)) {
    const name = cleanName(part);
    if (name.length === 0) {
      continue;
    }
    if (allowed.includes(name)) {
      if (!accepted.includes(name)) {
        accepted.push(name);
      }
    } else {
      rejected.push(name);
    }
  }
  return { accepted, rejected };
}
