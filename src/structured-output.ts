const FENCE_PATTERN = /```[\w-]*[ \t]*\r?\n?([\s\S]*?)```/g;

// Characters rescanned across all candidate starts before giving up.
const MAX_SCAN_CHARS = 1_000_000;

/**
 * Index just past the `}` that closes the `{` at `start`, or -1 when it never closes.
 * Braces inside JSON strings do not count.
 */
function findObjectEnd(text: string, start: number): number {
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
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function parseObject(candidate: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return null;
}

function firstObjectIn(text: string): Record<string, unknown> | null {
  let start = text.indexOf("{");
  let budget = MAX_SCAN_CHARS;

  while (start !== -1 && budget > 0) {
    const end = findObjectEnd(text, start);
    if (end === -1) {
      // an unterminated string can hide a later start that does close, so keep going
      budget -= text.length - start;
    } else {
      budget -= end - start;
      const parsed = parseObject(text.slice(start, end));
      if (parsed) return parsed;
    }
    start = text.indexOf("{", start + 1);
  }
  return null;
}

/**
 * Pull the first JSON object out of model output.
 *
 * Fenced code blocks (with or without a language tag) are searched first, then the
 * whole text, so an object wrapped in prose is still found. Arrays are never returned.
 */
export function extractJson(text: string): Record<string, unknown> | null {
  for (const match of text.matchAll(FENCE_PATTERN)) {
    const found = firstObjectIn(match[1] ?? "");
    if (found) return found;
  }
  return firstObjectIn(text);
}
