import fs from "fs";

const SESSION_BOUNDARY = "\n## ";

/**
 * The latest session: everything from the last level-2 heading that starts a line
 * after the first line, to end of file. Null when the log has no such heading.
 */
export function parseLatestSession(logText: string): string | null {
  const boundary = logText.lastIndexOf(SESSION_BOUNDARY);
  if (boundary === -1) return null;
  return logText.slice(boundary + 1).trim();
}

/**
 * The last `count` sessions, headings included, under the same boundary rule as
 * {@link parseLatestSession}. Fewer when the log holds fewer; null when it holds none.
 */
export function parseRecentSessions(logText: string, count: number): string | null {
  let cut = -1;
  let from = logText.length;
  for (let found = 0; found < count && from > 0; found++) {
    const boundary = logText.lastIndexOf(SESSION_BOUNDARY, from - 1);
    if (boundary === -1) break;
    cut = boundary;
    from = boundary;
  }
  if (cut === -1) return null;
  return logText.slice(cut + 1).trim();
}

/** Read a working file such as the session log, or null when it does not exist. */
export function readSessionLog(logPath: string): string | null {
  if (!fs.existsSync(logPath)) return null;
  return fs.readFileSync(logPath, "utf-8");
}
