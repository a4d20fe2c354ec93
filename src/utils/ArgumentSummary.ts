/**
 * Shortening of tool arguments for logs. Code and file bodies can be large, so long
 * strings are cut to a prefix with their full length noted.
 */

const DEFAULT_MAX_STRING = 120;
const MAX_DEPTH = 6;

export function getMaxLoggedStringLength(): number {
  const raw = Number(process.env.MCP_LOG_MAX_ARG_LENGTH);
  return Number.isInteger(raw) && raw > 0 ? raw : DEFAULT_MAX_STRING;
}

export function elideString(value: string, maxLength: number = getMaxLoggedStringLength()): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}... (${value.length} chars)`;
}

/**
 * Copy of `value` with every long string elided. Nesting beyond a fixed depth is
 * replaced by a marker.
 */
export function summarizeArguments(
  value: unknown,
  maxLength: number = getMaxLoggedStringLength(),
  depth = 0,
): unknown {
  if (typeof value === 'string') {
    return elideString(value, maxLength);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (depth >= MAX_DEPTH) {
    return '[nested]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => summarizeArguments(item, maxLength, depth + 1));
  }

  const summary: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    summary[key] = summarizeArguments(item, maxLength, depth + 1);
  }
  return summary;
}
