import { createHash } from 'node:crypto';

// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+[^\s"]+/gi,
  /authorization:\s*[^\s"]+/gi,
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  /github_pat_[A-Za-z0-9_]{20,}/g,
  /sk-[A-Za-z0-9_-]{16,}/g,
];

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

export function sha256Hex(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, item] of entries) {
      sorted[key] = canonicalize(item);
    }
    return sorted;
  }
  return value;
}

/**
 * SHA-256 of a canonical JSON representation (object keys sorted at every depth).
 */
export function jsonHash(obj: unknown): string {
  const canonical = JSON.stringify(canonicalize(obj)) ?? 'null';
  return sha256Hex(canonical);
}
