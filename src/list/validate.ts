import type { ListSnapshot } from './loader.js';
import { ALLOWED_HOSTS, isValidTag, MAX_TAGS } from './record.js';
import type { ListEntry } from './record.js';

export interface Violation {
  /** Zero-based position of the offending entry. */
  index: number;
  /** The entry's url, or "unknown" when it has none. */
  url: string;
  message: string;
}

export const UNKNOWN_URL = 'unknown';

type Report = (message: string) => void;

function checkUrl(entry: ListEntry, report: Report): void {
  if (entry.url === undefined) {
    report("Missing required field 'url'");
    return;
  }
  if (typeof entry.url !== 'string') {
    report("'url' must be a string");
    return;
  }
  let parsed: URL;
  try {
    parsed = new URL(entry.url);
  } catch {
    report(`Invalid URL format in 'url': ${entry.url}`);
    return;
  }
  if (parsed.protocol !== 'https:') {
    report("'url' must use https");
  }
  if (!ALLOWED_HOSTS.includes(parsed.host)) {
    report(`'url' must be a GitHub or Gist URL (${ALLOWED_HOSTS.join(', ')})`);
  }
}

function checkContributor(entry: ListEntry, report: Report): void {
  if (entry.contributor === undefined) {
    report("Missing required field 'contributor'");
  } else if (typeof entry.contributor !== 'string' || !entry.contributor.trim()) {
    report("'contributor' must be a non-empty string");
  }
}

function checkTags(entry: ListEntry, report: Report): void {
  const field = entry.tagsField ?? 'tags';
  const tags = entry.tags;
  if (tags === undefined) {
    report("Missing required field 'tags' (or legacy 'initial_tags')");
    return;
  }
  if (!Array.isArray(tags)) {
    report(`'${field}' must be a list`);
    return;
  }
  if (tags.length === 0) {
    report(`'${field}' must contain at least one tag`);
  }
  if (tags.length > MAX_TAGS) {
    report(`Too many tags (${tags.length}), maximum is ${MAX_TAGS}`);
  }
  for (const tag of tags) {
    if (typeof tag !== 'string') {
      report(`All tags must be strings, found: ${JSON.stringify(tag)}`);
    } else if (!tag.trim()) {
      report('Empty tag found');
    } else if (/\s/.test(tag)) {
      report(`Tag '${tag}' contains whitespace - use hyphens instead (e.g. 'machine-learning')`);
    } else if (!isValidTag(tag)) {
      report(
        `Tag '${tag}' must be lowercase alphanumeric words joined by hyphens ` +
          `(e.g. 'python', 'machine-learning', '.net')`,
      );
    }
  }
}

/**
 * Check every entry against every rule and return all violations in entry
 * order. An empty result means the snapshot is valid.
 */
export function validateSnapshot(snapshot: ListSnapshot): Violation[] {
  const violations: Violation[] = [];
  const firstSeen = new Map<string, number>();

  for (const entry of snapshot.entries) {
    const url = typeof entry.url === 'string' && entry.url ? entry.url : UNKNOWN_URL;
    const report: Report = (message) => violations.push({ index: entry.index, url, message });

    if (!entry.mapping) {
      report('Entry must be a mapping');
      continue;
    }

    checkUrl(entry, report);

    if (typeof entry.url === 'string') {
      const first = firstSeen.get(entry.url);
      if (first === undefined) {
        firstSeen.set(entry.url, entry.index);
      } else {
        report(`Duplicate url (first listed at entry ${first + 1})`);
      }
    }

    checkContributor(entry, report);
    checkTags(entry, report);
  }

  return violations;
}

export function formatViolation(v: Violation): string {
  return `Entry ${v.index + 1} (${v.url}): ${v.message}`;
}
