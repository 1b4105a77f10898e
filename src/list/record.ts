/**
 * Record model for one curated list entry.
 *
 * The url is the identity key: two entries are the same repository exactly
 * when their url strings are equal. No normalisation is applied.
 */

export interface RepoRecord {
  url: string;
  tags: string[];
  contributor: string;
}

/** One entry as written in the list file, normalised across field aliases. */
export interface ListEntry {
  /** Zero-based position in the `repos` list. */
  index: number;
  /** False when the entry is not a mapping; its fields are then all undefined. */
  mapping: boolean;
  url: unknown;
  tags: unknown;
  /** Which key supplied `tags`, or null when neither is present. */
  tagsField: TagsField | null;
  contributor: unknown;
}

export type TagsField = 'tags' | 'initial_tags';

export const MAX_TAGS = 6;

export const TAG_PATTERN = /^\.?[a-z0-9]+(-[a-z0-9]+)*$/;

export const ALLOWED_HOSTS: readonly string[] = ['github.com', 'gist.github.com'];

/** Canonical key first, then the aliases accepted in older list files. */
export const FIELD_ALIASES = {
  url: ['url', 'repo_url'],
  contributor: ['contributor', 'contributor_name'],
  tags: ['tags', 'initial_tags'],
} as const;

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}

/** True for `https://github.com/...` and `https://gist.github.com/...`. */
export function isAllowedRepoUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  return parsed.protocol === 'https:' && ALLOWED_HOSTS.includes(parsed.host);
}

/**
 * Lenient conversion used for diffing: only the url has to be a string.
 * Non-string tags are dropped and a non-string contributor becomes "".
 */
export function entryToRecord(entry: ListEntry): RepoRecord | null {
  if (typeof entry.url !== 'string') return null;
  const tags = Array.isArray(entry.tags)
    ? entry.tags.filter((t): t is string => typeof t === 'string')
    : [];
  const contributor = typeof entry.contributor === 'string' ? entry.contributor : '';
  return { url: entry.url, tags, contributor };
}
