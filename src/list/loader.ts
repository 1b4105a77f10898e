import { load, YAMLException } from 'js-yaml';
import { ListParseError } from '../shared/errors.js';
import { entryToRecord, FIELD_ALIASES } from './record.js';
import type { ListEntry, RepoRecord, TagsField } from './record.js';

export const LIST_ROOT_KEY = 'repos';

/** The whole list at one revision. Frozen once loaded. */
export interface ListSnapshot {
  readonly revision: string;
  readonly entries: readonly ListEntry[];
  /** Entries that carry a string url, in file order. */
  readonly records: readonly RepoRecord[];
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** First alias whose value is present (not undefined or null). */
function pick<K extends string>(
  raw: Record<string, unknown>,
  keys: readonly K[],
): { key: K; value: unknown } | null {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null) return { key, value };
  }
  return null;
}

export function normalizeEntry(raw: unknown, index: number): ListEntry {
  if (!isMapping(raw)) {
    return {
      index,
      mapping: false,
      url: undefined,
      tags: undefined,
      tagsField: null,
      contributor: undefined,
    };
  }
  const tags = pick<TagsField>(raw, FIELD_ALIASES.tags);
  return {
    index,
    mapping: true,
    url: pick(raw, FIELD_ALIASES.url)?.value,
    tags: tags?.value,
    tagsField: tags?.key ?? null,
    contributor: pick(raw, FIELD_ALIASES.contributor)?.value,
  };
}

/**
 * Parse the serialized list. Malformed entries are kept (flagged via
 * `mapping: false` or wrong-typed fields) so validation can report them by
 * position; only an unreadable document or a wrong root shape fails the load.
 */
export function loadSnapshot(source: string, revision: string): ListSnapshot {
  let doc: unknown;
  try {
    doc = load(source);
  } catch (err) {
    if (err instanceof YAMLException) {
      throw new ListParseError('invalid_yaml', revision, err.message);
    }
    throw err;
  }

  if (!isMapping(doc)) {
    throw new ListParseError(
      'malformed_root',
      revision,
      `document must be a mapping with a '${LIST_ROOT_KEY}' list`,
    );
  }
  const list = doc[LIST_ROOT_KEY];
  if (!Array.isArray(list)) {
    throw new ListParseError('malformed_root', revision, `'${LIST_ROOT_KEY}' must be a list`);
  }

  const entries = list.map((raw: unknown, i) => Object.freeze(normalizeEntry(raw, i)));
  const records: RepoRecord[] = [];
  for (const entry of entries) {
    const record = entryToRecord(entry);
    if (record) records.push(Object.freeze(record));
  }

  return Object.freeze({
    revision,
    entries: Object.freeze(entries),
    records: Object.freeze(records),
  });
}
