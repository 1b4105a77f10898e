import type { ListSnapshot } from './loader.js';
import type { RepoRecord } from './record.js';

export interface ChangeSet {
  readonly fromRevision: string;
  readonly toRevision: string;
  readonly added: readonly RepoRecord[];
  readonly removed: readonly RepoRecord[];
}

export type ChangeAction = 'add' | 'remove';

/** Downstream payload describing one list change. */
export interface ChangePayload {
  repo_url: string;
  contributor_name: string;
  tags?: string[];
  action: ChangeAction;
}

function urlSet(records: readonly RepoRecord[]): Set<string> {
  return new Set(records.map((r) => r.url));
}

/**
 * Identity diff on url. Records whose url exists in both snapshots are not
 * reported, even when their tags or contributor changed.
 */
export function diffSnapshots(old: ListSnapshot, next: ListSnapshot): ChangeSet {
  const oldUrls = urlSet(old.records);
  const nextUrls = urlSet(next.records);
  return Object.freeze({
    fromRevision: old.revision,
    toRevision: next.revision,
    added: Object.freeze(next.records.filter((r) => !oldUrls.has(r.url))),
    removed: Object.freeze(old.records.filter((r) => !nextUrls.has(r.url))),
  });
}

export function changeCount(changes: ChangeSet): number {
  return changes.added.length + changes.removed.length;
}

/**
 * Merge records sharing a url into one, keeping the position of the first.
 * Contributors are joined with ", " and tags are unioned, both in first-seen
 * order.
 */
export function consolidateRecords(records: readonly RepoRecord[]): RepoRecord[] {
  const groups = new Map<string, RepoRecord[]>();
  for (const record of records) {
    const group = groups.get(record.url);
    if (group) group.push(record);
    else groups.set(record.url, [record]);
  }

  const merged: RepoRecord[] = [];
  for (const [url, group] of groups) {
    const contributors = [...new Set(group.map((r) => r.contributor).filter(Boolean))];
    const tags = [...new Set(group.flatMap((r) => r.tags))];
    merged.push({ url, tags, contributor: contributors.join(', ') });
  }
  return merged;
}

export function consolidateChangeSet(changes: ChangeSet): ChangeSet {
  return Object.freeze({
    fromRevision: changes.fromRevision,
    toRevision: changes.toRevision,
    added: Object.freeze(consolidateRecords(changes.added)),
    removed: Object.freeze(consolidateRecords(changes.removed)),
  });
}

function toPayload(record: RepoRecord, action: ChangeAction): ChangePayload {
  const payload: ChangePayload = {
    repo_url: record.url,
    contributor_name: record.contributor,
    action,
  };
  if (record.tags.length > 0) payload.tags = [...record.tags];
  return payload;
}

/** Additions first, then removals, each in change-set order. */
export function toChangePayloads(changes: ChangeSet): ChangePayload[] {
  return [
    ...changes.added.map((r) => toPayload(r, 'add')),
    ...changes.removed.map((r) => toPayload(r, 'remove')),
  ];
}
