import { describe, it, expect } from '@jest/globals';
import {
  changeCount,
  consolidateChangeSet,
  diffSnapshots,
  toChangePayloads,
} from '../list/diff.js';
import type { ChangeSet } from '../list/diff.js';
import { loadSnapshot } from '../list/loader.js';
import { listYaml, repo } from './test-helpers.js';

function snap(items: unknown[], revision = 'rev') {
  return loadSnapshot(listYaml(items), revision);
}

describe('diffSnapshots', () => {
  it('is empty when comparing a snapshot with itself', () => {
    const a = snap([repo('a/one'), repo('b/two')]);
    const changes = diffSnapshots(a, a);
    expect(changes.added).toEqual([]);
    expect(changes.removed).toEqual([]);
  });

  it('reports added and removed urls', () => {
    const old = snap([repo('o/a'), repo('o/b')], 'old');
    const next = snap([repo('o/a'), repo('o/c')], 'new');
    const changes = diffSnapshots(old, next);
    expect(changes.fromRevision).toBe('old');
    expect(changes.toRevision).toBe('new');
    expect(changes.added.map((r) => r.url)).toEqual(['https://github.com/o/c']);
    expect(changes.removed.map((r) => r.url)).toEqual(['https://github.com/o/b']);
    expect(changeCount(changes)).toBe(2);
  });

  it('ignores field edits on a retained url', () => {
    const old = snap([repo('o/a', { tags: ['old-tag'], contributor: 'alice' })]);
    const next = snap([repo('o/a', { tags: ['new-tag'], contributor: 'bob' })]);
    expect(changeCount(diffSnapshots(old, next))).toBe(0);
  });

  it('preserves source order', () => {
    const old = snap([]);
    const next = snap([repo('z/last'), repo('a/first'), repo('m/middle')]);
    expect(diffSnapshots(old, next).added.map((r) => r.url)).toEqual([
      'https://github.com/z/last',
      'https://github.com/a/first',
      'https://github.com/m/middle',
    ]);
  });

  it('skips entries without a string url', () => {
    const next = snap([{ tags: ['x'] }, repo('o/a')]);
    expect(diffSnapshots(snap([]), next).added).toHaveLength(1);
  });

  it('returns a frozen change set', () => {
    const changes = diffSnapshots(snap([]), snap([repo('o/a')]));
    expect(Object.isFrozen(changes)).toBe(true);
    expect(Object.isFrozen(changes.added)).toBe(true);
  });
});

describe('consolidateChangeSet', () => {
  it('merges records that share a url', () => {
    const next = snap([
      repo('o/a', { tags: ['red-team', 'c2'], contributor: 'alice' }),
      repo('o/b'),
      repo('o/a', { tags: ['c2', 'osint'], contributor: 'bob' }),
    ]);
    const merged = consolidateChangeSet(diffSnapshots(snap([]), next));
    expect(merged.added).toEqual([
      { url: 'https://github.com/o/a', tags: ['red-team', 'c2', 'osint'], contributor: 'alice, bob' },
      { url: 'https://github.com/o/b', tags: ['security'], contributor: 'alice' },
    ]);
  });

  it('does not repeat a contributor listed twice', () => {
    const next = snap([repo('o/a'), repo('o/a')]);
    const merged = consolidateChangeSet(diffSnapshots(snap([]), next));
    expect(merged.added[0]?.contributor).toBe('alice');
  });
});

describe('toChangePayloads', () => {
  it('emits additions then removals in the downstream format', () => {
    const changes: ChangeSet = {
      fromRevision: 'a',
      toRevision: 'b',
      added: [{ url: 'https://github.com/o/c', tags: ['recon'], contributor: 'carol' }],
      removed: [{ url: 'https://github.com/o/b', tags: [], contributor: 'dave' }],
    };
    expect(toChangePayloads(changes)).toEqual([
      { repo_url: 'https://github.com/o/c', contributor_name: 'carol', tags: ['recon'], action: 'add' },
      { repo_url: 'https://github.com/o/b', contributor_name: 'dave', action: 'remove' },
    ]);
  });
});
