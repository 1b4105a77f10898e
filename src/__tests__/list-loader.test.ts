import { describe, it, expect } from '@jest/globals';
import { loadSnapshot } from '../list/loader.js';
import { ListParseError } from '../shared/errors.js';
import { listYaml, repo } from './test-helpers.js';

describe('loadSnapshot', () => {
  it('keeps entry order and converts entries to records', () => {
    const snapshot = loadSnapshot(listYaml([repo('a/one'), repo('b/two')]), 'HEAD');
    expect(snapshot.revision).toBe('HEAD');
    expect(snapshot.records.map((r) => r.url)).toEqual([
      'https://github.com/a/one',
      'https://github.com/b/two',
    ]);
    expect(snapshot.records[0]).toEqual({
      url: 'https://github.com/a/one',
      tags: ['security'],
      contributor: 'alice',
    });
  });

  it('accepts the legacy field names', () => {
    const source = [
      'repos:',
      '  - repo_url: https://github.com/a/one',
      '    contributor_name: bob',
      '    initial_tags: [fuzzing]',
    ].join('\n');
    const snapshot = loadSnapshot(source, 'r1');
    expect(snapshot.records).toEqual([
      { url: 'https://github.com/a/one', tags: ['fuzzing'], contributor: 'bob' },
    ]);
    expect(snapshot.entries[0]?.tagsField).toBe('initial_tags');
  });

  it('prefers the canonical field when both names are present', () => {
    const snapshot = loadSnapshot(
      listYaml([{ url: 'https://github.com/a/new', repo_url: 'https://github.com/a/old', tags: ['x'], initial_tags: ['y'], contributor: 'c' }]),
      'r1',
    );
    expect(snapshot.records[0]?.url).toBe('https://github.com/a/new');
    expect(snapshot.records[0]?.tags).toEqual(['x']);
    expect(snapshot.entries[0]?.tagsField).toBe('tags');
  });

  it('retains malformed entries without turning them into records', () => {
    const snapshot = loadSnapshot(listYaml(['just a string', { tags: ['x'] }, repo('a/one')]), 'r1');
    expect(snapshot.entries).toHaveLength(3);
    expect(snapshot.entries[0]?.mapping).toBe(false);
    expect(snapshot.entries[1]?.mapping).toBe(true);
    expect(snapshot.records.map((r) => r.url)).toEqual(['https://github.com/a/one']);
  });

  it('converts leniently: non-string tags dropped, missing contributor empty', () => {
    const snapshot = loadSnapshot(listYaml([{ url: 'https://github.com/a/one', tags: ['ok', 3] }]), 'r1');
    expect(snapshot.records[0]).toEqual({ url: 'https://github.com/a/one', tags: ['ok'], contributor: '' });
  });

  it('returns a frozen snapshot', () => {
    const snapshot = loadSnapshot(listYaml([repo('a/one')]), 'r1');
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.records)).toBe(true);
    expect(Object.isFrozen(snapshot.records[0])).toBe(true);
  });

  it('accepts an empty list', () => {
    expect(loadSnapshot('repos: []\n', 'r1').entries).toHaveLength(0);
  });

  it('rejects invalid YAML as invalid_yaml', () => {
    let caught: unknown;
    try {
      loadSnapshot('repos: [unclosed', 'bad-rev');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ListParseError);
    expect(caught).toMatchObject({ kind: 'invalid_yaml', revision: 'bad-rev' });
  });

  it.each([
    ['a scalar root', 'just text'],
    ['a list root', '- url: x'],
    ['a missing repos key', 'other: []'],
    ['repos that is not a list', 'repos: {a: 1}'],
  ])('rejects %s as malformed_root', (_label, source) => {
    expect(() => loadSnapshot(source, 'r1')).toThrow(ListParseError);
    try {
      loadSnapshot(source, 'r1');
    } catch (err) {
      expect(err).toMatchObject({ kind: 'malformed_root' });
    }
  });
});
