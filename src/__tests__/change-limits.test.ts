import { describe, it, expect } from '@jest/globals';
import { diffSnapshots } from '../list/diff.js';
import type { ChangeSet } from '../list/diff.js';
import { assertChangeLimit, CHANGE_LIMITS, checkChangeLimit, isChangeLimitPolicy } from '../list/limits.js';
import { loadSnapshot } from '../list/loader.js';
import { LimitExceededError } from '../shared/errors.js';
import { listYaml, repo } from './test-helpers.js';

function changesOf(added: number, removed: number): ChangeSet {
  const record = (i: number) => ({ url: `https://github.com/o/r${i}`, tags: ['x'], contributor: 'c' });
  return {
    fromRevision: 'a',
    toRevision: 'b',
    added: Array.from({ length: added }, (_, i) => record(i)),
    removed: Array.from({ length: removed }, (_, i) => record(100 + i)),
  };
}

describe('checkChangeLimit', () => {
  it('passes at exactly the ceiling', () => {
    expect(checkChangeLimit(changesOf(3, 2), 5)).toEqual({ allowed: true, count: 5, max: 5 });
  });

  it('fails one above the ceiling', () => {
    const result = checkChangeLimit(changesOf(4, 2), 5);
    expect(result.allowed).toBe(false);
    expect(result.count).toBe(6);
    expect(result.max).toBe(5);
    expect(result.reason).toBe(
      '6 changes (4 added, 2 removed) exceed the maximum of 5; split them into smaller change requests',
    );
  });

  it('counts both additions and removals in the a/b to a/c example', () => {
    const old = loadSnapshot(listYaml([repo('o/a'), repo('o/b')]), 'old');
    const next = loadSnapshot(listYaml([repo('o/a'), repo('o/c')]), 'new');
    const changes = diffSnapshots(old, next);
    expect(checkChangeLimit(changes, CHANGE_LIMITS.automated).allowed).toBe(true);
    expect(checkChangeLimit(changes, 0)).toMatchObject({ allowed: false, count: 2, max: 0 });
  });

  it('rejects a negative or fractional ceiling', () => {
    expect(() => checkChangeLimit(changesOf(0, 0), -1)).toThrow(RangeError);
    expect(() => checkChangeLimit(changesOf(0, 0), 1.5)).toThrow(RangeError);
  });

  it('exposes both policy ceilings', () => {
    expect(CHANGE_LIMITS).toEqual({ automated: 15, contributor: 5 });
    expect(isChangeLimitPolicy('contributor')).toBe(true);
    expect(isChangeLimitPolicy('maintainer')).toBe(false);
  });
});

describe('assertChangeLimit', () => {
  it('throws LimitExceededError with count and max', () => {
    let caught: unknown;
    try {
      assertChangeLimit(changesOf(16, 0), CHANGE_LIMITS.automated);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LimitExceededError);
    expect(caught).toMatchObject({
      name: 'LimitExceededError',
      count: 16,
      max: 15,
      message: 'Too many changes in a single change request: 16 (maximum: 15)',
    });
  });

  it('does not throw within the ceiling', () => {
    expect(() => assertChangeLimit(changesOf(5, 0), CHANGE_LIMITS.contributor)).not.toThrow();
  });
});
