import { describe, it, expect } from '@jest/globals';
import { describeRun, enrichAll, parseIntOption, runFailed } from '../cli/cli-shared.js';
import { SqliteRunStore } from '../runtime/run-store.js';
import { createRun } from '../runtime/runner.js';
import type { PipelineRun } from '../runtime/types.js';
import { createFakeCollaborators, createTestDb, foundReadme } from './test-helpers.js';

function run(state: PipelineRun['state']): PipelineRun {
  return { ...createRun({ url: 'https://github.com/o/r' }, '2026-01-01T00:00:00.000Z'), id: 'run_1', state };
}

describe('describeRun', () => {
  it('shows the next step of an active run', () => {
    expect(describeRun(run({ kind: 'active', step: 'summarize' }))).toEqual([
      'Run run_1  active  https://github.com/o/r',
      '  Next step: summarize',
    ]);
  });

  it('shows the failed step and reason', () => {
    const failed = run({
      kind: 'completed',
      completion: { status: 'failed', failed_step: 'upload_readme', error_name: 'Error', reason: 'disk full' },
    });
    expect(describeRun(failed)).toEqual([
      'Run run_1  failed  https://github.com/o/r',
      '  Failed at upload_readme: disk full',
    ]);
  });

  it('shows the skip reason', () => {
    const skipped = run({ kind: 'completed', completion: { status: 'skipped', reason: 'GitHub Gists are not supported' } });
    expect(describeRun(skipped)[1]).toBe('  Skipped: GitHub Gists are not supported');
  });
});

describe('parseIntOption', () => {
  it('parses integers and rejects anything else', () => {
    expect(parseIntOption('15', '--max-changes')).toBe(15);
    expect(() => parseIntOption('1.5', '--max-changes')).toThrow('--max-changes must be an integer, got "1.5"');
    expect(() => parseIntOption('ten', '--limit')).toThrow('--limit must be an integer');
  });
});

describe('runFailed', () => {
  it('is true only for a failed completion', () => {
    expect(runFailed(run({ kind: 'active', step: 'fetch_readme' }))).toBe(false);
    expect(runFailed(run({ kind: 'completed', completion: { status: 'skipped', reason: 'empty' } }))).toBe(false);
    expect(
      runFailed(
        run({
          kind: 'completed',
          completion: { status: 'failed', failed_step: 'summarize', error_name: 'Error', reason: 'timeout' },
        }),
      ),
    ).toBe(true);
  });
});

describe('enrichAll', () => {
  it('counts failed runs so the caller can exit non-zero', async () => {
    const db = createTestDb();
    try {
      const fakes = createFakeCollaborators(foundReadme('o', 'r', 'Port scanner'));
      fakes.storage.failing.add('summaries');
      const lines: string[] = [];

      const failed = await enrichAll(
        ['https://github.com/o/r'],
        { store: new SqliteRunStore(db), collaborators: fakes },
        (line) => lines.push(line),
      );

      expect(failed).toBe(1);
      expect(lines[1]).toBe('  Failed at upload_summary: storage write failed for summaries/o_r_summary.md');
    } finally {
      db.close();
    }
  });

  it('reports no failures when every run succeeds', async () => {
    const db = createTestDb();
    try {
      const fakes = createFakeCollaborators(foundReadme('o', 'r', 'Port scanner'));
      const lines: string[] = [];
      const failed = await enrichAll(
        ['https://github.com/o/r'],
        { store: new SqliteRunStore(db), collaborators: fakes },
        (line) => lines.push(line),
      );
      expect(failed).toBe(0);
      expect(lines[0]).toMatch(/^Run run_\S+  success  https:\/\/github\.com\/o\/r$/);
    } finally {
      db.close();
    }
  });
});
