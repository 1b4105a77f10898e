import { logger } from '../shared/logger.js';
import { consolidateChangeSet, diffSnapshots } from './diff.js';
import type { ChangeSet } from './diff.js';
import { checkChangeLimit } from './limits.js';
import { loadSnapshot } from './loader.js';
import type { ChangeLimitResult } from './limits.js';
import type { ListSnapshot } from './loader.js';
import { readListAtRevision } from './revisions.js';
import type { GitExec } from './revisions.js';
import { formatViolation, validateSnapshot } from './validate.js';
import type { Violation } from './validate.js';

export interface ChangeRequestReport {
  passed: boolean;
  fromRevision: string;
  toRevision: string;
  /** Consolidated changes; these are what the limit was checked against. */
  changes: ChangeSet;
  limit: ChangeLimitResult;
  violations: Violation[];
}

/**
 * Admission check for a change request: diff, consolidate, gate on the change
 * count, then validate the new snapshot. Everything is computed even when an
 * earlier check fails so one report covers all problems.
 */
export function reviewChangeRequest(
  old: ListSnapshot,
  next: ListSnapshot,
  maxChanges: number,
): ChangeRequestReport {
  const changes = consolidateChangeSet(diffSnapshots(old, next));
  const limit = checkChangeLimit(changes, maxChanges);
  const violations = validateSnapshot(next);
  const passed = limit.allowed && violations.length === 0;

  logger.info('Change request reviewed', {
    from: old.revision,
    to: next.revision,
    added: changes.added.length,
    removed: changes.removed.length,
    max_changes: maxChanges,
    violations: violations.length,
    passed,
  });

  return {
    passed,
    fromRevision: old.revision,
    toRevision: next.revision,
    changes,
    limit,
    violations,
  };
}

export interface RevisionReviewOptions {
  repoPath: string;
  filePath: string;
  oldRevision: string;
  newRevision: string;
  maxChanges: number;
  exec?: GitExec;
}

/** Read both revisions of the list file and review the change between them. */
export async function reviewRevisions(opts: RevisionReviewOptions): Promise<ChangeRequestReport> {
  const readerOpts = { repoPath: opts.repoPath, exec: opts.exec };
  const [oldSource, newSource] = await Promise.all([
    readListAtRevision(opts.oldRevision, opts.filePath, readerOpts),
    readListAtRevision(opts.newRevision, opts.filePath, readerOpts),
  ]);
  return reviewChangeRequest(
    loadSnapshot(oldSource, opts.oldRevision),
    loadSnapshot(newSource, opts.newRevision),
    opts.maxChanges,
  );
}

/** Human-readable report, one line per fact. */
export function formatReport(report: ChangeRequestReport): string[] {
  const lines = [
    `Comparing ${report.fromRevision} -> ${report.toRevision}`,
    `Added: ${report.changes.added.length}, removed: ${report.changes.removed.length}`,
  ];
  for (const record of report.changes.added) lines.push(`  + ${record.url}`);
  for (const record of report.changes.removed) lines.push(`  - ${record.url}`);

  if (report.limit.reason) lines.push(report.limit.reason);
  if (report.violations.length > 0) {
    lines.push(`Found ${report.violations.length} validation error(s):`);
    for (const v of report.violations) lines.push(`  ${formatViolation(v)}`);
  }
  lines.push(report.passed ? 'Change request passed' : 'Change request rejected');
  return lines;
}
