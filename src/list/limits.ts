import { LimitExceededError } from '../shared/errors.js';
import { changeCount } from './diff.js';
import type { ChangeSet } from './diff.js';

/**
 * Ceilings on added + removed entries per change request. Automated runs
 * (pushes, merged PRs) use the wider limit; contributor-facing docs quote the
 * narrower one. Callers pick which applies.
 */
export const CHANGE_LIMITS = {
  automated: 15,
  contributor: 5,
} as const;

export type ChangeLimitPolicy = keyof typeof CHANGE_LIMITS;

export interface ChangeLimitResult {
  allowed: boolean;
  count: number;
  max: number;
  reason?: string;
}

export function isChangeLimitPolicy(value: string): value is ChangeLimitPolicy {
  return Object.hasOwn(CHANGE_LIMITS, value);
}

export function checkChangeLimit(changes: ChangeSet, maxChanges: number): ChangeLimitResult {
  if (!Number.isInteger(maxChanges) || maxChanges < 0) {
    throw new RangeError(`maxChanges must be a non-negative integer, got ${maxChanges}`);
  }
  const count = changeCount(changes);
  if (count > maxChanges) {
    return {
      allowed: false,
      count,
      max: maxChanges,
      reason:
        `${count} changes (${changes.added.length} added, ${changes.removed.length} removed) ` +
        `exceed the maximum of ${maxChanges}; split them into smaller change requests`,
    };
  }
  return { allowed: true, count, max: maxChanges };
}

export function assertChangeLimit(changes: ChangeSet, maxChanges: number): void {
  const result = checkChangeLimit(changes, maxChanges);
  if (!result.allowed) throw new LimitExceededError(result.count, result.max);
}
