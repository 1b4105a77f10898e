export { loadSnapshot, LIST_ROOT_KEY } from './list/loader.js';
export type { ListSnapshot } from './list/loader.js';
export { isAllowedRepoUrl, isValidTag, MAX_TAGS, TAG_PATTERN } from './list/record.js';
export type { ListEntry, RepoRecord } from './list/record.js';
export { formatViolation, validateSnapshot } from './list/validate.js';
export type { Violation } from './list/validate.js';
export { changeCount, consolidateChangeSet, diffSnapshots, toChangePayloads } from './list/diff.js';
export type { ChangePayload, ChangeSet } from './list/diff.js';
export { assertChangeLimit, CHANGE_LIMITS, checkChangeLimit } from './list/limits.js';
export type { ChangeLimitPolicy, ChangeLimitResult } from './list/limits.js';
export { formatReport, reviewChangeRequest, reviewRevisions } from './list/review.js';
export type { ChangeRequestReport } from './list/review.js';
export { readListAtRevision, WORKTREE } from './list/revisions.js';
export { formatCiOutputs, writeCiOutputs } from './list/ci-output.js';

export { createRun, resumeRun, retryRun, startEnrichment, storageKeys } from './runtime/runner.js';
export type { RunnerContext } from './runtime/runner.js';
export type { Collaborators, MessageQueue, ObjectStorage, ReadmeSource, Summarizer } from './runtime/collaborators.js';
export { SqliteRunStore } from './runtime/run-store.js';
export type { RunStore } from './runtime/run-store.js';
export { SqliteMessageQueue } from './runtime/queue.js';
export { createCollaborators } from './runtime/tools/index.js';
export { PIPELINE_STEPS, runStatus } from './runtime/types.js';
export type { EnrichmentInput, EnrichmentPayload, PipelineRun, PipelineStep, QueueMessage, RunCompletion } from './runtime/types.js';

export * from './shared/errors.js';
export { loadAppConfig } from './workspace/config.js';
export type { AppConfig } from './workspace/types.js';
