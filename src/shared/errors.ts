export type ListParseErrorKind = 'invalid_yaml' | 'malformed_root';

/** The serialized list could not be turned into a snapshot. */
export class ListParseError extends Error {
  readonly kind: ListParseErrorKind;
  readonly revision: string;

  constructor(kind: ListParseErrorKind, revision: string, detail: string) {
    super(`Cannot load list at ${revision}: ${detail}`);
    this.name = 'ListParseError';
    this.kind = kind;
    this.revision = revision;
  }
}

export class RevisionReadError extends Error {
  readonly revision: string;
  readonly filePath: string;

  constructor(revision: string, filePath: string, detail: string) {
    super(`Cannot read ${filePath} at ${revision}: ${detail}`);
    this.name = 'RevisionReadError';
    this.revision = revision;
    this.filePath = filePath;
  }
}

export class LimitExceededError extends Error {
  readonly count: number;
  readonly max: number;

  constructor(count: number, max: number) {
    super(`Too many changes in a single change request: ${count} (maximum: ${max})`);
    this.name = 'LimitExceededError';
    this.count = count;
    this.max = max;
  }
}

export type CollaboratorName = 'readme_source' | 'object_storage' | 'summarizer' | 'queue';

/** A collaborator handle was requested but configuration left it unset. */
export class CollaboratorUnavailableError extends Error {
  readonly collaborator: CollaboratorName;

  constructor(collaborator: CollaboratorName, reason: string) {
    super(`${collaborator} unavailable: ${reason}`);
    this.name = 'CollaboratorUnavailableError';
    this.collaborator = collaborator;
  }
}

export class GitHubApiError extends Error {
  readonly status: number;

  constructor(status: number, detail: string) {
    super(`GitHub API error ${status}: ${detail}`);
    this.name = 'GitHubApiError';
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(detail: string) {
    super(`Invalid configuration: ${detail}`);
    this.name = 'ConfigError';
  }
}

/** Raised when a run id is unknown or a run is not in a state that allows the operation. */
export class RunStateError extends Error {
  readonly runId: string;

  constructor(runId: string, detail: string) {
    super(`Run ${runId}: ${detail}`);
    this.name = 'RunStateError';
    this.runId = runId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
