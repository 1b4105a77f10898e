/**
 * Capability handles the enrichment controller depends on. Each one is a
 * narrow view of an external service; the controller never talks to a
 * service directly.
 */
import { CollaboratorUnavailableError } from '../shared/errors.js';
import type {
  EnqueueResult,
  QueueMessage,
  ReadmeFetchResult,
  StoredObject,
  SummaryResult,
} from './types.js';

export interface ReadmeSource {
  /** Resolves `found: false` for the expected "nothing to summarize" cases; throws otherwise. */
  fetchReadme(url: string): Promise<ReadmeFetchResult>;
}

export type Bucket = 'readmes' | 'summaries';

export interface ObjectStorage {
  put(bucket: Bucket, key: string, content: string, contentType: string): Promise<StoredObject>;
  get(bucket: Bucket, key: string): Promise<string | null>;
  delete(bucket: Bucket, key: string): Promise<boolean>;
}

export interface SummarizeRequest {
  content: string;
  /** Word ceiling for the summary. */
  maxWords: number;
  language: string;
}

export interface Summarizer {
  summarize(request: SummarizeRequest): Promise<SummaryResult>;
}

export interface MessageQueue {
  /** At-least-once send; re-sending the same message id is a no-op. */
  send(message: QueueMessage): Promise<EnqueueResult>;
}

export interface Collaborators {
  readmes: ReadmeSource;
  storage: ObjectStorage;
  summarizer: Summarizer;
  queue: MessageQueue;
}

export function unavailableSummarizer(reason: string): Summarizer {
  return {
    async summarize() {
      throw new CollaboratorUnavailableError('summarizer', reason);
    },
  };
}
