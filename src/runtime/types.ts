import type { z } from 'zod';
import type {
  EnqueueResultSchema,
  EnrichmentParamsSchema,
  EnrichmentPayloadSchema,
  PipelineStepSchema,
  PrioritySchema,
  ReadmeFetchResultSchema,
  RunCompletionSchema,
  RunStateSchema,
  StepLedgerSchema,
  StoredObjectSchema,
  SummaryResultSchema,
} from '../shared/schemas.js';

export type Priority = z.infer<typeof PrioritySchema>;

/** Validated pipeline input with defaults applied. */
export type EnrichmentParams = z.infer<typeof EnrichmentParamsSchema>;
/** Pipeline input as callers supply it. */
export type EnrichmentInput = z.input<typeof EnrichmentParamsSchema>;

export type PipelineStep = z.infer<typeof PipelineStepSchema>;

export const PIPELINE_STEPS: readonly PipelineStep[] = [
  'fetch_readme',
  'upload_readme',
  'summarize',
  'upload_summary',
  'enqueue',
];

// Step outputs, memoised in the run ledger
export type ReadmeFetchResult = z.infer<typeof ReadmeFetchResultSchema>;
export type ReadmeFound = Extract<ReadmeFetchResult, { found: true }>;
export type StoredObject = z.infer<typeof StoredObjectSchema>;
export type SummaryResult = z.infer<typeof SummaryResultSchema>;
export type EnqueueResult = z.infer<typeof EnqueueResultSchema>;
export type StepLedger = z.infer<typeof StepLedgerSchema>;

export type EnrichmentPayload = z.infer<typeof EnrichmentPayloadSchema>;

export interface QueueMessage {
  /** SHA-256 of the canonical payload JSON. */
  id: string;
  priority: Priority;
  enqueued_at: string;
  payload: EnrichmentPayload;
}

export type RunCompletion = z.infer<typeof RunCompletionSchema>;
export type RunState = z.infer<typeof RunStateSchema>;

export interface PipelineRun {
  id: string;
  url: string;
  params: EnrichmentParams;
  state: RunState;
  ledger: StepLedger;
  /** Times the controller loop has been entered for this run. */
  attempts: number;
  created_at: string;
  updated_at: string;
}

export type RunStatus = 'active' | RunCompletion['status'];

export function runStatus(run: PipelineRun): RunStatus {
  return run.state.kind === 'active' ? 'active' : run.state.completion.status;
}
