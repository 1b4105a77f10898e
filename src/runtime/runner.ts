import { generateId } from '../shared/ids.js';
import { errorMessage, RunStateError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { jsonHash } from '../shared/redact.js';
import { EnrichmentParamsSchema } from '../shared/schemas.js';
import type { Collaborators } from './collaborators.js';
import type { RunStore } from './run-store.js';
import type {
  EnrichmentInput,
  EnrichmentPayload,
  PipelineRun,
  PipelineStep,
  ReadmeFound,
  RunCompletion,
  RunState,
  StepLedger,
  StoredObject,
} from './types.js';

export interface RunnerContext {
  store: RunStore;
  collaborators: Collaborators;
  now?: () => Date;
}

export interface StorageKeys {
  readme: string;
  summary: string;
}

export function storageKeys(owner: string, repo: string): StorageKeys {
  return {
    readme: `${owner}_${repo}.md`,
    summary: `${owner}_${repo}_summary.md`,
  };
}

function timestamp(ctx: RunnerContext): string {
  return (ctx.now ?? (() => new Date()))().toISOString();
}

/** Validates the input and builds a fresh run positioned at the first step. */
export function createRun(input: EnrichmentInput, now: string): PipelineRun {
  const params = EnrichmentParamsSchema.parse(input);
  return {
    id: generateId('run'),
    url: params.url,
    params,
    state: { kind: 'active', step: 'fetch_readme' },
    ledger: {},
    attempts: 0,
    created_at: now,
    updated_at: now,
  };
}

// ── Ledger accessors ────────────────────────────────────────────────────────

function foundReadme(run: PipelineRun): ReadmeFound {
  const fetched = run.ledger.fetch_readme;
  if (!fetched || !fetched.found) {
    throw new RunStateError(run.id, 'ledger has no fetched README');
  }
  return fetched;
}

function ledgerEntry<K extends keyof StepLedger>(run: PipelineRun, step: K): NonNullable<StepLedger[K]> {
  const value = run.ledger[step];
  if (value == null) {
    throw new RunStateError(run.id, `ledger has no output for ${step}`);
  }
  return value;
}

function uploadRef(obj: StoredObject): EnrichmentPayload['upload'] {
  return { key: obj.key, size: obj.size, checksum: obj.checksum };
}

export function buildPayload(run: PipelineRun): EnrichmentPayload {
  const summary = ledgerEntry(run, 'summarize');
  return {
    url: run.url,
    upload: uploadRef(ledgerEntry(run, 'upload_readme')),
    summary_upload: uploadRef(ledgerEntry(run, 'upload_summary')),
    summary_metrics: {
      original_words: summary.original_words,
      summary_words: summary.summary_words,
    },
  };
}

// ── Steps ───────────────────────────────────────────────────────────────────

/** Runs one step against its collaborator and returns the ledger with its output recorded. */
async function executeStep(
  run: PipelineRun,
  step: PipelineStep,
  ctx: RunnerContext,
): Promise<StepLedger> {
  const { readmes, storage, summarizer, queue } = ctx.collaborators;

  switch (step) {
    case 'fetch_readme':
      return { ...run.ledger, fetch_readme: await readmes.fetchReadme(run.url) };

    case 'upload_readme': {
      const readme = foundReadme(run);
      const { readme: key } = storageKeys(readme.owner, readme.repo);
      return {
        ...run.ledger,
        upload_readme: await storage.put('readmes', key, readme.content, 'text/markdown'),
      };
    }

    case 'summarize': {
      const readme = foundReadme(run);
      const result = await summarizer.summarize({
        content: readme.content,
        maxWords: run.params.max_summary_length,
        language: run.params.language,
      });
      return { ...run.ledger, summarize: result };
    }

    case 'upload_summary': {
      const readme = foundReadme(run);
      const { summary: key } = storageKeys(readme.owner, readme.repo);
      const summary = ledgerEntry(run, 'summarize');
      return {
        ...run.ledger,
        upload_summary: await storage.put('summaries', key, summary.summary, 'text/markdown'),
      };
    }

    case 'enqueue': {
      const payload = buildPayload(run);
      const result = await queue.send({
        id: jsonHash(payload),
        priority: run.params.priority,
        enqueued_at: timestamp(ctx),
        payload,
      });
      return { ...run.ledger, enqueue: result };
    }
  }
}

/** State after `step` has an entry in the ledger. */
function nextState(run: PipelineRun, step: PipelineStep): RunState {
  switch (step) {
    case 'fetch_readme': {
      const fetched = ledgerEntry(run, 'fetch_readme');
      if (!fetched.found) {
        return { kind: 'completed', completion: { status: 'skipped', reason: fetched.reason } };
      }
      return { kind: 'active', step: 'upload_readme' };
    }
    case 'upload_readme':
      return { kind: 'active', step: 'summarize' };
    case 'summarize':
      return { kind: 'active', step: 'upload_summary' };
    case 'upload_summary':
      return { kind: 'active', step: 'enqueue' };
    case 'enqueue':
      return {
        kind: 'completed',
        completion: {
          status: 'success',
          message_id: ledgerEntry(run, 'enqueue').message_id,
          payload: buildPayload(run),
        },
      };
  }
}

async function advance(run: PipelineRun, step: PipelineStep, ctx: RunnerContext): Promise<PipelineRun> {
  let ledger = run.ledger;
  if (ledger[step] === undefined) {
    logger.info('Step started', { run_id: run.id, step });
    try {
      ledger = await executeStep(run, step, ctx);
    } catch (err) {
      const name = err instanceof Error ? err.name : 'Error';
      const reason = errorMessage(err);
      logger.error('Step failed', { run_id: run.id, step, error: name, reason });
      const completion: RunCompletion = { status: 'failed', failed_step: step, error_name: name, reason };
      return { ...run, state: { kind: 'completed', completion }, updated_at: timestamp(ctx) };
    }
    logger.info('Step completed', { run_id: run.id, step });
  } else {
    logger.debug('Step already in ledger', { run_id: run.id, step });
  }

  const recorded = { ...run, ledger };
  return { ...recorded, state: nextState(recorded, step), updated_at: timestamp(ctx) };
}

/**
 * Controller loop. Executes the current step, persists the run, and repeats
 * until the run reaches a completion. Earlier steps are never rolled back.
 */
async function drive(run: PipelineRun, ctx: RunnerContext): Promise<PipelineRun> {
  let current: PipelineRun = { ...run, attempts: run.attempts + 1, updated_at: timestamp(ctx) };
  ctx.store.save(current);

  for (;;) {
    const state = current.state;
    if (state.kind === 'completed') {
      logCompletion(current, state.completion);
      return current;
    }
    current = await advance(current, state.step, ctx);
    ctx.store.save(current);
  }
}

function logCompletion(run: PipelineRun, completion: RunCompletion): void {
  logger.info('Run completed', {
    run_id: run.id,
    url: run.url,
    status: completion.status,
    ...(completion.status === 'failed' ? { failed_step: completion.failed_step } : {}),
    ...(completion.status === 'skipped' ? { reason: completion.reason } : {}),
  });
}

export async function startEnrichment(input: EnrichmentInput, ctx: RunnerContext): Promise<PipelineRun> {
  const run = createRun(input, timestamp(ctx));
  logger.info('Run started', { run_id: run.id, url: run.url, priority: run.params.priority });
  return drive(run, ctx);
}

function loadRun(runId: string, ctx: RunnerContext): PipelineRun {
  const run = ctx.store.get(runId);
  if (!run) throw new RunStateError(runId, 'not found');
  return run;
}

/** Continue an active run (for example after the process died mid-step). */
export async function resumeRun(runId: string, ctx: RunnerContext): Promise<PipelineRun> {
  const run = loadRun(runId, ctx);
  const state = run.state;
  if (state.kind === 'completed') {
    throw new RunStateError(runId, `already completed (${state.completion.status})`);
  }
  logger.info('Run resumed', { run_id: runId, step: state.step });
  return drive(run, ctx);
}

/** Reopen a failed run at the step that failed; finished steps keep their ledger output. */
export async function retryRun(runId: string, ctx: RunnerContext): Promise<PipelineRun> {
  const run = loadRun(runId, ctx);
  const state = run.state;
  if (state.kind === 'active') {
    throw new RunStateError(runId, 'only failed runs can be retried (status: active)');
  }
  const completion = state.completion;
  if (completion.status !== 'failed') {
    throw new RunStateError(runId, `only failed runs can be retried (status: ${completion.status})`);
  }
  logger.info('Run retried', { run_id: runId, step: completion.failed_step });
  return drive({ ...run, state: { kind: 'active', step: completion.failed_step } }, ctx);
}
