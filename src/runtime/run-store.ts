import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  EnrichmentParamsSchema,
  RunStateSchema,
  StepLedgerSchema,
} from '../shared/schemas.js';
import { runStatus } from './types.js';
import type { PipelineRun, RunStatus } from './types.js';

/** Persistence for pipeline runs; the controller writes through it after every step. */
export interface RunStore {
  save(run: PipelineRun): void;
  get(id: string): PipelineRun | null;
  list(filter?: { status?: RunStatus; limit?: number }): PipelineRun[];
}

const RunRowSchema = z.object({
  id: z.string(),
  url: z.string(),
  params_json: z.string(),
  state_json: z.string(),
  ledger_json: z.string(),
  attempts: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

const RUN_COLUMNS = 'id, url, params_json, state_json, ledger_json, attempts, created_at, updated_at';

function rowToRun(row: unknown): PipelineRun {
  const r = RunRowSchema.parse(row);
  return {
    id: r.id,
    url: r.url,
    params: EnrichmentParamsSchema.parse(JSON.parse(r.params_json)),
    state: RunStateSchema.parse(JSON.parse(r.state_json)),
    ledger: StepLedgerSchema.parse(JSON.parse(r.ledger_json)),
    attempts: r.attempts,
    created_at: r.created_at,
    updated_at: r.updated_at,
  };
}

export class SqliteRunStore implements RunStore {
  constructor(private readonly db: Database.Database) {}

  save(run: PipelineRun): void {
    this.db
      .prepare(
        `INSERT INTO pipeline_runs
           (id, url, status, current_step, params_json, state_json, ledger_json, attempts, created_at, updated_at)
         VALUES (@id, @url, @status, @current_step, @params_json, @state_json, @ledger_json, @attempts, @created_at, @updated_at)
         ON CONFLICT(id) DO UPDATE SET
           status = excluded.status,
           current_step = excluded.current_step,
           state_json = excluded.state_json,
           ledger_json = excluded.ledger_json,
           attempts = excluded.attempts,
           updated_at = excluded.updated_at`,
      )
      .run({
        id: run.id,
        url: run.url,
        status: runStatus(run),
        current_step: run.state.kind === 'active' ? run.state.step : null,
        params_json: JSON.stringify(run.params),
        state_json: JSON.stringify(run.state),
        ledger_json: JSON.stringify(run.ledger),
        attempts: run.attempts,
        created_at: run.created_at,
        updated_at: run.updated_at,
      });
  }

  get(id: string): PipelineRun | null {
    const row = this.db.prepare(`SELECT ${RUN_COLUMNS} FROM pipeline_runs WHERE id = ?`).get(id);
    return row === undefined ? null : rowToRun(row);
  }

  list(filter: { status?: RunStatus; limit?: number } = {}): PipelineRun[] {
    const limit = filter.limit ?? 50;
    const rows = filter.status
      ? this.db
          .prepare(`SELECT ${RUN_COLUMNS} FROM pipeline_runs WHERE status = ? ORDER BY created_at DESC, id LIMIT ?`)
          .all(filter.status, limit)
      : this.db
          .prepare(`SELECT ${RUN_COLUMNS} FROM pipeline_runs ORDER BY created_at DESC, id LIMIT ?`)
          .all(limit);
    return rows.map(rowToRun);
  }
}
