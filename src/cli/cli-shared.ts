import { existsSync, mkdirSync } from 'node:fs';
import type Database from 'better-sqlite3';
import type { FetchLike } from '../connector/github/tools.js';
import { SqliteRunStore } from '../runtime/run-store.js';
import { startEnrichment } from '../runtime/runner.js';
import type { RunnerContext } from '../runtime/runner.js';
import { createCollaborators } from '../runtime/tools/index.js';
import { runStatus } from '../runtime/types.js';
import type { PipelineRun } from '../runtime/types.js';
import { loadAppConfig } from '../workspace/config.js';
import { openDb } from '../workspace/db.js';
import { getRepolistPaths } from '../workspace/paths.js';
import type { AppConfig, RepolistPaths } from '../workspace/types.js';

export interface WorkspaceContext {
  paths: RepolistPaths;
  config: AppConfig;
  db: Database.Database;
}

/** Config only; commands that never touch the state db use this. */
export function loadConfig(cwd?: string): { paths: RepolistPaths; config: AppConfig } {
  const paths = getRepolistPaths(cwd);
  return { paths, config: loadAppConfig(paths.config) };
}

/**
 * Load config and open the state db, creating `.repolist/` on first use.
 * Use at the top of every CLI command that reads or writes runs.
 */
export function requireWorkspace(cwd?: string): WorkspaceContext {
  const { paths, config } = loadConfig(cwd);
  if (!existsSync(paths.root)) {
    mkdirSync(paths.root, { recursive: true });
  }
  const db = openDb(paths.stateDb);
  return { paths, config, db };
}

export function createRunnerContext(ws: WorkspaceContext, fetch?: FetchLike): RunnerContext {
  return {
    store: new SqliteRunStore(ws.db),
    collaborators: createCollaborators(ws.config, { db: ws.db, paths: ws.paths, fetch }),
  };
}

export function runFailed(run: PipelineRun): boolean {
  return run.state.kind === 'completed' && run.state.completion.status === 'failed';
}

/** Enrich each url in turn, printing every run; resolves to the number of failed runs. */
export async function enrichAll(
  urls: readonly string[],
  ctx: RunnerContext,
  print: (line: string) => void = console.log,
): Promise<number> {
  let failed = 0;
  for (const url of urls) {
    const run = await startEnrichment({ url }, ctx);
    for (const line of describeRun(run)) print(line);
    if (runFailed(run)) failed++;
  }
  return failed;
}

export function describeRun(run: PipelineRun): string[] {
  const lines = [`Run ${run.id}  ${runStatus(run)}  ${run.url}`];
  const state = run.state;
  if (state.kind === 'active') {
    lines.push(`  Next step: ${state.step}`);
    return lines;
  }
  const completion = state.completion;
  switch (completion.status) {
    case 'success':
      lines.push(`  Message: ${completion.message_id}`);
      lines.push(`  README:  ${completion.payload.upload.key} (${completion.payload.upload.size} bytes)`);
      lines.push(`  Summary: ${completion.payload.summary_upload.key} (${completion.payload.summary_metrics.summary_words} words)`);
      break;
    case 'skipped':
      lines.push(`  Skipped: ${completion.reason}`);
      break;
    case 'failed':
      lines.push(`  Failed at ${completion.failed_step}: ${completion.reason}`);
      break;
  }
  return lines;
}

export function parseIntOption(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got ${JSON.stringify(value)}`);
  }
  return n;
}
