import type { Command } from 'commander';
import { SqliteRunStore } from '../../runtime/run-store.js';
import { resumeRun, retryRun } from '../../runtime/runner.js';
import { runStatus } from '../../runtime/types.js';
import type { RunStatus } from '../../runtime/types.js';
import { createRunnerContext, describeRun, parseIntOption, requireWorkspace, runFailed } from '../cli-shared.js';

const STATUSES: readonly RunStatus[] = ['active', 'success', 'skipped', 'failed'];

function parseStatus(value: string | undefined): RunStatus | undefined {
  if (value === undefined) return undefined;
  const status = STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown status "${value}" (expected ${STATUSES.join(', ')})`);
  return status;
}

export function registerRunsCommand(program: Command): void {
  const runs = program.command('runs').description('Inspect and recover enrichment runs');

  runs
    .command('list')
    .description('List recent runs')
    .option('--status <status>', 'Filter: active, success, skipped or failed')
    .option('--limit <n>', 'Maximum rows', '20')
    .action((opts: { status?: string; limit: string }) => {
      const { db } = requireWorkspace();
      const store = new SqliteRunStore(db);
      const rows = store.list({ status: parseStatus(opts.status), limit: parseIntOption(opts.limit, '--limit') });
      if (rows.length === 0) {
        console.log('No runs.');
        return;
      }
      for (const run of rows) {
        const step = run.state.kind === 'active' ? run.state.step : '';
        console.log(`${run.id}  ${runStatus(run).padEnd(8)} ${step.padEnd(15)} ${run.created_at}  ${run.url}`);
      }
    });

  runs
    .command('show <id>')
    .description('Show one run and its step ledger')
    .option('--json', 'Print the full run as JSON', false)
    .action((id: string, opts: { json: boolean }) => {
      const { db } = requireWorkspace();
      const run = new SqliteRunStore(db).get(id);
      if (!run) throw new Error(`Run not found: ${id}`);
      if (opts.json) {
        console.log(JSON.stringify(run, null, 2));
        return;
      }
      for (const line of describeRun(run)) console.log(line);
      console.log(`  Attempts: ${run.attempts}`);
      console.log(`  Completed steps: ${Object.keys(run.ledger).join(', ') || '(none)'}`);
    });

  runs
    .command('resume <id>')
    .description('Continue an interrupted run from its current step')
    .action(async (id: string) => {
      const run = await resumeRun(id, createRunnerContext(requireWorkspace()));
      for (const line of describeRun(run)) console.log(line);
    });

  runs
    .command('retry <id>')
    .description('Re-run a failed run from the step that failed')
    .action(async (id: string) => {
      const run = await retryRun(id, createRunnerContext(requireWorkspace()));
      for (const line of describeRun(run)) console.log(line);
      if (runFailed(run)) {
        process.exitCode = 1;
      }
    });
}
