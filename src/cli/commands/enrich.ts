import type { Command } from 'commander';
import { startEnrichment } from '../../runtime/runner.js';
import { PrioritySchema } from '../../shared/schemas.js';
import { createRunnerContext, describeRun, parseIntOption, requireWorkspace, runFailed } from '../cli-shared.js';

export function registerEnrichCommand(program: Command): void {
  program
    .command('enrich <url>')
    .description('Fetch a repository README, store it, summarize it and enqueue the result')
    .option('--priority <priority>', 'Queue priority: low, medium or high', 'medium')
    .option('--max-summary-length <words>', 'Word ceiling for the summary (10-1000)', '200')
    .option('--language <code>', 'Summary language', 'en')
    .action(async (url: string, opts: { priority: string; maxSummaryLength: string; language: string }) => {
      const ws = requireWorkspace();
      const run = await startEnrichment(
        {
          url,
          priority: PrioritySchema.parse(opts.priority),
          max_summary_length: parseIntOption(opts.maxSummaryLength, '--max-summary-length'),
          language: opts.language,
        },
        createRunnerContext(ws),
      );
      for (const line of describeRun(run)) console.log(line);
      if (runFailed(run)) {
        console.log(`\nRetry with: repolist runs retry ${run.id}`);
        process.exitCode = 1;
      }
    });
}
