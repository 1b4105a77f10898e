import type { Command } from 'commander';
import { toChangePayloads } from '../../list/diff.js';
import { writeCiOutputs } from '../../list/ci-output.js';
import { isChangeLimitPolicy } from '../../list/limits.js';
import { formatReport, reviewRevisions } from '../../list/review.js';
import { createRunnerContext, enrichAll, loadConfig, parseIntOption, requireWorkspace } from '../cli-shared.js';

interface DetectOptions {
  old: string;
  new: string;
  file?: string;
  repo?: string;
  maxChanges?: string;
  policy: string;
  output: string;
  githubOutput?: string;
  enrich: boolean;
}

export function registerDetectCommand(program: Command): void {
  program
    .command('detect')
    .description('Diff the list between two revisions, enforce the change limit and validate the result')
    .option('--old <revision>', 'Base revision', 'HEAD~1')
    .option('--new <revision>', 'Head revision (WORKTREE for the file on disk)', 'HEAD')
    .option('--file <path>', 'List file path relative to the repository root')
    .option('--repo <path>', 'Repository root')
    .option('--max-changes <n>', 'Change ceiling; overrides --policy')
    .option('--policy <policy>', 'Change ceiling policy: automated or contributor', 'automated')
    .option('--output <format>', 'Output format: text or json', 'text')
    .option('--github-output <file>', 'Append has_changes/payloads_count/payloads to this file (defaults to $GITHUB_OUTPUT)')
    .option('--enrich', 'Run the enrichment pipeline for every added repository when the review passes', false)
    .action(async (opts: DetectOptions) => {
      const { config } = loadConfig();

      if (!isChangeLimitPolicy(opts.policy)) {
        throw new Error(`Unknown policy "${opts.policy}" (expected automated or contributor)`);
      }
      const maxChanges =
        opts.maxChanges !== undefined ? parseIntOption(opts.maxChanges, '--max-changes') : config.limits[opts.policy];

      const report = await reviewRevisions({
        repoPath: opts.repo ?? config.list.repo_path,
        filePath: opts.file ?? config.list.file,
        oldRevision: opts.old,
        newRevision: opts.new,
        maxChanges,
      });
      const payloads = report.passed ? toChangePayloads(report.changes) : [];

      if (opts.output === 'json') {
        console.log(JSON.stringify({ ...report, payloads }, null, 2));
      } else {
        const print = report.passed ? console.log : console.error;
        for (const line of formatReport(report)) print(line);
      }

      const githubOutput = opts.githubOutput ?? process.env['GITHUB_OUTPUT'];
      if (githubOutput) writeCiOutputs(githubOutput, payloads);

      if (!report.passed) {
        process.exitCode = 1;
        return;
      }

      if (opts.enrich && report.changes.added.length > 0) {
        const urls = report.changes.added.map((record) => record.url);
        const failed = await enrichAll(urls, createRunnerContext(requireWorkspace()));
        if (failed > 0) process.exitCode = 1;
      }
    });
}
