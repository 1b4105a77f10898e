import type { Command } from 'commander';
import { loadSnapshot } from '../../list/loader.js';
import { readListAtRevision, WORKTREE } from '../../list/revisions.js';
import { formatViolation, validateSnapshot } from '../../list/validate.js';
import { loadConfig } from '../cli-shared.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate [file]')
    .description('Validate the list file and print every violation')
    .option('--rev <revision>', 'Git revision to read instead of the working tree', WORKTREE)
    .option('--json', 'Print violations as JSON', false)
    .action(async (file: string | undefined, opts: { rev: string; json: boolean }) => {
      const { config } = loadConfig();
      const filePath = file ?? config.list.file;
      const source = await readListAtRevision(opts.rev, filePath, { repoPath: config.list.repo_path });
      const snapshot = loadSnapshot(source, opts.rev);
      const violations = validateSnapshot(snapshot);

      if (opts.json) {
        console.log(JSON.stringify({ valid: violations.length === 0, entries: snapshot.entries.length, violations }, null, 2));
      } else if (violations.length === 0) {
        console.log(`${filePath}: ${snapshot.entries.length} entries, all valid`);
      } else {
        console.error(`${filePath}: found ${violations.length} validation error(s):`);
        for (const v of violations) console.error(`  ${formatViolation(v)}`);
      }

      if (violations.length > 0) process.exitCode = 1;
    });
}
