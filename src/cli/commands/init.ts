import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a .repolist workspace in the current directory')
    .option('--list-file <path>', 'Path of the list file relative to the repository root', 'repo-list.yaml')
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .action((opts: { listFile: string; force: boolean }) => {
      const config = initWorkspace({ force: opts.force, listFile: opts.listFile });
      console.log('Workspace initialized!');
      console.log(`  List file:  ${config.list.file}`);
      console.log(`  GitHub API: ${config.github.api_base}`);
      console.log(`  LLM model:  ${config.llm.model}`);
      console.log('\nNext steps:');
      console.log('  repolist validate <file>   – check the list file');
      console.log('  repolist enrich <url>      – fetch and summarize a README');
      console.log('  repolist serve             – start the local API');
    });
}
