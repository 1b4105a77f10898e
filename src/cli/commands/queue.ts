import type { Command } from 'commander';
import { SqliteMessageQueue } from '../../runtime/queue.js';
import { parseIntOption, requireWorkspace } from '../cli-shared.js';

export function registerQueueCommand(program: Command): void {
  const queue = program.command('queue').description('Inspect the enrichment outbox');

  queue
    .command('list')
    .description('List queued enrichment messages, newest first')
    .option('--limit <n>', 'Maximum rows', '20')
    .option('--json', 'Print messages as JSON', false)
    .action((opts: { limit: string; json: boolean }) => {
      const { db } = requireWorkspace();
      const messages = new SqliteMessageQueue(db).list(parseIntOption(opts.limit, '--limit'));
      if (opts.json) {
        console.log(JSON.stringify(messages, null, 2));
        return;
      }
      if (messages.length === 0) {
        console.log('Queue is empty.');
        return;
      }
      for (const m of messages) {
        console.log(`${m.id.slice(0, 12)}  ${m.priority.padEnd(6)} ${m.enqueued_at}  ${m.payload.url}`);
      }
    });
}
