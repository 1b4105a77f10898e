#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerDetectCommand } from './commands/detect.js';
import { registerEnrichCommand } from './commands/enrich.js';
import { registerRunsCommand } from './commands/runs.js';
import { registerQueueCommand } from './commands/queue.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('repolist')
  .description('Curated security repository list: validation, change detection and README enrichment')
  .version('0.1.0');

registerInitCommand(program);
registerValidateCommand(program);
registerDetectCommand(program);
registerEnrichCommand(program);
registerRunsCommand(program);
registerQueueCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
