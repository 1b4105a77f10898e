import type { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { loadConfig, parseIntOption } from '../cli-shared.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the local API server')
    .option('--host <host>', 'Bind host (default: api.host from config)')
    .option('--port <port>', 'Port (default: api.port from config)')
    .action(async (opts: { host?: string; port?: string }) => {
      const { config } = loadConfig();
      const host = opts.host ?? config.api.host;
      const port = opts.port !== undefined ? parseIntOption(opts.port, '--port') : config.api.port;

      console.log('Starting repolist API...');
      console.log(`  API: http://${host}:${port}/v1`);
      console.log('\nPress Ctrl+C to stop\n');

      await startServer({ host, port });
    });
}
