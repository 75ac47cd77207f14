import type { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { parseIntOption } from '../cli-shared.js';

interface ServeCommandOptions {
  cwd: string;
  host?: string;
  port?: string;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the API server that accepts manual dispatches and signed push hooks')
    .option('--cwd <dir>', 'Project directory', process.cwd())
    .option('--host <host>', 'Bind host (default: 127.0.0.1)')
    .option('--port <port>', 'Port (default: 7800)')
    .action(async (opts: ServeCommandOptions) => {
      const port = opts.port !== undefined ? parseIntOption(opts.port, '--port') : undefined;

      console.log('Starting imagesmith API server...');
      console.log('\nPress Ctrl+C to stop\n');

      await startServer({ cwd: opts.cwd, host: opts.host, port });
    });
}
