import { Command } from 'commander';
import chalk from 'chalk';
import { ApiServer, DEFAULT_PORT } from '@papergraph/api-server';

export function parsePort(value: string): number | null {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    return null;
  }
  return port;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the PaperGraph REST API server')
    .option('--port <port>', 'Port to listen on', String(DEFAULT_PORT))
    .action(async (options: { port: string }) => {
      try {
        const port = parsePort(options.port);
        if (port === null) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('[papergraph] Invalid port number'));
          process.exit(1);
        }

        const server = new ApiServer({ rootDir: process.cwd(), port });
        await server.initialize();

        const shutdown = (): void => {
          // eslint-disable-next-line no-console
          console.error(chalk.blue('[papergraph]'), 'Shutting down...');
          void server.close().finally(() => process.exit(0));
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);

        await server.start();
        // eslint-disable-next-line no-console
        console.error(chalk.green('[papergraph]'), `API server running on http://localhost:${port}`);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('[papergraph] Server failed:'), message);
        process.exit(1);
      }
    });
}
