import { Command } from 'commander';
import { z } from 'zod';
import { startServer } from '../../server/index.js';
import { createSearchService } from '../search-service.js';
import {
  print,
  printError,
  formatError,
  formatValidationErrors,
  bold,
  cyan,
} from '../formatter.js';
import { getConfig } from '../../config/index.js';

/**
 * Schema for serve command options. Unset values fall back to the environment config.
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().optional(),
  corsOrigin: z.string().optional(),
  apiKey: z.string().optional(),
});

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the HTTP API server')
    .option('-p, --port <port>', 'Port to listen on')
    .option('-H, --host <host>', 'Host to bind to')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .option('--api-key <key>', 'API key for the /api/v1 endpoints')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const config = getConfig();

  const port = options.port ?? config.port;
  const host = options.host ?? config.host;
  const apiKey = options.apiKey ?? config.apiKey;
  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : ['*'];

  print('Starting Branchwise server...');
  print('');
  print(`${bold('Server Configuration:')}`);
  print(`  ${bold('Port:')} ${cyan(String(port))}`);
  print(`  ${bold('Host:')} ${cyan(host)}`);
  print(`  ${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print(`  ${bold('API Key:')} ${cyan(apiKey ? '(configured)' : '(none - auth disabled)')}`);
  print(`  ${bold('Model:')} ${cyan(config.model)}`);
  print('');

  const server = await startServer({
    service: createSearchService(config),
    port,
    host,
    corsOrigins,
    apiKey,
  });

  const shutdown = (): void => {
    print('');
    print('Shutting down server...');
    void server.close().then(
      () => {
        print('Server stopped');
        process.exit(0);
      },
      (err: unknown) => {
        printError(formatError(err instanceof Error ? err.message : String(err)));
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}  /health                      - Health check`);
  print(`  ${cyan('GET')}  /api/v1/searches             - List searches`);
  print(`  ${cyan('GET')}  /api/v1/searches/:id         - Search status and outcome`);
  print(`  ${cyan('POST')} /api/v1/searches             - Submit a search`);
  print(`  ${cyan('POST')} /api/v1/searches/:id/resume  - Resume an interrupted search`);
  print('');
  print('Press Ctrl+C to stop the server');
}
