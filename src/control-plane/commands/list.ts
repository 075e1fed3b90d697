import { Command } from 'commander';
import { z } from 'zod';
import { FileCheckpointStore } from '../../orchestrator/search-store.js';
import { toSearchStatus } from '../search-service.js';
import { listSearchesSchema } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatSearchList,
  formatValidationErrors,
  dim,
} from '../formatter.js';

const listOptionsSchema = listSearchesSchema.extend({
  json: z.boolean().default(false),
});

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  const command = new Command('list')
    .description('List searches, newest first')
    .option('-l, --limit <n>', 'Maximum number of searches to show', '20')
    .option('-o, --offset <n>', 'Number of searches to skip', '0')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeList(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeList(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = listOptionsSchema.safeParse(rawOptions);
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

  const { limit, offset, json } = optionsResult.data;
  const { items, total } = await new FileCheckpointStore().list({ limit, offset });
  const searches = items.map(toSearchStatus);

  if (json) {
    print(formatJson({ items: searches, total, limit, offset }));
    return;
  }

  print(formatSearchList(searches));
  if (total > offset + searches.length) {
    print('');
    print(dim(`Showing ${searches.length} of ${total}. Use --offset to see more.`));
  }
}
