import { Command } from 'commander';
import { searchIdSchema } from '../validators.js';
import { FileCheckpointStore } from '../../orchestrator/search-store.js';
import { toSearchStatus } from '../search-service.js';
import { print, printError, formatError, formatJson, formatSearchDetail } from '../formatter.js';

/**
 * Create the status command.
 */
export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Get the status of a search')
    .argument('<id>', 'Search ID')
    .option('--json', 'Output result as JSON', false)
    .action(async (id: string, options: { json?: boolean }) => {
      try {
        await executeStatus(id, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeStatus(id: string, options: { json?: boolean }): Promise<void> {
  const parsed = searchIdSchema.safeParse(id);
  if (!parsed.success) {
    printError(formatError(parsed.error.errors[0]?.message ?? 'Invalid search ID'));
    process.exitCode = 1;
    return;
  }
  const searchId = parsed.data;

  const state = await new FileCheckpointStore().load(searchId);

  if (!state) {
    printError(formatError(`Search not found: ${searchId}`));
    process.exitCode = 1;
    return;
  }

  const status = toSearchStatus(state);
  if (options.json) {
    print(formatJson(status));
  } else {
    print(formatSearchDetail(status));
  }
}
