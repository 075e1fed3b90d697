import { Command } from 'commander';
import { searchIdSchema } from '../validators.js';
import { createSearchService } from '../search-service.js';
import { getConfig } from '../../config/index.js';
import { print, printError, formatError, formatInfo, formatJson, formatOutcome } from '../formatter.js';

/**
 * Create the resume command.
 */
export function createResumeCommand(): Command {
  const command = new Command('resume')
    .description('Continue an interrupted search from its last checkpoint')
    .argument('<id>', 'Search ID')
    .option('--json', 'Output result as JSON', false)
    .action(async (id: string, options: { json?: boolean }) => {
      try {
        await executeResume(id, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeResume(id: string, options: { json?: boolean }): Promise<void> {
  const parsed = searchIdSchema.safeParse(id);
  if (!parsed.success) {
    printError(formatError(parsed.error.errors[0]?.message ?? 'Invalid search ID'));
    process.exitCode = 1;
    return;
  }
  const searchId = parsed.data;

  const service = createSearchService(getConfig());

  if (!options.json) {
    print(formatInfo(`Resuming search ${searchId}`));
  }

  const outcome = await service.resume(searchId);

  if (options.json) {
    print(formatJson({ searchId, ...outcome }));
  } else {
    print('');
    print(formatOutcome(outcome));
  }

  if (outcome.status === 'failed') {
    process.exitCode = 1;
  }
}
