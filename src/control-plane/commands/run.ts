import { Command } from 'commander';
import { z } from 'zod';
import { createSearchService } from '../search-service.js';
import { ValidationError } from '../../errors/index.js';
import { getConfig } from '../../config/index.js';
import {
  print,
  printError,
  formatError,
  formatInfo,
  formatJson,
  formatOutcome,
  formatDuration,
  formatValidationErrors,
  dim,
} from '../formatter.js';

/**
 * Schema for run command options. Unset numbers fall back to the search defaults.
 */
const runOptionsSchema = z.object({
  problem: z.string(),
  maxDepth: z.coerce.number().optional(),
  branches: z.coerce.number().optional(),
  beam: z.coerce.number().optional(),
  threshold: z.coerce.number().optional(),
  json: z.boolean().default(false),
});

type RunOptions = z.infer<typeof runOptionsSchema>;

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Run a tree-of-thoughts search and wait for the answer')
    .requiredOption('-p, --problem <text>', 'Problem to solve')
    .option('-d, --max-depth <n>', 'Maximum search depth')
    .option('-b, --branches <n>', 'Branches generated per node')
    .option('-w, --beam <n>', 'Beam width kept after pruning')
    .option('-t, --threshold <x>', 'Minimum score to survive pruning (0-1)')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeRun(options);
      } catch (error) {
        if (error instanceof ValidationError) {
          printError(formatValidationErrors(error.issues));
        } else {
          printError(formatError(error instanceof Error ? error.message : String(error)));
        }
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Map CLI options to the search config, leaving out anything not given.
 */
export function toSearchConfig(options: RunOptions): Record<string, number> {
  const config: Record<string, number> = {};
  if (options.maxDepth !== undefined) config.maxDepth = options.maxDepth;
  if (options.branches !== undefined) config.branchesPerNode = options.branches;
  if (options.beam !== undefined) config.beamWidth = options.beam;
  if (options.threshold !== undefined) config.minScoreThreshold = options.threshold;
  return config;
}

/**
 * Execute the run command.
 */
async function executeRun(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = runOptionsSchema.safeParse(rawOptions);
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
  const service = createSearchService(getConfig());
  const startTime = Date.now();

  const handle = service.submit(options.problem, toSearchConfig(options));
  if (!options.json) {
    print(formatInfo(`Search ${handle.searchId} started`));
  }

  const outcome = await handle.result();

  if (options.json) {
    print(formatJson({ searchId: handle.searchId, ...outcome }));
  } else {
    print('');
    print(formatOutcome(outcome));
    print('');
    print(dim(`Finished in ${formatDuration(Math.round((Date.now() - startTime) / 1000))}`));
  }

  if (outcome.status === 'failed') {
    process.exitCode = 1;
  }
}
