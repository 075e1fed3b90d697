import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createResumeCommand } from './commands/resume.js';
import { createStatusCommand } from './commands/status.js';
import { createListCommand } from './commands/list.js';
import { createServeCommand } from './commands/serve.js';
import { ensureAllDirs } from '../artifacts/paths.js';
import { VERSION } from '../version.js';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('branchwise')
    .description('Branchwise - durable tree-of-thoughts beam search over LLM reasoning')
    .version(VERSION, '-v, --version', 'Output the current version')
    .hook('preAction', async () => {
      // Ensure all required directories exist before any command runs
      await ensureAllDirs();
    });

  program.addCommand(createRunCommand());
  program.addCommand(createResumeCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createListCommand());
  program.addCommand(createServeCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createRunCommand } from './commands/run.js';
export { createResumeCommand } from './commands/resume.js';
export { createStatusCommand } from './commands/status.js';
export { createListCommand } from './commands/list.js';
export { createServeCommand } from './commands/serve.js';
