import type { SearchOutcome, SearchPhase, SearchResult, SearchStatus } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',

  // Background colors
  bgRed: '\x1b[41m',
  bgGreen: '\x1b[42m',
  bgYellow: '\x1b[43m',
  bgBlue: '\x1b[44m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

export function gray(text: string): string {
  return colorize(text, 'gray');
}

export function magenta(text: string): string {
  return colorize(text, 'magenta');
}

/**
 * Format a search phase with appropriate color.
 */
export function formatPhase(phase: SearchPhase): string {
  const phaseColors: Record<SearchPhase, keyof typeof colors> = {
    initializing: 'gray',
    generating: 'blue',
    evaluating: 'blue',
    pruning: 'blue',
    checking_termination: 'blue',
    finalizing: 'cyan',
    completed: 'green',
    failed: 'red',
  };

  return colorize(phase.toUpperCase(), phaseColors[phase]);
}

export function formatScore(score: number | null): string {
  if (score === null) {
    return '-';
  }
  return score.toFixed(2);
}

/**
 * Format a date for display.
 */
export function formatDate(date: Date): string {
  return date.toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

/**
 * Format a relative time (e.g., "2 hours ago").
 */
export function formatRelativeTime(date: Date): string {
  const now = Date.now();
  const diff = now - date.getTime();

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Format duration in seconds to human-readable string.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Pad a string to a specific width.
 */
export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  // Header row
  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  // Separator
  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  // Data rows
  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format a search status for detailed display.
 */
export function formatSearchDetail(status: SearchStatus): string {
  const lines: string[] = [];
  const createdAt = new Date(status.createdAt);

  lines.push(bold('Search Details'));
  lines.push('');
  lines.push(`${bold('ID:')}           ${status.searchId}`);
  lines.push(`${bold('Phase:')}        ${formatPhase(status.phase)}`);
  lines.push(`${bold('Progress:')}     ${status.progress}`);
  lines.push(`${bold('Created:')}      ${formatDate(createdAt)} (${dim(formatRelativeTime(createdAt))})`);

  lines.push('');
  lines.push(bold('Problem:'));
  lines.push(`  ${status.problem}`);

  lines.push('');
  lines.push(bold('Search:'));
  lines.push(`  ${dim('Depth:')}        ${status.currentDepth}/${status.maxDepth}`);
  lines.push(`  ${dim('Frontier:')}     ${status.frontierSize}`);
  lines.push(`  ${dim('Best score:')}   ${formatScore(status.bestScore)}`);
  lines.push(`  ${dim('Explored:')}     ${status.totalExplored}`);

  if (status.outcome) {
    lines.push('');
    lines.push(formatOutcome(status.outcome));
  }

  return lines.join('\n');
}

/**
 * Format the final answer and reasoning path of a completed search.
 */
export function formatResult(result: SearchResult): string {
  const lines: string[] = [];

  lines.push(bold(green('Answer:')));
  lines.push(`  ${result.answer}`);
  lines.push('');
  lines.push(`${bold('Score:')}        ${formatScore(result.score)}`);
  lines.push(`${bold('Depth:')}        ${result.depth}`);
  lines.push(`${bold('Stopped by:')}   ${result.terminationReason}`);
  lines.push(`${bold('Explored:')}     ${result.totalBranchesExplored} branches`);

  const steps = result.path.filter((b) => b.parentId !== null);
  if (steps.length > 0) {
    lines.push('');
    lines.push(bold('Reasoning path:'));
    steps.forEach((step, i) => {
      lines.push(`  ${cyan(`${i + 1}.`)} ${step.content} ${dim(`(${formatScore(step.score)})`)}`);
    });
  }

  return lines.join('\n');
}

export function formatOutcome(outcome: SearchOutcome): string {
  if (outcome.status === 'completed') {
    return formatResult(outcome.result);
  }
  return formatError(`${outcome.reason}: ${outcome.message}`);
}

/**
 * Format a list of searches as a table.
 */
export function formatSearchList(searches: SearchStatus[]): string {
  if (searches.length === 0) {
    return dim('No searches found.');
  }

  const columns: TableColumn<SearchStatus>[] = [
    {
      header: 'ID',
      width: 21,
      value: (s) => s.searchId,
    },
    {
      header: 'PHASE',
      width: 20,
      value: (s) => formatPhase(s.phase),
    },
    {
      header: 'DEPTH',
      width: 5,
      align: 'right',
      value: (s) => `${s.currentDepth}/${s.maxDepth}`,
    },
    {
      header: 'BEST',
      width: 5,
      align: 'right',
      value: (s) => formatScore(s.bestScore),
    },
    {
      header: 'CREATED',
      width: 16,
      value: (s) => formatRelativeTime(new Date(s.createdAt)),
    },
    {
      header: 'PROBLEM',
      width: 40,
      value: (s) => truncate(s.problem, 40),
    },
  ];

  return formatTable(searches, columns);
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format info message.
 */
export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
