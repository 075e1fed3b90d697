// Search Service
export {
  SearchService,
  createSearchService,
  toSearchStatus,
  type SearchHandle,
  type SearchServiceOptions,
} from './search-service.js';

// Validators
export {
  validateOrThrow,
  validateSubmission,
  formatZodErrors,
  submitSearchSchema,
  listSearchesSchema,
  searchIdSchema,
  type ValidationIssue,
  type SubmitSearchInput,
} from './validators.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  gray,
  magenta,
  formatPhase,
  formatScore,
  formatDate,
  formatRelativeTime,
  formatDuration,
  truncate,
  padRight,
  padLeft,
  formatTable,
  formatSearchDetail,
  formatSearchList,
  formatResult,
  formatOutcome,
  formatError,
  formatInfo,
  formatJson,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createRunCommand,
  createResumeCommand,
  createStatusCommand,
  createListCommand,
  createServeCommand,
} from './cli.js';
