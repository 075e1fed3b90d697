import { z, type ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { searchConfigSchema, type SearchConfig } from '../types/index.js';
import { ValidationError } from '../errors/index.js';

/**
 * Individual validation issue.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Schema for a search submission.
 */
export const submitSearchSchema = z.object({
  problem: z.string().trim().min(1, 'Problem must not be empty'),
  config: searchConfigSchema.strict().default({}),
});

export type SubmitSearchInput = z.input<typeof submitSearchSchema>;

/**
 * Search IDs are nanoid strings; anything else never reaches a store path.
 */
export const searchIdSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9_-]+$/, 'Search ID may only contain letters, digits, "_" and "-"');

export const listSearchesSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

/**
 * Convert Zod errors to our issue format.
 */
export function formatZodErrors(error: ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Validate and throw a ValidationError on failure.
 */
export function validateOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = formatZodErrors(result.error);
    const summary = issues.map((e) => `${e.path ? `${e.path}: ` : ''}${e.message}`).join('; ');
    throw new ValidationError(`Validation failed: ${summary}`, issues);
  }
  return result.data;
}

export function validateSubmission(problem: unknown, config?: unknown): { problem: string; config: SearchConfig } {
  return validateOrThrow(submitSearchSchema, { problem, config });
}
