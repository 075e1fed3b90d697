/**
 * Schemas for everything read back from durable storage.
 * Anything that fails these checks is treated as a substrate fault.
 */

import { z } from 'zod';
import {
  BranchStatus,
  CallErrorType,
  FailureReason,
  SearchPhase,
  TerminationReason,
  searchConfigSchema,
} from '../types/index.js';

export const branchSchema = z.object({
  id: z.string().min(1),
  parentId: z.string().min(1).nullable(),
  depth: z.number().int().min(0),
  content: z.string(),
  score: z.number().min(0).max(1).nullable(),
  status: z.nativeEnum(BranchStatus),
  terminalSignal: z.boolean(),
  answer: z.string().nullable(),
  rationale: z.string().nullable(),
  createdAt: z.string(),
});

export const searchResultSchema = z.object({
  searchId: z.string(),
  problem: z.string(),
  answer: z.string(),
  score: z.number(),
  depth: z.number().int(),
  branch: branchSchema,
  path: z.array(branchSchema),
  terminationReason: z.nativeEnum(TerminationReason),
  totalBranchesExplored: z.number().int(),
});

export const searchStateSchema = z.object({
  searchId: z.string().min(1),
  problem: z.string(),
  config: searchConfigSchema,
  phase: z.nativeEnum(SearchPhase),
  currentDepth: z.number().int().min(0),
  rootId: z.string().nullable(),
  branches: z.array(branchSchema),
  candidates: z.array(z.string()),
  frontier: z.array(z.string()),
  bestSoFarId: z.string().nullable(),
  winnerId: z.string().nullable(),
  terminationReason: z.nativeEnum(TerminationReason).nullable(),
  result: searchResultSchema.nullable(),
  failure: z
    .object({
      reason: z.nativeEnum(FailureReason),
      message: z.string(),
    })
    .nullable(),
  totalExplored: z.number().int().min(0),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const callRecordBase = {
  key: z.string().min(1),
  searchId: z.string().min(1),
  depth: z.number().int().min(0),
  subjectId: z.string().min(1),
  attempts: z.number().int().min(0),
  committedAt: z.string(),
};

export const callRecordSchema = z.union([
  z.object({
    ...callRecordBase,
    kind: z.literal('generate'),
    status: z.literal('succeeded'),
    children: z.array(z.object({ id: z.string().min(1), content: z.string() })),
  }),
  z.object({
    ...callRecordBase,
    kind: z.literal('evaluate'),
    status: z.literal('succeeded'),
    evaluation: z.object({
      score: z.number().min(0).max(1),
      isTerminal: z.boolean(),
      answer: z.string().nullable(),
      rationale: z.string().nullable(),
    }),
  }),
  z.object({
    ...callRecordBase,
    kind: z.enum(['generate', 'evaluate']),
    status: z.literal('failed'),
    errorType: z.nativeEnum(CallErrorType),
    error: z.string(),
  }),
]);
