/**
 * Search checkpoint persistence.
 * One JSON document per search, replaced atomically on every transition.
 */

import { readdir } from 'node:fs/promises';
import type { SearchState } from '../types/index.js';
import { getSearchesDir, getSearchStatePath } from '../artifacts/paths.js';
import { readText, writeJsonAtomic } from '../artifacts/json.js';
import { SubstrateError } from '../errors/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { searchStateSchema } from './schemas.js';

const log = createLogger('search-store');

export interface CheckpointStore {
  /** Persist the state; throws SubstrateError when the write cannot be guaranteed */
  save(state: SearchState): Promise<void>;
  /** Returns null for an unknown search; throws SubstrateError for an unreadable one */
  load(searchId: string): Promise<SearchState | null>;
  /** Newest first, with the total number of readable searches */
  list(options?: { limit?: number; offset?: number }): Promise<{ items: SearchState[]; total: number }>;
}

/**
 * Parse and validate a serialized checkpoint.
 */
export function parseCheckpoint(searchId: string, content: string): SearchState {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new SubstrateError(`Checkpoint for ${searchId} is not valid JSON`, { cause: error });
  }

  const result = searchStateSchema.safeParse(data);
  if (!result.success) {
    throw new SubstrateError(
      `Checkpoint for ${searchId} failed validation: ${result.error.message}`,
      { cause: result.error }
    );
  }
  if (result.data.searchId !== searchId) {
    throw new SubstrateError(
      `Checkpoint for ${searchId} belongs to search ${result.data.searchId}`
    );
  }
  return result.data;
}

export class FileCheckpointStore implements CheckpointStore {
  async save(state: SearchState): Promise<void> {
    try {
      await writeJsonAtomic(getSearchStatePath(state.searchId), state);
    } catch (error) {
      throw new SubstrateError(
        `Failed to checkpoint search ${state.searchId}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    log.debug({ searchId: state.searchId, phase: state.phase, depth: state.currentDepth }, 'Checkpoint saved');
  }

  async load(searchId: string): Promise<SearchState | null> {
    let content: string | null;
    try {
      content = await readText(getSearchStatePath(searchId));
    } catch (error) {
      throw new SubstrateError(`Failed to read checkpoint for ${searchId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (content === null) {
      return null;
    }
    return parseCheckpoint(searchId, content);
  }

  async list(
    options: { limit?: number; offset?: number } = {}
  ): Promise<{ items: SearchState[]; total: number }> {
    const { limit = 20, offset = 0 } = options;

    let entries: string[];
    try {
      entries = await readdir(getSearchesDir());
    } catch {
      return { items: [], total: 0 };
    }

    const states: SearchState[] = [];
    for (const entry of entries) {
      try {
        const state = await this.load(entry);
        if (state) {
          states.push(state);
        }
      } catch (error) {
        log.warn({ searchId: entry, error: errorMessage(error) }, 'Skipping unreadable checkpoint');
      }
    }

    states.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return { items: states.slice(offset, offset + limit), total: states.length };
  }
}
