/**
 * Append-only ledger of committed collaborator calls.
 *
 * A call is committed once, under its identity key, before its result is used.
 * Replays read the ledger instead of calling the collaborator again.
 */

import { truncate } from 'node:fs/promises';
import type { CallRecord } from '../types/index.js';
import { getCallLedgerPath } from '../artifacts/paths.js';
import { appendJsonLine, readText } from '../artifacts/json.js';
import { SubstrateError } from '../errors/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { callRecordSchema } from './schemas.js';

const log = createLogger('call-ledger');

export interface CallLedger {
  /** Load every committed record of a search, keyed by call key */
  load(searchId: string): Promise<Map<string, CallRecord>>;
  /** Durably append a record; throws SubstrateError when the append fails */
  commit(record: CallRecord): Promise<void>;
}

function parseRecord(searchId: string, line: string, lineNumber: number): CallRecord {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (error) {
    throw new SubstrateError(`Call ledger for ${searchId} is corrupt at line ${lineNumber}`, {
      cause: error,
    });
  }

  const result = callRecordSchema.safeParse(data);
  if (!result.success) {
    throw new SubstrateError(
      `Call ledger for ${searchId} has an invalid record at line ${lineNumber}: ${result.error.message}`,
      { cause: result.error }
    );
  }
  if (result.data.searchId !== searchId) {
    throw new SubstrateError(
      `Call ledger for ${searchId} contains a record of search ${result.data.searchId}`
    );
  }
  return result.data;
}

/**
 * Parse ledger content. Text after the last newline is an append that never
 * completed and is reported separately so the caller can cut it off.
 */
export function parseLedger(
  searchId: string,
  content: string
): { records: Map<string, CallRecord>; committedLength: number; tornTail: string } {
  const lastNewline = content.lastIndexOf('\n');
  const committed = content.slice(0, lastNewline + 1);
  const tornTail = content.slice(lastNewline + 1);

  const records = new Map<string, CallRecord>();
  const lines = committed.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line === undefined || line.trim() === '') {
      continue;
    }
    const record = parseRecord(searchId, line, i + 1);
    // First commit wins; a committed result is never replaced
    if (!records.has(record.key)) {
      records.set(record.key, record);
    }
  }

  return { records, committedLength: Buffer.byteLength(committed, 'utf-8'), tornTail };
}

export class FileCallLedger implements CallLedger {
  async load(searchId: string): Promise<Map<string, CallRecord>> {
    const path = getCallLedgerPath(searchId);

    let content: string | null;
    try {
      content = await readText(path);
    } catch (error) {
      throw new SubstrateError(`Failed to read call ledger for ${searchId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (content === null) {
      return new Map();
    }

    const { records, committedLength, tornTail } = parseLedger(searchId, content);

    if (tornTail.length > 0) {
      log.warn({ searchId, bytes: tornTail.length }, 'Discarding incomplete ledger append');
      try {
        await truncate(path, committedLength);
      } catch (error) {
        throw new SubstrateError(
          `Failed to repair call ledger for ${searchId}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    }

    log.debug({ searchId, records: records.size }, 'Call ledger loaded');
    return records;
  }

  async commit(record: CallRecord): Promise<void> {
    try {
      await appendJsonLine(getCallLedgerPath(record.searchId), record);
    } catch (error) {
      throw new SubstrateError(`Failed to commit call ${record.key}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
