import { join } from 'node:path';
import { homedir } from 'node:os';
import { mkdir } from 'node:fs/promises';

let branchwiseRoot: string | null = null;

export function getBranchwiseRoot(): string {
  if (branchwiseRoot) {
    return branchwiseRoot;
  }

  branchwiseRoot = process.env['BRANCHWISE_ROOT'] ?? join(homedir(), '.branchwise');
  return branchwiseRoot;
}

export function setBranchwiseRoot(root: string | null): void {
  branchwiseRoot = root;
}

export function getSearchesDir(): string {
  return join(getBranchwiseRoot(), 'searches');
}

// Search paths
export function getSearchDir(searchId: string): string {
  return join(getSearchesDir(), searchId);
}

export function getSearchStatePath(searchId: string): string {
  return join(getSearchDir(searchId), 'state.json');
}

export function getCallLedgerPath(searchId: string): string {
  return join(getSearchDir(searchId), 'calls.jsonl');
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function ensureAllDirs(): Promise<void> {
  await ensureDir(getSearchesDir());
}
