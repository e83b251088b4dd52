import { access, readFile } from 'node:fs/promises';

export async function fileExists(p: string | undefined): Promise<boolean> {
  if (!p) return false;
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

/** First existing path among `candidates`, or the first candidate when none exist. */
export async function firstExisting(candidates: readonly string[]): Promise<string> {
  for (const candidate of candidates) {
    if (await fileExists(candidate)) return candidate;
  }
  return candidates[0] ?? '';
}

export async function readTextIfExists(p: string): Promise<string | null> {
  if (!(await fileExists(p))) return null;
  return readFile(p, 'utf8');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
