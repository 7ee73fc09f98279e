import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import YAML from 'yaml';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Modification time in epoch milliseconds; null when the path is missing. */
export async function modifiedAt(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch {
    return null;
  }
}

export async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

/** Returns null instead of throwing when the file is missing or unreadable. */
export async function tryReadText(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch {
    return null;
  }
}

export async function readJson(path: string): Promise<unknown> {
  const raw = await readText(path);
  const doc: unknown = JSON.parse(raw);
  return doc;
}

export async function readYaml(path: string): Promise<unknown> {
  const raw = await readText(path);
  const doc: unknown = YAML.parse(raw);
  return doc;
}

/**
 * Run `fn` with a fresh temporary directory and remove it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** POSIX-style path, the form every glob and report path in this project uses. */
export function toPosix(path: string): string {
  return path.replaceAll('\\', '/');
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}
