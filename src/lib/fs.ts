/**
 * File system utilities.
 *
 * JSON writes use the write-tmp-fsync-rename pattern so report.json is never
 * left half-written; the remaining helpers cover the directory work shared by
 * discovery, staging and artifact collection.
 */

import { open, rename, unlink, readFile, readdir, rm, mkdir, stat } from 'node:fs/promises';
import { isAbsolute, join, relative } from 'node:path';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * Atomically writes JSON data to a file using the write-tmp-fsync-rename pattern.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('bloom-build/report.json', report);
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    const content = JSON.stringify(data, null, 2) + '\n';

    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      try {
        await fileHandle.close();
      } catch {
        // Ignore close errors during cleanup
      }
    }

    try {
      await unlink(tmpPath);
    } catch {
      // Ignore unlink errors - file may not exist
    }

    throw new AtomicFsError(
      `Failed to atomically write JSON to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a JSON file. The result is unvalidated.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * True when `candidate` is `parent` or lies below it. Both paths must be absolute.
 */
export function isPathInside(parent: string, candidate: string): boolean {
  const rel = relative(parent, candidate);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Removes a directory tree (if present) and recreates it empty.
 */
export async function resetDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });
}

/**
 * Recursively lists files whose name ends with `extension`, sorted.
 * Symbolic links are not followed. A missing directory yields an empty list.
 */
export async function findFilesByExtension(dir: string, extension: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true }).catch(() => null);
    if (!entries) return;
    for (const entry of entries) {
      const entryPath = join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        found.push(entryPath);
      }
    }
  };

  await walk(dir);
  return found.sort();
}
