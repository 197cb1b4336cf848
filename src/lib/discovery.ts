/**
 * Package discovery.
 *
 * Walks the search directory and returns every directory that holds the
 * descriptor file (package.xml), sorted so runs are reproducible.
 */

import { readdir } from 'node:fs/promises';
import { basename, join, relative, resolve } from 'node:path';
import micromatch from 'micromatch';
import type { Unit } from '../types/unit.js';
import { isDirectory } from './fs.js';
import { RunAbortError } from './errors.js';

export interface DiscoveryOptions {
  /** Marker file name, e.g. "package.xml" */
  descriptorFile: string;
  /** Globs matched against directory paths relative to the root; matching directories are skipped */
  ignoreGlobs?: readonly string[];
  /** Absolute directories never descended (the working directory) */
  excludeDirs?: readonly string[];
}

/**
 * Creates a Unit from a package directory found under `root`.
 */
export function toUnit(root: string, sourcePath: string): Unit {
  const absolute = resolve(root, sourcePath);
  return {
    name: basename(absolute),
    source_path: absolute,
    path: relative(resolve(root), absolute) || '.',
  };
}

/**
 * Recursively finds package directories under `rootDir`.
 *
 * Symbolic links are not followed.
 *
 * @throws {RunAbortError} SEARCH_DIR_NOT_FOUND if the root is not a directory,
 *   NO_UNITS_FOUND if no descriptor file exists under it
 *
 * @example
 * ```typescript
 * const units = await discoverUnits('/ws/src', { descriptorFile: 'package.xml' });
 * units.map((u) => u.name); // ['a', 'b']
 * ```
 */
export async function discoverUnits(rootDir: string, options: DiscoveryOptions): Promise<Unit[]> {
  const root = resolve(rootDir);
  if (!(await isDirectory(root))) {
    throw new RunAbortError('SEARCH_DIR_NOT_FOUND', `Package search directory not found: ${root}`);
  }

  const ignoreGlobs = [...(options.ignoreGlobs ?? [])];
  const excluded = new Set((options.excludeDirs ?? []).map((dir) => resolve(dir)));
  const found: string[] = [];

  const isIgnored = (dir: string): boolean => {
    if (excluded.has(dir)) return true;
    if (ignoreGlobs.length === 0) return false;
    const rel = relative(root, dir);
    return rel !== '' && micromatch.isMatch(rel, ignoreGlobs, { dot: true });
  };

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = join(dir, entry.name);
      if (entry.isFile() && entry.name === options.descriptorFile) {
        found.push(dir);
      } else if (entry.isDirectory() && !isIgnored(entryPath)) {
        await walk(entryPath);
      }
    }
  };

  await walk(root);

  if (found.length === 0) {
    throw new RunAbortError('NO_UNITS_FOUND', `No ROS packages found in ${root}`);
  }

  return found.sort().map((dir) => toUnit(root, dir));
}
