/**
 * Binary package collection.
 *
 * The output directory is flat: artifacts from every package land side by
 * side, and a later file with the same name replaces an earlier one.
 */

import { copyFile, mkdir, readdir, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from './log.js';
import { findFilesByExtension, isFile } from './fs.js';

/**
 * Finds every artifact anywhere under a unit workspace.
 */
export async function collectArtifacts(workspaceRoot: string, extension: string): Promise<string[]> {
  return findFilesByExtension(workspaceRoot, extension);
}

/**
 * Copies artifacts into the output directory.
 *
 * @returns Paths of the copies, in input order
 */
export async function publishArtifacts(files: readonly string[], outputDir: string, logger: Logger): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });
  const published: string[] = [];
  for (const file of files) {
    const target = join(outputDir, basename(file));
    if (await isFile(target)) {
      logger.warn(`Overwriting ${basename(file)} in output directory`);
    }
    await copyFile(file, target);
    logger.info(`Generated: ${basename(file)}`);
    published.push(target);
  }
  return published;
}

/**
 * Lists artifact file names directly inside the output directory, sorted.
 * A missing directory yields an empty list.
 */
export async function listOutputArtifacts(outputDir: string, extension: string): Promise<string[]> {
  const entries = await readdir(outputDir, { withFileTypes: true }).catch(() => null);
  if (!entries) return [];
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Removes artifacts left in the output directory by an earlier run, so the
 * final artifact check only sees this run's output. Other files are kept.
 *
 * @returns Names of the removed files
 */
export async function clearStaleArtifacts(outputDir: string, extension: string): Promise<string[]> {
  const stale = await listOutputArtifacts(outputDir, extension);
  for (const name of stale) {
    await unlink(join(outputDir, name));
  }
  return stale;
}
