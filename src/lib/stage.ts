/**
 * Workspace staging.
 *
 * Builds never run in the source tree. Each package is copied into a fresh
 * directory under the working directory; bloom additionally needs a git
 * repository at the staged root to derive version information.
 *
 * Layout:
 *   <working_dir>/units/<name>/          packaging area (debian/rules writes .deb here)
 *   <working_dir>/units/<name>/<name>/   staged source, git root
 *   <working_dir>/workspace/src/<name>/  combined workspace source
 */

import { copyFile, mkdir, readdir, readlink, symlink } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { BuildSet, Unit } from '../types/unit.js';
import type { Executor } from './exec.js';
import { isPathInside, resetDir } from './fs.js';
import { UnitBuildError } from './errors.js';
import { GIT_AUTHOR_EMAIL, GIT_AUTHOR_NAME } from './branding.js';

/**
 * Directories private to one package build.
 */
export interface UnitWorkspace {
  /** Packaging area; everything under it belongs to this unit */
  root: string;
  /** Staged copy of the package source; generator and builder run here */
  source_dir: string;
}

/**
 * Directories of the combined workspace.
 */
export interface CombinedWorkspace {
  root: string;
  src_dir: string;
}

export function unitWorkspacePaths(workingDir: string, unitName: string): UnitWorkspace {
  const root = join(workingDir, 'units', unitName);
  return { root, source_dir: join(root, unitName) };
}

export function combinedWorkspacePaths(workingDir: string): CombinedWorkspace {
  const root = join(workingDir, 'workspace');
  return { root, src_dir: join(root, 'src') };
}

/**
 * Copies a package tree, leaving out the working directory when the package
 * contains it (e.g. a package at the search root). Symbolic links are copied
 * as links; file modes are kept.
 */
async function copyTree(from: string, to: string, workingDir: string): Promise<void> {
  const skip = resolve(workingDir);
  await mkdir(to, { recursive: true });
  const entries = await readdir(from, { withFileTypes: true });
  for (const entry of entries) {
    const source = join(from, entry.name);
    if (isPathInside(skip, resolve(source))) continue;
    const target = join(to, entry.name);
    if (entry.isDirectory()) {
      await copyTree(source, target, workingDir);
    } else if (entry.isSymbolicLink()) {
      await symlink(await readlink(source), target);
    } else if (entry.isFile()) {
      await copyFile(source, target);
    }
  }
}

/**
 * Stages one package: wipes any previous copy, copies the source and
 * initialises a git repository with a local identity.
 *
 * @throws {UnitBuildError} STAGING_FAILED if copying or git fails
 */
export async function stageUnit(unit: Unit, workingDir: string, executor: Executor): Promise<UnitWorkspace> {
  const paths = unitWorkspacePaths(workingDir, unit.name);

  try {
    await resetDir(paths.root);
    await copyTree(unit.source_path, paths.source_dir, workingDir);
  } catch (error) {
    throw new UnitBuildError(
      'STAGING_FAILED',
      `Failed to stage ${unit.name}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const gitSteps: string[][] = [
    ['init', '-q'],
    ['config', 'user.name', GIT_AUTHOR_NAME],
    ['config', 'user.email', GIT_AUTHOR_EMAIL],
  ];
  for (const args of gitSteps) {
    const status = await executor.run('git', args, paths.source_dir, { quiet: true });
    if (!status.ok) {
      throw new UnitBuildError(
        'STAGING_FAILED',
        `git ${args[0]} failed in ${paths.source_dir}${status.error ? `: ${status.error}` : ''}`
      );
    }
  }

  return paths;
}

/**
 * Stages every package of the build set into one combined source tree.
 * Any previous combined tree is removed first.
 */
export async function stageWorkspace(units: BuildSet, workingDir: string): Promise<CombinedWorkspace> {
  const paths = combinedWorkspacePaths(workingDir);
  await resetDir(paths.root);
  await mkdir(paths.src_dir, { recursive: true });
  for (const unit of units) {
    await copyTree(unit.source_path, join(paths.src_dir, unit.name), workingDir);
  }
  return paths;
}
