/**
 * Combined workspace build.
 *
 * All selected packages are built together first so that packages depending
 * on each other resolve before bloom packages them one by one. A failure here
 * aborts the run: per-package packaging relies on the workspace's build output.
 */

import { join } from 'node:path';
import type { BuildSet } from '../types/unit.js';
import type { BuildContext } from './context.js';
import { sourced } from '../lib/exec.js';
import { isFile } from '../lib/fs.js';
import { stageWorkspace } from '../lib/stage.js';
import { installDependencies } from '../lib/rosdep.js';
import { workspaceToolProfile } from '../lib/platform.js';
import { RunAbortError } from '../lib/errors.js';

export interface WorkspaceBuildResult {
  root: string;
  /** Overlay setup script to source before packaging, null if the tool did not create one */
  overlay_setup: string | null;
}

/**
 * Stages, resolves and builds the combined workspace.
 *
 * @throws {RunAbortError} WORKSPACE_BUILD_FAILED if staging or the build tool fails
 */
export async function buildWorkspace(units: BuildSet, ctx: BuildContext): Promise<WorkspaceBuildResult> {
  const { config, logger } = ctx;
  logger.section('Building workspace with all packages');

  logger.info('Copying packages into workspace...');
  for (const unit of units) {
    logger.info(`  - ${unit.name}`);
  }

  let root: string;
  try {
    ({ root } = await stageWorkspace(units, config.working_dir));
  } catch (error) {
    throw new RunAbortError(
      'WORKSPACE_BUILD_FAILED',
      `Failed to stage workspace: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  logger.info('Installing workspace dependencies...');
  await installDependencies(root, 'src', config.ros_distro, ctx.executor, logger);

  const profile = workspaceToolProfile(config.ros_distro);
  logger.info(`Building workspace with ${profile.build.command}...`);
  const line = sourced(ctx.setupFiles, profile.build.command, profile.build.args);
  const status = await ctx.executor.run(line.command, line.args, root);
  if (!status.ok) {
    throw new RunAbortError(
      'WORKSPACE_BUILD_FAILED',
      `Workspace build failed${status.error ? `: ${status.error}` : ''}`
    );
  }

  const overlay = join(root, profile.overlay_setup);
  if (!(await isFile(overlay))) {
    logger.warn(`Workspace overlay not found: ${overlay}`);
    logger.info('Workspace built successfully');
    return { root, overlay_setup: null };
  }

  logger.info('Workspace built successfully');
  return { root, overlay_setup: overlay };
}
