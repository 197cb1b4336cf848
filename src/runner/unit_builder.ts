/**
 * Per-package build: stage, generate debian/, build the .deb, collect it.
 *
 * Every failure of a step is scoped to this package. The builder returns a
 * failed result instead of throwing, so the run loop always continues.
 */

import { join } from 'node:path';
import type { Unit } from '../types/unit.js';
import type { UnitBuildResult } from '../types/report.js';
import type { BuildContext } from './context.js';
import { formatCommand, sourced } from '../lib/exec.js';
import { isDirectory } from '../lib/fs.js';
import { stageUnit } from '../lib/stage.js';
import { installDependencies } from '../lib/rosdep.js';
import { collectArtifacts, publishArtifacts } from '../lib/artifacts.js';
import { UnitBuildError } from '../lib/errors.js';

/** Directory bloom-generate writes the build instructions to */
export const BUILD_INSTRUCTIONS_DIR = 'debian';

export function bloomGenerateArgs(osName: string, osVersion: string, rosDistro: string): string[] {
  return ['rosdebian', '--os-name', osName, '--os-version', osVersion, '--ros-distro', rosDistro];
}

async function runStep(
  ctx: BuildContext,
  command: string,
  args: string[],
  cwd: string
): Promise<boolean> {
  const line = sourced(ctx.setupFiles, command, args);
  const status = await ctx.executor.run(line.command, line.args, cwd);
  if (!status.ok && status.error) {
    ctx.logger.error(`${formatCommand(command, args)}: ${status.error}`);
  }
  return status.ok;
}

/**
 * Builds one package.
 *
 * @param index - 1-based position in the build set, for progress output only
 * @param total - Size of the build set
 */
export async function buildUnit(unit: Unit, index: number, total: number, ctx: BuildContext): Promise<UnitBuildResult> {
  const { config, logger } = ctx;
  const warnings: string[] = [];

  logger.section(`Generating debian for package ${index}/${total}`);
  logger.info(`Package: ${unit.name}`);

  try {
    const workspace = await stageUnit(unit, config.working_dir, ctx.executor);

    logger.info('Generating debian files with bloom...');
    const generated = await runStep(
      ctx,
      'bloom-generate',
      bloomGenerateArgs(config.os_name, config.os_version, config.ros_distro),
      workspace.source_dir
    );
    if (!generated) {
      throw new UnitBuildError('GENERATION_FAILED', 'Bloom generation failed');
    }

    logger.info('Installing package dependencies...');
    const warning = await installDependencies(workspace.source_dir, '.', config.ros_distro, ctx.executor, logger);
    if (warning) {
      warnings.push(warning);
    }

    logger.info('Building debian package...');
    if (!(await isDirectory(join(workspace.source_dir, BUILD_INSTRUCTIONS_DIR)))) {
      throw new UnitBuildError('MISSING_BUILD_INSTRUCTIONS', 'Debian directory not found');
    }

    const built = await runStep(ctx, 'fakeroot', [`${BUILD_INSTRUCTIONS_DIR}/rules`, 'binary'], workspace.source_dir);
    if (!built) {
      throw new UnitBuildError('NATIVE_BUILD_FAILED', 'Debian build failed');
    }

    const found = await collectArtifacts(workspace.root, config.artifact_extension);
    if (found.length === 0) {
      throw new UnitBuildError('NO_ARTIFACTS_PRODUCED', 'No debian packages were generated');
    }

    logger.info('Collecting debian packages...');
    const artifacts = await publishArtifacts(found, config.output_dir, logger).catch((error: unknown) => {
      throw new UnitBuildError(
        'PUBLISH_FAILED',
        `Failed to copy debian packages to ${config.output_dir}: ${error instanceof Error ? error.message : String(error)}`
      );
    });

    logger.info(`Successfully generated debian for ${unit.name}`);
    return { unit, ok: true, failure_kind: null, detail: null, artifacts, warnings };
  } catch (error) {
    if (!(error instanceof UnitBuildError)) {
      throw error;
    }
    logger.error(error.message);
    return { unit, ok: false, failure_kind: error.kind, detail: error.message, artifacts: [], warnings };
  }
}
