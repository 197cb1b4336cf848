/**
 * Run aggregator.
 *
 * Discovery → filter → rosdep sources → (workspace build) → one build per
 * package, in order → report. Package failures are tallied, never
 * short-circuited; anything that throws RunAbortError ends the run.
 */

import { mkdir } from 'node:fs/promises';
import type { RunConfig } from '../types/config.js';
import type { BuildSet } from '../types/unit.js';
import type { RunReport, UnitBuildResult } from '../types/report.js';
import type { Executor } from '../lib/exec.js';
import type { Logger } from '../lib/log.js';
import type { BuildContext } from './context.js';
import { discoverUnits } from '../lib/discovery.js';
import { filterUnits } from '../lib/filter.js';
import { isFile, isPathInside } from '../lib/fs.js';
import { prepareDependencySources } from '../lib/rosdep.js';
import { detectRosVersion } from '../lib/platform.js';
import { clearStaleArtifacts, listOutputArtifacts } from '../lib/artifacts.js';
import { generateRunId, logRunSummary, summarizeRun, writeRunReport } from '../lib/report.js';
import { buildUnit } from './unit_builder.js';
import { buildWorkspace } from './workspace_builder.js';

export interface RunDependencies {
  executor: Executor;
  logger: Logger;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Discovers and filters packages without building anything.
 *
 * @throws {RunAbortError} SEARCH_DIR_NOT_FOUND, NO_UNITS_FOUND, NO_UNITS_SELECTED or
 *   DUPLICATE_UNIT_NAMES
 */
export async function planBuildSet(config: RunConfig, logger: Logger): Promise<BuildSet> {
  logger.info(`Discovering ROS packages in: ${config.search_dir}`);
  const discovered = await discoverUnits(config.search_dir, {
    descriptorFile: config.descriptor_file,
    ignoreGlobs: config.ignore_globs,
    excludeDirs: [config.working_dir, config.output_dir],
  });
  return filterUnits(discovered, config.whitelist, config.blacklist, logger);
}

function logConfiguration(config: RunConfig, logger: Logger): void {
  logger.section('ROS Bloom Release - Multi-Package Build');
  logger.info(`ROS Distro: ${config.ros_distro}`);
  logger.info(`Debian Distro: ${config.os_version}`);
  logger.info(`Packages Directory: ${config.packages_dir}`);
  logger.info(`Whitelist Pattern: ${config.whitelist}`);
  logger.info(`Blacklist Pattern: ${config.blacklist}`);
  logger.info(`Workspace build: ${config.workspace_build ? 'enabled' : 'disabled'}`);
}

async function baseSetupFiles(config: RunConfig, logger: Logger): Promise<string[]> {
  if (await isFile(config.ros_setup_file)) {
    return [config.ros_setup_file];
  }
  logger.warn(`ROS setup file not found, running tools in the current environment: ${config.ros_setup_file}`);
  return [];
}

/**
 * Old artifacts are only deleted from an output directory under the working
 * directory; a directory configured elsewhere is left as it is.
 */
async function reportPreviousArtifacts(config: RunConfig, logger: Logger): Promise<void> {
  if (isPathInside(config.working_dir, config.output_dir)) {
    const stale = await clearStaleArtifacts(config.output_dir, config.artifact_extension);
    if (stale.length > 0) {
      logger.warn(`Removed ${stale.length} artifact(s) left by a previous run from ${config.output_dir}`);
    }
    return;
  }

  const existing = await listOutputArtifacts(config.output_dir, config.artifact_extension);
  if (existing.length > 0) {
    logger.warn(
      `Output directory ${config.output_dir} already holds ${existing.length} artifact(s); they are kept and count toward this run`
    );
  }
}

/**
 * Runs a complete multi-package build.
 *
 * @returns The run report; `report.code` decides the exit status
 * @throws {RunAbortError} For every run-level fatal condition
 *
 * @example
 * ```typescript
 * const report = await runBuild(config, {
 *   executor: createProcessExecutor(),
 *   logger: createConsoleLogger(),
 * });
 * process.exitCode = exitCodeFor(report.code);
 * ```
 */
export async function runBuild(config: RunConfig, deps: RunDependencies): Promise<RunReport> {
  const { executor, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  logConfiguration(config, logger);

  const buildSet = await planBuildSet(config, logger);

  await mkdir(config.working_dir, { recursive: true });
  await mkdir(config.output_dir, { recursive: true });
  logger.info(`Working directory: ${config.working_dir}`);

  await reportPreviousArtifacts(config, logger);

  logger.section(`Processing ${buildSet.length} package(s)`);

  await prepareDependencySources(config, executor, logger);
  logger.info(`Detected ROS ${detectRosVersion(config.ros_distro)}`);

  const setupFiles = await baseSetupFiles(config, logger);
  const ctx: BuildContext = { config, executor, logger, setupFiles };

  if (config.workspace_build) {
    const workspace = await buildWorkspace(buildSet, ctx);
    if (workspace.overlay_setup) {
      ctx.setupFiles = [...setupFiles, workspace.overlay_setup];
    }
  }

  const results: UnitBuildResult[] = [];
  for (const [i, unit] of buildSet.entries()) {
    results.push(await buildUnit(unit, i + 1, buildSet.length, ctx));
  }

  const artifacts = await listOutputArtifacts(config.output_dir, config.artifact_extension);
  const report = summarizeRun(buildSet, results, artifacts, {
    run_id: generateRunId(startedAt),
    started_at: startedAt.toISOString(),
    duration_ms: now().getTime() - startedAt.getTime(),
    ros_distro: config.ros_distro,
    os_version: config.os_version,
    workspace_build: config.workspace_build,
  });

  const reportPath = await writeRunReport(report, config.working_dir);
  logRunSummary(report, logger);
  logger.info(`Report written to ${reportPath}`);
  return report;
}
