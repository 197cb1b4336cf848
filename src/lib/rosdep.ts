/**
 * rosdep integration.
 *
 * Source initialisation happens once per run and is fatal when the update
 * fails. Installing dependencies is best effort: many rosdep keys are missing
 * on CI images, so failures only produce a warning.
 */

import type { RunConfig } from '../types/config.js';
import type { Executor, CommandLine } from './exec.js';
import type { Logger } from './log.js';
import { isFile } from './fs.js';
import { RunAbortError } from './errors.js';

export function rosdepInstallCommand(fromPath: string, rosDistro: string): CommandLine {
  return {
    command: 'rosdep',
    args: ['install', '--from-paths', fromPath, '--ignore-src', '-y', '-r', '--rosdistro', rosDistro],
  };
}

/**
 * Initialises and updates the rosdep sources.
 *
 * @throws {RunAbortError} DEPENDENCY_SOURCES_FAILED if `rosdep update` fails or
 *   the sources list is still missing afterwards
 */
export async function prepareDependencySources(
  config: RunConfig,
  executor: Executor,
  logger: Logger
): Promise<void> {
  if (config.rosdep.init) {
    logger.info('Initializing rosdep...');
    const init = await executor.run('sudo', ['rosdep', 'init'], config.working_dir);
    if (!init.ok) {
      logger.warn('rosdep init failed (already initialized?), continuing');
    }
  }

  logger.info('Updating rosdep...');
  const update = await executor.run('rosdep', ['update'], config.working_dir);
  if (!update.ok) {
    throw new RunAbortError('DEPENDENCY_SOURCES_FAILED', 'rosdep update failed');
  }

  logger.info('Verifying rosdep sources...');
  if (!(await isFile(config.rosdep.sources_file))) {
    throw new RunAbortError(
      'DEPENDENCY_SOURCES_FAILED',
      `rosdep sources not found after initialization: ${config.rosdep.sources_file}`
    );
  }
}

/**
 * Runs `rosdep install` for everything under `fromPath`.
 *
 * @returns A warning message when the install failed, null otherwise
 */
export async function installDependencies(
  cwd: string,
  fromPath: string,
  rosDistro: string,
  executor: Executor,
  logger: Logger
): Promise<string | null> {
  const { command, args } = rosdepInstallCommand(fromPath, rosDistro);
  const status = await executor.run(command, args, cwd);
  if (status.ok) {
    return null;
  }
  const warning = 'Some dependencies could not be installed, continuing...';
  logger.warn(warning);
  return warning;
}
