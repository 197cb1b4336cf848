/**
 * Configuration loading and validation utilities.
 *
 * A run is configured from three layers, highest precedence first: CLI options,
 * environment variables, and an optional rosdeb.config.json. The layers are
 * merged once into an immutable RunConfig.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { loadSchema, validateWithSchema, CONFIG_SCHEMA_PATH } from './schema.js';
import { CONFIG_FILE_NAME, DEFAULT_WORKING_DIR } from './branding.js';
import type { FileConfig, RunConfig } from '../types/config.js';
import type { RunCode } from '../constants/run_codes.js';

export const DEFAULT_WHITELIST = '.*';
export const DEFAULT_OS_NAME = 'ubuntu';
export const DEFAULT_DESCRIPTOR_FILE = 'package.xml';
export const DEFAULT_ARTIFACT_EXTENSION = '.deb';
export const DEFAULT_IGNORE_GLOBS = ['**/.git', '**/node_modules'] as const;
export const DEFAULT_ROSDEP_SOURCES_FILE = '/etc/ros/rosdep/sources.list.d/20-default.list';

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  readonly code: RunCode = 'MISSING_CONFIG';

  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Values given on the command line. Undefined means "not given".
 */
export interface CliOverrides {
  rosDistro?: string;
  osVersion?: string;
  osName?: string;
  packagesDir?: string;
  whitelist?: string;
  blacklist?: string;
  workingDir?: string;
  outputDir?: string;
  workspace?: boolean;
}

/**
 * Environment variables read by rosdeb.
 */
export const ENV_VARS = {
  rosDistro: 'ROS_DISTRO',
  osVersion: 'DEBIAN_DISTRO',
  packagesDir: 'PACKAGES_DIR',
  whitelist: 'PACKAGE_WHITELIST',
  blacklist: 'PACKAGE_BLACKLIST',
  workingDir: 'WORKING_DIR',
  outputDir: 'OUTPUT_DIR',
  workspace: 'WORKSPACE_BUILD',
} as const;

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here; keep walking up.
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * Loads and validates rosdeb.config.json.
 *
 * With an explicit `configPath` the file must exist. Without one, the file is
 * searched upward from `cwd` and its absence is not an error.
 *
 * @returns The validated file config, or null when no file was found
 * @throws {ConfigError} If the file cannot be read or does not match the schema
 */
export async function loadFileConfig(configPath?: string, cwd: string = process.cwd()): Promise<FileConfig | null> {
  const resolvedPath = configPath ? resolve(cwd, configPath) : await findConfigFile(cwd);
  if (!resolvedPath) {
    return null;
  }

  let raw: unknown;
  try {
    raw = await atomicReadJson(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, resolvedPath, error);
    }
    throw error;
  }

  const schema = await loadSchema(CONFIG_SCHEMA_PATH);
  const result = validateWithSchema<FileConfig>(raw, schema);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid configuration file ${resolvedPath}: ${result.errors.join('; ')}`,
      resolvedPath
    );
  }
  return result.data;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parses a boolean environment variable.
 *
 * @throws {ConfigError} On anything but true/false/1/0/yes/no
 */
export function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be true or false, got '${value}'`);
}

/**
 * Checks that a filter pattern compiles as a regular expression.
 *
 * @throws {ConfigError} If the pattern is not a valid regular expression
 */
export function assertValidPattern(label: string, pattern: string): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(
      `Invalid ${label} pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export interface ResolveConfigInput {
  cli?: CliOverrides;
  env?: NodeJS.ProcessEnv;
  file?: FileConfig | null;
  /** Directory relative paths are resolved against */
  cwd?: string;
}

/**
 * Merges CLI options, environment and file config into a RunConfig.
 *
 * Pure apart from reading `process.cwd()`/`process.env` when not given; it
 * never touches the filesystem, so a missing distro is reported before any
 * directory is created.
 *
 * @throws {ConfigError} If ROS_DISTRO or DEBIAN_DISTRO is missing, or a value is invalid
 *
 * @example
 * ```typescript
 * const config = resolveRunConfig({
 *   env: { ROS_DISTRO: 'humble', DEBIAN_DISTRO: 'jammy' },
 *   cwd: '/repo',
 * });
 * config.working_dir; // '/repo/bloom-build'
 * ```
 */
export function resolveRunConfig(input: ResolveConfigInput = {}): RunConfig {
  const cli = input.cli ?? {};
  const env = input.env ?? process.env;
  const file = input.file ?? {};
  const cwd = input.cwd ?? process.cwd();

  const rosDistro = cli.rosDistro ?? envValue(env, ENV_VARS.rosDistro) ?? file.ros_distro;
  const osVersion = cli.osVersion ?? envValue(env, ENV_VARS.osVersion) ?? file.os_version;

  const missing: string[] = [];
  if (!rosDistro) missing.push(ENV_VARS.rosDistro);
  if (!osVersion) missing.push(ENV_VARS.osVersion);
  if (!rosDistro || !osVersion) {
    throw new ConfigError(
      `Missing required configuration: ${missing.join(', ')} (set the environment variable, CLI option, or config file field)`
    );
  }

  const packagesDir = cli.packagesDir ?? envValue(env, ENV_VARS.packagesDir) ?? file.packages_dir ?? '.';
  const whitelist = cli.whitelist ?? envValue(env, ENV_VARS.whitelist) ?? file.whitelist ?? DEFAULT_WHITELIST;
  const blacklist = cli.blacklist ?? envValue(env, ENV_VARS.blacklist) ?? file.blacklist ?? '';
  assertValidPattern('whitelist', whitelist);
  if (blacklist !== '') {
    assertValidPattern('blacklist', blacklist);
  }

  const workingDir = resolve(
    cwd,
    cli.workingDir ?? envValue(env, ENV_VARS.workingDir) ?? file.working_dir ?? DEFAULT_WORKING_DIR
  );
  const outputOverride = cli.outputDir ?? envValue(env, ENV_VARS.outputDir) ?? file.output_dir;
  const outputDir = outputOverride ? resolve(cwd, outputOverride) : join(workingDir, 'output');

  const workspaceBuild =
    cli.workspace ??
    parseBooleanEnv(ENV_VARS.workspace, envValue(env, ENV_VARS.workspace)) ??
    file.workspace_build ??
    true;

  return Object.freeze({
    ros_distro: rosDistro,
    os_version: osVersion,
    os_name: cli.osName ?? file.os_name ?? DEFAULT_OS_NAME,
    packages_dir: packagesDir,
    search_dir: resolve(cwd, packagesDir),
    whitelist,
    blacklist,
    working_dir: workingDir,
    output_dir: outputDir,
    workspace_build: workspaceBuild,
    descriptor_file: file.descriptor_file ?? DEFAULT_DESCRIPTOR_FILE,
    artifact_extension: file.artifact_extension ?? DEFAULT_ARTIFACT_EXTENSION,
    ignore_globs: Object.freeze([...(file.ignore_globs ?? DEFAULT_IGNORE_GLOBS)]),
    ros_setup_file: file.ros_setup_file ?? `/opt/ros/${rosDistro}/setup.bash`,
    rosdep: Object.freeze({
      init: file.rosdep?.init ?? true,
      sources_file: file.rosdep?.sources_file ?? DEFAULT_ROSDEP_SOURCES_FILE,
    }),
  });
}

/**
 * Loads the optional config file and resolves the full RunConfig.
 *
 * @throws {ConfigError} If the file is invalid or required values are missing
 */
export async function loadRunConfig(options: {
  configPath?: string;
  cli?: CliOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
} = {}): Promise<RunConfig> {
  const cwd = options.cwd ?? process.cwd();
  const file = await loadFileConfig(options.configPath, cwd);
  return resolveRunConfig({ cli: options.cli, env: options.env, file, cwd });
}
