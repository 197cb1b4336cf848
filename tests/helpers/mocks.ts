/**
 * Test helpers and fakes for build tests.
 *
 * Provides temp directory trees, a RunConfig for them, and a fake Executor
 * that records every command and simulates the side effects of the ROS
 * build tools on disk.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Executor, ExitStatus } from '@/lib/exec.js';
import type { RunConfig, FileConfig } from '@/types/config.js';
import { resolveRunConfig } from '@/lib/config.js';

/**
 * One recorded invocation, with any `sourced()` wrapper removed.
 */
export interface ExecCall {
  command: string;
  args: string[];
  cwd: string;
  quiet: boolean;
  /** Setup scripts the command was wrapped with */
  setupFiles: string[];
}

export type ExecHandler = (call: ExecCall) => Promise<ExitStatus | undefined> | ExitStatus | undefined;

export interface FakeExecutor extends Executor {
  calls: ExecCall[];
  /** "command arg1 arg2" for every call, in order */
  commandLines(): string[];
  /** Calls whose command is `command` */
  callsTo(command: string): ExecCall[];
}

export const OK: ExitStatus = { code: 0, ok: true };

export function exited(code: number): ExitStatus {
  return { code, ok: code === 0 };
}

/**
 * Reverses `sourced()`: bash -c SCRIPT rosdeb <n> <files...> <command> <args...>
 */
export function unwrapSourced(command: string, args: readonly string[]): Omit<ExecCall, 'cwd' | 'quiet'> {
  if (command !== 'bash' || args[0] !== '-c' || args[2] !== 'rosdeb') {
    return { command, args: [...args], setupFiles: [] };
  }
  const count = Number(args[3]);
  const setupFiles = args.slice(4, 4 + count);
  const [inner, ...innerArgs] = args.slice(4 + count);
  return { command: inner, args: innerArgs, setupFiles };
}

/**
 * Creates an Executor that records calls and answers through `handler`.
 * A handler returning undefined means exit code 0.
 */
export function createFakeExecutor(handler: ExecHandler = () => OK): FakeExecutor {
  const calls: ExecCall[] = [];
  return {
    calls,
    commandLines: () => calls.map((call) => [call.command, ...call.args].join(' ')),
    callsTo: (command) => calls.filter((call) => call.command === command),
    async run(command, args, cwd, options = {}) {
      const call: ExecCall = { ...unwrapSourced(command, args), cwd, quiet: options.quiet ?? false };
      calls.push(call);
      return (await handler(call)) ?? OK;
    },
  };
}

/**
 * Failure switches for the simulated toolchain, keyed by package name
 * (the basename of the directory the tool runs in).
 */
export interface ToolchainBehaviour {
  failGenerate?: string[];
  /** bloom-generate exits 0 but writes no debian/ */
  skipDebianDir?: string[];
  failNative?: string[];
  /** fakeroot exits 0 but writes no .deb */
  skipArtifacts?: string[];
  failRosdepInstall?: boolean;
  failRosdepUpdate?: boolean;
  failRosdepInit?: boolean;
  failWorkspaceBuild?: boolean;
}

export function debFileName(unitName: string): string {
  return `ros-humble-${unitName.replace(/_/g, '-')}_1.0.0-0jammy_amd64.deb`;
}

/**
 * Handler simulating git, rosdep, bloom-generate, fakeroot, colcon and catkin_make.
 *
 * fakeroot writes the .deb next to the source directory, like dpkg does.
 */
export function simulatedToolchain(behaviour: ToolchainBehaviour = {}): ExecHandler {
  return async (call) => {
    const unitName = basename(call.cwd);
    switch (call.command) {
      case 'bloom-generate':
        if (behaviour.failGenerate?.includes(unitName)) return exited(1);
        if (!behaviour.skipDebianDir?.includes(unitName)) {
          await mkdir(join(call.cwd, 'debian'), { recursive: true });
          await writeFile(join(call.cwd, 'debian', 'rules'), '#!/usr/bin/make -f\n');
        }
        return OK;
      case 'fakeroot':
        if (behaviour.failNative?.includes(unitName)) return exited(2);
        if (!behaviour.skipArtifacts?.includes(unitName)) {
          await writeFile(join(dirname(call.cwd), debFileName(unitName)), 'deb');
        }
        return OK;
      case 'rosdep':
        if (call.args[0] === 'install' && behaviour.failRosdepInstall) return exited(1);
        if (call.args[0] === 'update' && behaviour.failRosdepUpdate) return exited(1);
        return OK;
      case 'sudo':
        return behaviour.failRosdepInit ? exited(1) : OK;
      case 'colcon':
      case 'catkin_make': {
        if (behaviour.failWorkspaceBuild) return exited(1);
        const overlayDir = call.command === 'colcon' ? 'install' : 'devel';
        await mkdir(join(call.cwd, overlayDir), { recursive: true });
        await writeFile(join(call.cwd, overlayDir, 'setup.bash'), '# overlay\n');
        return OK;
      }
      default:
        return OK;
    }
  };
}

export async function makeTempDir(prefix = 'rosdeb-test'): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Creates package directories (each with a package.xml) under `root`.
 */
export async function createPackages(root: string, relPaths: string[]): Promise<void> {
  for (const relPath of relPaths) {
    const dir = join(root, relPath);
    await mkdir(join(dir, 'src'), { recursive: true });
    await writeFile(join(dir, 'package.xml'), `<package format="3"><name>${basename(dir)}</name></package>\n`);
    await writeFile(join(dir, 'src', 'main.cpp'), 'int main() { return 0; }\n');
  }
}

/**
 * Creates a RunConfig rooted at `dir`: packages under `dir/src`, working
 * directory `dir/bloom-build`, an existing rosdep sources file and no ROS
 * setup file.
 */
export async function createTestConfig(dir: string, file: FileConfig = {}, env: NodeJS.ProcessEnv = {}): Promise<RunConfig> {
  const sourcesFile = join(dir, 'rosdep', '20-default.list');
  await mkdir(dirname(sourcesFile), { recursive: true });
  await writeFile(sourcesFile, 'yaml https://example.invalid/base.yaml\n');

  return resolveRunConfig({
    cwd: dir,
    env: { ROS_DISTRO: 'humble', DEBIAN_DISTRO: 'jammy', ...env },
    file: {
      packages_dir: 'src',
      ros_setup_file: join(dir, 'opt-ros', 'setup.bash'),
      ...file,
      rosdep: { sources_file: sourcesFile, ...file.rosdep },
    },
  });
}
