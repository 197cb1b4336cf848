/**
 * Doctor checks for the external tools a run depends on.
 */

import type { RunConfig } from '../types/config.js';
import type { Executor } from './exec.js';
import { sourced } from './exec.js';
import { isFile } from './fs.js';
import { workspaceToolProfile } from './platform.js';

/**
 * Result of probing one tool.
 */
export interface ToolCheck {
  tool: string;
  available: boolean;
  /** Why the tool is needed */
  purpose: string;
  details?: string;
}

interface ToolProbe {
  tool: string;
  args: string[];
  purpose: string;
  /** Needs the ROS environment to be found */
  ros_env: boolean;
}

function probesFor(config: RunConfig): ToolProbe[] {
  const probes: ToolProbe[] = [
    { tool: 'git', args: ['--version'], purpose: 'staged repositories for bloom', ros_env: false },
    { tool: 'rosdep', args: ['--version'], purpose: 'dependency installation', ros_env: false },
    { tool: 'bloom-generate', args: ['--help'], purpose: 'debian/ generation', ros_env: true },
    { tool: 'fakeroot', args: ['--version'], purpose: 'debian/rules binary', ros_env: false },
  ];
  if (config.workspace_build) {
    const profile = workspaceToolProfile(config.ros_distro);
    probes.push({ tool: profile.build.command, args: ['--help'], purpose: 'workspace build', ros_env: true });
  }
  return probes;
}

/**
 * Probes every tool the configured run would invoke.
 */
export async function checkTools(config: RunConfig, executor: Executor, cwd: string = process.cwd()): Promise<ToolCheck[]> {
  const setupFiles = (await isFile(config.ros_setup_file)) ? [config.ros_setup_file] : [];
  const checks: ToolCheck[] = [];

  for (const probe of probesFor(config)) {
    const line = probe.ros_env ? sourced(setupFiles, probe.tool, probe.args) : { command: probe.tool, args: probe.args };
    const status = await executor.run(line.command, line.args, cwd, { quiet: true });
    checks.push({
      tool: probe.tool,
      available: status.ok,
      purpose: probe.purpose,
      ...(status.ok ? {} : { details: status.error ?? `exit code ${status.code ?? 'unknown'}` }),
    });
  }

  return checks;
}
