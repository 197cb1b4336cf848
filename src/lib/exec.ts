/**
 * External command execution.
 *
 * Build tools are black boxes: only their exit status and the files they leave
 * behind matter. Commands run with argv arrays (no shell) except for the
 * explicit `sourced()` wrapper, which needs bash to load ROS setup scripts.
 */

import { spawn, ChildProcess } from 'node:child_process';

/**
 * Exit status of an external command.
 */
export interface ExitStatus {
  /** Process exit code, null when the process never started or was killed */
  code: number | null;
  /** Whether the command exited with code 0 */
  ok: boolean;
  /** Spawn error message, if the command could not be started */
  error?: string;
}

export interface RunOptions {
  /** Discard the command's output instead of streaming it to the run log */
  quiet?: boolean;
  /** Extra environment variables for the command */
  env?: Record<string, string>;
}

/**
 * Runs an external command and reports how it exited.
 */
export interface Executor {
  run(command: string, args: readonly string[], cwd: string, options?: RunOptions): Promise<ExitStatus>;
}

/**
 * A command line ready to hand to an Executor.
 */
export interface CommandLine {
  command: string;
  args: string[];
}

/**
 * Creates an Executor backed by child processes.
 *
 * Output is streamed to this process's stdout/stderr so it lands in the run
 * log in order. The promise resolves once the child exits; there is no timeout.
 */
export function createProcessExecutor(): Executor {
  return {
    run(command, args, cwd, options = {}) {
      return new Promise<ExitStatus>((resolve) => {
        let child: ChildProcess;
        const stdio = options.quiet ? 'ignore' : 'inherit';

        try {
          child = spawn(command, [...args], {
            cwd,
            shell: false,
            stdio: ['ignore', stdio, stdio],
            env: options.env ? { ...process.env, ...options.env } : process.env,
          });
        } catch (error) {
          resolve({
            code: null,
            ok: false,
            error: `Failed to spawn ${command}: ${error instanceof Error ? error.message : String(error)}`,
          });
          return;
        }

        let settled = false;
        const finish = (status: ExitStatus) => {
          if (settled) return;
          settled = true;
          resolve(status);
        };

        child.on('error', (error: Error) => {
          finish({ code: null, ok: false, error: error.message });
        });

        child.on('close', (code: number | null) => {
          finish({ code, ok: code === 0 });
        });
      });
    },
  };
}

/**
 * Wraps a command so that it runs after sourcing the given setup scripts.
 *
 * The scripts and the command are passed as positional parameters, never
 * interpolated into the script text. With no setup files the command is
 * returned unchanged.
 *
 * @example
 * ```typescript
 * sourced(['/opt/ros/humble/setup.bash'], 'colcon', ['build'])
 * // { command: 'bash', args: ['-c', SCRIPT, 'rosdeb', '1', '/opt/ros/humble/setup.bash', 'colcon', 'build'] }
 * ```
 */
export function sourced(setupFiles: readonly string[], command: string, args: readonly string[]): CommandLine {
  if (setupFiles.length === 0) {
    return { command, args: [...args] };
  }
  return {
    command: 'bash',
    args: ['-c', SOURCE_SCRIPT, 'rosdeb', String(setupFiles.length), ...setupFiles, command, ...args],
  };
}

// $1 is the number of setup files that follow; everything after them is the command.
// Setup scripts parse "$@" (catkin's _setup_util.py does), so they are sourced
// with no positional parameters.
const SOURCE_SCRIPT = [
  'n="$1"; shift',
  'files=("${@:1:n}"); shift "$n"',
  'cmd=("$@")',
  'for f in "${files[@]}"; do set --; . "$f" || exit 1; done',
  'exec "${cmd[@]}"',
].join('\n');

/**
 * Formats a command line for the run log.
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}
