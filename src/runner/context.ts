import type { RunConfig } from '../types/config.js';
import type { Executor } from '../lib/exec.js';
import type { Logger } from '../lib/log.js';

/**
 * Collaborators shared by every build step of a run.
 */
export interface BuildContext {
  config: RunConfig;
  executor: Executor;
  logger: Logger;
  /** Setup scripts sourced before bloom-generate and the native builder */
  setupFiles: readonly string[];
}
