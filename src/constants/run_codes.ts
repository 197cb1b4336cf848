/**
 * Run outcome codes and unit failure kinds.
 */

/**
 * Outcome of a whole run.
 *
 * SUCCESS: every selected package built and at least one artifact exists
 * UNITS_FAILED: the loop finished but one or more packages failed
 * MISSING_CONFIG: carried by ConfigError
 * Everything else aborts the run before or instead of the per-package loop.
 */
export const RUN_CODES = [
  'SUCCESS',
  'UNITS_FAILED',
  'NO_ARTIFACTS_PRODUCED',
  'MISSING_CONFIG',
  'SEARCH_DIR_NOT_FOUND',
  'NO_UNITS_FOUND',
  'NO_UNITS_SELECTED',
  'DUPLICATE_UNIT_NAMES',
  'DEPENDENCY_SOURCES_FAILED',
  'WORKSPACE_BUILD_FAILED',
] as const;

export type RunCode = typeof RUN_CODES[number];

/**
 * Reasons a single package build can fail. None of them abort the run.
 */
export const FAILURE_KINDS = [
  'STAGING_FAILED',
  'GENERATION_FAILED',
  'MISSING_BUILD_INSTRUCTIONS',
  'NATIVE_BUILD_FAILED',
  'NO_ARTIFACTS_PRODUCED',
  'PUBLISH_FAILED',
] as const;

export type FailureKind = typeof FAILURE_KINDS[number];

/**
 * Maps a run code to the process exit status.
 */
export function exitCodeFor(code: RunCode): 0 | 1 {
  return code === 'SUCCESS' ? 0 : 1;
}
