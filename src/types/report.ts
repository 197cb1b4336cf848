/**
 * Result types for package builds and whole runs.
 *
 * report.json is written from RunReport at the end of every run that reached
 * the per-package loop.
 */

import type { FailureKind, RunCode } from '../constants/run_codes.js';
import type { Unit } from './unit.js';

/**
 * Outcome of building one package.
 */
export type UnitBuildResult =
  | {
      unit: Unit;
      ok: true;
      failure_kind: null;
      detail: null;
      /** Paths of the artifacts copied into the output directory */
      artifacts: string[];
      /** Non-fatal problems, e.g. rosdep install failures */
      warnings: string[];
    }
  | {
      unit: Unit;
      ok: false;
      failure_kind: FailureKind;
      detail: string;
      artifacts: string[];
      warnings: string[];
    };

/**
 * Run metadata that is not derived from the build results.
 */
export interface RunMeta {
  run_id: string;
  started_at: string;
  duration_ms: number;
  ros_distro: string;
  os_version: string;
  workspace_build: boolean;
}

/**
 * Aggregated result of a run.
 */
export interface RunReport extends RunMeta {
  /** SUCCESS, UNITS_FAILED or NO_ARTIFACTS_PRODUCED */
  code: RunCode;
  total: number;
  succeeded: number;
  failed: number;
  results: UnitBuildResult[];
  /** File names present in the output directory, sorted */
  artifacts: string[];
}
