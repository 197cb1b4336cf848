/**
 * Error types that carry a run code or a unit failure kind.
 */

import type { FailureKind, RunCode } from '../constants/run_codes.js';

/**
 * Fatal for the whole run. Propagates to the CLI, which exits 1.
 */
export class RunAbortError extends Error {
  constructor(
    public readonly code: Exclude<RunCode, 'SUCCESS' | 'UNITS_FAILED'>,
    message: string
  ) {
    super(message);
    this.name = 'RunAbortError';
  }
}

/**
 * Fatal for one package only. Thrown inside the unit builder and turned into a
 * failed result at its boundary; never reaches the run loop.
 */
export class UnitBuildError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string
  ) {
    super(message);
    this.name = 'UnitBuildError';
  }
}
