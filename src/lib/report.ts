/**
 * Run report generation.
 *
 * The tally is a pure reduction over the build results; writing report.json
 * and printing the summary are kept separate from it.
 */

import { randomBytes } from 'node:crypto';
import { join } from 'node:path';
import type { RunCode } from '../constants/run_codes.js';
import type { BuildSet } from '../types/unit.js';
import type { RunMeta, RunReport, UnitBuildResult } from '../types/report.js';
import type { Logger } from './log.js';
import { atomicWriteJson } from './fs.js';

export const REPORT_FILE_NAME = 'report.json';

/**
 * Generates a unique run ID.
 *
 * Format: timestamp + random suffix (hex encoded)
 * Example: "2025-01-28T12-34-56Z-a1b2c3d4e5f6a7b8"
 */
export function generateRunId(now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-').substring(0, 19) + 'Z';
  const randomSuffix = randomBytes(8).toString('hex');
  return `${timestamp}-${randomSuffix}`;
}

/**
 * Derives the run code from the tally and the final output listing.
 *
 * An empty output directory fails the run even when every unit reported
 * success.
 */
export function deriveRunCode(failed: number, artifacts: readonly string[]): RunCode {
  if (artifacts.length === 0) return 'NO_ARTIFACTS_PRODUCED';
  if (failed > 0) return 'UNITS_FAILED';
  return 'SUCCESS';
}

/**
 * Reduces per-unit results into a RunReport.
 *
 * @throws Error if the results do not cover the build set one-to-one
 */
export function summarizeRun(
  buildSet: BuildSet,
  results: readonly UnitBuildResult[],
  artifacts: readonly string[],
  meta: RunMeta
): RunReport {
  if (results.length !== buildSet.length) {
    throw new Error(`Expected ${buildSet.length} build results, got ${results.length}`);
  }

  const tally = results.reduce(
    (acc, result) => (result.ok ? { ...acc, succeeded: acc.succeeded + 1 } : { ...acc, failed: acc.failed + 1 }),
    { succeeded: 0, failed: 0 }
  );

  return {
    ...meta,
    code: deriveRunCode(tally.failed, artifacts),
    total: buildSet.length,
    succeeded: tally.succeeded,
    failed: tally.failed,
    results: [...results],
    artifacts: [...artifacts].sort(),
  };
}

/**
 * Writes report.json into the working directory.
 *
 * @returns Path of the written report
 */
export async function writeRunReport(report: RunReport, workingDir: string): Promise<string> {
  const reportPath = join(workingDir, REPORT_FILE_NAME);
  await atomicWriteJson(reportPath, report);
  return reportPath;
}

/**
 * Prints the build summary, failures and artifact list.
 */
export function logRunSummary(report: RunReport, logger: Logger): void {
  logger.section('Build Summary');
  logger.info(`Total packages: ${report.total}`);
  logger.info(`Successful: ${report.succeeded}`);
  logger.info(`Failed: ${report.failed}`);

  for (const result of report.results) {
    if (!result.ok) {
      logger.error(`${result.unit.name}: ${result.failure_kind} - ${result.detail}`);
    }
  }

  if (report.artifacts.length === 0) {
    logger.error('No debian packages were generated!');
    return;
  }

  logger.section('Generated Debian Packages');
  for (const artifact of report.artifacts) {
    logger.info(`  - ${artifact}`);
  }

  if (report.failed > 0) {
    logger.warn('Some packages failed to build');
  } else {
    logger.info('All builds completed successfully!');
  }
}
