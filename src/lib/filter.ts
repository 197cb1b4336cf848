/**
 * Whitelist/blacklist selection of discovered packages.
 *
 * Patterns are regular expressions searched (unanchored) in the package
 * directory path relative to the search directory, so `^my_pkg` anchors at the
 * first path component. A package must match the whitelist and must not match the
 * blacklist; an empty blacklist excludes nothing.
 */

import type { BuildSet, Unit } from '../types/unit.js';
import type { Logger } from './log.js';
import { RunAbortError } from './errors.js';
import { assertValidPattern } from './config.js';

/**
 * Tests a path against one rule.
 */
export interface PathMatcher {
  readonly pattern: string;
  matches(path: string): boolean;
}

/**
 * Creates a matcher performing an unanchored regex search.
 *
 * @throws {ConfigError} If the pattern is not a valid regular expression
 */
export function createRegexMatcher(pattern: string, label = 'filter'): PathMatcher {
  assertValidPattern(label, pattern);
  const regex = new RegExp(pattern);
  return {
    pattern,
    matches: (path) => regex.test(path),
  };
}

/**
 * Why a unit was left out of the build set.
 */
export type ExclusionReason = 'whitelist' | 'blacklist';

/**
 * Decides whether one unit is excluded. Whitelist is checked first.
 */
export function exclusionReason(
  unit: Unit,
  whitelist: PathMatcher,
  blacklist: PathMatcher | null
): ExclusionReason | null {
  if (!whitelist.matches(unit.path)) {
    return 'whitelist';
  }
  if (blacklist && blacklist.matches(unit.path)) {
    return 'blacklist';
  }
  return null;
}

/**
 * Applies whitelist and blacklist patterns, preserving discovery order.
 *
 * @param blacklistPattern - Empty string disables the blacklist
 * @throws {RunAbortError} NO_UNITS_SELECTED if nothing survives, DUPLICATE_UNIT_NAMES
 *   if two survivors share a directory name
 */
export function filterUnits(
  units: readonly Unit[],
  whitelistPattern: string,
  blacklistPattern: string,
  logger: Logger
): BuildSet {
  const whitelist = createRegexMatcher(whitelistPattern, 'whitelist');
  const blacklist = blacklistPattern === '' ? null : createRegexMatcher(blacklistPattern, 'blacklist');

  const selected: Unit[] = [];
  for (const unit of units) {
    const reason = exclusionReason(unit, whitelist, blacklist);
    if (reason) {
      logger.info(`Package at '${unit.path}' excluded by ${reason}`);
      continue;
    }
    logger.info(`Found package at: ${unit.path}`);
    selected.push(unit);
  }

  if (selected.length === 0) {
    throw new RunAbortError('NO_UNITS_SELECTED', 'No packages matched the whitelist/blacklist filters');
  }

  assertUniqueNames(selected);
  return selected;
}

/**
 * Staging directories are named after the package, so two selected packages
 * may not share a directory name.
 *
 * @throws {RunAbortError} DUPLICATE_UNIT_NAMES listing every clash
 */
export function assertUniqueNames(units: BuildSet): void {
  const byName = new Map<string, string[]>();
  for (const unit of units) {
    byName.set(unit.name, [...(byName.get(unit.name) ?? []), unit.path]);
  }

  const clashes = [...byName.entries()].filter(([, paths]) => paths.length > 1);
  if (clashes.length > 0) {
    const detail = clashes.map(([name, paths]) => `'${name}' at ${paths.join(', ')}`).join('; ');
    throw new RunAbortError('DUPLICATE_UNIT_NAMES', `Duplicate package names selected: ${detail}`);
  }
}
