/**
 * A discovered ROS package.
 *
 * Units are read-only views of the source tree; every mutation happens on a
 * staged copy under the working directory.
 */
export interface Unit {
  /** Last path component of the package directory */
  name: string;
  /** Absolute path of the directory holding the descriptor file */
  source_path: string;
  /** Path relative to the search directory ("." for the root itself); filters match against it */
  path: string;
}

/**
 * Units selected for a run, in discovery order. Never empty once built.
 */
export type BuildSet = readonly Unit[];
