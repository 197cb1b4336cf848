/**
 * TypeScript interfaces for rosdeb configuration.
 *
 * `FileConfig` mirrors rosdeb.config.json; every field is optional because
 * environment variables and CLI options can supply the same values.
 * `RunConfig` is the resolved, immutable configuration for one run.
 */

/**
 * rosdep source initialisation settings.
 */
export interface RosdepConfig {
  /** Whether to run `sudo rosdep init` before `rosdep update` */
  init: boolean;
  /** Sources list that must exist once rosdep is initialised */
  sources_file: string;
}

/**
 * Shape of rosdeb.config.json.
 */
export interface FileConfig {
  /** ROS distribution, e.g. "humble" */
  ros_distro?: string;
  /** Target OS release codename, e.g. "jammy" */
  os_version?: string;
  /** Target OS name passed to bloom (default "ubuntu") */
  os_name?: string;
  /** Directory to search for packages, relative to the current directory */
  packages_dir?: string;
  /** Regular expression a package directory must match */
  whitelist?: string;
  /** Regular expression that excludes a package directory when it matches */
  blacklist?: string;
  /** Root for staged sources and build output */
  working_dir?: string;
  /** Flat directory collecting every produced .deb */
  output_dir?: string;
  /** Build all selected packages together before packaging them */
  workspace_build?: boolean;
  /** Marker file identifying a package directory */
  descriptor_file?: string;
  /** Extension of produced binary packages */
  artifact_extension?: string;
  /** Globs (relative to the search directory) never descended during discovery */
  ignore_globs?: string[];
  /** ROS environment setup script sourced before ROS tools run */
  ros_setup_file?: string;
  rosdep?: Partial<RosdepConfig>;
}

/**
 * Resolved configuration for one run. Built once and never mutated.
 */
export interface RunConfig {
  readonly ros_distro: string;
  readonly os_version: string;
  readonly os_name: string;
  readonly packages_dir: string;
  /** Absolute directory discovery starts from */
  readonly search_dir: string;
  readonly whitelist: string;
  /** Empty string disables the blacklist */
  readonly blacklist: string;
  /** Absolute working directory */
  readonly working_dir: string;
  /** Absolute output directory */
  readonly output_dir: string;
  readonly workspace_build: boolean;
  readonly descriptor_file: string;
  readonly artifact_extension: string;
  readonly ignore_globs: readonly string[];
  readonly ros_setup_file: string;
  readonly rosdep: Readonly<RosdepConfig>;
}
