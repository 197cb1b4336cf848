/**
 * ROS platform profiles.
 *
 * ROS 1 distros build workspaces with catkin_make and expose their overlay in
 * devel/; every other distro is treated as ROS 2 and built with colcon.
 */

import { join } from 'node:path';
import type { CommandLine } from './exec.js';

export const ROS1_DISTROS = ['melodic', 'noetic'] as const;

export type RosVersion = 1 | 2;

export function detectRosVersion(distro: string): RosVersion {
  return (ROS1_DISTROS as readonly string[]).includes(distro) ? 1 : 2;
}

/**
 * How to build a combined workspace for one ROS version.
 */
export interface WorkspaceToolProfile {
  ros_version: RosVersion;
  build: CommandLine;
  /** Setup script, relative to the workspace root, that exposes the built packages */
  overlay_setup: string;
}

const PROFILES: Record<RosVersion, WorkspaceToolProfile> = {
  1: {
    ros_version: 1,
    build: { command: 'catkin_make', args: [] },
    overlay_setup: join('devel', 'setup.bash'),
  },
  2: {
    ros_version: 2,
    build: { command: 'colcon', args: ['build', '--symlink-install'] },
    overlay_setup: join('install', 'setup.bash'),
  },
};

export function workspaceToolProfile(distro: string): WorkspaceToolProfile {
  return PROFILES[detectRosVersion(distro)];
}
