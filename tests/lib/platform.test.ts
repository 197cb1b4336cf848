import { describe, it, expect } from 'vitest';
import { detectRosVersion, workspaceToolProfile } from '@/lib/platform.js';

describe('detectRosVersion', () => {
  it('recognises ROS 1 distros', () => {
    expect(detectRosVersion('melodic')).toBe(1);
    expect(detectRosVersion('noetic')).toBe(1);
  });

  it('treats every other distro as ROS 2', () => {
    expect(detectRosVersion('humble')).toBe(2);
    expect(detectRosVersion('jazzy')).toBe(2);
    expect(detectRosVersion('rolling')).toBe(2);
  });
});

describe('workspaceToolProfile', () => {
  it('builds ROS 1 workspaces with catkin_make', () => {
    expect(workspaceToolProfile('noetic')).toEqual({
      ros_version: 1,
      build: { command: 'catkin_make', args: [] },
      overlay_setup: 'devel/setup.bash',
    });
  });

  it('builds ROS 2 workspaces with colcon', () => {
    expect(workspaceToolProfile('humble')).toEqual({
      ros_version: 2,
      build: { command: 'colcon', args: ['build', '--symlink-install'] },
      overlay_setup: 'install/setup.bash',
    });
  });
});
