import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { checkTools } from '@/lib/doctor.js';
import {
  createFakeExecutor,
  createTestConfig,
  exited,
  makeTempDir,
  OK,
  removeTempDir,
} from '../helpers/mocks.js';

describe('checkTools', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('rosdeb-doctor');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('probes every tool quietly, including the workspace tool', async () => {
    const config = await createTestConfig(testDir);
    const executor = createFakeExecutor();

    const checks = await checkTools(config, executor, testDir);

    expect(checks.map((check) => [check.tool, check.available])).toEqual([
      ['git', true],
      ['rosdep', true],
      ['bloom-generate', true],
      ['fakeroot', true],
      ['colcon', true],
    ]);
    expect(executor.calls.every((call) => call.quiet && call.cwd === testDir)).toBe(true);
  });

  it('skips the workspace tool when workspace builds are disabled', async () => {
    const config = await createTestConfig(testDir, { workspace_build: false });

    const checks = await checkTools(config, createFakeExecutor(), testDir);

    expect(checks.map((check) => check.tool)).toEqual(['git', 'rosdep', 'bloom-generate', 'fakeroot']);
  });

  it('probes catkin_make for ROS 1 distros inside the ROS environment', async () => {
    const config = await createTestConfig(testDir, {}, { ROS_DISTRO: 'noetic', DEBIAN_DISTRO: 'focal' });
    await mkdir(dirname(config.ros_setup_file), { recursive: true });
    await writeFile(config.ros_setup_file, '# ros\n');
    const executor = createFakeExecutor();

    await checkTools(config, executor, testDir);

    expect(executor.callsTo('catkin_make')[0].setupFiles).toEqual([config.ros_setup_file]);
    expect(executor.callsTo('bloom-generate')[0].setupFiles).toEqual([config.ros_setup_file]);
    expect(executor.callsTo('git')[0].setupFiles).toEqual([]);
  });

  it('reports missing tools with details', async () => {
    const config = await createTestConfig(testDir, { workspace_build: false });
    const executor = createFakeExecutor((call) => {
      if (call.command === 'fakeroot') return { code: null, ok: false, error: 'spawn fakeroot ENOENT' };
      if (call.command === 'rosdep') return exited(127);
      return OK;
    });

    const checks = await checkTools(config, executor, testDir);

    expect(checks.filter((check) => !check.available)).toEqual([
      { tool: 'rosdep', available: false, purpose: 'dependency installation', details: 'exit code 127' },
      { tool: 'fakeroot', available: false, purpose: 'debian/rules binary', details: 'spawn fakeroot ENOENT' },
    ]);
  });
});
