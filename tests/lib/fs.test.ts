import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  atomicWriteJson,
  atomicReadJson,
  AtomicFsError,
  findFilesByExtension,
  isDirectory,
  isFile,
  isPathInside,
  resetDir,
} from '@/lib/fs.js';
import { makeTempDir, removeTempDir } from '../helpers/mocks.js';

describe('atomicWriteJson', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('rosdeb-fs');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should write JSON data atomically', async () => {
    const filePath = join(testDir, 'report.json');
    const data = { total: 2, succeeded: 2, failed: 0 };

    await atomicWriteJson(filePath, data);

    expect(await atomicReadJson(filePath)).toEqual(data);
  });

  it('should format JSON with 2-space indent and a trailing newline', async () => {
    const filePath = join(testDir, 'formatted.json');

    await atomicWriteJson(filePath, { a: 1 });

    expect(await readFile(filePath, 'utf-8')).toBe('{\n  "a": 1\n}\n');
  });

  it('should not leave .tmp file after successful write', async () => {
    await atomicWriteJson(join(testDir, 'clean.json'), { test: true });

    expect(await readdir(testDir)).toEqual(['clean.json']);
  });

  it('should throw AtomicFsError on write failure', async () => {
    const filePath = join(testDir, 'missing', 'dir', 'test.json');

    await expect(atomicWriteJson(filePath, { test: true })).rejects.toThrow(AtomicFsError);
  });
});

describe('atomicReadJson', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('rosdeb-fs');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should throw AtomicFsError when file does not exist', async () => {
    await expect(atomicReadJson(join(testDir, 'nonexistent.json'))).rejects.toThrow(AtomicFsError);
  });

  it('should throw AtomicFsError on invalid JSON', async () => {
    const filePath = join(testDir, 'invalid.json');
    await writeFile(filePath, '{ invalid json }');

    await expect(atomicReadJson(filePath)).rejects.toThrow(AtomicFsError);
  });
});

describe('directory helpers', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('rosdeb-fs');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('distinguishes files from directories', async () => {
    await writeFile(join(testDir, 'file.txt'), 'x');

    expect(await isFile(join(testDir, 'file.txt'))).toBe(true);
    expect(await isDirectory(join(testDir, 'file.txt'))).toBe(false);
    expect(await isDirectory(testDir)).toBe(true);
    expect(await isFile(join(testDir, 'absent'))).toBe(false);
  });

  it('resetDir empties an existing directory', async () => {
    const dir = join(testDir, 'stage');
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(join(dir, 'nested', 'old.txt'), 'old');

    await resetDir(dir);

    expect(await readdir(dir)).toEqual([]);
  });

  it('findFilesByExtension walks nested directories and sorts', async () => {
    await mkdir(join(testDir, 'b', 'deep'), { recursive: true });
    await mkdir(join(testDir, 'a'), { recursive: true });
    await writeFile(join(testDir, 'b', 'deep', 'two.deb'), '');
    await writeFile(join(testDir, 'a', 'one.deb'), '');
    await writeFile(join(testDir, 'a', 'one.dsc'), '');

    expect(await findFilesByExtension(testDir, '.deb')).toEqual([
      join(testDir, 'a', 'one.deb'),
      join(testDir, 'b', 'deep', 'two.deb'),
    ]);
  });

  it('findFilesByExtension ignores symlinks and missing directories', async () => {
    await writeFile(join(testDir, 'real.deb'), '');
    await symlink(join(testDir, 'real.deb'), join(testDir, 'link.deb'));

    expect(await findFilesByExtension(testDir, '.deb')).toEqual([join(testDir, 'real.deb')]);
    expect(await findFilesByExtension(join(testDir, 'absent'), '.deb')).toEqual([]);
  });
});

describe('isPathInside', () => {
  it('accepts the directory itself and its descendants only', () => {
    expect(isPathInside('/ws/bloom-build', '/ws/bloom-build')).toBe(true);
    expect(isPathInside('/ws/bloom-build', '/ws/bloom-build/output')).toBe(true);
    expect(isPathInside('/ws/bloom-build', '/ws/bloom-build-old')).toBe(false);
    expect(isPathInside('/ws/bloom-build', '/ws/debs')).toBe(false);
  });
});
