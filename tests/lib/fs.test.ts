import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FsError, errnoCode, isNotFound, readJsonFile, removeIfPresent } from '@/lib/fs.js';
import { mkdir, readdir, rm, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

describe('fs helpers', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `pomobar-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('reads JSON files', async () => {
    const filePath = join(testDir, 'a.json');
    await writeFile(filePath, '{"work_minutes": 30}');
    expect(await readJsonFile(filePath)).toEqual({ work_minutes: 30 });
  });

  it('wraps read failures in FsError and keeps the errno cause', async () => {
    const filePath = join(testDir, 'missing.json');
    try {
      await readJsonFile(filePath);
      expect.unreachable('readJsonFile should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FsError);
      expect(isNotFound(error)).toBe(true);
      expect(error instanceof FsError ? error.filePath : '').toBe(filePath);
    }
  });

  it('keeps the SyntaxError cause for invalid JSON', async () => {
    const filePath = join(testDir, 'broken.json');
    await writeFile(filePath, '{');
    try {
      await readJsonFile(filePath);
      expect.unreachable('readJsonFile should have thrown');
    } catch (error) {
      expect(error instanceof FsError ? error.cause : undefined).toBeInstanceOf(SyntaxError);
      expect(isNotFound(error)).toBe(false);
    }
  });

  it('removes files that exist and tolerates missing ones', async () => {
    const filePath = join(testDir, 'stale.sock');
    await writeFile(filePath, '');

    expect(await removeIfPresent(filePath)).toBe(true);
    expect(await readdir(testDir)).toEqual([]);
    expect(await removeIfPresent(filePath)).toBe(false);
  });

  it('removes a symlink whose target is gone', async () => {
    const linkPath = join(testDir, 'link.sock');
    await symlink(join(testDir, 'missing.sock'), linkPath);

    expect(await removeIfPresent(linkPath)).toBe(true);
    expect(await readdir(testDir)).toEqual([]);
  });

  it('reads errno codes only from errors that carry one', () => {
    expect(errnoCode(Object.assign(new Error('x'), { code: 'EACCES' }))).toBe('EACCES');
    expect(errnoCode(new Error('x'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });
});
