/**
 * Unit tests for FileSystemAdapter
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { FileSystemAdapter } from '../../../src/platform/FileSystemAdapter.js';
import { makeTempDir, removeTempDir } from '../../helpers/engineHelpers.js';

describe('FileSystemAdapter', () => {
  let fs: FileSystemAdapter;
  let testDir: string;

  beforeEach(async () => {
    fs = new FileSystemAdapter();
    testDir = await makeTempDir('shellweave-fs-');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('should write and read back a file', async () => {
    const path = join(testDir, 'config.yml');
    await fs.writeFile(path, 'pool:\n  maxConcurrent: 2\n');

    expect(await fs.readFile(path)).toBe('pool:\n  maxConcurrent: 2\n');
  });

  it('should report existence', async () => {
    expect(await fs.exists(testDir)).toBe(true);
    expect(await fs.exists(join(testDir, 'missing.yml'))).toBe(false);
  });

  it('should create nested directories', async () => {
    const nested = join(testDir, 'a', 'b', 'c');
    await fs.mkdir(nested, { recursive: true });

    expect(await fs.exists(nested)).toBe(true);
  });
});
