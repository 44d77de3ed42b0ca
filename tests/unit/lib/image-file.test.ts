/**
 * Image File Utility Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join, dirname, basename } from 'path';
import { createImageFileName, saveImage, fileExists } from '../../../src/lib/image-file.js';

describe('createImageFileName', () => {
  it('should generate unique png names', () => {
    const names = new Set(Array.from({ length: 50 }, () => createImageFileName()));

    expect(names.size).toBe(50);
    for (const name of names) {
      expect(name).toMatch(/^[0-9a-f-]{36}\.png$/);
    }
  });
});

describe('saveImage', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'image-file-test-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should write the bytes into the cache directory', async () => {
    const data = new Uint8Array([1, 2, 3, 4]);

    const filepath = await saveImage(workDir, data);

    expect(dirname(filepath)).toBe(workDir);
    expect(basename(filepath)).toMatch(/\.png$/);
    expect(new Uint8Array(await readFile(filepath))).toEqual(data);
  });

  it('should create a missing cache directory', async () => {
    const cacheDir = join(workDir, 'nested', 'images');

    const filepath = await saveImage(cacheDir, new Uint8Array([0]));

    expect(await fileExists(filepath)).toBe(true);
  });

  it('should never reuse a path', async () => {
    const first = await saveImage(workDir, new Uint8Array([1]));
    const second = await saveImage(workDir, new Uint8Array([2]));

    expect(first).not.toBe(second);
  });
});

describe('fileExists', () => {
  it('should return false for a missing file', async () => {
    expect(await fileExists(join(tmpdir(), 'does-not-exist', 'missing.png'))).toBe(false);
  });
});
