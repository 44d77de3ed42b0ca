/**
 * Image File Utility
 *
 * Writes rendered PNGs into the cache directory under fresh UUID names, so
 * concurrent renders never share a path. Nothing here deletes files;
 * retention belongs to whoever owns the cache directory.
 */

import { access, mkdir, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { join } from 'path';

/**
 * Generate a unique image file name.
 */
export function createImageFileName(): string {
  return `${randomUUID()}.png`;
}

/**
 * Write PNG bytes to a new file in the cache directory.
 *
 * @param cacheDir - Directory to write into (created if missing)
 * @param data - Encoded PNG bytes
 * @returns Absolute path to the written file
 */
export async function saveImage(cacheDir: string, data: Uint8Array): Promise<string> {
  await mkdir(cacheDir, { recursive: true });
  const filepath = join(cacheDir, createImageFileName());
  await writeFile(filepath, data);
  return filepath;
}

export async function fileExists(filepath: string): Promise<boolean> {
  try {
    await access(filepath);
    return true;
  } catch {
    return false;
  }
}
