/**
 * File Key-Value Store
 * One JSON file per key inside a cache directory
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { randomBytes } from 'crypto';
import { join } from 'path';
import type { KeyValueStore } from './kv-store.js';

// ============================================
// Types
// ============================================

export interface FileStoreConfig {
  /** Directory holding `<key>.json` files, created on write if absent */
  directory: string;
}

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

// ============================================
// File Store
// ============================================

export class FileKeyValueStore implements KeyValueStore {
  private config: FileStoreConfig;

  constructor(config: FileStoreConfig) {
    this.config = { ...config };
  }

  /**
   * Resolve the file path for a key. Keys become file names, so anything
   * that could escape the directory is refused.
   */
  pathFor(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Invalid store key: ${JSON.stringify(key)}`);
    }
    return join(this.config.directory, `${key}.json`);
  }

  async get(key: string): Promise<string | undefined> {
    try {
      return await readFile(this.pathFor(key), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Write to a temp file beside the target, then rename over it.
   * rename() within one directory is atomic, so readers never see a torn file.
   */
  async set(key: string, value: string): Promise<void> {
    const target = this.pathFor(key);
    // Recreated on every write: the directory may be removed while we run
    await mkdir(this.config.directory, { recursive: true });

    const tmp = join(this.config.directory, `.${key}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`);
    try {
      await writeFile(tmp, value, 'utf-8');
      await rename(tmp, target);
    } catch (error) {
      await unlink(tmp).catch(() => undefined);
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
