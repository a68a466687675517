// ============================================================================
// Local File Storage
// Scratch storage for task records and output artifacts, addressed by
// relative keys under one root directory.
// ============================================================================

import { createReadStream } from 'node:fs';
import { mkdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { Readable } from 'node:stream';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Key-addressed storage with atomic writes and streaming reads. */
export interface FileStorage {
  /** Replaces the object at `key`. Readers see either the old or the new bytes. */
  write(key: string, data: Buffer | string): Promise<void>;
  /** Returns null when nothing is stored at `key`. */
  read(key: string): Promise<Buffer | null>;
  /** Returns null when nothing is stored at `key`. */
  stat(key: string): Promise<{ sizeBytes: number } | null>;
  createReadStream(key: string): Readable;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createLocalFileStorage(rootDir: string): FileStorage {
  const root = path.resolve(rootDir);

  function resolveKey(key: string): string {
    const resolved = path.resolve(root, key);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
      throw new Error(`Storage key escapes the storage root: ${key}`);
    }
    return resolved;
  }

  return {
    async write(key, data) {
      const target = resolveKey(key);
      await mkdir(path.dirname(target), { recursive: true });
      const temp = `${target}.${randomUUID()}.tmp`;
      try {
        await writeFile(temp, data);
        await rename(temp, target);
      } catch (err) {
        await unlink(temp).catch(() => undefined);
        throw err;
      }
    },

    async read(key) {
      try {
        return await readFile(resolveKey(key));
      } catch (err) {
        if (isMissingFileError(err)) return null;
        throw err;
      }
    },

    async stat(key) {
      try {
        const info = await stat(resolveKey(key));
        return info.isFile() ? { sizeBytes: info.size } : null;
      } catch (err) {
        if (isMissingFileError(err)) return null;
        throw err;
      }
    },

    createReadStream(key) {
      return createReadStream(resolveKey(key));
    },
  };
}
