/**
 * File Storage
 *
 * Stores uploaded post images under `posts/`. Names are reduced to a safe
 * character set and get a numeric suffix when the name is taken.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';

export const UPLOAD_DIR = 'posts';

export interface FileStorage {
  /**
   * Store bytes and return the storage path, e.g. `posts/photo.gif`
   */
  save(fileName: string, bytes: Uint8Array): Promise<string>;
  /**
   * Read a stored file, or null when it does not exist
   */
  read(path: string): Promise<Uint8Array | null>;
  delete(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}

/**
 * Reduce a client-supplied file name to `[A-Za-z0-9._-]`, keeping the extension
 */
export function sanitizeFileName(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? '';
  const cleaned = base
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/^\.+/, '');
  return cleaned || 'upload';
}

/**
 * Candidate storage paths for a name: `posts/a.gif`, `posts/a_1.gif`, ...
 */
export function* candidatePaths(fileName: string): Generator<string> {
  const safe = sanitizeFileName(fileName);
  const dot = safe.lastIndexOf('.');
  const stem = dot > 0 ? safe.slice(0, dot) : safe;
  const ext = dot > 0 ? safe.slice(dot) : '';

  yield `${UPLOAD_DIR}/${safe}`;
  for (let n = 1; ; n++) {
    yield `${UPLOAD_DIR}/${stem}_${n}${ext}`;
  }
}

/**
 * Files under a media root on the local disk
 */
export class LocalFileStorage implements FileStorage {
  private root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async save(fileName: string, bytes: Uint8Array): Promise<string> {
    for (const path of candidatePaths(fileName)) {
      const target = this.requirePath(path);
      await mkdir(dirname(target), { recursive: true });
      try {
        // 'wx' fails if the file exists
        await writeFile(target, bytes, { flag: 'wx' });
        return path;
      } catch (error) {
        if (!isErrnoCode(error, 'EEXIST')) {
          throw error;
        }
      }
    }
    throw new Error(`No free name for ${fileName}`);
  }

  async read(path: string): Promise<Uint8Array | null> {
    const target = this.resolvePath(path);
    if (target === null) {
      return null;
    }
    try {
      return new Uint8Array(await readFile(target));
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'EISDIR')) {
        return null;
      }
      throw error;
    }
  }

  async delete(path: string): Promise<void> {
    await rm(this.requirePath(path), { force: true });
  }

  async exists(path: string): Promise<boolean> {
    return (await this.read(path)) !== null;
  }

  /**
   * Map a storage path into the media root; null when it would leave the root
   */
  private resolvePath(path: string): string | null {
    const target = resolve(join(this.root, path));
    return target.startsWith(this.root + sep) ? target : null;
  }

  private requirePath(path: string): string {
    const target = this.resolvePath(path);
    if (target === null) {
      throw new Error(`Path escapes media root: ${path}`);
    }
    return target;
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
