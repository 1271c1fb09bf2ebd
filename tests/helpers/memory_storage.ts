/**
 * In-memory FileStorage for tests
 */

import { candidatePaths, type FileStorage } from '../../src/contexts/blog/infrastructure/file_storage.ts';

export class MemoryFileStorage implements FileStorage {
  readonly files = new Map<string, Uint8Array>();

  async save(fileName: string, bytes: Uint8Array): Promise<string> {
    for (const path of candidatePaths(fileName)) {
      if (!this.files.has(path)) {
        this.files.set(path, bytes);
        return path;
      }
    }
    throw new Error('unreachable');
  }

  async read(path: string): Promise<Uint8Array | null> {
    return this.files.get(path) ?? null;
  }

  async delete(path: string): Promise<void> {
    this.files.delete(path);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }
}
