import { promises as fs } from 'fs';
import * as path from 'path';

/** Folder level operations used while staging a release */
export interface FileSystem {
  /** Remove a file or folder recursively, does nothing if it is missing */
  delete(target: string): Promise<void>;
  /** Create a folder and its parents, does nothing if it exists */
  ensureDirectoryExists(target: string): Promise<void>;
  /** Move a file, replacing any existing file at the destination */
  move(source: string, target: string): Promise<void>;
}

export class LocalFileSystem implements FileSystem {
  async delete(target: string): Promise<void> {
    await fs.rm(target, { recursive: true, force: true });
  }

  async ensureDirectoryExists(target: string): Promise<void> {
    await fs.mkdir(target, { recursive: true });
  }

  async move(source: string, target: string): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.rename(source, target);
  }
}
