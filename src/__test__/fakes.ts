import pino from 'pino';
import { FileSystem } from '../fs';
import { DocumentStorage } from '../storage';
import { Transport } from '../transport';

export const silentLogger = pino({ level: 'silent' });

/** Files and folders kept in memory, keyed by absolute path */
export class MemoryFileSystem implements FileSystem {
  files = new Map<string, Buffer>();
  folders = new Set<string>();
  /** Folders that fail to be created */
  failEnsure = new Set<string>();

  async delete(target: string): Promise<void> {
    for (const key of [...this.files.keys()]) if (isInside(target, key)) this.files.delete(key);
    for (const key of [...this.folders]) if (isInside(target, key)) this.folders.delete(key);
  }

  async ensureDirectoryExists(target: string): Promise<void> {
    if (this.failEnsure.has(target)) throw new Error('Failed to create ' + target);
    this.folders.add(target);
  }

  async move(source: string, target: string): Promise<void> {
    const data = this.files.get(source);
    if (data == null) throw new Error('File not found: ' + source);
    this.files.delete(source);
    this.files.set(target, data);
  }

  /** True if a file or folder exists at, or below, `target` */
  exists(target: string): boolean {
    for (const key of this.files.keys()) if (isInside(target, key)) return true;
    for (const key of this.folders) if (isInside(target, key)) return true;
    return false;
  }
}

function isInside(folder: string, target: string): boolean {
  return target === folder || target.startsWith(folder + '/');
}

/** Serves fixed responses, writing downloaded files into a MemoryFileSystem */
export class MemoryTransport implements Transport {
  responses = new Map<string, string>();
  fetched: string[] = [];
  fetchedFiles: { url: string; destPath: string }[] = [];
  fs: MemoryFileSystem;

  constructor(fs: MemoryFileSystem) {
    this.fs = fs;
  }

  async fetch(url: string): Promise<Buffer> {
    this.fetched.push(url);
    const data = this.responses.get(url);
    if (data == null) throw new Error('Not found: ' + url);
    return Buffer.from(data);
  }

  async fetchFile(url: string, destPath: string): Promise<void> {
    this.fetchedFiles.push({ url, destPath });
    const data = this.responses.get(url);
    if (data == null) throw new Error('Not found: ' + url);
    this.fs.files.set(destPath, Buffer.from(data));
  }
}

export class MemoryStorage<T> implements DocumentStorage<T> {
  docs = new Map<string, T>();
  /** Folders that fail to store */
  failStore = new Set<string>();
  stored: string[] = [];

  async load(folder: string): Promise<T | null> {
    return this.docs.get(folder) ?? null;
  }

  async store(doc: T, folder: string): Promise<void> {
    if (this.failStore.has(folder)) throw new Error('Failed to write ' + folder);
    this.stored.push(folder);
    this.docs.set(folder, doc);
  }
}
