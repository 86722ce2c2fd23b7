import { posix } from 'path';
import { z } from 'zod';
import { DocumentParseError, parseJson, validateDocument } from './document';

export const ManifestFileName = 'content-manifest.json';

export interface ManifestFile {
  /** Path relative to the content root, without leading or trailing slashes */
  readonly path: string;
  /** Content fingerprint, eg `sha256-<base64>` */
  readonly hash: string;
}

export interface ContentManifest {
  /** Files keyed by path */
  readonly files: ReadonlyMap<string, ManifestFile>;
  /** Document entries as they were read */
  readonly json: readonly Readonly<Record<string, unknown>>[];
}

const manifestSchema = z.array(z.object({ file: z.string().min(1), hash: z.string().min(1) }).passthrough());

/**
 * Collapse `.` segments and repeated slashes, then remove leading and trailing slashes
 *
 * @example
 * normalizePath('/js/./app.js') // 'js/app.js'
 * normalizePath('./') // ''
 */
export function normalizePath(input: string): string {
  let output = posix.normalize(input);
  if (output.startsWith('./')) output = output.slice(2);
  while (output.startsWith('/')) output = output.slice(1);
  if (output.endsWith('/')) output = output.slice(0, output.length - 1);
  if (output === '.') return '';
  return output;
}

/** Normalized path of a manifest entry, `null` if it is empty or climbs out of the content root */
export function toManifestPath(input: string): string | null {
  const output = normalizePath(input);
  if (output === '') return null;
  if (output.split('/').includes('..')) return null;
  return output;
}

export function compareFiles(a: ManifestFile, b: ManifestFile): number {
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

function toFileMap(files: Iterable<ManifestFile>): ReadonlyMap<string, ManifestFile> {
  const output = new Map<string, ManifestFile>();
  for (const file of files) {
    const path = toManifestPath(file.path);
    if (path == null) throw new DocumentParseError(ManifestFileName, `invalid file "${file.path}"`);
    if (output.has(path)) throw new DocumentParseError(ManifestFileName, `duplicate file "${path}"`);
    output.set(path, Object.freeze({ path, hash: file.hash }));
  }
  return output;
}

export function parseContentManifest(input: unknown): ContentManifest {
  const entries = validateDocument(ManifestFileName, manifestSchema, input);
  const files = toFileMap(entries.map((entry) => ({ path: entry.file, hash: entry.hash })));
  return Object.freeze({ files, json: Object.freeze(entries.map((entry) => Object.freeze({ ...entry }))) });
}

export function readContentManifest(buf: Buffer | string): ContentManifest {
  return parseContentManifest(parseJson(ManifestFileName, buf));
}

/** Build a manifest from a list of files, sorted by path */
export function createContentManifest(files: Iterable<ManifestFile>): ContentManifest {
  const sorted = [...toFileMap(files).values()].sort(compareFiles);
  return parseContentManifest(sorted.map((f) => ({ file: f.path, hash: f.hash })));
}

export function serializeContentManifest(manifest: ContentManifest): string {
  return JSON.stringify(manifest.json, null, 2);
}
