import { fsa } from '@linzjs/s3fs';
import pLimit from 'p-limit';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ApplicationConfigFileName } from './config';
import { DefaultConcurrency } from './fetcher';
import { hashFile } from './hash';
import { LogType } from './log';
import { ContentManifest, createContentManifest, ManifestFile, ManifestFileName } from './manifest';

/** Documents live beside the content but are never part of the manifest */
const IgnoredFiles = new Set([
  ApplicationConfigFileName,
  ManifestFileName,
  ApplicationConfigFileName + '.1',
  ManifestFileName + '.1',
]);

/** List every content file below `folder` as a path relative to it, using `/` as the separator */
export async function* listContentFiles(folder: string, prefix = ''): AsyncGenerator<string> {
  const entries = await fs.readdir(path.join(folder, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const relative = prefix === '' ? entry.name : prefix + '/' + entry.name;
    if (entry.isDirectory()) {
      yield* listContentFiles(folder, relative);
      continue;
    }
    if (!entry.isFile()) continue;
    if (prefix === '' && IgnoredFiles.has(entry.name)) continue;
    yield relative;
  }
}

/** Hash every content file of a folder */
export async function buildManifest(
  folder: string,
  logger: LogType,
  concurrency = DefaultConcurrency,
): Promise<ContentManifest> {
  const Q = pLimit(concurrency);
  const promises: Promise<ManifestFile>[] = [];
  for await (const filePath of listContentFiles(folder)) {
    promises.push(
      Q(async () => {
        const hash = await hashFile(fsa.readStream(path.join(folder, filePath)));
        logger.trace({ path: filePath, hash }, 'Manifest:File');
        return { path: filePath, hash };
      }),
    );
  }
  const files = await Promise.all(promises);
  logger.info({ folder, files: files.length }, 'Manifest:Built');
  return createContentManifest(files);
}

export interface ValidateResult {
  /** Manifest entries with no file */
  missing: string[];
  /** Files whose hash differs from the manifest */
  mismatched: string[];
  /** Files not listed in the manifest */
  extra: string[];
}

/** Compare the content of a folder with a manifest */
export async function validateFolder(
  folder: string,
  manifest: ContentManifest,
  logger: LogType,
  concurrency = DefaultConcurrency,
): Promise<ValidateResult> {
  const result: ValidateResult = { missing: [], mismatched: [], extra: [] };
  const expected = new Set(manifest.files.keys());
  const Q = pLimit(concurrency);
  const promises: Promise<void>[] = [];

  for await (const filePath of listContentFiles(folder)) {
    const file = manifest.files.get(filePath);
    if (file == null) {
      result.extra.push(filePath);
      continue;
    }
    expected.delete(filePath);
    promises.push(
      Q(async () => {
        const hash = await hashFile(fsa.readStream(path.join(folder, filePath)));
        if (hash === file.hash) return;
        logger.warn({ path: filePath, expected: file.hash, got: hash }, 'Validate:Mismatch');
        result.mismatched.push(filePath);
      }),
    );
  }
  await Promise.all(promises);

  result.missing = [...expected].sort();
  result.mismatched.sort();
  result.extra.sort();
  return result;
}
