import pLimit from 'p-limit';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { ApplicationConfig, readApplicationConfig } from './config';
import { ErrorList } from './error.list';
import { FileSystem } from './fs';
import { LogType } from './log';
import { ContentManifest, ManifestFile, ManifestFileName, readContentManifest } from './manifest';
import { Tracer } from './tracer';
import { Transport } from './transport';
import { joinUrl } from './url';

export const DefaultConcurrency = 5;

/** Track ms since a performance.now() call limited to 4dp */
export function msSince(lastTick: number): number {
  return Number((performance.now() - lastTick).toFixed(4));
}

/** Resolve a manifest path inside `folder`, refusing paths that would escape it */
export function resolveInside(folder: string, filePath: string): string {
  const target = path.resolve(folder, filePath);
  const relative = path.relative(path.resolve(folder), target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`File path "${filePath}" is outside of ${folder}`);
  }
  return target;
}

export interface ContentFetcherOptions {
  transport: Transport;
  fs: FileSystem;
  logger: LogType;
  /** Number of files downloaded at the same time */
  concurrency?: number;
}

export class ContentFetcher {
  readonly transport: Transport;
  readonly fs: FileSystem;
  readonly concurrency: number;
  logger: LogType;

  constructor(opts: ContentFetcherOptions) {
    this.transport = opts.transport;
    this.fs = opts.fs;
    this.logger = opts.logger;
    this.concurrency = opts.concurrency ?? DefaultConcurrency;
  }

  async fetchApplicationConfig(url: string): Promise<ApplicationConfig> {
    this.logger.debug({ url }, 'Fetch:Config');
    return readApplicationConfig(await this.transport.fetch(url));
  }

  async fetchContentManifest(baseContentUrl: string, manifestFileName = ManifestFileName): Promise<ContentManifest> {
    if (baseContentUrl.trim() === '') throw new Error('Content url is not set in the application config');
    const url = joinUrl(baseContentUrl, manifestFileName);
    this.logger.debug({ url }, 'Fetch:Manifest');
    return readContentManifest(await this.transport.fetch(url));
  }

  /**
   * Download every file into `destFolder`, going through `tempFolder` so a partial file never has its final name.
   *
   * All downloads are allowed to settle before reporting, so nothing is written into `destFolder`
   * after this resolves or rejects.
   *
   * @throws ErrorList if any file failed
   */
  async fetchFiles(
    destFolder: string,
    tempFolder: string,
    baseContentUrl: string,
    files: readonly ManifestFile[],
  ): Promise<void> {
    if (baseContentUrl.trim() === '') throw new Error('Content url is not set in the application config');
    const startTime = performance.now();
    const Q = pLimit(this.concurrency);
    const errors: Error[] = [];

    this.logger.info({ files: files.length, concurrency: this.concurrency }, 'Fetch:Files:Start');
    const promises = files.map((file, index) =>
      Q(() =>
        Tracer.span('fetch:file:' + file.path, async (span) => {
          const url = joinUrl(baseContentUrl, file.path);
          const tempPath = resolveInside(tempFolder, file.path);
          const destPath = resolveInside(destFolder, file.path);
          span.setAttribute('url', url);
          span.setAttribute('index', index);

          const fileStart = performance.now();
          await this.transport.fetchFile(url, tempPath);
          await this.fs.move(tempPath, destPath);
          this.logger.trace({ index, total: files.length, url, duration: msSince(fileStart) }, 'Fetch:File:Done');
        }),
      ).catch((e) => {
        const err = ErrorList.toError(e);
        this.logger.error({ err, path: file.path }, 'Fetch:File:Failed');
        errors.push(err);
      }),
    );
    await Promise.all(promises);

    if (errors.length > 0) throw new ErrorList('FetchFiles:Failed', errors);
    this.logger.info({ files: files.length, duration: msSince(startTime) }, 'Fetch:Files:Done');
  }
}
