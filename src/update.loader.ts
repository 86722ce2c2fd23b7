import { ulid } from 'ulid';
import { ApplicationConfig } from './config';
import { ContentFetcher } from './fetcher';
import { FileSystem } from './fs';
import { ReleaseFileLayout } from './layout';
import { LogType } from './log';
import { ContentManifest } from './manifest';
import { applicationConfigStorage, contentManifestStorage, DocumentStorage } from './storage';
import { Transport } from './transport';
import { NativeVersionProvider, updateError, UpdateEvent, UpdateEventSink } from './update.events';
import { UpdateWorker } from './update.worker';

export interface UpdateLoaderOptions {
  /** Folder holding every release of the application */
  rootFolder: string;
  transport: Transport;
  fs: FileSystem;
  nativeVersion: NativeVersionProvider;
  logger: LogType;
  concurrency?: number;
  configStorage?: DocumentStorage<ApplicationConfig>;
  manifestStorage?: DocumentStorage<ContentManifest>;
}

export interface DownloadUpdateOptions {
  configUrl: string;
  /** Release currently serving the application */
  installedRelease: string;
  sink?: UpdateEventSink;
}

/** Runs update workers for one application, one at a time */
export class UpdateLoader {
  readonly rootFolder: string;
  readonly fetcher: ContentFetcher;
  readonly fs: FileSystem;
  readonly nativeVersion: NativeVersionProvider;
  readonly configStorage: DocumentStorage<ApplicationConfig>;
  readonly manifestStorage: DocumentStorage<ContentManifest>;
  logger: LogType;
  private current: UpdateWorker | null = null;

  constructor(opts: UpdateLoaderOptions) {
    this.rootFolder = opts.rootFolder;
    this.fs = opts.fs;
    this.nativeVersion = opts.nativeVersion;
    this.logger = opts.logger;
    this.fetcher = new ContentFetcher({
      transport: opts.transport,
      fs: opts.fs,
      logger: opts.logger,
      concurrency: opts.concurrency,
    });
    this.configStorage = opts.configStorage ?? applicationConfigStorage(opts.logger);
    this.manifestStorage = opts.manifestStorage ?? contentManifestStorage(opts.logger);
  }

  get isExecuting(): boolean {
    return this.current != null;
  }

  /** Start an update run, or report `UpdateInProgress` if one is already running */
  async downloadUpdate(options: DownloadUpdateOptions): Promise<UpdateEvent> {
    if (this.current != null) {
      const event = updateError(ulid(), 'UpdateInProgress', null);
      this.logger.warn({ workerId: this.current.workerId }, 'Update:InProgress');
      this.emit(options.sink, event);
      return event;
    }

    let layout: ReleaseFileLayout;
    try {
      layout = new ReleaseFileLayout(this.rootFolder, options.installedRelease, this.fs);
    } catch (err) {
      // Without a usable release name there is no installed config to read
      this.logger.error({ err, release: options.installedRelease }, 'Update:InvalidRelease');
      const event = updateError(ulid(), 'LocalConfigNotFound', null);
      this.emit(options.sink, event);
      return event;
    }

    const worker = new UpdateWorker({
      configUrl: options.configUrl,
      layout,
      fetcher: this.fetcher,
      configStorage: this.configStorage,
      manifestStorage: this.manifestStorage,
      nativeVersion: this.nativeVersion,
      logger: this.logger,
      sink: options.sink,
    });
    this.current = worker;
    try {
      return await worker.run();
    } finally {
      this.current = null;
    }
  }

  private emit(sink: UpdateEventSink | undefined, event: UpdateEvent): void {
    if (sink == null) return;
    try {
      sink(event);
    } catch (err) {
      this.logger.error({ err, workerId: event.workerId }, 'Update:Sink:Failed');
    }
  }
}
