import { performance } from 'perf_hooks';
import { ulid } from 'ulid';
import { ApplicationConfig } from './config';
import { ContentFetcher, msSince } from './fetcher';
import { ReleaseFileLayout } from './layout';
import { LogType } from './log';
import { ContentManifest } from './manifest';
import { diffManifests } from './manifest.diff';
import { DocumentStorage } from './storage';
import {
  NativeVersionProvider,
  NothingToUpdateEvent,
  ReadyToInstallEvent,
  updateError,
  UpdateErrorEvent,
  UpdateErrorKind,
  UpdateEvent,
  UpdateEventSink,
} from './update.events';

export interface UpdateWorkerOptions {
  /** Url of the remote application config */
  configUrl: string;
  layout: ReleaseFileLayout;
  fetcher: ContentFetcher;
  configStorage: DocumentStorage<ApplicationConfig>;
  manifestStorage: DocumentStorage<ContentManifest>;
  nativeVersion: NativeVersionProvider;
  logger: LogType;
  /** Receives the outcome of the run */
  sink?: UpdateEventSink;
}

interface InstalledRelease {
  folder: string;
  config: ApplicationConfig;
  manifest: ContentManifest;
}

/**
 * Download a new content release into its staging folder.
 *
 * A worker performs a single run, `run()` resolves with the one outcome of that run and never rejects.
 * The installed release is only written to when the remote manifest has no content changes,
 * in which case both documents are refreshed in place.
 */
export class UpdateWorker {
  readonly workerId = ulid();
  readonly configUrl: string;
  readonly layout: ReleaseFileLayout;
  readonly fetcher: ContentFetcher;
  readonly configStorage: DocumentStorage<ApplicationConfig>;
  readonly manifestStorage: DocumentStorage<ContentManifest>;
  readonly nativeVersion: NativeVersionProvider;
  readonly sink: UpdateEventSink | null;
  logger: LogType;

  constructor(opts: UpdateWorkerOptions) {
    this.configUrl = opts.configUrl;
    this.layout = opts.layout;
    this.fetcher = opts.fetcher;
    this.configStorage = opts.configStorage;
    this.manifestStorage = opts.manifestStorage;
    this.nativeVersion = opts.nativeVersion;
    this.sink = opts.sink ?? null;
    this.logger = opts.logger.child({ workerId: this.workerId });
  }

  _run: Promise<UpdateEvent> | null = null;
  run(): Promise<UpdateEvent> {
    if (this._run == null) this._run = this.runOnce();
    return this._run;
  }

  private async runOnce(): Promise<UpdateEvent> {
    const startTime = performance.now();
    this.logger.info({ configUrl: this.configUrl, release: this.layout.installedRelease }, 'Update:Start');

    let event: UpdateEvent;
    try {
      event = await this.execute();
    } catch (err) {
      this.logger.error({ err }, 'Update:Unexpected');
      await this.cleanUp();
      event = this.error('FailedToDownloadUpdateFiles', null);
    }

    this.logger.info(
      { type: event.type, release: event.config?.releaseVersion, duration: msSince(startTime) },
      'Update:Done',
    );
    if (this.sink) {
      try {
        this.sink(event);
      } catch (err) {
        this.logger.error({ err }, 'Update:Sink:Failed');
      }
    }
    return event;
  }

  private async execute(): Promise<UpdateEvent> {
    const installedFolder = this.layout.resolveInstalledPaths().folder;
    const oldConfig = await this.loadDocument(this.configStorage, installedFolder);
    if (oldConfig == null) return this.error('LocalConfigNotFound', null);
    const oldManifest = await this.loadDocument(this.manifestStorage, installedFolder);
    if (oldManifest == null) return this.error('LocalManifestNotFound', null);
    const installed: InstalledRelease = { folder: installedFolder, config: oldConfig, manifest: oldManifest };

    let newConfig: ApplicationConfig;
    try {
      newConfig = await this.fetcher.fetchApplicationConfig(this.configUrl);
    } catch (err) {
      this.logger.warn({ err, url: this.configUrl }, 'Update:Config:Failed');
      return this.error('FailedToDownloadApplicationConfig', null);
    }

    if (newConfig.releaseVersion === installed.config.releaseVersion) {
      this.logger.info({ release: newConfig.releaseVersion }, 'Update:UpToDate');
      return this.nothingToUpdate(newConfig);
    }

    const buildVersion = this.nativeVersion.nativeBuildVersion();
    if (newConfig.minimumNativeVersion > buildVersion) {
      this.logger.warn(
        { release: newConfig.releaseVersion, required: newConfig.minimumNativeVersion, buildVersion },
        'Update:NativeVersionTooLow',
      );
      return this.error('NativeVersionTooLow', newConfig);
    }

    let newManifest: ContentManifest;
    try {
      newManifest = await this.fetcher.fetchContentManifest(newConfig.contentUrl);
    } catch (err) {
      this.logger.warn({ err, contentUrl: newConfig.contentUrl }, 'Update:Manifest:Failed');
      return this.error('FailedToDownloadContentManifest', newConfig);
    }

    const diff = diffManifests(installed.manifest, newManifest);
    this.logger.info(
      { added: diff.added.length, updated: diff.updated.length, removed: diff.removed.length },
      'Update:Diff',
    );
    if (diff.isEmpty()) {
      await this.refreshInstalled(installed, newConfig, newManifest);
      return this.nothingToUpdate(newConfig);
    }

    try {
      this.layout.switchToRelease(newConfig.releaseVersion);
      await this.layout.recreateFolder(this.layout.stagingFolder);
      await this.layout.recreateFolder(this.layout.tempFolder);
      await this.fetcher.fetchFiles(
        this.layout.stagingFolder,
        this.layout.tempFolder,
        newConfig.contentUrl,
        diff.updateFiles,
      );

      await this.manifestStorage.store(newManifest, this.layout.stagingFolder);
      await this.configStorage.store(newConfig, this.layout.stagingFolder);
    } catch (err) {
      this.logger.error({ err, release: newConfig.releaseVersion }, 'Update:Files:Failed');
      await this.cleanUp();
      return this.error('FailedToDownloadUpdateFiles', newConfig);
    }

    await this.removeTempFolder();
    this.logger.info({ release: newConfig.releaseVersion, folder: this.layout.stagingFolder }, 'Update:Staged');
    return this.readyToInstall(newConfig);
  }

  private async loadDocument<T>(storage: DocumentStorage<T>, folder: string): Promise<T | null> {
    try {
      return await storage.load(folder);
    } catch (err) {
      this.logger.warn({ err, folder }, 'Update:Load:Failed');
      return null;
    }
  }

  /**
   * Content is unchanged, only the documents differ: write both into the installed folder.
   *
   * If the config cannot be written the previous manifest is put back, so the pair stays consistent.
   */
  private async refreshInstalled(
    installed: InstalledRelease,
    config: ApplicationConfig,
    manifest: ContentManifest,
  ): Promise<void> {
    try {
      await this.manifestStorage.store(manifest, installed.folder);
    } catch (err) {
      this.logger.warn({ err, folder: installed.folder }, 'Update:Refresh:Failed');
      return;
    }

    try {
      await this.configStorage.store(config, installed.folder);
      this.logger.info({ folder: installed.folder, release: config.releaseVersion }, 'Update:Refresh');
    } catch (err) {
      this.logger.warn({ err, folder: installed.folder }, 'Update:Refresh:Failed');
      await this.manifestStorage
        .store(installed.manifest, installed.folder)
        .catch((restoreErr) => this.logger.error({ err: restoreErr }, 'Update:Refresh:Restore:Failed'));
    }
  }

  private async cleanUp(): Promise<void> {
    try {
      await this.layout.cleanUp();
    } catch (err) {
      this.logger.error({ err, folder: this.layout.contentFolder }, 'Update:CleanUp:Failed');
    }
  }

  private async removeTempFolder(): Promise<void> {
    try {
      await this.layout.fs.delete(this.layout.tempFolder);
    } catch (err) {
      this.logger.warn({ err, folder: this.layout.tempFolder }, 'Update:CleanUp:Failed');
    }
  }

  private error(kind: UpdateErrorKind, config: ApplicationConfig | null): UpdateErrorEvent {
    return updateError(this.workerId, kind, config);
  }

  private nothingToUpdate(config: ApplicationConfig): NothingToUpdateEvent {
    return { type: 'NothingToUpdate', workerId: this.workerId, config };
  }

  private readyToInstall(config: ApplicationConfig): ReadyToInstallEvent {
    return { type: 'ReadyToInstall', workerId: this.workerId, config };
  }
}
