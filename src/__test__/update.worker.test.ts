import o from 'ospec';
import sinon from 'sinon';
import { ApplicationConfig, parseApplicationConfig } from '../config';
import { ContentFetcher } from '../fetcher';
import { ReleaseFileLayout } from '../layout';
import { ContentManifest, parseContentManifest } from '../manifest';
import { UpdateEventSink } from '../update.events';
import { UpdateWorker } from '../update.worker';
import { MemoryFileSystem, MemoryStorage, MemoryTransport, silentLogger } from './fakes';

const ConfigUrl = 'https://cdn.test/app-config.json';
const InstalledFolder = '/apps/1.0.0/www';

interface Setup {
  fs: MemoryFileSystem;
  transport: MemoryTransport;
  configStorage: MemoryStorage<ApplicationConfig>;
  manifestStorage: MemoryStorage<ContentManifest>;
  worker: UpdateWorker;
}

function setup(opts: { buildVersion?: number; sink?: UpdateEventSink } = {}): Setup {
  const fs = new MemoryFileSystem();
  const transport = new MemoryTransport(fs);
  const configStorage = new MemoryStorage<ApplicationConfig>();
  const manifestStorage = new MemoryStorage<ContentManifest>();
  const worker = new UpdateWorker({
    configUrl: ConfigUrl,
    layout: new ReleaseFileLayout('/apps', '1.0.0', fs),
    fetcher: new ContentFetcher({ transport, fs, logger: silentLogger }),
    configStorage,
    manifestStorage,
    nativeVersion: { nativeBuildVersion: () => opts.buildVersion ?? 1 },
    logger: silentLogger,
    sink: opts.sink,
  });
  return { fs, transport, configStorage, manifestStorage, worker };
}

function install(s: Setup): void {
  s.configStorage.docs.set(
    InstalledFolder,
    parseApplicationConfig({ release: '1.0.0', content_url: 'https://cdn.test/1.0.0', min_native_interface: 1 }),
  );
  s.manifestStorage.docs.set(InstalledFolder, parseContentManifest([{ file: 'a.js', hash: 'h1' }]));
}

function publish(s: Setup, config: Record<string, unknown>, manifest?: Record<string, unknown>[]): void {
  s.transport.responses.set(ConfigUrl, JSON.stringify(config));
  if (manifest) s.transport.responses.set('https://cdn.test/2.0.0/content-manifest.json', JSON.stringify(manifest));
}

const NewRelease = { release: '2.0.0', content_url: 'https://cdn.test/2.0.0', min_native_interface: 1 };

o.spec('UpdateWorker', () => {
  o('should report a missing installed config', async () => {
    const s = setup();
    const event = await s.worker.run();
    o(event).deepEquals({
      type: 'Error',
      workerId: s.worker.workerId,
      error: { kind: 'LocalConfigNotFound', code: -9 },
      config: null,
    });
    o(s.transport.fetched).deepEquals([]);
  });

  o('should report a missing installed manifest', async () => {
    const s = setup();
    install(s);
    s.manifestStorage.docs.clear();
    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error : null).deepEquals({ kind: 'LocalManifestNotFound', code: -10 });
    o(s.transport.fetched).deepEquals([]);
  });

  o('should report a failed config download', async () => {
    const s = setup();
    install(s);
    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error : null).deepEquals({ kind: 'FailedToDownloadApplicationConfig', code: -1 });
    o(event.config).equals(null);
  });

  o('should do nothing when the release is unchanged', async () => {
    const s = setup();
    install(s);
    publish(s, { release: '1.0.0', content_url: 'https://cdn.test/1.0.0' });

    const event = await s.worker.run();
    o(event.type).equals('NothingToUpdate');
    o(event.config?.releaseVersion).equals('1.0.0');
    o(s.transport.fetched).deepEquals([ConfigUrl]);
    o(s.transport.fetchedFiles).deepEquals([]);
    o(s.fs.folders.size).equals(0);
    o(s.configStorage.stored).deepEquals([]);
  });

  o('should reject a release needing a newer native build before fetching the manifest', async () => {
    const s = setup({ buildVersion: 1 });
    install(s);
    publish(s, { ...NewRelease, min_native_interface: 999 }, [{ file: 'a.js', hash: 'h1' }]);

    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error : null).deepEquals({ kind: 'NativeVersionTooLow', code: -2 });
    o(event.config?.releaseVersion).equals('2.0.0');
    o(s.transport.fetched).deepEquals([ConfigUrl]);
  });

  o('should report a missing content url', async () => {
    const s = setup();
    install(s);
    publish(s, { release: '2.0.0' });

    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error : null).deepEquals({ kind: 'FailedToDownloadContentManifest', code: -3 });
    o(event.config?.releaseVersion).equals('2.0.0');
    o(s.transport.fetched).deepEquals([ConfigUrl]);
  });

  o('should report a failed manifest download', async () => {
    const s = setup();
    install(s);
    publish(s, NewRelease);

    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error : null).deepEquals({ kind: 'FailedToDownloadContentManifest', code: -3 });
    o(s.fs.folders.size).equals(0);
  });

  o('should refresh the installed documents when no content changed', async () => {
    const s = setup();
    install(s);
    publish(s, { ...NewRelease, built_at: 'today' }, [{ file: 'a.js', hash: 'h1', size: 10 }]);

    const event = await s.worker.run();
    o(event.type).equals('NothingToUpdate');
    o(event.config?.releaseVersion).equals('2.0.0');
    o(s.transport.fetchedFiles).deepEquals([]);
    o(s.fs.exists('/apps/2.0.0')).equals(false);

    o(s.configStorage.stored).deepEquals([InstalledFolder]);
    o(s.manifestStorage.stored).deepEquals([InstalledFolder]);
    o(s.configStorage.docs.get(InstalledFolder)?.json).deepEquals({ ...NewRelease, built_at: 'today' });
    o(s.manifestStorage.docs.get(InstalledFolder)?.json).deepEquals([{ file: 'a.js', hash: 'h1', size: 10 }]);
  });

  o('should restore the installed manifest when the refreshed config cannot be written', async () => {
    const s = setup();
    install(s);
    const oldManifest = s.manifestStorage.docs.get(InstalledFolder);
    s.configStorage.failStore.add(InstalledFolder);
    publish(s, NewRelease, [{ file: 'a.js', hash: 'h1', size: 10 }]);

    const event = await s.worker.run();
    o(event.type).equals('NothingToUpdate');
    o(s.manifestStorage.docs.get(InstalledFolder)).equals(oldManifest);
    o(s.configStorage.docs.get(InstalledFolder)?.releaseVersion).equals('1.0.0');
  });

  o('should stage only new and changed files', async () => {
    const s = setup();
    install(s);
    publish(s, NewRelease, [
      { file: 'a.js', hash: 'h1' },
      { file: 'b.js', hash: 'h2' },
    ]);
    s.transport.responses.set('https://cdn.test/2.0.0/b.js', 'console.log("b")');

    const event = await s.worker.run();
    o(event.type).equals('ReadyToInstall');
    o(event.workerId).equals(s.worker.workerId);
    o(event.config?.releaseVersion).equals('2.0.0');

    o(s.transport.fetchedFiles).deepEquals([{ url: 'https://cdn.test/2.0.0/b.js', destPath: '/apps/2.0.0/.tmp/b.js' }]);
    o([...s.fs.files.keys()]).deepEquals(['/apps/2.0.0/update/b.js']);
    o(s.fs.exists('/apps/2.0.0/.tmp')).equals(false);

    o(s.manifestStorage.stored).deepEquals(['/apps/2.0.0/update']);
    o(s.configStorage.stored).deepEquals(['/apps/2.0.0/update']);
    o(s.configStorage.docs.get(InstalledFolder)?.releaseVersion).equals('1.0.0');
  });

  o('should stage a release that only removes files', async () => {
    const s = setup();
    install(s);
    publish(s, NewRelease, []);

    const event = await s.worker.run();
    o(event.type).equals('ReadyToInstall');
    o(s.transport.fetchedFiles).deepEquals([]);
    o(s.fs.folders.has('/apps/2.0.0/update')).equals(true);
    o(s.manifestStorage.docs.get('/apps/2.0.0/update')?.files.size).equals(0);
  });

  o('should remove the staged release when a file fails to download', async () => {
    const s = setup();
    install(s);
    publish(s, NewRelease, [
      { file: 'a.js', hash: 'h1' },
      { file: 'b.js', hash: 'h2' },
      { file: 'c.js', hash: 'h3' },
    ]);
    s.transport.responses.set('https://cdn.test/2.0.0/b.js', 'console.log("b")');

    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error : null).deepEquals({ kind: 'FailedToDownloadUpdateFiles', code: -4 });
    o(event.config?.releaseVersion).equals('2.0.0');
    o(s.transport.fetchedFiles.length).equals(2);
    o(s.fs.exists('/apps/2.0.0')).equals(false);
    o(s.manifestStorage.stored).deepEquals([]);
    o(s.configStorage.stored).deepEquals([]);
  });

  o('should remove the staged release when the documents cannot be written', async () => {
    const s = setup();
    install(s);
    publish(s, NewRelease, [{ file: 'b.js', hash: 'h2' }]);
    s.transport.responses.set('https://cdn.test/2.0.0/b.js', 'b');
    s.configStorage.failStore.add('/apps/2.0.0/update');

    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error.kind : null).equals('FailedToDownloadUpdateFiles');
    o(s.fs.exists('/apps/2.0.0')).equals(false);
  });

  o('should remove the staged release when a download folder cannot be created', async () => {
    for (const folder of ['/apps/2.0.0/update', '/apps/2.0.0/.tmp']) {
      const s = setup();
      install(s);
      publish(s, NewRelease, [{ file: 'b.js', hash: 'h2' }]);
      s.transport.responses.set('https://cdn.test/2.0.0/b.js', 'b');
      s.fs.failEnsure.add(folder);

      const event = await s.worker.run();
      o(event.type === 'Error' ? event.error : null).deepEquals({ kind: 'FailedToDownloadUpdateFiles', code: -4 });
      o(event.config?.releaseVersion).equals('2.0.0');
      o(s.transport.fetchedFiles).deepEquals([]);
      o(s.fs.exists('/apps/2.0.0')).equals(false);
    }
  });

  o('should report an unusable release name as a failed download', async () => {
    const s = setup();
    install(s);
    s.transport.responses.set(ConfigUrl, JSON.stringify({ ...NewRelease, release: '../2.0.0' }));
    s.transport.responses.set('https://cdn.test/2.0.0/content-manifest.json', JSON.stringify([]));

    const event = await s.worker.run();
    o(event.type === 'Error' ? event.error.kind : null).equals('FailedToDownloadUpdateFiles');
    o(s.fs.folders.size).equals(0);
  });

  o('should send the outcome to the sink once, even when run twice', async () => {
    const sink = sinon.spy();
    const s = setup({ sink });
    install(s);
    publish(s, { release: '1.0.0' });

    const first = await s.worker.run();
    const second = await s.worker.run();
    o(second).equals(first);
    o(sink.callCount).equals(1);
    o(sink.firstCall.args[0]).equals(first);
    o(s.transport.fetched).deepEquals([ConfigUrl]);
  });

  o('should give each worker its own id', () => {
    o(setup().worker.workerId).notEquals(setup().worker.workerId);
  });
});
