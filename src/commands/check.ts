import { command, number, option, string } from 'cmd-ts';
import * as path from 'path';
import { registerFileSystems } from '../filesystems';
import { LocalFileSystem } from '../fs';
import { logger } from '../log';
import { Tracer } from '../tracer';
import { createTransport } from '../transport';
import { UpdateLoader } from '../update.loader';
import { applyVerbose, concurrency, endpoint, verbose } from './common';

export const commandCheck = command({
  name: 'check',
  description: 'Check for a new content release and stage it',
  args: {
    verbose,
    endpoint,
    concurrency,
    root: option({ long: 'root', type: string, description: 'Folder holding every release' }),
    configUrl: option({ long: 'config-url', type: string, description: 'Url of the remote application config' }),
    release: option({ long: 'release', type: string, description: 'Release currently installed' }),
    nativeVersion: option({ long: 'native-version', type: number, description: 'Build number of the native app' }),
  },
  handler: (args) => {
    return Tracer.startRootSpan('command:check', async (span) => {
      applyVerbose(args);
      await registerFileSystems(args, logger);

      const loader = new UpdateLoader({
        rootFolder: path.resolve(args.root),
        transport: createTransport(),
        fs: new LocalFileSystem(),
        nativeVersion: { nativeBuildVersion: () => args.nativeVersion },
        logger,
        concurrency: args.concurrency,
      });

      const event = await loader.downloadUpdate({ configUrl: args.configUrl, installedRelease: args.release });
      span.setAttribute('outcome', event.type);
      span.setAttribute('workerId', event.workerId);

      const outcome = {
        type: event.type,
        workerId: event.workerId,
        release: event.config?.releaseVersion ?? null,
        error: event.type === 'Error' ? event.error : null,
      };
      if (event.type === 'Error') {
        logger.error({ outcome }, 'Check:Failed');
        process.exitCode = 1;
        return;
      }
      logger.info({ outcome }, 'Check:Done');
    });
  },
});
