import { command } from 'cmd-ts';
import { promises as fs } from 'fs';
import * as path from 'path';
import { logger } from '../log';
import { buildManifest } from '../manifest.build';
import { contentManifestStorage } from '../storage';
import { Tracer } from '../tracer';
import { applyVerbose, concurrency, folder, verbose } from './common';

export const commandManifest = command({
  name: 'manifest',
  description: 'Hash the content of a release folder and write its content manifest',
  args: { verbose, concurrency, folder },
  handler: (args) => {
    return Tracer.startRootSpan('command:manifest', async (span) => {
      applyVerbose(args);
      const fullPath = path.resolve(args.folder);
      const stat = await fs.stat(fullPath);
      if (!stat.isDirectory()) throw new Error('Not a folder: ' + fullPath);

      const manifest = await buildManifest(fullPath, logger, args.concurrency);
      await contentManifestStorage(logger).store(manifest, fullPath);

      logger.info({ path: fullPath, count: manifest.files.size }, 'Manifest:Created');
      span.setAttribute('fileCount', manifest.files.size);
    });
  },
});
