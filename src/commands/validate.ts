import { command } from 'cmd-ts';
import * as path from 'path';
import { logger } from '../log';
import { validateFolder } from '../manifest.build';
import { contentManifestStorage } from '../storage';
import { Tracer } from '../tracer';
import { applyVerbose, concurrency, folder, verbose } from './common';

export const commandValidate = command({
  name: 'validate',
  description: 'Check the files of a release folder against its content manifest',
  args: { verbose, concurrency, folder },
  handler: (args) => {
    return Tracer.startRootSpan('command:validate', async (span) => {
      applyVerbose(args);
      const fullPath = path.resolve(args.folder);
      const manifest = await contentManifestStorage(logger).load(fullPath);
      if (manifest == null) throw new Error('No content manifest found in ' + fullPath);

      logger.info({ path: fullPath, files: manifest.files.size }, 'Validate:Start');
      const result = await validateFolder(fullPath, manifest, logger, args.concurrency);
      span.setAttribute('missing', result.missing.length);
      span.setAttribute('mismatched', result.mismatched.length);
      span.setAttribute('extra', result.extra.length);

      if (result.missing.length > 0 || result.mismatched.length > 0 || result.extra.length > 0) {
        logger.error(result, 'Validate:Failed');
        process.exitCode = 1;
        return;
      }
      logger.info({ files: manifest.files.size }, 'Validate:Ok');
    });
  },
});
