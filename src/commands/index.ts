import { subcommands } from 'cmd-ts';
import { getVersion } from '../version';
import { commandCheck } from './check';
import { commandManifest } from './manifest';
import { commandValidate } from './validate';

export const cmd = subcommands({
  name: 'hcu',
  description: 'Hot content update - build, validate and download content releases',
  version: getVersion().version ?? 'unknown',
  cmds: { check: commandCheck, manifest: commandManifest, validate: commandValidate },
});
