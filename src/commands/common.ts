import { boolean, flag, number, option, optional, positional, string } from 'cmd-ts';
import { DefaultConcurrency } from '../fetcher';
import { setVerbose } from '../log';

export const verbose = flag({
  long: 'verbose',
  type: boolean,
  defaultValue: () => false,
  description: 'Verbose logging',
});
export const endpoint = option({ long: 'endpoint', type: optional(string), description: 'S3 endpoint to use' });
export const concurrency = option({
  long: 'concurrency',
  type: number,
  description: 'Number of files to process at the same time ($HCU_CONCURRENCY)',
  defaultValue: () => {
    const fromEnv = Number(process.env['HCU_CONCURRENCY']);
    return Number.isInteger(fromEnv) && fromEnv > 0 ? fromEnv : DefaultConcurrency;
  },
});
export const folder = positional({ type: string, displayName: 'FOLDER', description: 'Release content folder' });

export function applyVerbose(args: { verbose: boolean }): void {
  if (args.verbose) setVerbose();
}
