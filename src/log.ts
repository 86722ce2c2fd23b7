import pino from 'pino';
import { PrettyTransform } from 'pretty-json-log';
import { PassThrough } from 'stream';
import { ulid } from 'ulid';

export const outputStream = new PassThrough();
/** Unique id for this process, bound to every log line */
export const RunId = ulid();
const prettyTransform = new PrettyTransform();

export const logger = pino({ level: 'info' }, outputStream).child({ id: RunId });
export type LogType = pino.Logger;

if (process.stdout.isTTY) {
  outputStream.pipe(PrettyTransform.stream(process.stdout, prettyTransform));
} else {
  outputStream.pipe(process.stdout);
}

/** Lower the log level to trace, and let the pretty printer show the trace lines */
export function setVerbose(): void {
  prettyTransform.pretty.level = 10;
  logger.level = 'trace';
}

if (process.argv.includes('--verbose')) setVerbose();
