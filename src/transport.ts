import { fsa } from '@linzjs/s3fs';
import axios, { AxiosInstance } from 'axios';
import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { ErrorList } from './error.list';
import { isHttpUrl } from './url';

/** Moves bytes from a url into memory or onto local disk */
export interface Transport {
  fetch(url: string): Promise<Buffer>;
  /** Download `url` into `destPath`, creating any missing parent folders */
  fetchFile(url: string, destPath: string): Promise<void>;
}

export const BackOff = {
  /** Number of attempts per request */
  count: 3,
  /** Back off time in ms, multiplied by the number of failed attempts */
  time: 500,
};

/** Default timeout for a single http request */
export const HttpTimeoutMs = 60_000;

async function retry<T>(name: string, cb: () => Promise<T>): Promise<T> {
  const errors: Error[] = [];
  while (errors.length < BackOff.count) {
    try {
      return await cb();
    } catch (e) {
      errors.push(ErrorList.toError(e));
      if (errors.length >= BackOff.count) break;
      await new Promise((resolve) => setTimeout(resolve, BackOff.time * errors.length));
    }
  }
  throw new ErrorList(name + ':RetriesFailed', errors);
}

export type HttpClient = Pick<AxiosInstance, 'get'>;

export class HttpTransport implements Transport {
  readonly client: HttpClient;

  constructor(opts: { timeoutMs?: number; headers?: Record<string, string>; client?: HttpClient } = {}) {
    this.client = opts.client ?? axios.create({ timeout: opts.timeoutMs ?? HttpTimeoutMs, headers: opts.headers });
  }

  fetch(url: string): Promise<Buffer> {
    return retry('Fetch', async () => {
      const res = await this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      return Buffer.from(res.data);
    });
  }

  fetchFile(url: string, destPath: string): Promise<void> {
    return retry('FetchFile', async () => {
      await fs.mkdir(path.dirname(destPath), { recursive: true });
      const res = await this.client.get<Readable>(url, { responseType: 'stream' }).catch((err: unknown) => {
        // Error responses still carry an open body stream
        if (axios.isAxiosError(err) && err.response?.data instanceof Readable) err.response.data.destroy();
        throw err;
      });
      await pipeline(res.data, createWriteStream(destPath));
    });
  }
}

/** Reads `s3://` and local paths through the registered file systems */
export class FsaTransport implements Transport {
  fetch(url: string): Promise<Buffer> {
    return fsa.read(url);
  }

  async fetchFile(url: string, destPath: string): Promise<void> {
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await pipeline(fsa.readStream(url), createWriteStream(destPath));
  }
}

/** Send http(s) urls to one transport and everything else to another */
export class TransportRouter implements Transport {
  readonly http: Transport;
  readonly other: Transport;

  constructor(http: Transport, other: Transport) {
    this.http = http;
    this.other = other;
  }

  private get(url: string): Transport {
    return isHttpUrl(url) ? this.http : this.other;
  }

  fetch(url: string): Promise<Buffer> {
    return this.get(url).fetch(url);
  }

  fetchFile(url: string, destPath: string): Promise<void> {
    return this.get(url).fetchFile(url, destPath);
  }
}

export function createTransport(opts: { timeoutMs?: number; headers?: Record<string, string> } = {}): Transport {
  return new TransportRouter(new HttpTransport(opts), new FsaTransport());
}
