import { createHash } from 'crypto';
import { Readable } from 'stream';

const HashAlgorithm = 'sha256';

/** Format a digest as used by content manifests: `sha256-<base64>` */
function formatDigest(digest: string): string {
  return `${HashAlgorithm}-${digest}`;
}

export function hashBuffer(buf: Buffer): string {
  return formatDigest(createHash(HashAlgorithm).update(buf).digest('base64'));
}

export async function hashFile(stream: Readable): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(HashAlgorithm);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(formatDigest(hash.digest('base64'))));
    stream.on('error', (err) => reject(err));
  });
}
