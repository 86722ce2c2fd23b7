import { normalizePath } from './manifest';

export function isHttpUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}

/**
 * Join a relative file path onto a base url
 *
 * Http(s) urls have each path segment percent encoded, `s3://` and local paths are joined as is.
 */
export function joinUrl(base: string, filePath: string): string {
  let file = normalizePath(filePath);
  if (isHttpUrl(base)) file = file.split('/').map(encodeURIComponent).join('/');
  if (base.endsWith('/')) return base + file;
  return base + '/' + file;
}
