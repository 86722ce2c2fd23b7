export * from './config';
export { DocumentParseError } from './document';
export { ErrorList } from './error.list';
export * from './fetcher';
export * from './fs';
export { hashBuffer, hashFile } from './hash';
export * from './layout';
export * from './manifest';
export { buildManifest, validateFolder } from './manifest.build';
export type { ValidateResult } from './manifest.build';
export * from './manifest.diff';
export * from './storage';
export * from './transport';
export * from './update.events';
export * from './update.loader';
export * from './update.worker';
export { joinUrl } from './url';
