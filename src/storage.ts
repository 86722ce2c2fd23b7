import { fsa } from '@linzjs/s3fs';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ApplicationConfig, ApplicationConfigFileName, readApplicationConfig, serializeApplicationConfig } from './config';
import { LogType } from './log';
import { ContentManifest, ManifestFileName, readContentManifest, serializeContentManifest } from './manifest';

/** Documents are written here first and renamed over the real file once complete */
const BackupExtension = '.1';

export interface DocumentStorage<T> {
  /** Read the document from a folder, null if it is missing or unreadable */
  load(folder: string): Promise<T | null>;
  store(doc: T, folder: string): Promise<void>;
}

export class JsonDocumentStorage<T> implements DocumentStorage<T> {
  readonly fileName: string;
  private readonly read: (buf: Buffer) => T;
  private readonly serialize: (doc: T) => string;
  private readonly logger: LogType;

  constructor(
    fileName: string,
    codec: { read: (buf: Buffer) => T; serialize: (doc: T) => string },
    logger: LogType,
  ) {
    this.fileName = fileName;
    this.read = codec.read;
    this.serialize = codec.serialize;
    this.logger = logger;
  }

  async load(folder: string): Promise<T | null> {
    const filePath = fsa.join(folder, this.fileName);
    // Fall back to a backup left over from an interrupted write
    for (const candidate of [filePath, filePath + BackupExtension]) {
      if (!(await fsa.exists(candidate))) continue;
      try {
        return this.read(await fsa.read(candidate));
      } catch (err) {
        this.logger.warn({ path: candidate, err }, 'Document:Load:Failed');
      }
    }
    return null;
  }

  async store(doc: T, folder: string): Promise<void> {
    const filePath = path.join(folder, this.fileName);
    await fs.mkdir(folder, { recursive: true });
    await fs.writeFile(filePath + BackupExtension, this.serialize(doc));
    await fs.rename(filePath + BackupExtension, filePath);
    this.logger.debug({ path: filePath }, 'Document:Stored');
  }
}

export function applicationConfigStorage(logger: LogType): JsonDocumentStorage<ApplicationConfig> {
  return new JsonDocumentStorage(
    ApplicationConfigFileName,
    { read: readApplicationConfig, serialize: serializeApplicationConfig },
    logger,
  );
}

export function contentManifestStorage(logger: LogType): JsonDocumentStorage<ContentManifest> {
  return new JsonDocumentStorage(
    ManifestFileName,
    { read: readContentManifest, serialize: serializeContentManifest },
    logger,
  );
}
