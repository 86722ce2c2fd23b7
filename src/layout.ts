import * as path from 'path';
import { ApplicationConfigFileName } from './config';
import { FileSystem } from './fs';
import { ManifestFileName } from './manifest';

const InstalledFolderName = 'www';
const StagingFolderName = 'update';
const TempFolderName = '.tmp';

const ReleaseVersionRegex = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface InstalledPaths {
  /** Folder holding the serving release's documents and content */
  folder: string;
  configPath: string;
  manifestPath: string;
  contentRoot: string;
}

export function assertReleaseVersion(version: string): void {
  if (!ReleaseVersionRegex.test(version) || version === '.' || version === '..') {
    throw new Error(`Release version "${version}" cannot be used as a folder name`);
  }
}

/**
 * Folders used by one update run
 *
 * ```
 * <root>/<release>/www     installed release
 * <root>/<release>/update  staged download of <release>
 * <root>/<release>/.tmp    partial downloads of <release>
 * ```
 */
export class ReleaseFileLayout {
  readonly rootFolder: string;
  readonly installedRelease: string;
  readonly fs: FileSystem;
  private stagedRelease: string;

  constructor(rootFolder: string, installedRelease: string, fs: FileSystem) {
    assertReleaseVersion(installedRelease);
    this.rootFolder = rootFolder;
    this.installedRelease = installedRelease;
    this.stagedRelease = installedRelease;
    this.fs = fs;
  }

  resolveInstalledPaths(): InstalledPaths {
    const contentRoot = path.join(this.rootFolder, this.installedRelease);
    const folder = path.join(contentRoot, InstalledFolderName);
    return {
      folder,
      configPath: path.join(folder, ApplicationConfigFileName),
      manifestPath: path.join(folder, ManifestFileName),
      contentRoot,
    };
  }

  /** Point the staging folders at a new release, no folders are touched */
  switchToRelease(version: string): void {
    assertReleaseVersion(version);
    this.stagedRelease = version;
  }

  get release(): string {
    return this.stagedRelease;
  }

  /** Root of everything stored for the staged release */
  get contentFolder(): string {
    return path.join(this.rootFolder, this.stagedRelease);
  }

  get stagingFolder(): string {
    return path.join(this.contentFolder, StagingFolderName);
  }

  get tempFolder(): string {
    return path.join(this.contentFolder, TempFolderName);
  }

  /** Delete anything at `target` and create it again as an empty folder */
  async recreateFolder(target: string): Promise<void> {
    await this.fs.delete(target);
    await this.fs.ensureDirectoryExists(target);
  }

  /** Remove everything downloaded for the staged release */
  async cleanUp(): Promise<void> {
    if (this.stagedRelease === this.installedRelease) {
      // Never remove the serving release
      await this.fs.delete(this.stagingFolder);
      await this.fs.delete(this.tempFolder);
      return;
    }
    await this.fs.delete(this.contentFolder);
  }
}
