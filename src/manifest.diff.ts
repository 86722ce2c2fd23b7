import { compareFiles, ContentManifest, ManifestFile } from './manifest';

export class ManifestDiff {
  /** Files only in the new manifest */
  readonly added: readonly ManifestFile[];
  /** Files in both manifests with a different fingerprint, as listed in the new manifest */
  readonly updated: readonly ManifestFile[];
  /** Files only in the old manifest */
  readonly removed: readonly ManifestFile[];

  constructor(added: ManifestFile[], updated: ManifestFile[], removed: ManifestFile[]) {
    this.added = Object.freeze(added.sort(compareFiles));
    this.updated = Object.freeze(updated.sort(compareFiles));
    this.removed = Object.freeze(removed.sort(compareFiles));
  }

  /** Files that need to be downloaded: added and updated */
  get updateFiles(): ManifestFile[] {
    return [...this.added, ...this.updated];
  }

  isEmpty(): boolean {
    return this.added.length === 0 && this.updated.length === 0 && this.removed.length === 0;
  }
}

/**
 * Compare the files of two content manifests.
 *
 * Files are matched by path and compared by fingerprint only.
 *
 * @param oldManifest The installed manifest.
 * @param newManifest The remote manifest.
 */
export function diffManifests(oldManifest: ContentManifest, newManifest: ContentManifest): ManifestDiff {
  const added: ManifestFile[] = [];
  const updated: ManifestFile[] = [];
  const removed: ManifestFile[] = [];

  for (const file of newManifest.files.values()) {
    const existing = oldManifest.files.get(file.path);
    if (existing == null) added.push(file);
    else if (existing.hash !== file.hash) updated.push(file);
  }

  for (const file of oldManifest.files.values()) {
    if (!newManifest.files.has(file.path)) removed.push(file);
  }

  return new ManifestDiff(added, updated, removed);
}
