import * as fs from 'fs';
import { join } from 'path';

export interface PackageVersion {
  /** Git commit the package was built from, if the package is running from a checkout */
  hash: string | null;
  /** `version` from package.json */
  version: string | null;
}

const PackageRoot = join(__dirname, '..');

function readGitHash(): string | null {
  const headPath = join(PackageRoot, '.git', 'HEAD');
  if (!fs.existsSync(headPath)) return null;
  const head = fs.readFileSync(headPath).toString().trim();
  if (!head.startsWith('ref:')) return head;

  const refPath = join(PackageRoot, '.git', head.slice('ref:'.length).trim());
  if (!fs.existsSync(refPath)) return null;
  return fs.readFileSync(refPath).toString().trim();
}

function readPackageVersion(): string | null {
  const pkgPath = join(PackageRoot, 'package.json');
  if (!fs.existsSync(pkgPath)) return null;
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath).toString());
  if (typeof pkg !== 'object' || pkg == null || !('version' in pkg)) return null;
  return typeof pkg.version === 'string' ? pkg.version : null;
}

let _version: PackageVersion | null = null;
export function getVersion(): PackageVersion {
  if (_version == null) _version = { hash: readGitHash(), version: readPackageVersion() };
  return _version;
}
