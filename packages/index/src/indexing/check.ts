import { err, InvalidHashError, ok, type Result } from '@index-meta/shared';
import { type IndexMetadata, sortedPackageNames, sortedReleases } from './types';

/**
 * Verifies that every release has both a manifest and a tarball hash. Reports
 * the first failure in package then version order, manifest before tarball.
 */
export function checkMetadata(metadata: IndexMetadata): Result<IndexMetadata, InvalidHashError> {
  for (const packageName of sortedPackageNames(metadata)) {
    const info = metadata.get(packageName);
    if (!info) continue;
    for (const { version, release } of sortedReleases(info)) {
      if (!release.manifestHash.isValid()) {
        return err(new InvalidHashError(packageName, version.toString(), 'cabal'));
      }
      if (!release.tarballHash.isValid()) {
        return err(new InvalidHashError(packageName, version.toString(), 'tarball'));
      }
    }
  }
  return ok(metadata);
}
