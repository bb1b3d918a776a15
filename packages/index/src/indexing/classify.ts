import { err, InvalidIndexFileError, ok, type Result } from '@index-meta/shared';
import { isPackageName, Version } from '../package';
import type { IndexFileType } from './types';

/**
 * Maps an archive path to the index file it represents:
 * `pkg/ver/pkg.cabal`, `pkg/ver/package.json` or `pkg/preferred-versions`.
 */
export function classify(path: string): Result<IndexFileType, InvalidIndexFileError> {
  const segments = path.split('/');

  if (segments.length === 3) {
    const [packageName, versionText, fileName] = segments;
    const version = Version.parse(versionText);
    if (isPackageName(packageName) && version) {
      if (fileName === `${packageName}.cabal`) {
        return ok({ kind: 'manifest', packageName, version });
      }
      if (fileName === 'package.json') {
        return ok({ kind: 'signed-targets', packageName, version });
      }
    }
  }

  if (segments.length === 2) {
    const [packageName, fileName] = segments;
    if (isPackageName(packageName) && fileName === 'preferred-versions') {
      return ok({ kind: 'preferred-versions', packageName });
    }
  }

  return err(new InvalidIndexFileError(segments));
}
