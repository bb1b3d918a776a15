import {
  ManifestJsonError,
  RangeParseError,
  unwrap,
  type Logger,
} from '@index-meta/shared';
import { SHA256 } from '../hash';
import { anyVersion, parsePreferredVersions, type Version } from '../package';
import { checkMetadata } from './check';
import { parseSignedTargets, targetFor } from './targets';
import { foldIndex, type IndexFold } from './walker';
import type { IndexEntry, IndexMetadata, PackageInfo, ReleaseInfo } from './types';

const TEXT_DECODER = new TextDecoder('utf-8');

export interface IndexMetadataOptions {
  /** Skip entries newer than this POSIX time, to reproduce an earlier index state. */
  cutoff?: number;
  logger?: Logger;
  /** Archive fold to drive; defaults to {@link foldIndex}. */
  walker?: IndexFold;
}

function packageInfo(metadata: IndexMetadata, packageName: string): PackageInfo {
  let info = metadata.get(packageName);
  if (!info) {
    info = { versions: new Map(), preferred: anyVersion };
    metadata.set(packageName, info);
  }
  return info;
}

function updateRelease(
  info: PackageInfo,
  version: Version,
  update: (existing: ReleaseInfo | undefined) => ReleaseInfo,
): void {
  const key = version.toString();
  info.versions.set(key, { version, release: update(info.versions.get(key)?.release) });
}

/**
 * Merges one index file into `metadata`, in place.
 *
 * A manifest counts as a new revision unless the release so far only has a
 * tarball hash, in which case it fills in the manifest hash at revision 0.
 *
 * @throws ManifestJsonError for an unreadable signed-targets document.
 * @throws RangeParseError for unreadable preferred-versions content.
 */
export function applyIndexEntry(
  metadata: IndexMetadata,
  entry: IndexEntry,
  content: Uint8Array,
): IndexMetadata {
  const type = entry.type;
  switch (type.kind) {
    case 'manifest': {
      const manifestHash = SHA256.digest(content);
      updateRelease(packageInfo(metadata, type.packageName), type.version, (existing) => {
        if (!existing) {
          return { revision: 0, manifestHash, tarballHash: SHA256.empty };
        }
        if (existing.revision === 0 && !existing.manifestHash.isValid()) {
          return { ...existing, manifestHash };
        }
        return { ...existing, revision: existing.revision + 1, manifestHash };
      });
      break;
    }
    case 'signed-targets': {
      const document = parseSignedTargets(TEXT_DECODER.decode(content));
      if (!document.ok) {
        throw new ManifestJsonError(entry.path, document.message);
      }
      const target = targetFor(document.value, type.packageName, type.version);
      if (!target.ok) {
        throw new ManifestJsonError(entry.path, target.message);
      }
      const tarballHash = target.value.hashes.sha256;
      updateRelease(packageInfo(metadata, type.packageName), type.version, (existing) =>
        existing
          ? { ...existing, tarballHash }
          : { revision: 0, manifestHash: SHA256.empty, tarballHash },
      );
      break;
    }
    case 'preferred-versions': {
      if (content.length === 0) {
        break;
      }
      const range = parsePreferredVersions(type.packageName, TEXT_DECODER.decode(content));
      if (!range.ok) {
        throw new RangeParseError(entry.path, range.message);
      }
      packageInfo(metadata, type.packageName).preferred = range.value;
      break;
    }
  }
  return metadata;
}

/**
 * Folds the index archive into release metadata without checking that every
 * release is complete.
 */
export async function accumulateIndex(
  indexPath: string,
  options: IndexMetadataOptions = {},
): Promise<IndexMetadata> {
  const { cutoff, logger } = options;
  const walker: IndexFold = options.walker ?? foldIndex;
  let skipped = 0;

  const metadata = await walker<IndexMetadata>(
    indexPath,
    new Map(),
    (entry, content, acc) => {
      if (cutoff !== undefined && entry.time > cutoff) {
        skipped++;
        return acc;
      }
      return applyIndexEntry(acc, entry, content);
    },
    { logger },
  );

  if (skipped > 0) {
    logger?.debug(`Skipped ${skipped} index files newer than ${cutoff}`);
  }
  return metadata;
}

/**
 * Reads release metadata from the index archive at `indexPath`.
 *
 * @throws InvalidHashError if a release lacks a manifest or tarball hash.
 */
export async function indexMetadata(
  indexPath: string,
  options: IndexMetadataOptions = {},
): Promise<IndexMetadata> {
  const metadata = await accumulateIndex(indexPath, options);
  return unwrap(checkMetadata(metadata));
}
