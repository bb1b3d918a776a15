import type { SHA256 } from '../hash';
import { type Version, type VersionRange, withinRange } from '../package';

/** Index file kinds, derived from an entry's path. */
export type IndexFileType =
  | { kind: 'manifest'; packageName: string; version: Version }
  | { kind: 'signed-targets'; packageName: string; version: Version }
  | { kind: 'preferred-versions'; packageName: string };

export interface Ownership {
  uid: number;
  gid: number;
  userName: string;
  groupName: string;
}

/** One regular file of the index archive, classified. */
export interface IndexEntry {
  path: string;
  type: IndexFileType;
  /** Modification time, POSIX seconds. */
  time: number;
  permissions: number;
  ownership: Ownership;
}

export interface ReleaseInfo {
  /** Number of manifest revisions seen after the first. */
  readonly revision: number;
  /** Hash of the latest manifest revision. */
  readonly manifestHash: SHA256;
  /** Hash of the release tarball, from the signed targets. */
  readonly tarballHash: SHA256;
}

export interface VersionedRelease {
  readonly version: Version;
  readonly release: ReleaseInfo;
}

export interface PackageInfo {
  /** Keyed by canonical version text. */
  versions: Map<string, VersionedRelease>;
  preferred: VersionRange;
}

/** Keyed by package name. */
export type IndexMetadata = Map<string, PackageInfo>;

/** Releases of a package that fall within its preferred range. */
export function preferredVersions(info: PackageInfo): Map<string, VersionedRelease> {
  return new Map(
    [...info.versions].filter(([, entry]) => withinRange(entry.version, info.preferred)),
  );
}

/** Package names in code-unit order. */
export function sortedPackageNames(metadata: IndexMetadata): string[] {
  return [...metadata.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/** Releases of a package in version order. */
export function sortedReleases(info: PackageInfo): VersionedRelease[] {
  return [...info.versions.values()].sort((a, b) => a.version.compareTo(b.version));
}
