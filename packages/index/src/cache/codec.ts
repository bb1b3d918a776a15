import { CacheDecodeError, err, ok, type Result } from '@index-meta/shared';
import { SHA256 } from '../hash';
import { isPackageName, parseVersionRange, prettyRange, Version } from '../package';
import {
  type IndexMetadata,
  type PackageInfo,
  sortedPackageNames,
  sortedReleases,
} from '../indexing/types';
import { BinaryReader, BinaryWriter } from './binary';

/** Leading int64 of every cache file. Bump to invalidate caches in an older layout. */
export const CACHE_MAGIC = 0xfedcba09n;

export interface CacheRecord {
  /** Size of the index archive, in bytes, when the metadata was built. */
  size: number;
  /** Modification time of the index archive, POSIX seconds. */
  time: number;
  metadata: IndexMetadata;
}

/**
 * Layout, big-endian:
 *
 * ```
 * magic i64, size i64, time i64, package count u32
 *   name str, preferred range str, version count u32
 *     version str, revision u32, manifest hash bytes, tarball hash bytes
 * ```
 *
 * `str` and `bytes` are a u32 length followed by the payload. Packages are
 * written in name order and versions in version order, so equal metadata
 * encodes to equal bytes.
 */
export function encodeCache(record: CacheRecord): Uint8Array {
  const writer = new BinaryWriter()
    .writeInt64(CACHE_MAGIC)
    .writeInt64(BigInt(record.size))
    .writeInt64(BigInt(record.time))
    .writeUint32(record.metadata.size);

  for (const packageName of sortedPackageNames(record.metadata)) {
    const info = record.metadata.get(packageName);
    if (!info) continue;
    const releases = sortedReleases(info);
    writer
      .writeString(packageName)
      .writeString(prettyRange(info.preferred))
      .writeUint32(releases.length);
    for (const { version, release } of releases) {
      writer
        .writeString(version.toString())
        .writeUint32(release.revision)
        .writeBytes(release.manifestHash.bytes)
        .writeBytes(release.tarballHash.bytes);
    }
  }
  return writer.toBytes();
}

export function decodeCache(bytes: Uint8Array): Result<CacheRecord, CacheDecodeError> {
  try {
    return ok(readCache(new BinaryReader(bytes)));
  } catch (error) {
    if (error instanceof CacheDecodeError) {
      return err(error);
    }
    throw error;
  }
}

function readCache(reader: BinaryReader): CacheRecord {
  if (reader.readInt64() !== CACHE_MAGIC) {
    throw new CacheDecodeError('Got wrong magic number');
  }
  const size = readSafeInteger(reader, 'size');
  const time = readSafeInteger(reader, 'time');

  const metadata: IndexMetadata = new Map();
  const packageCount = reader.readUint32();
  for (let i = 0; i < packageCount; i++) {
    const packageName = reader.readString();
    if (!isPackageName(packageName)) {
      throw new CacheDecodeError(`Invalid package name ${JSON.stringify(packageName)}`);
    }
    metadata.set(packageName, readPackage(reader, packageName));
  }

  if (reader.remaining > 0) {
    throw new CacheDecodeError(`Unexpected ${reader.remaining} trailing bytes`);
  }
  return { size, time, metadata };
}

function readPackage(reader: BinaryReader, packageName: string): PackageInfo {
  const preferred = parseVersionRange(reader.readString());
  if (!preferred.ok) {
    throw new CacheDecodeError(`Invalid preferred range for ${packageName}: ${preferred.message}`);
  }
  const info: PackageInfo = { versions: new Map(), preferred: preferred.value };

  const versionCount = reader.readUint32();
  for (let i = 0; i < versionCount; i++) {
    const versionText = reader.readString();
    const version = Version.parse(versionText);
    if (!version) {
      throw new CacheDecodeError(
        `Invalid version ${JSON.stringify(versionText)} for ${packageName}`,
      );
    }
    const revision = reader.readUint32();
    const manifestHash = readHash(reader);
    const tarballHash = readHash(reader);
    info.versions.set(version.toString(), {
      version,
      release: { revision, manifestHash, tarballHash },
    });
  }
  return info;
}

function readHash(reader: BinaryReader): SHA256 {
  const bytes = reader.readBytes();
  if (bytes.length !== SHA256.LENGTH) {
    throw new CacheDecodeError(`Invalid SHA256 length ${bytes.length}`);
  }
  return SHA256.fromBytes(bytes);
}

function readSafeInteger(reader: BinaryReader, field: string): number {
  const value = reader.readInt64();
  if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new CacheDecodeError(`Cache ${field} out of range: ${value}`);
  }
  return Number(value);
}
