import { promises as fs } from 'fs';
import path from 'node:path';
import {
  atomicWrite,
  ensureDir,
  logger as defaultLogger,
  unwrap,
  type Logger,
} from '@index-meta/shared';
import { indexMetadata, type IndexMetadataOptions } from '../indexing/accumulator';
import { checkMetadata } from '../indexing/check';
import type { IndexMetadata } from '../indexing/types';
import { type CacheRecord, decodeCache, encodeCache } from './codec';
import { FileLocker, type Locker } from './locker';

export const CACHE_FILENAME = 'hackage.binary';

export type MetadataBuilder = (
  indexPath: string,
  options: IndexMetadataOptions,
) => Promise<IndexMetadata>;

export interface MetadataCacheOptions {
  locker?: Locker;
  /** Builds metadata on a cache miss; defaults to {@link indexMetadata}. */
  builder?: MetadataBuilder;
  logger?: Logger;
}

/** Size and modification time the cache is keyed on. */
export interface SourceStat {
  size: number;
  time: number;
}

export async function statSource(indexPath: string): Promise<SourceStat> {
  const stat = await fs.stat(indexPath);
  return { size: stat.size, time: Math.floor(stat.mtimeMs / 1000) };
}

/**
 * Release metadata of an index archive, persisted in `cacheDir` and rebuilt
 * whenever the archive's size or modification time changes.
 */
export class MetadataCache {
  readonly cacheFile: string;
  private readonly locker: Locker;
  private readonly builder: MetadataBuilder;
  private readonly logger: Logger;

  constructor(
    readonly cacheDir: string,
    options: MetadataCacheOptions = {},
  ) {
    this.cacheFile = path.join(cacheDir, CACHE_FILENAME);
    this.logger = (options.logger ?? defaultLogger).child({ cacheDir });
    this.locker = options.locker ?? new FileLocker({ logger: this.logger });
    this.builder = options.builder ?? indexMetadata;
  }

  /**
   * Returns the metadata of the archive at `indexPath`, from the cache when it
   * matches the archive, otherwise rebuilding and persisting it. Holds the
   * cache directory lock throughout.
   */
  async getMetadata(indexPath: string): Promise<IndexMetadata> {
    await ensureDir(this.cacheDir);
    const release = await this.locker.acquire(this.cacheDir);
    try {
      const source = await statSource(indexPath);
      const cached = await this.readCache();
      if (cached && cached.size === source.size && cached.time === source.time) {
        this.logger.debug(`Cache hit for ${indexPath}`);
        return cached.metadata;
      }

      this.logger.info(`Rebuilding index metadata from ${indexPath}`);
      const metadata = unwrap(
        checkMetadata(await this.builder(indexPath, { logger: this.logger })),
      );
      await atomicWrite(this.cacheFile, encodeCache({ ...source, metadata }));
      this.logger.debug(`Wrote ${metadata.size} packages to ${this.cacheFile}`);
      return metadata;
    } finally {
      await release();
    }
  }

  /** A decoded cache file, or undefined when there is none usable. */
  private async readCache(): Promise<CacheRecord | undefined> {
    let bytes: Uint8Array;
    try {
      bytes = await fs.readFile(this.cacheFile);
    } catch (error) {
      this.logger.debug(
        `Cache file unreadable: ${error instanceof Error ? error.message : String(error)}`,
      );
      return undefined;
    }
    const decoded = decodeCache(bytes);
    if (!decoded.ok) {
      this.logger.debug(`Discarding cache file: ${decoded.error.message}`);
      return undefined;
    }
    return decoded.value;
  }
}
