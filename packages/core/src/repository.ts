import path from 'path';
import {
  cacheHome,
  type CacheHomeOptions,
  type Config,
  ConsoleLogger,
  DEFAULT_REPOSITORY_ID,
  type Logger,
  NoRepositoryConfiguredError,
} from '@index-meta/shared';
import {
  createLocker,
  type IndexMetadata,
  type Locker,
  type MetadataBuilder,
  MetadataCache,
} from '@index-meta/index';
import { ConfigLoader, type ConfigOptions } from './config/loader';

export const INDEX_FILENAME = '01-index.tar';
export const CACHE_DIRNAME = 'cabal-parsers';

/**
 * Location of a repository's index archive: its configured `indexPath`, or
 * `01-index.tar` under the repository cache. Undefined for unknown repositories.
 */
export function resolveIndexPath(
  config: Config,
  repositoryId: string = DEFAULT_REPOSITORY_ID,
): string | undefined {
  if (!Object.prototype.hasOwnProperty.call(config.repositories, repositoryId)) {
    return undefined;
  }
  const repository = config.repositories[repositoryId];
  return repository.indexPath ?? path.join(config.repositoryCache, repositoryId, INDEX_FILENAME);
}

export function resolveCacheDir(config: Config, options: CacheHomeOptions = {}): string {
  return config.cacheDir ?? path.join(cacheHome(options), CACHE_DIRNAME);
}

export interface RepositoryMetadataOptions extends ConfigOptions {
  repositoryId?: string;
  /** Use this configuration instead of loading one. */
  config?: Config;
  logger?: Logger;
  locker?: Locker;
  builder?: MetadataBuilder;
}

/**
 * Release metadata of a configured repository, served from the on-disk cache
 * when the index archive has not changed since it was written.
 *
 * @throws NoRepositoryConfiguredError if the repository has no index archive.
 */
export async function cachedRepositoryMetadata(
  options: RepositoryMetadataOptions = {},
): Promise<IndexMetadata> {
  const config = options.config ?? ConfigLoader.load(options);
  const repositoryId = options.repositoryId ?? DEFAULT_REPOSITORY_ID;
  const logger = (options.logger ?? new ConsoleLogger({ level: config.logLevel })).child({
    repository: repositoryId,
  });

  const indexPath = resolveIndexPath(config, repositoryId);
  if (!indexPath) {
    throw new NoRepositoryConfiguredError(repositoryId);
  }
  const cacheDir = resolveCacheDir(config, { env: options.env });
  logger.debug(`Using index ${indexPath} with cache ${cacheDir}`);

  const cache = new MetadataCache(cacheDir, {
    locker: options.locker ?? createLocker(config.locking, logger),
    builder: options.builder,
    logger,
  });
  return cache.getMetadata(indexPath);
}
