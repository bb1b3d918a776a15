/**
 * Error codes used throughout index-meta.
 * Configuration errors are user-correctable; the rest describe a bad
 * index archive, a broken cache, or an inconsistent metadata snapshot.
 */
export type ErrorCode =
  // User-correctable errors
  | 'ConfigError'
  | 'RepositoryError'
  // Index and metadata errors
  | 'IndexFileError'
  | 'ArchiveError'
  | 'MetadataParseError'
  | 'HashError'
  // Cache errors (degraded to a rebuild by the cache manager)
  | 'CacheError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all index-meta errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ArchiveError', 'Header checksum mismatch', {
 *   details: { offset: 1024 },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when no index archive is configured for a repository.
 */
export class NoRepositoryConfiguredError extends AppError {
  public readonly repositoryId: string;

  constructor(repositoryId: string, options: AppErrorOptions = {}) {
    super('RepositoryError', `No index configured for repository "${repositoryId}"`, options);
    this.repositoryId = repositoryId;
  }
}

/**
 * Error thrown when an archive entry is not a manifest, `package.json`
 * or `preferred-versions` file.
 */
export class InvalidIndexFileError extends AppError {
  /** Path segments of the offending entry */
  public readonly segments: string[];

  constructor(segments: string[], options: AppErrorOptions = {}) {
    super('IndexFileError', `Unrecognised index file: ${JSON.stringify(segments)}`, options);
    this.segments = segments;
  }
}

/**
 * Error thrown when the index archive is corrupt or truncated.
 */
export class ArchiveFormatError extends AppError {
  /** Byte offset of the header being read when the error occurred */
  public readonly offset?: number;

  constructor(message: string, options: AppErrorOptions & { offset?: number } = {}) {
    super(
      'ArchiveError',
      options.offset === undefined ? message : `${message} at offset ${options.offset}`,
      options,
    );
    this.offset = options.offset;
  }
}

/**
 * Base class for index entries whose content cannot be parsed.
 * Carries the archive path of the offending entry.
 */
export class MetadataParseError extends AppError {
  public readonly entryPath: string;

  constructor(entryPath: string, message: string, options: AppErrorOptions = {}) {
    super('MetadataParseError', `${entryPath}: ${message}`, options);
    this.entryPath = entryPath;
  }
}

/**
 * Error thrown for a malformed signed-targets (`package.json`) document.
 */
export class ManifestJsonError extends MetadataParseError {}

/**
 * Error thrown for malformed `preferred-versions` content.
 */
export class RangeParseError extends MetadataParseError {}

/**
 * Error thrown when hash text cannot be decoded into a hash of the expected length.
 */
export class InvalidHashTextError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('HashError', message, options);
  }
}

export type HashKind = 'cabal' | 'tarball';

/**
 * Error thrown when the consistency check finds a release without a known hash.
 */
export class InvalidHashError extends AppError {
  public readonly packageName: string;
  public readonly version: string;
  public readonly kind: HashKind;

  constructor(packageName: string, version: string, kind: HashKind, options: AppErrorOptions = {}) {
    super('HashError', `Invalid ${kind} hash for ${packageName}-${version}`, options);
    this.packageName = packageName;
    this.version = version;
    this.kind = kind;
  }
}

/**
 * Error thrown when a persisted cache cannot be decoded.
 * The cache manager treats it as a cache miss.
 */
export class CacheDecodeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CacheError', message, options);
  }
}
