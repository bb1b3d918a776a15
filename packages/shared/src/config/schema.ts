import { z } from 'zod';

export const DEFAULT_REPOSITORY_ID = 'hackage.haskell.org';

export const RepositoryConfigSchema = z.object({
  /** Explicit location of the repository's index archive. */
  indexPath: z.string().min(1).optional(),
});

export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Directory holding one `<repository>/01-index.tar` per configured repository. */
  repositoryCache: z.string().min(1),
  /** Overrides the metadata cache directory. */
  cacheDir: z.string().min(1).optional(),
  locking: z.enum(['file', 'none']).default('file'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  repositories: z
    .record(z.string(), RepositoryConfigSchema)
    .default({ [DEFAULT_REPOSITORY_ID]: {} }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
