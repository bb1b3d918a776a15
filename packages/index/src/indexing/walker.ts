import { createReadStream } from 'fs';
import type { Logger } from '@index-meta/shared';
import { readTar } from '../tar/reader';
import { classify } from './classify';
import type { IndexEntry } from './types';

export type FoldStep<A> = (entry: IndexEntry, content: Uint8Array, acc: A) => A | Promise<A>;

export interface FoldOptions {
  logger?: Logger;
  /** Entries between progress lines; 0 disables them. */
  progressInterval?: number;
}

/** Signature shared by {@link foldIndex} and test doubles. */
export type IndexFold = <A>(
  indexPath: string,
  initial: A,
  step: FoldStep<A>,
  options?: FoldOptions,
) => Promise<A>;

/**
 * Folds `step` over every regular file of the index archive at `indexPath`,
 * in archive order. Directories and other entry kinds are skipped.
 *
 * @throws ArchiveFormatError if the archive is corrupt.
 * @throws InvalidIndexFileError on the first file that is not an index file.
 */
export async function foldIndex<A>(
  indexPath: string,
  initial: A,
  step: FoldStep<A>,
  options: FoldOptions = {},
): Promise<A> {
  const { logger } = options;
  const progressInterval = options.progressInterval ?? 100_000;
  let acc = initial;
  let files = 0;

  logger?.debug(`Reading index archive ${indexPath}`);
  for await (const { header, content } of readTar(createReadStream(indexPath))) {
    if (header.type !== 'file') {
      continue;
    }
    const type = classify(header.path);
    if (!type.ok) {
      throw type.error;
    }
    const entry: IndexEntry = {
      path: header.path,
      type: type.value,
      time: header.mtime,
      permissions: header.mode,
      ownership: {
        uid: header.uid,
        gid: header.gid,
        userName: header.userName,
        groupName: header.groupName,
      },
    };
    acc = await step(entry, content, acc);

    files++;
    if (progressInterval > 0 && files % progressInterval === 0) {
      logger?.debug(`Folded ${files} index files`);
    }
  }
  logger?.debug(`Folded ${files} index files from ${indexPath}`);
  return acc;
}
