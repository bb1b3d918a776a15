import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ArchiveFormatError, InvalidIndexFileError, type Logger } from '@index-meta/shared';
import { writeTar } from '../__fixtures__/archive';
import { foldIndex } from './walker';
import type { IndexEntry } from './types';

function describeEntry(entry: IndexEntry): string {
  return `${entry.type.kind}:${entry.path}`;
}

describe('foldIndex', () => {
  let tempDir: string;
  let indexPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'index-meta-walker-test-'));
    indexPath = path.join(tempDir, '01-index.tar');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('folds classified regular files in archive order', async () => {
    await writeTar(indexPath, [
      { path: 'acme/1.0/acme.cabal', content: 'name: acme', mtime: 1_500_000_000, uid: 7 },
      { path: 'acme/', type: 'directory' },
      { path: 'acme/preferred-versions', content: 'acme >=1.0' },
      { path: 'acme-latest', type: 'symlink', linkName: 'acme' },
    ]);

    const seen = await foldIndex<string[]>(indexPath, [], (entry, content, acc) => [
      ...acc,
      `${describeEntry(entry)}:${content.length}`,
    ]);

    expect(seen).toEqual([
      'manifest:acme/1.0/acme.cabal:10',
      'preferred-versions:acme/preferred-versions:10',
    ]);
  });

  it('passes entry metadata to the step', async () => {
    await writeTar(indexPath, [
      {
        path: 'acme/1.0/package.json',
        content: '{}',
        mtime: 1_500_000_000,
        mode: 0o600,
        uid: 7,
        gid: 8,
        userName: 'hackage',
        groupName: 'index',
      },
    ]);

    const entries = await foldIndex<IndexEntry[]>(indexPath, [], async (entry, _content, acc) => [
      ...acc,
      entry,
    ]);

    expect(entries).toHaveLength(1);
    expect(entries[0].time).toBe(1_500_000_000);
    expect(entries[0].permissions).toBe(0o600);
    expect(entries[0].ownership).toEqual({
      uid: 7,
      gid: 8,
      userName: 'hackage',
      groupName: 'index',
    });
  });

  it('aborts on the first file that is not an index file', async () => {
    await writeTar(indexPath, [
      { path: 'acme/1.0/acme.cabal', content: 'a' },
      { path: 'acme/1.0/wrong.cabal', content: 'b' },
      { path: 'acme/2.0/acme.cabal', content: 'c' },
    ]);
    const step = vi.fn((_entry: IndexEntry, _content: Uint8Array, acc: number) => acc + 1);

    const result = foldIndex(indexPath, 0, step);

    await expect(result).rejects.toBeInstanceOf(InvalidIndexFileError);
    await expect(result).rejects.toThrow('Unrecognised index file: ["acme","1.0","wrong.cabal"]');
    expect(step).toHaveBeenCalledTimes(1);
  });

  it('propagates archive format errors', async () => {
    await writeTar(indexPath, [{ path: 'acme/1.0/acme.cabal', content: 'a'.repeat(600) }]);
    fs.truncateSync(indexPath, 700);

    await expect(foldIndex(indexPath, 0, (_entry, _content, acc) => acc)).rejects.toBeInstanceOf(
      ArchiveFormatError,
    );
  });

  it('propagates errors thrown by the step', async () => {
    await writeTar(indexPath, [{ path: 'acme/1.0/acme.cabal', content: 'a' }]);

    await expect(
      foldIndex(indexPath, 0, () => {
        throw new Error('step failed');
      }),
    ).rejects.toThrow('step failed');
  });

  it('logs progress at the configured interval', async () => {
    await writeTar(indexPath, [
      { path: 'a/1/a.cabal', content: 'a' },
      { path: 'b/1/b.cabal', content: 'b' },
    ]);
    const debug = vi.fn();
    const logger: Logger = {
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => logger,
    };

    await foldIndex(indexPath, 0, (_entry, _content, acc) => acc, { logger, progressInterval: 1 });

    expect(debug.mock.calls.map(([message]) => message)).toEqual([
      `Reading index archive ${indexPath}`,
      'Folded 1 index files',
      'Folded 2 index files',
      `Folded 2 index files from ${indexPath}`,
    ]);
  });
});
