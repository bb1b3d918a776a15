import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  InvalidHashError,
  ManifestJsonError,
  RangeParseError,
} from '@index-meta/shared';
import { signedTargetsJson, writeTar, type FixtureEntry } from '../__fixtures__/archive';
import { encodeCache } from '../cache/codec';
import { SHA256 } from '../hash';
import { prettyRange } from '../package';
import { accumulateIndex, applyIndexEntry, indexMetadata } from './accumulator';
import { classify } from './classify';
import { type IndexEntry, type IndexMetadata, preferredVersions } from './types';
import type { IndexFold } from './walker';

const encoder = new TextEncoder();
const TARBALL_SHA = 'ab'.repeat(32);
const OTHER_TARBALL_SHA = 'ef'.repeat(32);
const MD5_HEX = 'cd'.repeat(16);

function entryFor(entryPath: string, time = 1_600_000_000): IndexEntry {
  const type = classify(entryPath);
  if (!type.ok) throw type.error;
  return {
    path: entryPath,
    type: type.value,
    time,
    permissions: 0o644,
    ownership: { uid: 0, gid: 0, userName: '', groupName: '' },
  };
}

function apply(metadata: IndexMetadata, entryPath: string, content: string): IndexMetadata {
  return applyIndexEntry(metadata, entryFor(entryPath), encoder.encode(content));
}

function describeRelease(metadata: IndexMetadata, packageName: string, version: string) {
  const release = metadata.get(packageName)?.versions.get(version)?.release;
  return release && {
    revision: release.revision,
    manifest: release.manifestHash.isValid() ? release.manifestHash.toHex() : 'empty',
    tarball: release.tarballHash.isValid() ? release.tarballHash.toHex() : 'empty',
  };
}

function digestHex(content: string): string {
  return SHA256.digest(encoder.encode(content)).toHex();
}

const targets = (name: string, version: string, sha256 = TARBALL_SHA) =>
  signedTargetsJson(name, version, { sha256, md5: MD5_HEX });

describe('applyIndexEntry', () => {
  it('records the first manifest at revision 0 without a tarball hash', () => {
    const metadata = apply(new Map(), 'acme/1.0/acme.cabal', 'name: acme\n');

    expect(describeRelease(metadata, 'acme', '1.0')).toEqual({
      revision: 0,
      manifest: digestHex('name: acme\n'),
      tarball: 'empty',
    });
    expect(prettyRange(metadata.get('acme')?.preferred ?? { kind: 'none' })).toBe('-any');
  });

  it('gives the same release whichever source comes first', () => {
    const manifestFirst = apply(
      apply(new Map(), 'acme/1.0/acme.cabal', 'name: acme\n'),
      'acme/1.0/package.json',
      targets('acme', '1.0'),
    );
    const targetsFirst = apply(
      apply(new Map(), 'acme/1.0/package.json', targets('acme', '1.0')),
      'acme/1.0/acme.cabal',
      'name: acme\n',
    );

    const expected = { revision: 0, manifest: digestHex('name: acme\n'), tarball: TARBALL_SHA };
    expect(describeRelease(manifestFirst, 'acme', '1.0')).toEqual(expected);
    expect(describeRelease(targetsFirst, 'acme', '1.0')).toEqual(expected);
  });

  it('counts each later manifest as a revision', () => {
    let metadata: IndexMetadata = new Map();
    metadata = apply(metadata, 'acme/1.0/acme.cabal', 'revision 0');
    metadata = apply(metadata, 'acme/1.0/package.json', targets('acme', '1.0'));
    metadata = apply(metadata, 'acme/1.0/acme.cabal', 'revision 1');
    metadata = apply(metadata, 'acme/1.0/acme.cabal', 'revision 2');

    expect(describeRelease(metadata, 'acme', '1.0')).toEqual({
      revision: 2,
      manifest: digestHex('revision 2'),
      tarball: TARBALL_SHA,
    });
  });

  // Known edge: a manifest after a tarball-only record fills the placeholder
  // instead of counting a revision, whatever the archive order implies.
  it('fills a tarball-only placeholder without counting a revision', () => {
    let metadata: IndexMetadata = new Map();
    metadata = apply(metadata, 'acme/1.0/package.json', targets('acme', '1.0'));
    metadata = apply(metadata, 'acme/1.0/acme.cabal', 'revision 0');
    metadata = apply(metadata, 'acme/1.0/acme.cabal', 'revision 1');

    expect(describeRelease(metadata, 'acme', '1.0')?.revision).toBe(1);
  });

  it('overwrites only the tarball hash on later signed targets', () => {
    let metadata: IndexMetadata = new Map();
    metadata = apply(metadata, 'acme/1.0/acme.cabal', 'r0');
    metadata = apply(metadata, 'acme/1.0/acme.cabal', 'r1');
    metadata = apply(metadata, 'acme/1.0/package.json', targets('acme', '1.0'));
    metadata = apply(metadata, 'acme/1.0/package.json', targets('acme', '1.0', OTHER_TARBALL_SHA));

    expect(describeRelease(metadata, 'acme', '1.0')).toEqual({
      revision: 1,
      manifest: digestHex('r1'),
      tarball: OTHER_TARBALL_SHA,
    });
  });

  it('sets the preferred range, creating the package when needed', () => {
    let metadata: IndexMetadata = new Map();
    metadata = apply(metadata, 'acme/preferred-versions', 'acme <2 || ==2.1.*\n');

    const info = metadata.get('acme');
    expect(info?.versions.size).toBe(0);
    expect(info && prettyRange(info.preferred)).toBe('<2 || ==2.1.*');

    for (const version of ['1.0', '2.0', '2.1.3']) {
      metadata = apply(metadata, `acme/${version}/acme.cabal`, version);
    }
    const preferred = metadata.get('acme');
    expect(preferred && [...preferredVersions(preferred).keys()]).toEqual(['1.0', '2.1.3']);
  });

  it('ignores empty preferred-versions content', () => {
    const metadata = apply(new Map(), 'acme/preferred-versions', '');
    expect(metadata.size).toBe(0);
  });

  it('rejects unreadable signed targets with the entry path', () => {
    const badType = signedTargetsJson('acme', '1.0', { sha256: TARBALL_SHA, md5: MD5_HEX }, {
      _type: 'Snapshot',
    });

    expect(() => apply(new Map(), 'acme/1.0/package.json', badType)).toThrow(ManifestJsonError);
    expect(() => apply(new Map(), 'acme/1.0/package.json', badType)).toThrow(
      'acme/1.0/package.json: signed._type: Invalid literal value, expected "Targets"',
    );
  });

  it('rejects signed targets that do not list the release tarball', () => {
    expect(() => apply(new Map(), 'acme/1.0/package.json', targets('acme', '1.1'))).toThrow(
      'acme/1.0/package.json: Missing target "<repo>/package/acme-1.0.tar.gz"; ' +
        'present: ["<repo>/package/acme-1.1.tar.gz"]',
    );
  });

  it('rejects preferred versions for another package', () => {
    const attempt = () => apply(new Map(), 'acme/preferred-versions', 'other >=1');
    expect(attempt).toThrow(RangeParseError);
    expect(attempt).toThrow('acme/preferred-versions: expected "acme" at column 1');
  });
});

describe('indexMetadata', () => {
  let tempDir: string;
  let indexPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'index-meta-accumulator-test-'));
    indexPath = path.join(tempDir, '01-index.tar');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const archive: FixtureEntry[] = [
    { path: 'acme/1.0/acme.cabal', content: 'acme 1.0 r0', mtime: 1_000 },
    { path: 'acme/1.0/package.json', content: targets('acme', '1.0'), mtime: 1_000 },
    { path: 'acme/1.0/acme.cabal', content: 'acme 1.0 r1', mtime: 2_000 },
    { path: 'acme/2.0/acme.cabal', content: 'acme 2.0', mtime: 3_000 },
    { path: 'acme/2.0/package.json', content: targets('acme', '2.0'), mtime: 3_000 },
    { path: 'acme/preferred-versions', content: 'acme <2', mtime: 3_000 },
  ];

  it('reads every release of the archive', async () => {
    await writeTar(indexPath, archive);

    const metadata = await indexMetadata(indexPath);

    expect([...(metadata.get('acme')?.versions.keys() ?? [])]).toEqual(['1.0', '2.0']);
    expect(describeRelease(metadata, 'acme', '1.0')).toEqual({
      revision: 1,
      manifest: digestHex('acme 1.0 r1'),
      tarball: TARBALL_SHA,
    });
  });

  it('reproduces an earlier index state with a cutoff', async () => {
    await writeTar(indexPath, archive);

    const metadata = await indexMetadata(indexPath, { cutoff: 1_500 });

    expect([...(metadata.get('acme')?.versions.keys() ?? [])]).toEqual(['1.0']);
    expect(describeRelease(metadata, 'acme', '1.0')?.revision).toBe(0);
    expect(metadata.get('acme')?.preferred).toEqual({ kind: 'any' });
  });

  it('yields byte-identical results across runs', async () => {
    await writeTar(indexPath, archive);

    const first = await indexMetadata(indexPath);
    const second = await indexMetadata(indexPath);

    expect(encodeCache({ size: 1, time: 2, metadata: second })).toEqual(
      encodeCache({ size: 1, time: 2, metadata: first }),
    );
  });

  it('fails when a release has no signed targets', async () => {
    await writeTar(indexPath, [
      ...archive,
      { path: 'zeta/0.1/zeta.cabal', content: 'zeta', mtime: 4_000 },
    ]);

    const result = indexMetadata(indexPath);
    await expect(result).rejects.toBeInstanceOf(InvalidHashError);
    await expect(result).rejects.toThrow('Invalid tarball hash for zeta-0.1');
  });

  it('checks consistency even with a cutoff', async () => {
    await writeTar(indexPath, [
      { path: 'acme/1.0/acme.cabal', content: 'acme', mtime: 1_000 },
      { path: 'acme/1.0/package.json', content: targets('acme', '1.0'), mtime: 2_000 },
    ]);

    await expect(indexMetadata(indexPath, { cutoff: 1_500 })).rejects.toThrow(
      'Invalid tarball hash for acme-1.0',
    );
    const partial = await accumulateIndex(indexPath, { cutoff: 1_500 });
    expect(describeRelease(partial, 'acme', '1.0')?.tarball).toBe('empty');
  });

  it('drives an injected walker', async () => {
    const walker = vi.fn<IndexFold>(async (_path, initial, step) =>
      step(entryFor('acme/preferred-versions'), encoder.encode('acme ==1.0'), initial),
    );

    const metadata = await indexMetadata('/nonexistent/01-index.tar', { walker });

    expect(walker).toHaveBeenCalledWith(
      '/nonexistent/01-index.tar',
      expect.any(Map),
      expect.any(Function),
      { logger: undefined },
    );
    expect(metadata.get('acme')?.preferred).toEqual({
      kind: 'this',
      version: expect.objectContaining({ components: [1, 0] }),
    });
  });
});
