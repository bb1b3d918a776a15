import { writeFile } from 'node:fs/promises';

const BLOCK_SIZE = 512;
const TEXT_ENCODER = new TextEncoder();

export interface FixtureEntry {
  path: string;
  content?: string | Uint8Array;
  type?: 'file' | 'directory' | 'symlink';
  /** POSIX seconds; defaults to 1_600_000_000. */
  mtime?: number;
  mode?: number;
  uid?: number;
  gid?: number;
  userName?: string;
  groupName?: string;
  linkName?: string;
  pax?: Record<string, string>;
  /** Size written to the ustar header when it should differ from the content length. */
  headerSize?: number;
}

export const DEFAULT_MTIME = 1_600_000_000;

/** Builds a ustar archive in memory, with pax headers for names over 100 bytes. */
export function buildTar(entries: FixtureEntry[], options: { terminate?: boolean } = {}): Uint8Array {
  const blocks: Uint8Array[] = [];
  for (const entry of entries) {
    const content = toBytes(entry.content ?? '');
    const pax: Record<string, string> = { ...(entry.pax ?? {}) };
    let name = entry.path;
    if (TEXT_ENCODER.encode(name).length > 100) {
      pax.path = name;
      name = name.slice(0, 100);
    }
    if (Object.keys(pax).length > 0) {
      const records = encodePaxRecords(pax);
      blocks.push(header({ name: 'PaxHeader/entry', size: records.length, typeflag: 'x' }));
      blocks.push(...padded(records));
    }
    const type = entry.type ?? 'file';
    blocks.push(
      header({
        name,
        size: entry.headerSize ?? (type === 'file' ? content.length : 0),
        typeflag: type === 'file' ? '0' : type === 'directory' ? '5' : '2',
        mtime: entry.mtime,
        mode: entry.mode,
        uid: entry.uid,
        gid: entry.gid,
        userName: entry.userName,
        groupName: entry.groupName,
        linkName: entry.linkName,
      }),
    );
    if (type === 'file') {
      blocks.push(...padded(content));
    }
  }
  if (options.terminate ?? true) {
    blocks.push(new Uint8Array(BLOCK_SIZE), new Uint8Array(BLOCK_SIZE));
  }
  return concat(blocks);
}

export async function writeTar(path: string, entries: FixtureEntry[]): Promise<void> {
  await writeFile(path, buildTar(entries));
}

/** Splits bytes into an async stream of `chunkSize` pieces. */
export async function* chunked(bytes: Uint8Array, chunkSize = 100): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    yield bytes.subarray(offset, offset + chunkSize);
  }
}

export interface TargetHashes {
  sha256: string;
  md5: string;
  length?: number;
}

/** Signed-targets document listing the release tarball of `name-version`. */
export function signedTargetsJson(
  name: string,
  version: string,
  hashes: TargetHashes,
  signed: Record<string, unknown> = {},
): string {
  return JSON.stringify({
    signatures: [],
    signed: {
      _type: 'Targets',
      expires: null,
      version: 0,
      targets: {
        [`<repo>/package/${name}-${version}.tar.gz`]: {
          length: hashes.length ?? 1024,
          hashes: { md5: hashes.md5, sha256: hashes.sha256 },
        },
      },
      ...signed,
    },
  });
}

interface HeaderFields {
  name: string;
  size: number;
  typeflag: string;
  mtime?: number;
  mode?: number;
  uid?: number;
  gid?: number;
  userName?: string;
  groupName?: string;
  linkName?: string;
}

function header(fields: HeaderFields): Uint8Array {
  const block = new Uint8Array(BLOCK_SIZE);
  writeString(block, 0, 100, fields.name);
  writeOctal(block, 100, 8, fields.mode ?? 0o644);
  writeOctal(block, 108, 8, fields.uid ?? 0);
  writeOctal(block, 116, 8, fields.gid ?? 0);
  writeOctal(block, 124, 12, fields.size);
  writeOctal(block, 136, 12, fields.mtime ?? DEFAULT_MTIME);
  block.fill(0x20, 148, 156);
  block[156] = fields.typeflag.charCodeAt(0);
  writeString(block, 157, 100, fields.linkName ?? '');
  writeString(block, 257, 6, 'ustar');
  writeString(block, 263, 2, '00');
  writeString(block, 265, 32, fields.userName ?? '');
  writeString(block, 297, 32, fields.groupName ?? '');

  const checksum = block.reduce((sum, byte) => sum + byte, 0);
  writeString(block, 148, 6, checksum.toString(8).padStart(6, '0'));
  block[154] = 0;
  block[155] = 0x20;
  return block;
}

function writeString(buffer: Uint8Array, offset: number, length: number, value: string): void {
  buffer.set(TEXT_ENCODER.encode(value).subarray(0, length), offset);
}

function writeOctal(buffer: Uint8Array, offset: number, length: number, value: number): void {
  writeString(buffer, offset, length - 1, value.toString(8).padStart(length - 1, '0'));
  buffer[offset + length - 1] = 0;
}

function encodePaxRecords(records: Record<string, string>): Uint8Array {
  let out = '';
  for (const [key, value] of Object.entries(records)) {
    const record = `${key}=${value}\n`;
    let length = record.length + 2;
    while (`${length} `.length + record.length !== length) {
      length = `${length} `.length + record.length;
    }
    out += `${length} ${record}`;
  }
  return TEXT_ENCODER.encode(out);
}

function padded(data: Uint8Array): Uint8Array[] {
  const padding = (BLOCK_SIZE - (data.length % BLOCK_SIZE)) % BLOCK_SIZE;
  return padding > 0 ? [data, new Uint8Array(padding)] : [data];
}

function toBytes(content: string | Uint8Array): Uint8Array {
  return typeof content === 'string' ? TEXT_ENCODER.encode(content) : content;
}

function concat(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
