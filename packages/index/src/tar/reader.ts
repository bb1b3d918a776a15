import { ArchiveFormatError } from '@index-meta/shared';
import type { TarEntryType, TarHeader, TarRecord } from './types';

const BLOCK_SIZE = 512;
/** Header records that describe the entry after them. */
const EXTENSION_FLAGS = new Set(['x', 'g', 'L', 'K']);
const TEXT_DECODER = new TextDecoder('utf-8');

/**
 * Pulls exact byte counts from an async chunk source, buffering only what a
 * single header or entry needs.
 */
class ByteReader {
  private readonly chunks: Uint8Array[] = [];
  private buffered = 0;
  private exhausted = false;
  position = 0;

  constructor(private readonly iterator: AsyncIterator<Uint8Array>) {}

  /** Returns `length` bytes, or fewer if the source ends first. */
  async read(length: number): Promise<Uint8Array> {
    while (this.buffered < length && !this.exhausted) {
      const next = await this.iterator.next();
      if (next.done) {
        this.exhausted = true;
      } else if (next.value.length > 0) {
        this.chunks.push(next.value);
        this.buffered += next.value.length;
      }
    }

    const take = Math.min(length, this.buffered);
    const out = new Uint8Array(take);
    let filled = 0;
    while (filled < take) {
      const chunk = this.chunks[0];
      const n = Math.min(chunk.length, take - filled);
      out.set(chunk.subarray(0, n), filled);
      filled += n;
      if (n === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(n);
      }
    }
    this.buffered -= take;
    this.position += take;
    return out;
  }
}

/**
 * Reads ustar, pax and GNU archives sequentially. Pax (`x`, `g`) and GNU
 * long-name (`L`, `K`) records are folded into the entry that follows them
 * and are not yielded.
 *
 * @throws ArchiveFormatError on a bad checksum, unknown header format or truncation.
 */
export async function* readTar(source: AsyncIterable<Uint8Array>): AsyncGenerator<TarRecord> {
  const iterator = source[Symbol.asyncIterator]();
  const reader = new ByteReader(iterator);

  let globalPax: Record<string, string> = {};
  let pendingPax: Record<string, string> | null = null;
  let longName: string | null = null;
  let longLink: string | null = null;

  try {
    while (true) {
      const offset = reader.position;
      const header = await reader.read(BLOCK_SIZE);
      if (header.length === 0) {
        return;
      }
      if (header.length < BLOCK_SIZE) {
        throw new ArchiveFormatError('Truncated header block', { offset });
      }

      if (isZeroBlock(header)) {
        const next = await reader.read(BLOCK_SIZE);
        if (next.length === 0 || isZeroBlock(next)) {
          return;
        }
        throw new ArchiveFormatError('Data after end-of-archive block', { offset });
      }

      verifyChecksum(header, offset);
      const magic = readString(header, 257, 6);
      const posix = magic === 'ustar';
      if (!posix && magic !== 'ustar ' && !isZeroBytes(header.subarray(257, 263))) {
        throw new ArchiveFormatError('Unrecognised header format', { offset });
      }

      const typeflag = String.fromCharCode(header[156]);
      const pax = pendingPax ?? globalPax;
      const size =
        !EXTENSION_FLAGS.has(typeflag) && pax.size !== undefined
          ? paxSize(pax.size, offset)
          : readNumber(header, 124, 12, offset, 'size');
      const content = await reader.read(size);
      if (content.length < size) {
        throw new ArchiveFormatError('Truncated entry data', { offset });
      }
      const padding = (BLOCK_SIZE - (size % BLOCK_SIZE)) % BLOCK_SIZE;
      if ((await reader.read(padding)).length < padding) {
        throw new ArchiveFormatError('Truncated entry padding', { offset });
      }

      switch (typeflag) {
        case 'x':
          pendingPax = { ...globalPax, ...parsePaxRecords(content) };
          continue;
        case 'g':
          globalPax = { ...globalPax, ...parsePaxRecords(content) };
          continue;
        case 'L':
          longName = readString(content, 0, content.length);
          continue;
        case 'K':
          longLink = readString(content, 0, content.length);
          continue;
      }

      const name = readString(header, 0, 100);
      const prefix = posix ? readString(header, 345, 155) : '';

      const entry: TarHeader = {
        path: pax.path ?? longName ?? (prefix ? `${prefix}/${name}` : name),
        type: typeFromFlag(typeflag),
        size,
        mtime: pax.mtime
          ? Math.floor(Number(pax.mtime))
          : readNumber(header, 136, 12, offset, 'mtime'),
        mode: readNumber(header, 100, 8, offset, 'mode'),
        uid: pax.uid ? Number(pax.uid) : readNumber(header, 108, 8, offset, 'uid'),
        gid: pax.gid ? Number(pax.gid) : readNumber(header, 116, 8, offset, 'gid'),
        userName: pax.uname ?? readString(header, 265, 32),
        groupName: pax.gname ?? readString(header, 297, 32),
        linkName: pax.linkpath ?? longLink ?? readString(header, 157, 100),
      };
      if (entry.type === 'file' && entry.path.endsWith('/')) {
        entry.type = 'directory';
      }

      pendingPax = null;
      longName = null;
      longLink = null;

      yield { header: entry, content, offset };
    }
  } finally {
    await iterator.return?.();
  }
}

function verifyChecksum(header: Uint8Array, offset: number): void {
  const stored = parseOctal(header.subarray(148, 156));
  if (stored === undefined) {
    throw new ArchiveFormatError('Missing header checksum', { offset });
  }
  let sum = 0;
  for (let i = 0; i < header.length; i += 1) {
    sum += i >= 148 && i < 156 ? 0x20 : header[i];
  }
  if (stored !== sum) {
    throw new ArchiveFormatError('Header checksum mismatch', { offset });
  }
}

function paxSize(value: string, offset: number): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new ArchiveFormatError('Invalid pax size record', { offset });
  }
  return Number(value);
}

function readString(buffer: Uint8Array, start: number, length: number): string {
  const slice = buffer.subarray(start, start + length);
  let end = slice.indexOf(0);
  if (end === -1) end = slice.length;
  return TEXT_DECODER.decode(slice.subarray(0, end));
}

function readNumber(
  header: Uint8Array,
  start: number,
  length: number,
  offset: number,
  label: string,
): number {
  const bytes = header.subarray(start, start + length);
  if ((bytes[0] & 0x80) !== 0) {
    return parseBase256(bytes);
  }
  if (readString(bytes, 0, length).trim() === '') {
    return 0;
  }
  const value = parseOctal(bytes);
  if (value === undefined) {
    throw new ArchiveFormatError(`Invalid ${label} field`, { offset });
  }
  return value;
}

function parseOctal(buffer: Uint8Array): number | undefined {
  const text = readString(buffer, 0, buffer.length).trim();
  if (!/^[0-7]+$/.test(text)) return undefined;
  return parseInt(text, 8);
}

function parseBase256(buffer: Uint8Array): number {
  // First byte carries the marker bit.
  let result = buffer[0] & 0x7f;
  for (let i = 1; i < buffer.length; i += 1) {
    result = result * 256 + buffer[i];
  }
  return result;
}

function isZeroBytes(buffer: Uint8Array): boolean {
  return buffer.every((byte) => byte === 0);
}

function isZeroBlock(block: Uint8Array): boolean {
  return block.length === BLOCK_SIZE && isZeroBytes(block);
}

function typeFromFlag(flag: string): TarEntryType {
  switch (flag) {
    case '0':
    case '\0':
    case '7':
      return 'file';
    case '1':
      return 'link';
    case '2':
      return 'symlink';
    case '5':
      return 'directory';
    default:
      return 'other';
  }
}

function parsePaxRecords(buffer: Uint8Array): Record<string, string> {
  const out: Record<string, string> = {};
  let offset = 0;
  while (offset < buffer.length) {
    const spaceIndex = buffer.indexOf(0x20, offset);
    if (spaceIndex === -1) break;
    const length = parseInt(TEXT_DECODER.decode(buffer.subarray(offset, spaceIndex)), 10);
    if (!Number.isFinite(length) || length <= 0) break;
    const record = TEXT_DECODER.decode(buffer.subarray(spaceIndex + 1, offset + length));
    const eqIndex = record.indexOf('=');
    if (eqIndex > 0) {
      out[record.slice(0, eqIndex)] = record.slice(eqIndex + 1).replace(/\n$/, '');
    }
    offset += length;
  }
  return out;
}
