import { CacheDecodeError } from '@index-meta/shared';

const encoder = new TextEncoder();
const utf8DecoderFatal = new TextDecoder('utf-8', { fatal: true });

/** Big-endian writer; strings and byte strings carry a u32 length prefix. */
export class BinaryWriter {
  private readonly chunks: Uint8Array[] = [];

  writeInt64(value: bigint): this {
    const chunk = new Uint8Array(8);
    new DataView(chunk.buffer).setBigInt64(0, value, false);
    this.chunks.push(chunk);
    return this;
  }

  writeUint32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new RangeError(`Value out of range for uint32: ${value}`);
    }
    const chunk = new Uint8Array(4);
    new DataView(chunk.buffer).setUint32(0, value, false);
    this.chunks.push(chunk);
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.writeUint32(bytes.length);
    this.chunks.push(new Uint8Array(bytes));
    return this;
  }

  writeString(value: string): this {
    return this.writeBytes(encoder.encode(value));
  }

  toBytes(): Uint8Array {
    const total = this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

/**
 * Reads values written by {@link BinaryWriter}.
 *
 * @throws CacheDecodeError when the data ends early or a string is not UTF-8.
 */
export class BinaryReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readInt64(): bigint {
    this.require(8);
    const value = this.view.getBigInt64(this.offset, false);
    this.offset += 8;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return value;
  }

  readBytes(): Uint8Array {
    const length = this.readUint32();
    this.require(length);
    const value = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  readString(): string {
    const start = this.offset;
    const bytes = this.readBytes();
    try {
      return utf8DecoderFatal.decode(bytes);
    } catch (error) {
      throw new CacheDecodeError(`Invalid UTF-8 string at offset ${start}`, { cause: error });
    }
  }

  private require(length: number): void {
    if (this.remaining < length) {
      throw new CacheDecodeError(
        `Unexpected end of cache data at offset ${this.offset}: needed ${length} bytes, ${this.remaining} left`,
      );
    }
  }
}
