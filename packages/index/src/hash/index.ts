import { createHash } from 'node:crypto';
import {
  InvalidHashTextError,
  parsed,
  parseFailure,
  type ParseResult,
} from '@index-meta/shared';

/**
 * Fixed-length binary digest.
 *
 * A value whose byte length differs from `expectedLength` is never produced by
 * decoding; the only such value is the zero-length `empty` sentinel, which
 * stands for "hash not yet known".
 */
export interface HashValue {
  readonly algorithm: string;
  readonly expectedLength: number;
  readonly bytes: Uint8Array;
  isValid(): boolean;
  toHex(): string;
  equals(other: HashValue): boolean;
}

const HEX_PAIR = /^[0-9a-fA-F]{2}$/;

/**
 * Decodes base16 text, rejecting leftovers and a decoded length other than
 * `expectedLength`.
 */
export function decodeHex(text: string, expectedLength: number): ParseResult<Uint8Array> {
  let end = 0;
  while (end + 2 <= text.length && HEX_PAIR.test(text.slice(end, end + 2))) {
    end += 2;
  }
  if (end !== text.length) {
    return parseFailure(`Base16 encoding leftovers: ${JSON.stringify(text.slice(end))}`);
  }
  const bytes = new Uint8Array(Buffer.from(text, 'hex'));
  if (bytes.length !== expectedLength) {
    return parseFailure(
      `Base16 of wrong length, expected ${expectedLength}, got ${bytes.length}`,
    );
  }
  return parsed(bytes);
}

abstract class FixedLengthHash implements HashValue {
  abstract readonly algorithm: string;
  abstract readonly expectedLength: number;

  protected constructor(readonly bytes: Uint8Array) {}

  isValid(): boolean {
    return this.bytes.length === this.expectedLength;
  }

  toHex(): string {
    return Buffer.from(this.bytes).toString('hex');
  }

  equals(other: HashValue): boolean {
    return (
      this.algorithm === other.algorithm &&
      Buffer.from(this.bytes).equals(Buffer.from(other.bytes))
    );
  }

  toString(): string {
    return this.isValid() ? this.toHex() : `<empty ${this.algorithm}>`;
  }
}

/** SHA-256 digest, 32 bytes. */
export class SHA256 extends FixedLengthHash {
  static readonly LENGTH = 32;
  static readonly empty = new SHA256(new Uint8Array(0));

  readonly algorithm = 'sha256';
  readonly expectedLength = SHA256.LENGTH;

  /** Hash `content`. */
  static digest(content: Uint8Array): SHA256 {
    return new SHA256(new Uint8Array(createHash('sha256').update(content).digest()));
  }

  static parseHex(text: string): ParseResult<SHA256> {
    const result = decodeHex(text, SHA256.LENGTH);
    return result.ok ? parsed(new SHA256(result.value)) : result;
  }

  /** @throws InvalidHashTextError */
  static fromHex(text: string): SHA256 {
    const result = SHA256.parseHex(text);
    if (!result.ok) throw new InvalidHashTextError(result.message);
    return result.value;
  }

  /** Wrap raw digest bytes read back from storage. */
  static fromBytes(bytes: Uint8Array): SHA256 {
    if (bytes.length !== SHA256.LENGTH) {
      throw new InvalidHashTextError(`Invalid SHA256 length ${bytes.length}`);
    }
    return new SHA256(new Uint8Array(bytes));
  }
}

/** MD5 digest, 16 bytes. Only ever decoded from signed-targets documents. */
export class MD5 extends FixedLengthHash {
  static readonly LENGTH = 16;

  readonly algorithm = 'md5';
  readonly expectedLength = MD5.LENGTH;

  static parseHex(text: string): ParseResult<MD5> {
    const result = decodeHex(text, MD5.LENGTH);
    return result.ok ? parsed(new MD5(result.value)) : result;
  }

  /** @throws InvalidHashTextError */
  static fromHex(text: string): MD5 {
    const result = MD5.parseHex(text);
    if (!result.ok) throw new InvalidHashTextError(result.message);
    return result.value;
  }
}
