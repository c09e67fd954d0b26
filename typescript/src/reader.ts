import { InvalidByteOrderError, InvalidHexError, UnexpectedEndOfInputError } from "./errors";
import { ByteOrder } from "./types";

const HEX_DIGITS = /^[0-9a-fA-F]*$/;

/**
 * Reader decodes (E)WKB primitives from a binary buffer.
 *
 * Multi-byte reads follow the byte order set by the last call to
 * readByteOrder(). Before the first call the reader is big-endian.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;
  private littleEndian: boolean;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
    this.littleEndian = false;
  }

  /**
   * Creates a reader over hex-encoded input.
   */
  static fromHex(hex: string): Reader {
    return new Reader(hexToBytes(hex));
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Returns the byte order currently applied to multi-byte reads.
   */
  get byteOrder(): ByteOrder {
    return this.littleEndian ? ByteOrder.LittleEndian : ByteOrder.BigEndian;
  }

  /**
   * Throws unless at least `needed` bytes remain.
   */
  ensureRemaining(needed: number): void {
    if (needed > this.remaining) {
      throw new UnexpectedEndOfInputError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.ensureRemaining(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads a byte order marker and applies it to subsequent reads.
   */
  readByteOrder(): ByteOrder {
    const marker = this.readByte();
    switch (marker) {
      case ByteOrder.LittleEndian:
        this.littleEndian = true;
        return ByteOrder.LittleEndian;
      case ByteOrder.BigEndian:
        this.littleEndian = false;
        return ByteOrder.BigEndian;
      default:
        throw new InvalidByteOrderError(marker);
    }
  }

  /**
   * Reads an unsigned 32-bit integer.
   */
  readUint32(): number {
    this.ensureRemaining(4);
    const value = this.view.getUint32(this.pos, this.littleEndian);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.ensureRemaining(8);
    const value = this.view.getFloat64(this.pos, this.littleEndian);
    this.pos += 8;
    return value;
  }
}

/**
 * Decodes hex text into bytes.
 *
 * Accepts the forms PostGIS hands out: bare digits in either case, with an
 * optional `0x` or `\x` (bytea) prefix and surrounding whitespace.
 */
export function hexToBytes(hex: string): Uint8Array {
  let digits = hex.trim();
  if (digits.startsWith("0x") || digits.startsWith("0X") || digits.startsWith("\\x")) {
    digits = digits.slice(2);
  }

  if (digits.length % 2 !== 0) {
    throw new InvalidHexError(`odd number of digits (${digits.length})`);
  }
  if (!HEX_DIGITS.test(digits)) {
    throw new InvalidHexError("unexpected non-hex character");
  }

  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
