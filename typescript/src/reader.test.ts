import { describe, it, expect } from 'vitest';
import { Reader, hexToBytes } from './reader';
import { ByteOrder } from './types';
import {
  InvalidByteOrderError,
  InvalidHexError,
  UnexpectedEndOfInputError,
} from './errors';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}

describe('Reader', () => {
  describe('byte order', () => {
    it('reads 1 as little-endian', () => {
      const reader = new Reader(new Uint8Array([1]));
      expect(reader.readByteOrder()).toBe(ByteOrder.LittleEndian);
      expect(reader.byteOrder).toBe(ByteOrder.LittleEndian);
    });

    it('reads 0 as big-endian', () => {
      const reader = new Reader(new Uint8Array([0]));
      expect(reader.readByteOrder()).toBe(ByteOrder.BigEndian);
      expect(reader.byteOrder).toBe(ByteOrder.BigEndian);
    });

    it('rejects other markers', () => {
      const reader = new Reader(new Uint8Array([2]));
      expect(() => reader.readByteOrder()).toThrow(InvalidByteOrderError);
    });

    it('reports the offending marker', () => {
      const reader = new Reader(new Uint8Array([0xff]));
      const error = catchError(() => reader.readByteOrder());
      expect(error).toBeInstanceOf(InvalidByteOrderError);
      expect(error).toMatchObject({
        marker: 255,
        message: 'Invalid byte order marker: 255',
      });
    });

    it('switches order on each marker', () => {
      const reader = new Reader(new Uint8Array([
        1, 0x01, 0x00, 0x00, 0x00,
        0, 0x00, 0x00, 0x00, 0x01,
      ]));
      reader.readByteOrder();
      expect(reader.readUint32()).toBe(1);
      reader.readByteOrder();
      expect(reader.readUint32()).toBe(1);
    });
  });

  describe('uint32', () => {
    it('reads little-endian', () => {
      const reader = new Reader(new Uint8Array([1, 0x01, 0x00, 0x00, 0x20]));
      reader.readByteOrder();
      expect(reader.readUint32()).toBe(0x20000001);
    });

    it('reads big-endian', () => {
      const reader = new Reader(new Uint8Array([0, 0x20, 0x00, 0x00, 0x01]));
      reader.readByteOrder();
      expect(reader.readUint32()).toBe(0x20000001);
    });

    it('reads values above 2^31 as unsigned', () => {
      const reader = new Reader(new Uint8Array([1, 0xff, 0xff, 0xff, 0xff]));
      reader.readByteOrder();
      expect(reader.readUint32()).toBe(4294967295);
    });
  });

  describe('float64', () => {
    it('reads little-endian', () => {
      const reader = new Reader(new Uint8Array([1, 0, 0, 0, 0, 0, 0, 0xf8, 0x3f]));
      reader.readByteOrder();
      expect(reader.readFloat64()).toBe(1.5);
    });

    it('reads big-endian', () => {
      const reader = new Reader(new Uint8Array([0, 0xc0, 0x02, 0, 0, 0, 0, 0, 0]));
      reader.readByteOrder();
      expect(reader.readFloat64()).toBe(-2.25);
    });
  });

  describe('bounds', () => {
    it('tracks position and remaining', () => {
      const reader = new Reader(new Uint8Array([1, 0, 0, 0, 0]));
      expect(reader.position).toBe(0);
      expect(reader.remaining).toBe(5);
      reader.readByteOrder();
      reader.readUint32();
      expect(reader.position).toBe(5);
      expect(reader.remaining).toBe(0);
      expect(reader.hasMore).toBe(false);
    });

    it('fails on a short uint32', () => {
      const reader = new Reader(new Uint8Array([1, 0, 0]));
      reader.readByteOrder();
      expect(() => reader.readUint32()).toThrow(
        'Unexpected end of input: needed 4 bytes, only 2 available'
      );
    });

    it('fails on a short float64', () => {
      const reader = new Reader(new Uint8Array([1, 0, 0, 0, 0, 0, 0, 0]));
      reader.readByteOrder();
      expect(() => reader.readFloat64()).toThrow(UnexpectedEndOfInputError);
    });

    it('fails on an empty buffer', () => {
      const reader = new Reader(new Uint8Array(0));
      expect(() => reader.readByteOrder()).toThrow(UnexpectedEndOfInputError);
    });

    it('does not advance on failure', () => {
      const reader = new Reader(new Uint8Array([1, 0, 0]));
      reader.readByteOrder();
      expect(() => reader.readUint32()).toThrow(UnexpectedEndOfInputError);
      expect(reader.position).toBe(1);
    });

    it('reads within a subarray view', () => {
      const backing = new Uint8Array([0xaa, 0xbb, 1, 0x07, 0x00, 0x00, 0x00, 0xcc]);
      const reader = new Reader(backing.subarray(2, 7));
      reader.readByteOrder();
      expect(reader.readUint32()).toBe(7);
      expect(reader.hasMore).toBe(false);
    });
  });
});

describe('hexToBytes', () => {
  it('decodes lower and upper case digits', () => {
    expect(hexToBytes('01Ff0a')).toEqual(new Uint8Array([0x01, 0xff, 0x0a]));
  });

  it('drops a 0x prefix', () => {
    expect(hexToBytes('0x0102')).toEqual(new Uint8Array([1, 2]));
  });

  it('drops a bytea prefix', () => {
    expect(hexToBytes('\\x0102')).toEqual(new Uint8Array([1, 2]));
  });

  it('trims surrounding whitespace', () => {
    expect(hexToBytes('  0102\n')).toEqual(new Uint8Array([1, 2]));
  });

  it('decodes an empty string', () => {
    expect(hexToBytes('')).toEqual(new Uint8Array(0));
  });

  it('rejects an odd number of digits', () => {
    expect(() => hexToBytes('010')).toThrow('Invalid hex input: odd number of digits (3)');
  });

  it('rejects non-hex characters', () => {
    expect(() => hexToBytes('01zz')).toThrow(InvalidHexError);
  });

  it('builds a reader from hex', () => {
    const reader = Reader.fromHex('01e6100000');
    reader.readByteOrder();
    expect(reader.readUint32()).toBe(4326);
  });
});
