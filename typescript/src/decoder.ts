import { NestingDepthExceededError, UnexpectedGeometryTypeError, UnsupportedTypeError } from "./errors";
import { Reader } from "./reader";
import {
  GEOMETRY_TAGS,
  Geometry,
  GeometryTag,
  GeometryValueOf,
  LineStringValue,
  ParseResult,
  PointValue,
  PolygonValue,
  WKB_SRID_FLAG,
  hasFlag,
  isWkbType,
} from "./types";

/** Default maximum nesting depth of member geometries. */
const DEFAULT_MAX_DEPTH = 32;

/** Encoded size of one point: two float64. */
const POINT_SIZE = 16;

/** Size of an element count. */
const COUNT_SIZE = 4;

/** Smallest complete geometry: byte order, type and a zero count. */
const MIN_GEOMETRY_SIZE = 9;

/**
 * Options for Decoder configuration.
 */
export interface DecoderOptions {
  /** Maximum nesting depth of member geometries; non-integers and negatives fall back to the default. Default: 32 */
  maxDepth?: number;
  /** Warn when parse() leaves unread bytes. Default: false */
  warnOnTrailingBytes?: boolean;
}

/**
 * State owned by a single parse() call.
 */
interface DecodeState {
  /** Last SRID read in this call, including nested headers. */
  srid: number | null;
}

/**
 * Maps a type code with its SRID flag cleared to a geometry tag.
 *
 * @throws UnsupportedTypeError if the code is not a known geometry
 */
export function geometryTag(code: number): GeometryTag {
  if (!isWkbType(code)) {
    throw new UnsupportedTypeError(code);
  }
  return GEOMETRY_TAGS[code];
}

function isDepth(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value >= 0;
}

function isGeometryOf<T extends GeometryTag>(
  geometry: Geometry,
  tag: T
): geometry is Extract<Geometry, { type: T }> {
  return geometry.type === tag;
}

/**
 * Decoder reads WKB and EWKB geometries.
 *
 * @example
 * ```typescript
 * const decoder = new Decoder("0101000020e6100000000000000000f83f00000000000002c0");
 * const result = decoder.parse();
 * // { type: "POINT", value: [1.5, -2.25], srid: 4326 }
 * ```
 */
export class Decoder {
  private reader: Reader;
  private maxDepth: number;
  private warnOnTrailingBytes: boolean;

  /**
   * @param data - Geometry bytes, or the same bytes as hex text
   */
  constructor(data: Uint8Array | string, options: DecoderOptions = {}) {
    this.reader = typeof data === "string" ? Reader.fromHex(data) : new Reader(data);
    this.maxDepth = isDepth(options.maxDepth) ? options.maxDepth : DEFAULT_MAX_DEPTH;
    this.warnOnTrailingBytes = options.warnOnTrailingBytes ?? false;
  }

  /**
   * Returns the current position in the input.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Returns the number of bytes not yet decoded.
   */
  get remaining(): number {
    return this.reader.remaining;
  }

  /**
   * Returns true if there is more data to decode.
   */
  get hasMore(): boolean {
    return this.reader.hasMore;
  }

  /**
   * Decodes the geometry at the current position.
   *
   * If nested headers carry SRIDs too, the last one read is reported.
   */
  parse(): ParseResult {
    const result = this.parseNext();

    if (this.warnOnTrailingBytes && this.reader.hasMore) {
      console.warn(
        `ewkb-parser: ${this.reader.remaining} trailing bytes after geometry ` +
        `at offset ${this.reader.position}`
      );
    }

    return result;
  }

  /**
   * Decodes back-to-back geometries until the input is exhausted.
   */
  parseAll(): ParseResult[] {
    const results: ParseResult[] = [];
    while (this.reader.hasMore) {
      results.push(this.parseNext());
    }
    return results;
  }

  private parseNext(): ParseResult {
    const state: DecodeState = { srid: null };
    const geometry = this.decodeGeometry(state, 0);
    return { ...geometry, srid: state.srid };
  }

  private decodeGeometry(state: DecodeState, depth: number): Geometry {
    if (depth > this.maxDepth) {
      throw new NestingDepthExceededError(this.maxDepth);
    }

    this.reader.readByteOrder();
    let typeCode = this.reader.readUint32();

    if (hasFlag(typeCode, WKB_SRID_FLAG)) {
      typeCode = (typeCode ^ WKB_SRID_FLAG) >>> 0;
      state.srid = this.reader.readUint32();
    }

    // Z and M codes stay unsupported: points are always two coordinates.
    const tag = geometryTag(typeCode);

    switch (tag) {
      case "POINT":
        return { type: tag, value: this.readPoint() };
      case "LINESTRING":
        return { type: tag, value: this.readLineString() };
      case "POLYGON":
        return { type: tag, value: this.readPolygon() };
      case "MULTIPOINT":
        return { type: tag, value: this.readMembers(state, depth, "POINT") };
      case "MULTILINESTRING":
        return { type: tag, value: this.readMembers(state, depth, "LINESTRING") };
      case "MULTIPOLYGON":
        return { type: tag, value: this.readMembers(state, depth, "POLYGON") };
      case "GEOMETRYCOLLECTION":
        return { type: tag, value: this.readCollection(state, depth) };
    }
  }

  private readPoint(): PointValue {
    return [this.reader.readFloat64(), this.reader.readFloat64()];
  }

  private readLineString(): LineStringValue {
    const count = this.reader.readUint32();
    this.reader.ensureRemaining(count * POINT_SIZE);

    const points: LineStringValue = [];
    for (let i = 0; i < count; i++) {
      points.push(this.readPoint());
    }
    return points;
  }

  private readPolygon(): PolygonValue {
    const count = this.reader.readUint32();
    this.reader.ensureRemaining(count * COUNT_SIZE);

    const rings: PolygonValue = [];
    for (let i = 0; i < count; i++) {
      rings.push(this.readLineString());
    }
    return rings;
  }

  /**
   * Reads member geometries of a multi-geometry, keeping only their values.
   */
  private readMembers<T extends GeometryTag>(
    state: DecodeState,
    depth: number,
    expected: T
  ): GeometryValueOf<T>[] {
    const count = this.reader.readUint32();
    this.reader.ensureRemaining(count * MIN_GEOMETRY_SIZE);

    const values: GeometryValueOf<T>[] = [];
    for (let i = 0; i < count; i++) {
      const member = this.decodeGeometry(state, depth + 1);
      const actual: GeometryTag = member.type;
      if (!isGeometryOf(member, expected)) {
        throw new UnexpectedGeometryTypeError(expected, actual);
      }
      values.push(member.value);
    }
    return values;
  }

  private readCollection(state: DecodeState, depth: number): Geometry[] {
    const count = this.reader.readUint32();
    this.reader.ensureRemaining(count * MIN_GEOMETRY_SIZE);

    const geometries: Geometry[] = [];
    for (let i = 0; i < count; i++) {
      geometries.push(this.decodeGeometry(state, depth + 1));
    }
    return geometries;
  }
}
