/**
 * ewkb-parser - WKB and EWKB geometry decoding for TypeScript
 *
 * @example
 * ```typescript
 * import { parse, toGeoJSON } from 'ewkb-parser';
 *
 * // Bytes or hex, e.g. a PostGIS geometry column
 * const result = parse("0101000020e6100000000000000000f83f00000000000002c0");
 * // { type: "POINT", value: [1.5, -2.25], srid: 4326 }
 *
 * const geojson = toGeoJSON(result);
 * // { type: "Point", coordinates: [1.5, -2.25] }
 * ```
 */

// Core types
export {
  ByteOrder,
  WkbType,
  WKB_SRID_FLAG,
  WKB_M_FLAG,
  WKB_Z_FLAG,
  GEOMETRY_TAGS,
  hasFlag,
  isWkbType,
} from "./types";

export type {
  GeometryTag,
  PointValue,
  LineStringValue,
  PolygonValue,
  MultiPointValue,
  MultiLineStringValue,
  MultiPolygonValue,
  PointGeometry,
  LineStringGeometry,
  PolygonGeometry,
  MultiPointGeometry,
  MultiLineStringGeometry,
  MultiPolygonGeometry,
  GeometryCollectionGeometry,
  Geometry,
  GeometryValueOf,
  ParseResult,
} from "./types";

// Errors
export {
  WkbError,
  DecodeError,
  UnexpectedEndOfInputError,
  InvalidByteOrderError,
  UnsupportedTypeError,
  UnexpectedGeometryTypeError,
  NestingDepthExceededError,
  InvalidHexError,
} from "./errors";

// Reader
export { Reader, hexToBytes } from "./reader";

// Decoder
import { Decoder, DecoderOptions } from "./decoder";
export { Decoder, geometryTag } from "./decoder";
export type { DecoderOptions } from "./decoder";

// GeoJSON
export { toGeoJSON } from "./geojson";

import { ParseResult } from "./types";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

/**
 * Parse decodes one WKB or EWKB geometry from bytes or hex text.
 */
export function parse(data: Uint8Array | string, options: DecoderOptions = {}): ParseResult {
  return new Decoder(data, options).parse();
}
