/**
 * Byte order markers that open every geometry header.
 */
export enum ByteOrder {
  /** Big-endian (XDR) */
  BigEndian = 0,
  /** Little-endian (NDR) */
  LittleEndian = 1,
}

/**
 * Base geometry codes carried in the low bits of the type field.
 */
export enum WkbType {
  Point = 1,
  LineString = 2,
  Polygon = 3,
  MultiPoint = 4,
  MultiLineString = 5,
  MultiPolygon = 6,
  GeometryCollection = 7,
}

/**
 * EWKB header flags.
 *
 * Type field layout:
 *   bits 0..28  geometry code (1-7 are supported)
 *   bit 29      SRID follows the type field
 *   bit 30      M dimension (not supported)
 *   bit 31      Z dimension (not supported)
 */
export const WKB_SRID_FLAG = 0x20000000;
export const WKB_M_FLAG = 0x40000000;
export const WKB_Z_FLAG = 0x80000000;

/**
 * Canonical geometry tags reported in decoded values.
 */
export type GeometryTag =
  | "POINT"
  | "LINESTRING"
  | "POLYGON"
  | "MULTIPOINT"
  | "MULTILINESTRING"
  | "MULTIPOLYGON"
  | "GEOMETRYCOLLECTION";

export const GEOMETRY_TAGS: Record<WkbType, GeometryTag> = {
  [WkbType.Point]: "POINT",
  [WkbType.LineString]: "LINESTRING",
  [WkbType.Polygon]: "POLYGON",
  [WkbType.MultiPoint]: "MULTIPOINT",
  [WkbType.MultiLineString]: "MULTILINESTRING",
  [WkbType.MultiPolygon]: "MULTIPOLYGON",
  [WkbType.GeometryCollection]: "GEOMETRYCOLLECTION",
};

export type PointValue = [x: number, y: number];
export type LineStringValue = PointValue[];
/** Rings; closure is not checked. */
export type PolygonValue = LineStringValue[];
export type MultiPointValue = PointValue[];
export type MultiLineStringValue = LineStringValue[];
export type MultiPolygonValue = PolygonValue[];

export interface PointGeometry {
  type: "POINT";
  value: PointValue;
}

export interface LineStringGeometry {
  type: "LINESTRING";
  value: LineStringValue;
}

export interface PolygonGeometry {
  type: "POLYGON";
  value: PolygonValue;
}

export interface MultiPointGeometry {
  type: "MULTIPOINT";
  value: MultiPointValue;
}

export interface MultiLineStringGeometry {
  type: "MULTILINESTRING";
  value: MultiLineStringValue;
}

export interface MultiPolygonGeometry {
  type: "MULTIPOLYGON";
  value: MultiPolygonValue;
}

export interface GeometryCollectionGeometry {
  type: "GEOMETRYCOLLECTION";
  value: Geometry[];
}

/**
 * A decoded geometry, discriminated on `type`.
 */
export type Geometry =
  | PointGeometry
  | LineStringGeometry
  | PolygonGeometry
  | MultiPointGeometry
  | MultiLineStringGeometry
  | MultiPolygonGeometry
  | GeometryCollectionGeometry;

/**
 * Payload shape for a given tag.
 */
export type GeometryValueOf<T extends GeometryTag> = Extract<Geometry, { type: T }>["value"];

/**
 * Result of decoding one top-level geometry.
 * `srid` is null when no header carried the SRID flag.
 */
export type ParseResult = Geometry & { srid: number | null };

/**
 * Returns true if every bit of `flag` is set in `typeCode`.
 */
export function hasFlag(typeCode: number, flag: number): boolean {
  return (typeCode & flag) >>> 0 === flag >>> 0;
}

/**
 * Returns true if `code` is one of the seven supported geometry codes.
 */
export function isWkbType(code: number): code is WkbType {
  return Number.isInteger(code) && code >= WkbType.Point && code <= WkbType.GeometryCollection;
}
