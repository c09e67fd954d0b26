import type {
  Geometry as GeoJsonGeometry,
  Position,
} from "geojson";
import { Geometry, LineStringValue, PointValue, PolygonValue } from "./types";

function position(point: PointValue): Position {
  return [point[0], point[1]];
}

function positions(line: LineStringValue): Position[] {
  return line.map(position);
}

function rings(polygon: PolygonValue): Position[][] {
  return polygon.map(positions);
}

/**
 * Converts a decoded geometry to a GeoJSON geometry.
 *
 * Coordinates are copied; the SRID is not carried over since GeoJSON
 * has no place for it.
 */
export function toGeoJSON(geometry: Geometry): GeoJsonGeometry {
  switch (geometry.type) {
    case "POINT":
      return { type: "Point", coordinates: position(geometry.value) };
    case "LINESTRING":
      return { type: "LineString", coordinates: positions(geometry.value) };
    case "POLYGON":
      return { type: "Polygon", coordinates: rings(geometry.value) };
    case "MULTIPOINT":
      return { type: "MultiPoint", coordinates: geometry.value.map(position) };
    case "MULTILINESTRING":
      return { type: "MultiLineString", coordinates: geometry.value.map(positions) };
    case "MULTIPOLYGON":
      return { type: "MultiPolygon", coordinates: geometry.value.map(rings) };
    case "GEOMETRYCOLLECTION":
      return { type: "GeometryCollection", geometries: geometry.value.map(toGeoJSON) };
  }
}
