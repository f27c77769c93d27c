/**
 * Tile coordinate helpers.
 *
 * Source directories use XYZ numbering (row 0 at the north edge). MBTiles 1.1
 * stores rows in TMS numbering (row 0 at the south edge).
 */
import proj4 from 'proj4';
import type { BBox } from 'geojson';

// ============================================================================
// Types
// ============================================================================

export interface TileCoord {
  zoom: number;
  column: number;
  row: number;
}

export type TileFormat = 'png' | 'jpg';

export interface ParsedTilePath extends TileCoord {
  /** Lower-cased extension as found on disk, e.g. "jpeg" */
  extension: string;
  format: TileFormat;
}

export type TilePathResult =
  | { ok: true; tile: ParsedTilePath }
  | { ok: false; message: string };

// ============================================================================
// Constants
// ============================================================================

/** Deepest zoom whose tile indices stay exact in a double and an SQLite INTEGER */
export const MAX_ZOOM = 30;

export const EXTENSION_FORMATS: Record<string, TileFormat> = {
  png: 'png',
  jpg: 'jpg',
  jpeg: 'jpg',
};

export const DEFAULT_EXTENSIONS = Object.keys(EXTENSION_FORMATS);

/** Half the circumference of the EPSG:3857 world square, in meters */
const MERCATOR_HALF_EXTENT = 20037508.342789244;

const DECIMAL = /^\d+$/;

// ============================================================================
// Row conversion
// ============================================================================

export function tilesPerSide(zoom: number): number {
  return 2 ** zoom;
}

/**
 * Convert an XYZ row (counted from the top) to a TMS row (counted from the
 * bottom). The conversion is its own inverse.
 */
export function xyzToTmsRow(zoom: number, row: number): number {
  return tilesPerSide(zoom) - row - 1;
}

export const tmsToXyzRow = xyzToTmsRow;

// ============================================================================
// Path parsing
// ============================================================================

/**
 * Split a file name into base name and lower-cased extension.
 * Returns null when there is no extension.
 */
export function splitExtension(fileName: string): { base: string; extension: string } | null {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0 || dot === fileName.length - 1) return null;
  return {
    base: fileName.slice(0, dot),
    extension: fileName.slice(dot + 1).toLowerCase(),
  };
}

function parseSegment(name: string, value: string): number | string {
  if (!DECIMAL.test(value)) {
    return `${name} "${value}" is not a decimal integer`;
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse `<zoom>/<column>/<row>.<ext>` (relative to the map directory, `/`
 * separated). Every segment must be a plain decimal integer inside the tile
 * pyramid; nothing is coerced.
 */
export function parseTilePath(relPath: string): TilePathResult {
  const segments = relPath.split('/');
  if (segments.length !== 3) {
    return {
      ok: false,
      message: `expected <zoom>/<column>/<row>.<ext>, got ${segments.length} path segment(s)`,
    };
  }

  const file = splitExtension(segments[2]);
  if (!file) {
    return { ok: false, message: 'file name has no extension' };
  }

  const format = EXTENSION_FORMATS[file.extension];
  if (!format) {
    return { ok: false, message: `unsupported extension ".${file.extension}"` };
  }

  const zoom = parseSegment('zoom', segments[0]);
  if (typeof zoom === 'string') return { ok: false, message: zoom };
  const column = parseSegment('column', segments[1]);
  if (typeof column === 'string') return { ok: false, message: column };
  const row = parseSegment('row', file.base);
  if (typeof row === 'string') return { ok: false, message: row };

  if (zoom > MAX_ZOOM) {
    return { ok: false, message: `zoom ${zoom} exceeds maximum of ${MAX_ZOOM}` };
  }

  const side = tilesPerSide(zoom);
  if (column >= side) {
    return { ok: false, message: `column ${column} is outside 0..${side - 1} at zoom ${zoom}` };
  }
  if (row >= side) {
    return { ok: false, message: `row ${row} is outside 0..${side - 1} at zoom ${zoom}` };
  }

  return { ok: true, tile: { zoom, column, row, extension: file.extension, format } };
}

// ============================================================================
// Geographic bounds
// ============================================================================

function mercatorCorner(zoom: number, column: number, row: number): [number, number] {
  const size = (2 * MERCATOR_HALF_EXTENT) / tilesPerSide(zoom);
  return [-MERCATOR_HALF_EXTENT + column * size, MERCATOR_HALF_EXTENT - row * size];
}

function toLngLat(point: [number, number]): [number, number] {
  const [lng, lat] = proj4('EPSG:3857', 'EPSG:4326', point);
  return [lng, lat];
}

/**
 * WGS84 bounds of an XYZ tile as [west, south, east, north].
 */
export function tileBounds(zoom: number, column: number, row: number): BBox {
  const [west, north] = toLngLat(mercatorCorner(zoom, column, row));
  const [east, south] = toLngLat(mercatorCorner(zoom, column + 1, row + 1));
  return [west, south, east, north];
}
