/**
 * Tileset metadata: loading the optional JSON config and deriving the
 * name/value pairs written to the `metadata` table.
 *
 * Required MBTiles 1.1 keys (name, type, version, description) always get a
 * value; everything else is written only when known.
 */
import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import type { BBox } from 'geojson';
import { MetadataConfigError, describeError } from './errors.js';
import type { ImportResult, TileExtent } from './importer.js';
import { EXTENSION_FORMATS, MAX_ZOOM, tileBounds, tmsToXyzRow, type TileFormat } from './tile-coords.js';

// ============================================================================
// Types
// ============================================================================

export type LayerType = 'overlay' | 'baselayer';

export interface LatLon {
  latitude: number;
  longitude: number;
}

export type CoverageConfig =
  | { topLeft: LatLon; bottomRight: LatLon }
  | { center: LatLon; zoom?: number };

export interface MetadataConfig {
  name?: string;
  type?: LayerType;
  version?: string;
  description?: string;
  format?: TileFormat;
  attribution?: string;
  shortName?: string;
  longDescription?: string;
  shortAttribution?: string;
  longAttribution?: string;
  coverage?: CoverageConfig;
}

export interface MetadataContext {
  dbPath: string;
  mapDir: string | null;
  imported: ImportResult | null;
}

export type MetadataEntry = [name: string, value: string];

const OPTIONAL_TEXT_KEYS = [
  ['attribution', 'attribution'],
  ['shortName', 'short_name'],
  ['longDescription', 'long_description'],
  ['shortAttribution', 'short_attribution'],
  ['longAttribution', 'long_attribution'],
] as const;

type TextField = 'name' | 'description' | (typeof OPTIONAL_TEXT_KEYS)[number][0];

const TEXT_FIELDS: TextField[] = [
  'name',
  'description',
  ...OPTIONAL_TEXT_KEYS.map(([field]) => field),
];

const KNOWN_FIELDS = new Set([...TEXT_FIELDS, 'type', 'version', 'format', 'coverage']);

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readLatLon(value: unknown, field: string): LatLon {
  if (!isRecord(value)) {
    throw new MetadataConfigError(`${field} must be an object with latitude and longitude`);
  }
  const { latitude, longitude } = value;
  if (typeof latitude !== 'number' || !Number.isFinite(latitude) || Math.abs(latitude) > 90) {
    throw new MetadataConfigError(`${field}.latitude must be a number between -90 and 90`);
  }
  if (typeof longitude !== 'number' || !Number.isFinite(longitude) || Math.abs(longitude) > 180) {
    throw new MetadataConfigError(`${field}.longitude must be a number between -180 and 180`);
  }
  return { latitude, longitude };
}

function readCoverage(value: unknown): CoverageConfig {
  if (!isRecord(value)) {
    throw new MetadataConfigError('coverage must be an object');
  }

  if ('center' in value) {
    const center = readLatLon(value.center, 'coverage.center');
    if (value.zoom === undefined) return { center };
    const zoom = value.zoom;
    if (typeof zoom !== 'number' || !Number.isInteger(zoom) || zoom < 0 || zoom > MAX_ZOOM) {
      throw new MetadataConfigError(`coverage.zoom must be an integer between 0 and ${MAX_ZOOM}`);
    }
    return { center, zoom };
  }

  const topLeft = readLatLon(value.topLeft, 'coverage.topLeft');
  const bottomRight = readLatLon(value.bottomRight, 'coverage.bottomRight');
  if (topLeft.latitude < bottomRight.latitude) {
    throw new MetadataConfigError('coverage.topLeft must not lie south of coverage.bottomRight');
  }
  return { topLeft, bottomRight };
}

/**
 * Validate a parsed JSON value as a MetadataConfig.
 */
export function parseMetadataConfig(value: unknown): MetadataConfig {
  if (!isRecord(value)) {
    throw new MetadataConfigError('metadata config must be a JSON object');
  }

  for (const key of Object.keys(value)) {
    if (!KNOWN_FIELDS.has(key)) {
      throw new MetadataConfigError(`unknown field "${key}"`);
    }
  }

  const config: MetadataConfig = {};

  for (const field of TEXT_FIELDS) {
    const text = value[field];
    if (text === undefined) continue;
    if (typeof text !== 'string') {
      throw new MetadataConfigError(`${field} must be a string`);
    }
    config[field] = text;
  }

  if (value.type !== undefined) {
    if (value.type !== 'overlay' && value.type !== 'baselayer') {
      throw new MetadataConfigError('type must be "overlay" or "baselayer"');
    }
    config.type = value.type;
  }

  if (value.version !== undefined) {
    if (typeof value.version !== 'string' && typeof value.version !== 'number') {
      throw new MetadataConfigError('version must be a string or a number');
    }
    config.version = String(value.version);
  }

  if (value.format !== undefined) {
    const format = typeof value.format === 'string' ? EXTENSION_FORMATS[value.format.toLowerCase()] : undefined;
    if (!format) {
      throw new MetadataConfigError('format must be "png" or "jpg"');
    }
    config.format = format;
  }

  if (value.coverage !== undefined) {
    config.coverage = readCoverage(value.coverage);
  }

  return config;
}

/**
 * Read and validate a metadata config file.
 */
export function loadMetadataConfig(configPath: string): MetadataConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new MetadataConfigError(`could not read metadata config: ${describeError(err)}`, configPath);
  }

  try {
    return parseMetadataConfig(raw);
  } catch (err) {
    if (err instanceof MetadataConfigError) {
      throw new MetadataConfigError(err.message, configPath);
    }
    throw err;
  }
}

// ============================================================================
// Bounds
// ============================================================================

/**
 * WGS84 bounds of a tile extent (TMS rows) as [west, south, east, north].
 */
export function extentBounds(extent: TileExtent): BBox {
  const { zoom } = extent;
  const [west, , , north] = tileBounds(zoom, extent.minColumn, tmsToXyzRow(zoom, extent.maxRow));
  const [, south, east] = tileBounds(zoom, extent.maxColumn, tmsToXyzRow(zoom, extent.minRow));
  return [west, south, east, north];
}

function formatCoordinate(value: number): string {
  return String(Number(value.toFixed(6)));
}

export function formatBounds(bounds: BBox): string {
  return bounds.map(formatCoordinate).join(',');
}

// ============================================================================
// Metadata entries
// ============================================================================

/**
 * Build the metadata rows for an archive, in write order.
 */
export function buildMetadata(config: MetadataConfig, context: MetadataContext): MetadataEntry[] {
  const imported = context.imported;
  const entries: MetadataEntry[] = [
    ['name', config.name ?? basename(context.dbPath, extname(context.dbPath))],
    ['type', config.type ?? 'baselayer'],
    ['version', config.version ?? '1'],
    [
      'description',
      config.description ??
        (context.mapDir ? `Tiles imported from ${context.mapDir}` : 'Empty tileset'),
    ],
  ];

  const singleFormat =
    imported && imported.formats.size === 1 ? [...imported.formats][0] : undefined;
  const format = config.format ?? singleFormat;
  if (format) entries.push(['format', format]);

  const coverage = config.coverage;
  if (coverage && 'topLeft' in coverage) {
    entries.push([
      'bounds',
      formatBounds([
        coverage.topLeft.longitude,
        coverage.bottomRight.latitude,
        coverage.bottomRight.longitude,
        coverage.topLeft.latitude,
      ]),
    ]);
  } else if (imported?.extent) {
    entries.push(['bounds', formatBounds(extentBounds(imported.extent))]);
  }

  if (coverage && 'center' in coverage) {
    const zoom = coverage.zoom ?? imported?.minZoom ?? 0;
    entries.push([
      'center',
      `${formatCoordinate(coverage.center.longitude)},${formatCoordinate(coverage.center.latitude)},${zoom}`,
    ]);
  }

  if (imported && imported.minZoom !== null && imported.maxZoom !== null) {
    entries.push(['minzoom', String(imported.minZoom)]);
    entries.push(['maxzoom', String(imported.maxZoom)]);
  }

  for (const [field, key] of OPTIONAL_TEXT_KEYS) {
    const text = config[field];
    if (text !== undefined) entries.push([key, text]);
  }

  return entries;
}
