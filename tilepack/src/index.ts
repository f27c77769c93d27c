export { TileArchive, type TileRecord, type InsertResult, type ArchiveStats } from './core/archive.js';
export {
  importTiles,
  emptyImportResult,
  type ImportResult,
  type ImportOptions,
  type ImportFailure,
  type FailureReason,
  type TileExtent,
  type TileImportEvent,
} from './core/importer.js';
export {
  buildMetadata,
  loadMetadataConfig,
  parseMetadataConfig,
  extentBounds,
  formatBounds,
  type MetadataConfig,
  type MetadataContext,
  type MetadataEntry,
  type CoverageConfig,
  type LayerType,
} from './core/metadata.js';
export { collectStats, formatStats, type MapStats } from './core/stats.js';
export { listFiles, type FileListing, type UnreadableDir } from './core/scanner.js';
export {
  parseTilePath,
  xyzToTmsRow,
  tmsToXyzRow,
  tileBounds,
  tilesPerSide,
  MAX_ZOOM,
  DEFAULT_EXTENSIONS,
  type TileCoord,
  type TileFormat,
  type ParsedTilePath,
} from './core/tile-coords.js';
export { ArchiveCreateError, ArchiveWriteError, MetadataConfigError } from './core/errors.js';
export { run, parseArgs, type CliArgs } from './scripts/lib/convert.js';
