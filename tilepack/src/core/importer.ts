/**
 * Imports a `<zoom>/<column>/<row>.<ext>` tile tree into a TileArchive.
 *
 * The walk is a single fold: every file either lands in the archive, is
 * ignored (wrong extension), or is recorded as an ImportFailure. Only an
 * archive write error aborts the import.
 */
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { TileArchive } from './archive.js';
import { ArchiveWriteError, describeError } from './errors.js';
import { listFiles } from './scanner.js';
import {
  DEFAULT_EXTENSIONS,
  parseTilePath,
  splitExtension,
  xyzToTmsRow,
  type TileFormat,
} from './tile-coords.js';

// ============================================================================
// Types
// ============================================================================

export type FailureReason = 'malformed-path' | 'read-error' | 'unreadable-dir';

export interface ImportFailure {
  /** Path relative to the map directory; a directory for 'unreadable-dir' */
  path: string;
  reason: FailureReason;
  message: string;
}

/** Column and TMS row range covered at one zoom level */
export interface TileExtent {
  zoom: number;
  minColumn: number;
  maxColumn: number;
  minRow: number;
  maxRow: number;
}

export interface TileImportEvent {
  path: string;
  zoom: number;
  column: number;
  sourceRow: number;
  tileRow: number;
  bytes: number;
  replaced: boolean;
}

export interface ImportResult {
  /** Tiles written, including those that replaced an earlier file */
  imported: number;
  /** Writes that overwrote a tile already in the archive */
  replaced: number;
  /** Files skipped because of their extension */
  ignored: number;
  failures: ImportFailure[];
  minZoom: number | null;
  maxZoom: number | null;
  /** Extent at maxZoom, used for coverage bounds */
  extent: TileExtent | null;
  formats: Set<TileFormat>;
}

export interface ImportOptions {
  /** Extensions to import, without the dot (default: png, jpg, jpeg) */
  extensions?: string[];
  /** Reads a tile's bytes; defaults to a synchronous file read */
  readTile?: (absolutePath: string) => Buffer;
  /** Called after every tile is written */
  onTile?: (event: TileImportEvent) => void;
  /** Called for every file or directory that is skipped with a failure */
  onFailure?: (failure: ImportFailure) => void;
}

// ============================================================================
// Accumulator
// ============================================================================

export function emptyImportResult(): ImportResult {
  return {
    imported: 0,
    replaced: 0,
    ignored: 0,
    failures: [],
    minZoom: null,
    maxZoom: null,
    extent: null,
    formats: new Set(),
  };
}

function growExtent(
  extent: TileExtent | null,
  zoom: number,
  column: number,
  row: number
): TileExtent | null {
  if (extent && zoom < extent.zoom) return extent;
  if (!extent || zoom > extent.zoom) {
    return { zoom, minColumn: column, maxColumn: column, minRow: row, maxRow: row };
  }
  return {
    zoom,
    minColumn: Math.min(extent.minColumn, column),
    maxColumn: Math.max(extent.maxColumn, column),
    minRow: Math.min(extent.minRow, row),
    maxRow: Math.max(extent.maxRow, row),
  };
}

function recordFailure(
  result: ImportResult,
  failure: ImportFailure,
  options: ImportOptions
): void {
  result.failures.push(failure);
  options.onFailure?.(failure);
}

// ============================================================================
// Import
// ============================================================================

/**
 * Import every matching file below mapDir. All writes share one transaction;
 * an ArchiveWriteError rolls the whole import back.
 */
export function importTiles(
  archive: TileArchive,
  mapDir: string,
  options: ImportOptions = {}
): ImportResult {
  const extensions = new Set(
    (options.extensions ?? DEFAULT_EXTENSIONS).map((ext) => ext.replace(/^\./, '').toLowerCase())
  );
  const readTile = options.readTile ?? ((absolutePath: string) => readFileSync(absolutePath));
  const { files, unreadable } = listFiles(mapDir);

  return archive.transaction(() => {
    const result = emptyImportResult();

    for (const dir of unreadable) {
      recordFailure(result, { path: dir.path, reason: 'unreadable-dir', message: dir.message }, options);
    }

    for (const path of files) {
      const name = path.slice(path.lastIndexOf('/') + 1);
      const ext = splitExtension(name)?.extension;
      if (!ext || !extensions.has(ext)) {
        result.ignored++;
        continue;
      }

      const parsed = parseTilePath(path);
      if (!parsed.ok) {
        recordFailure(result, { path, reason: 'malformed-path', message: parsed.message }, options);
        continue;
      }
      const { zoom, column, row, format } = parsed.tile;
      const tileRow = xyzToTmsRow(zoom, row);

      let data: Buffer;
      try {
        data = readTile(join(mapDir, path));
      } catch (err) {
        recordFailure(result, { path, reason: 'read-error', message: describeError(err) }, options);
        continue;
      }

      const inserted = archive.insertTile({
        zoomLevel: zoom,
        tileColumn: column,
        tileRow,
        tileData: data,
      });
      if (!inserted.ok) {
        throw new ArchiveWriteError(`Could not write tile ${path}`, inserted.error, path);
      }

      result.imported++;
      if (inserted.replaced) result.replaced++;
      result.minZoom = result.minZoom === null ? zoom : Math.min(result.minZoom, zoom);
      result.maxZoom = result.maxZoom === null ? zoom : Math.max(result.maxZoom, zoom);
      result.extent = growExtent(result.extent, zoom, column, tileRow);
      result.formats.add(format);

      options.onTile?.({
        path,
        zoom,
        column,
        sourceRow: row,
        tileRow,
        bytes: data.length,
        replaced: inserted.replaced,
      });
    }

    return result;
  });
}
