/**
 * MBTiles archive access.
 * Owns the SQLite connection and exposes typed operations for the two
 * relations the format defines: `metadata` and `tiles`.
 */
import Database from 'better-sqlite3';
import { rmSync } from 'node:fs';
import { ArchiveCreateError, ArchiveWriteError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface TileRecord {
  zoomLevel: number;
  tileColumn: number;
  /** TMS row, counted from the bottom of the pyramid */
  tileRow: number;
  tileData: Buffer;
}

export type InsertResult =
  | { ok: true; replaced: boolean }
  | { ok: false; error: Error };

export interface ArchiveStats {
  tileCount: number;
  minZoom: number | null;
  maxZoom: number | null;
}

type TileKey = [zoomLevel: number, tileColumn: number, tileRow: number];

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE metadata (name TEXT PRIMARY KEY, value TEXT);

  CREATE TABLE tiles (
    zoom_level INTEGER,
    tile_column INTEGER,
    tile_row INTEGER,
    tile_data BLOB,
    PRIMARY KEY (zoom_level, tile_column, tile_row)
  );
`;

/** Files SQLite may leave next to the database */
const SIDECAR_SUFFIXES = ['-journal', '-wal', '-shm'];

// ============================================================================
// Archive Implementation
// ============================================================================

export class TileArchive {
  readonly dbPath: string;
  private db: Database.Database;
  private tileExistsStmt: Database.Statement<TileKey, { found: number }>;
  private upsertTileStmt: Database.Statement<[...TileKey, Buffer]>;
  private upsertMetadataStmt: Database.Statement<[string, string]>;

  private constructor(db: Database.Database, dbPath: string) {
    this.db = db;
    this.dbPath = dbPath;

    // Rollback journal keeps the archive a single file once closed
    this.db.pragma('journal_mode = DELETE');
    this.db.exec(SCHEMA_SQL);

    this.tileExistsStmt = this.db.prepare<TileKey, { found: number }>(
      `SELECT 1 AS found FROM tiles
       WHERE zoom_level = ? AND tile_column = ? AND tile_row = ?`
    );
    this.upsertTileStmt = this.db.prepare<[...TileKey, Buffer]>(
      `INSERT INTO tiles (zoom_level, tile_column, tile_row, tile_data)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(zoom_level, tile_column, tile_row) DO UPDATE SET
         tile_data = excluded.tile_data`
    );
    this.upsertMetadataStmt = this.db.prepare<[string, string]>(
      `INSERT INTO metadata (name, value) VALUES (?, ?)
       ON CONFLICT(name) DO UPDATE SET value = excluded.value`
    );
  }

  /**
   * Create a fresh, empty archive at dbPath. Any previous file there is
   * deleted first. The parent directory must already exist.
   */
  static create(dbPath: string): TileArchive {
    let db: Database.Database | null = null;
    try {
      for (const path of [dbPath, ...SIDECAR_SUFFIXES.map((suffix) => dbPath + suffix)]) {
        rmSync(path, { force: true });
      }

      db = new Database(dbPath);
      return new TileArchive(db, dbPath);
    } catch (err) {
      db?.close();
      throw new ArchiveCreateError(dbPath, err);
    }
  }

  /**
   * Insert one tile. An existing tile at the same coordinates is replaced
   * (last write wins).
   */
  insertTile(tile: TileRecord): InsertResult {
    const key: TileKey = [tile.zoomLevel, tile.tileColumn, tile.tileRow];
    try {
      const replaced = this.tileExistsStmt.get(...key) !== undefined;
      this.upsertTileStmt.run(...key, tile.tileData);
      return { ok: true, replaced };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    }
  }

  getTile(zoomLevel: number, tileColumn: number, tileRow: number): Buffer | null {
    const row = this.db
      .prepare<TileKey, { tile_data: Buffer }>(
        `SELECT tile_data FROM tiles
         WHERE zoom_level = ? AND tile_column = ? AND tile_row = ?`
      )
      .get(zoomLevel, tileColumn, tileRow);

    return row ? row.tile_data : null;
  }

  /**
   * List tile keys, ordered by zoom, column, row.
   */
  listTileKeys(): Array<Omit<TileRecord, 'tileData'>> {
    return this.db
      .prepare<[], { zoom_level: number; tile_column: number; tile_row: number }>(
        `SELECT zoom_level, tile_column, tile_row FROM tiles
         ORDER BY zoom_level, tile_column, tile_row`
      )
      .all()
      .map((row) => ({
        zoomLevel: row.zoom_level,
        tileColumn: row.tile_column,
        tileRow: row.tile_row,
      }));
  }

  countTiles(): number {
    return this.queryStats().tileCount;
  }

  putMetadata(name: string, value: string): void {
    this.putMetadataEntries([[name, value]]);
  }

  /**
   * Upsert metadata rows in one transaction.
   * @throws ArchiveWriteError when SQLite rejects a write
   */
  putMetadataEntries(entries: Iterable<readonly [string, string]>): void {
    try {
      this.transaction(() => {
        for (const [name, value] of entries) {
          this.upsertMetadataStmt.run(name, value);
        }
      });
    } catch (err) {
      throw new ArchiveWriteError('Could not write metadata', err);
    }
  }

  getMetadata(): Record<string, string> {
    const rows = this.db
      .prepare<[], { name: string; value: string | null }>(
        `SELECT name, value FROM metadata ORDER BY name`
      )
      .all();

    const metadata: Record<string, string> = {};
    for (const row of rows) {
      metadata[row.name] = row.value ?? '';
    }
    return metadata;
  }

  /**
   * Tile count and zoom range. Zoom bounds are null for an empty archive.
   */
  queryStats(): ArchiveStats {
    const row = this.db
      .prepare<[], { tile_count: number; min_zoom: number | null; max_zoom: number | null }>(
        `SELECT COUNT(*) AS tile_count,
                MIN(zoom_level) AS min_zoom,
                MAX(zoom_level) AS max_zoom
         FROM tiles`
      )
      .get();

    return {
      tileCount: row?.tile_count ?? 0,
      minZoom: row?.min_zoom ?? null,
      maxZoom: row?.max_zoom ?? null,
    };
  }

  /**
   * Run fn inside a transaction. A thrown error rolls back everything fn wrote.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
