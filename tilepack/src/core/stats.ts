/**
 * Summary of a populated archive.
 */
import { statSync } from 'node:fs';
import type { TileArchive } from './archive.js';

export interface MapStats {
  dbPath: string;
  fileSize: number;
  mapDir: string | null;
  tileCount: number;
  minZoom: number | null;
  maxZoom: number | null;
}

export function collectStats(
  archive: TileArchive,
  dbPath: string,
  mapDir: string | null
): MapStats {
  const { tileCount, minZoom, maxZoom } = archive.queryStats();
  const fileSize = statSync(dbPath).size;

  return { dbPath, fileSize, mapDir, tileCount, minZoom, maxZoom };
}

function formatZoomRange(stats: MapStats): string {
  if (stats.minZoom === null || stats.maxZoom === null) return 'none';
  return `${stats.minZoom} - ${stats.maxZoom}`;
}

export function formatStats(stats: MapStats): string[] {
  return [
    'Map statistics',
    '--------------',
    `map db:            ${stats.dbPath}`,
    `file size:         ${stats.fileSize} bytes`,
    `tile directory:    ${stats.mapDir ?? '(none)'}`,
    `number of tiles:   ${stats.tileCount}`,
    `zoom levels:       ${formatZoomRange(stats)}`,
  ];
}
