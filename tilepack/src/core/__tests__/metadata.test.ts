/**
 * Unit tests for metadata config loading and metadata rows.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { MetadataConfigError } from '../errors.js';
import { emptyImportResult, type ImportResult } from '../importer.js';
import {
  buildMetadata,
  extentBounds,
  formatBounds,
  loadMetadataConfig,
  parseMetadataConfig,
} from '../metadata.js';
import type { TileFormat } from '../tile-coords.js';
import { createTempDir, removeDir } from '../../test-utils/tile-tree.js';

function worldImport(): ImportResult {
  return {
    ...emptyImportResult(),
    imported: 5,
    minZoom: 0,
    maxZoom: 1,
    extent: { zoom: 1, minColumn: 0, maxColumn: 1, minRow: 0, maxRow: 1 },
    formats: new Set<TileFormat>(['png']),
  };
}

describe('parseMetadataConfig', () => {
  it('accepts a full config', () => {
    const config = parseMetadataConfig({
      name: 'World',
      type: 'overlay',
      version: 2,
      description: 'Shaded relief',
      format: 'JPEG',
      attribution: 'Example Survey',
      shortName: 'world',
      coverage: {
        topLeft: { latitude: 60, longitude: -10.5 },
        bottomRight: { latitude: 35, longitude: 30 },
      },
    });

    expect(config).toEqual({
      name: 'World',
      type: 'overlay',
      version: '2',
      description: 'Shaded relief',
      format: 'jpg',
      attribution: 'Example Survey',
      shortName: 'world',
      coverage: {
        topLeft: { latitude: 60, longitude: -10.5 },
        bottomRight: { latitude: 35, longitude: 30 },
      },
    });
  });

  it('accepts a center coverage', () => {
    expect(
      parseMetadataConfig({ coverage: { center: { latitude: 52.5, longitude: 13.4 }, zoom: 8 } })
    ).toEqual({ coverage: { center: { latitude: 52.5, longitude: 13.4 }, zoom: 8 } });
  });

  it('rejects an unknown layer type', () => {
    expect(() => parseMetadataConfig({ type: 'layer' })).toThrow(
      'type must be "overlay" or "baselayer"'
    );
  });

  it('rejects unknown fields', () => {
    expect(() => parseMetadataConfig({ title: 'World' })).toThrow('unknown field "title"');
  });

  it('rejects non-string text fields', () => {
    expect(() => parseMetadataConfig({ description: 7 })).toThrow('description must be a string');
  });

  it('rejects out-of-range coordinates', () => {
    expect(() =>
      parseMetadataConfig({ coverage: { center: { latitude: 91, longitude: 0 } } })
    ).toThrow('coverage.center.latitude must be a number between -90 and 90');
  });

  it('rejects an inverted bounding box', () => {
    expect(() =>
      parseMetadataConfig({
        coverage: {
          topLeft: { latitude: 10, longitude: 0 },
          bottomRight: { latitude: 20, longitude: 5 },
        },
      })
    ).toThrow('coverage.topLeft must not lie south of coverage.bottomRight');
  });

  it('rejects arrays and primitives', () => {
    expect(() => parseMetadataConfig([])).toThrow(MetadataConfigError);
    expect(() => parseMetadataConfig('World')).toThrow(MetadataConfigError);
  });
});

describe('loadMetadataConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('reads a JSON file', () => {
    const path = join(dir, 'world.json');
    writeFileSync(path, JSON.stringify({ name: 'World', type: 'baselayer' }));

    expect(loadMetadataConfig(path)).toEqual({ name: 'World', type: 'baselayer' });
  });

  it('prefixes validation errors with the file path', () => {
    const path = join(dir, 'world.json');
    writeFileSync(path, JSON.stringify({ type: 'layer' }));

    expect(() => loadMetadataConfig(path)).toThrow(
      `${path}: type must be "overlay" or "baselayer"`
    );
  });

  it('reports unreadable JSON as a config error', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ name: ');

    expect(() => loadMetadataConfig(path)).toThrow(MetadataConfigError);
  });

  it('reports a missing file as a config error', () => {
    expect(() => loadMetadataConfig(join(dir, 'missing.json'))).toThrow(MetadataConfigError);
  });
});

describe('bounds', () => {
  it('converts a tile extent to WGS84 bounds', () => {
    const [west, south, east, north] = extentBounds({
      zoom: 1,
      minColumn: 1,
      maxColumn: 1,
      minRow: 1,
      maxRow: 1,
    });

    expect(west).toBeCloseTo(0, 6);
    expect(south).toBeCloseTo(0, 6);
    expect(east).toBeCloseTo(180, 6);
    expect(north).toBeCloseTo(85.0511287798, 6);
  });

  it('formats bounds with six decimals at most', () => {
    expect(formatBounds([-180, -85.0511287798066, 180, 85.0511287798066])).toBe(
      '-180,-85.051129,180,85.051129'
    );
  });
});

describe('buildMetadata', () => {
  it('fills the required keys for an archive without tiles', () => {
    expect(buildMetadata({}, { dbPath: '/data/out/world.mbtiles', mapDir: null, imported: null })).toEqual([
      ['name', 'world'],
      ['type', 'baselayer'],
      ['version', '1'],
      ['description', 'Empty tileset'],
    ]);
  });

  it('derives format, bounds and zoom range from the import', () => {
    const entries = buildMetadata(
      {},
      { dbPath: 'world.mbtiles', mapDir: 'tiles', imported: worldImport() }
    );

    expect(entries).toEqual([
      ['name', 'world'],
      ['type', 'baselayer'],
      ['version', '1'],
      ['description', 'Tiles imported from tiles'],
      ['format', 'png'],
      ['bounds', '-180,-85.051129,180,85.051129'],
      ['minzoom', '0'],
      ['maxzoom', '1'],
    ]);
  });

  it('prefers configured values', () => {
    const entries = buildMetadata(
      {
        name: 'Alps',
        type: 'overlay',
        version: '3',
        description: 'Hiking overlay',
        format: 'jpg',
        attribution: 'Example Survey',
        longAttribution: 'Tiles by Example Survey',
        coverage: {
          topLeft: { latitude: 48, longitude: 5.5 },
          bottomRight: { latitude: 44, longitude: 16 },
        },
      },
      { dbPath: 'alps.mbtiles', mapDir: 'tiles', imported: worldImport() }
    );

    expect(entries).toEqual([
      ['name', 'Alps'],
      ['type', 'overlay'],
      ['version', '3'],
      ['description', 'Hiking overlay'],
      ['format', 'jpg'],
      ['bounds', '5.5,44,16,48'],
      ['minzoom', '0'],
      ['maxzoom', '1'],
      ['attribution', 'Example Survey'],
      ['long_attribution', 'Tiles by Example Survey'],
    ]);
  });

  it('writes a center, defaulting its zoom to the shallowest level imported', () => {
    const imported = { ...worldImport(), minZoom: 2, maxZoom: 4, extent: null };

    const entries = buildMetadata(
      { coverage: { center: { latitude: 52.5, longitude: 13.4 } } },
      { dbPath: 'berlin.mbtiles', mapDir: 'tiles', imported }
    );

    expect(entries).toContainEqual(['center', '13.4,52.5,2']);
    expect(entries.find(([name]) => name === 'bounds')).toBeUndefined();
  });

  it('omits format when several image formats were imported', () => {
    const imported = { ...worldImport(), formats: new Set<TileFormat>(['png', 'jpg']) };

    const entries = buildMetadata({}, { dbPath: 'mixed.mbtiles', mapDir: 'tiles', imported });

    expect(entries.map(([name]) => name)).not.toContain('format');
  });
});
