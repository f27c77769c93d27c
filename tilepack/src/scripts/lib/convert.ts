/**
 * Command-line driver: create archive, import tiles, write metadata,
 * report statistics.
 *
 * Exit codes:
 *   0  success
 *   1  usage or fatal error (bad arguments, archive cannot be created or written)
 *   2  archive written, but some tile files were skipped
 */
import { statSync } from 'node:fs';
import { TileArchive } from '../../core/archive.js';
import { ArchiveCreateError, ArchiveWriteError, MetadataConfigError } from '../../core/errors.js';
import { importTiles, type ImportResult } from '../../core/importer.js';
import { buildMetadata, loadMetadataConfig, type MetadataConfig } from '../../core/metadata.js';
import { collectStats, formatStats } from '../../core/stats.js';
import { createConsoleLogger, type Logger } from '../../utils/logger.js';

export const VERSION = '1.1.0';

/** Number of row conversions echoed in verbose mode */
const PREVIEW_COUNT = 100;

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_SKIPPED_FILES = 2;

// ============================================================================
// Arguments
// ============================================================================

export interface CliArgs {
  dbPath: string;
  mapDir: string | null;
  metadataPath: string | null;
  verbose: boolean;
}

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; message: string | null };

export const USAGE = [
  'Usage: tiles-to-mbtiles -db <db file> [-mapdir <map directory>] [-metadata <file.json>] [-verbose]',
  'Options:',
  '  -db        Path of the MBTiles archive to create (replaced if it exists)',
  '  -mapdir    Tile directory laid out as <zoom>/<column>/<row>.png',
  '  -metadata  JSON file with tileset name, type, version, description, coverage',
  '  -verbose   Log the first row conversions of the import',
];

export function parseArgs(argv: string[]): ParsedArgs {
  const result: Partial<CliArgs> = {
    mapDir: null,
    metadataPath: null,
    verbose: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const takeValue = (): string | null => {
      const value = argv[i + 1];
      if (value === undefined) return null;
      i++;
      return value;
    };

    switch (arg) {
      case '-db':
      case '--db': {
        const value = takeValue();
        if (value === null) return { ok: false, message: `${arg} needs a value` };
        result.dbPath = value;
        break;
      }
      case '-mapdir':
      case '--mapdir': {
        const value = takeValue();
        if (value === null) return { ok: false, message: `${arg} needs a value` };
        result.mapDir = value;
        break;
      }
      case '-metadata':
      case '--metadata': {
        const value = takeValue();
        if (value === null) return { ok: false, message: `${arg} needs a value` };
        result.metadataPath = value;
        break;
      }
      case '-verbose':
      case '--verbose':
        result.verbose = true;
        break;
      default:
        return { ok: false, message: `Unknown argument: ${arg}` };
    }
  }

  if (!result.dbPath) {
    return { ok: false, message: null };
  }

  return {
    ok: true,
    args: {
      dbPath: result.dbPath,
      mapDir: result.mapDir ?? null,
      metadataPath: result.metadataPath ?? null,
      verbose: result.verbose ?? false,
    },
  };
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

// ============================================================================
// Run
// ============================================================================

function runImport(archive: TileArchive, mapDir: string, logger: Logger): ImportResult {
  logger.info(`Importing map tiles at ${mapDir}`);

  let previews = 0;
  const result = importTiles(archive, mapDir, {
    onTile: (event) => {
      if (previews >= PREVIEW_COUNT) return;
      previews++;
      logger.debug(
        `zoom ${event.zoom} (${2 ** event.zoom} rows): ${event.path} -> column ${event.column}, row ${event.tileRow}`
      );
    },
    onFailure: (failure) => {
      logger.warn(`Could not import ${failure.path}: ${failure.message}`);
    },
  });

  const zooms =
    result.minZoom === null ? 'no zoom levels' : `zoom ${result.minZoom} - ${result.maxZoom}`;
  logger.info(`Imported ${result.imported} tile(s), ${zooms}`);
  if (result.replaced > 0) {
    logger.info(`${result.replaced} tile(s) replaced an earlier file with the same coordinates`);
  }
  if (result.ignored > 0) {
    logger.debug(`${result.ignored} file(s) ignored by extension`);
  }

  return result;
}

/**
 * Run the converter and return the process exit code.
 */
export function run(argv: string[], logger?: Logger): number {
  const parsed = parseArgs(argv);
  const log = logger ?? createConsoleLogger(parsed.ok && parsed.args.verbose);

  log.info(`tiles-to-mbtiles ${VERSION} - generating for MBTiles 1.1`);

  if (!parsed.ok) {
    if (parsed.message) log.error(parsed.message);
    for (const line of USAGE) log.info(line);
    return EXIT_FATAL;
  }

  const { dbPath, mapDir, metadataPath } = parsed.args;

  if (mapDir !== null && !isDirectory(mapDir)) {
    log.error(`Map directory does not exist: ${mapDir}`);
    return EXIT_FATAL;
  }

  let config: MetadataConfig = {};
  if (metadataPath !== null) {
    try {
      config = loadMetadataConfig(metadataPath);
    } catch (err) {
      if (!(err instanceof MetadataConfigError)) throw err;
      log.error(err.message);
      return EXIT_FATAL;
    }
  }

  log.info(`Creating ${dbPath}`);
  let archive: TileArchive;
  try {
    archive = TileArchive.create(dbPath);
  } catch (err) {
    if (!(err instanceof ArchiveCreateError)) throw err;
    log.error(err.message);
    return EXIT_FATAL;
  }

  try {
    const imported = mapDir === null ? null : runImport(archive, mapDir, log);

    archive.putMetadataEntries(buildMetadata(config, { dbPath, mapDir, imported }));

    if (mapDir !== null) {
      log.info('');
      for (const line of formatStats(collectStats(archive, dbPath, mapDir))) {
        log.info(line);
      }
    }

    if (imported && imported.failures.length > 0) {
      log.error(`${imported.failures.length} file(s) could not be imported`);
      return EXIT_SKIPPED_FILES;
    }
    return EXIT_OK;
  } catch (err) {
    if (!(err instanceof ArchiveWriteError)) throw err;
    log.error(err.message);
    return EXIT_FATAL;
  } finally {
    archive.close();
  }
}
