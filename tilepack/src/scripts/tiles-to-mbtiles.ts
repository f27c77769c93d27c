#!/usr/bin/env node
/**
 * Pack a raster tile directory into an MBTiles 1.1 archive.
 *
 * Usage:
 *   npm run convert -- -db out/world.mbtiles -mapdir tiles/world
 *   npm run convert -- -db out/world.mbtiles -mapdir tiles/world -metadata world.json -verbose
 */
import { run } from './lib/convert.js';

try {
  process.exitCode = run(process.argv.slice(2));
} catch (err) {
  console.error('Conversion failed:', err);
  process.exitCode = 1;
}
