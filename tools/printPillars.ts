#!/usr/bin/env node
/**
 * Prints the coordinate record for an instant and longitude.
 *
 * Usage:
 *   npx tsx tools/printPillars.ts <ISO datetime | unix seconds> <longitude>
 *   npx tsx tools/printPillars.ts 1949-10-01T04:00:00Z 116.4
 */

import "dotenv/config";
import { configFromEnv, providerFromEnv } from "../lib/envConfig.js";
import { createNormalizer } from "../pillars/temporalCoordinates.js";
import { toCoordinateRecord } from "../pillars/schema/coordinateRecord.schema.js";

function usage() {
  console.error("Usage: tsx tools/printPillars.ts <ISO datetime | unix seconds> <longitude>");
}

function parseTimestamp(input: string): number {
  if (/^-?\d+(\.\d+)?$/.test(input)) return Number(input);
  const ms = Date.parse(input);
  if (Number.isNaN(ms)) {
    throw new Error(`Cannot parse timestamp: ${input}`);
  }
  return ms / 1000;
}

async function main() {
  const [, , when, lon] = process.argv;
  if (!when || lon === undefined) {
    usage();
    process.exit(1);
  }

  const normalizer = createNormalizer({
    config: configFromEnv(),
    provider: providerFromEnv(),
  });
  const set = normalizer.convert(parseTimestamp(when), Number(lon));

  console.log(JSON.stringify(toCoordinateRecord(set), null, 2));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
