#!/usr/bin/env node
/**
 * Prints the 24 solar terms counted under a year.
 *
 * Usage:
 *   npx tsx tools/printSolarTerms.ts 2024
 */

import "dotenv/config";
import { toIsoString } from "../astro/time/instant.js";
import { configFromEnv, providerFromEnv } from "../lib/envConfig.js";
import { createNormalizer } from "../pillars/temporalCoordinates.js";

async function main() {
  const year = Number(process.argv[2]);
  if (!Number.isInteger(year)) {
    console.error("Usage: tsx tools/printSolarTerms.ts <year>");
    process.exit(1);
  }

  const { locator } = createNormalizer({
    config: configFromEnv(),
    provider: providerFromEnv(),
  });

  const terms = locator.termsForYear(year).map((node) => ({
    target_longitude: node.targetLongitude,
    utc_datetime: toIsoString(node.epochSeconds),
    residual_deg: node.residualDeg,
    iterations: node.iterations,
  }));

  console.log(JSON.stringify({ year, provider: locator.provider.name, terms }, null, 2));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
