#!/usr/bin/env node
import dotenv from 'dotenv';
import { createRuntime } from '../bootstrap';
import { withStore } from '../db/store';
import type { RestaurantStore } from '../db/store';
import { InMemoryStoreProvider } from '../db/memoryStore';
import { ConfigError } from '../errors';
import type { RestaurantRecord } from '../types';
import { saveToTsv } from '../utils/exportTsv';
import { USAGE, parseArgs } from './cliArgs';

dotenv.config();

async function allRecords(store: RestaurantStore): Promise<RestaurantRecord[]> {
  const out: RestaurantRecord[] = [];
  const limit = 100;
  for (let skip = 0; ; skip += limit) {
    const rows = await store.listRestaurants({ skip, limit });
    for (const r of rows) {
      out.push({ name: r.name, description: r.description, source: r.source, source_url: r.source_url ?? '', address: r.address });
    }
    if (rows.length < limit) return out;
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.urls.length) {
    console.error(USAGE);
    process.exit(2);
  }
  const { engine, logger, storeProvider } = createRuntime(
    process.env,
    args.dryRun ? { storeProvider: new InMemoryStoreProvider() } : {},
  );
  const report = await engine.runBatch(args.urls, { concurrency: args.concurrency });
  logger.info({ succeeded: report.succeeded, failed: report.failed }, 'Batch finished');
  if (args.tsv) {
    const records = await withStore(storeProvider, allRecords);
    const path = await saveToTsv(records, args.tsv);
    logger.info({ path, count: records.length }, 'Saved restaurants to TSV');
  }
  process.exitCode = report.failed > 0 ? 1 : 0;
}

main().catch((err) => {
  console.error(err instanceof ConfigError ? err.message : err);
  process.exit(1);
});
