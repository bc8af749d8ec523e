import pLimit from 'p-limit';
import { withStore } from '../../db/store';
import type { StoreProvider } from '../../db/store';
import { errorMessage } from '../../errors';
import { silentLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { BatchReport, ReconcileResult, RestaurantRecord, UrlOutcome } from '../../types';
import { reconcileRestaurants } from '../reconcile';
import type { BaseAdapter } from './baseAdapter';
import { PageFetcher } from './http';
import { EaterAdapter } from './sites/eater';

export const DEFAULT_CONCURRENCY = 5;
export const MAX_CONCURRENCY = 10;

export interface ScrapeEngineOptions {
  storeProvider: StoreProvider;
  fetcher?: PageFetcher;
  adapter?: BaseAdapter;
  concurrency?: number;
  logger?: Logger;
}

export interface PageResult {
  url: string;
  records: RestaurantRecord[];
  reconciled: ReconcileResult[];
}

function normalizeConcurrency(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 1) return fallback;
  return Math.min(MAX_CONCURRENCY, Math.floor(value));
}

export class ScrapeEngine {
  private readonly storeProvider: StoreProvider;
  private readonly fetcher: PageFetcher;
  private readonly adapter: BaseAdapter;
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor({ storeProvider, fetcher, adapter, concurrency, logger }: ScrapeEngineOptions) {
    this.storeProvider = storeProvider;
    this.log = (logger ?? silentLogger).child({ component: 'engine' });
    this.fetcher = fetcher ?? new PageFetcher({ logger: logger ?? silentLogger });
    this.adapter = adapter ?? new EaterAdapter();
    this.concurrency = normalizeConcurrency(concurrency, DEFAULT_CONCURRENCY);
  }

  getMeta() {
    return { adapter: this.adapter.getMeta().name, concurrency: this.concurrency };
  }

  /**
   * Fetch, parse and reconcile one page inside its own store session.
   * Any failure propagates to the caller.
   */
  async scrapePage(url: string): Promise<PageResult> {
    const log = this.log.child({ url });
    log.info('Starting to scrape');
    const html = await this.fetcher.fetchHtml(url);
    const records = this.adapter.parsePage(html, url, log);
    const reconciled = records.length
      ? await withStore(this.storeProvider, (store) => reconcileRestaurants(store, records, log))
      : [];
    return { url, records, reconciled };
  }

  /**
   * Scrape every URL with at most `concurrency` pages in flight.
   * A failing URL is logged and reported; it never stops the others.
   * Resolves once every unit has settled; awaiting them all is what drains the pool.
   */
  async runBatch(urls: string[], { concurrency }: { concurrency?: number } = {}): Promise<BatchReport> {
    if (urls.length === 0) {
      this.log.info('No URLs to scrape');
      return { total: 0, succeeded: 0, failed: 0, outcomes: [] };
    }
    const limit = pLimit(normalizeConcurrency(concurrency, this.concurrency));

    const tasks = urls.map((url) =>
      limit(async (): Promise<UrlOutcome> => {
        try {
          const { records, reconciled } = await this.scrapePage(url);
          const created = reconciled.filter((r) => r.action === 'created').length;
          this.log.info(
            { url, records: records.length, created, updated: reconciled.length - created },
            'Successfully processed restaurants',
          );
          return { url, status: 'ok', records: records.length, created, updated: reconciled.length - created };
        } catch (err) {
          this.log.error({ url, err: errorMessage(err) }, 'Scrape failed');
          return { url, status: 'failed', error: errorMessage(err) };
        }
      }),
    );

    const outcomes = await Promise.all(tasks);

    const succeeded = outcomes.filter((o) => o.status === 'ok').length;
    const report: BatchReport = { total: urls.length, succeeded, failed: urls.length - succeeded, outcomes };
    this.log.info({ total: report.total, succeeded, failed: report.failed }, 'All scrape tasks completed');
    return report;
  }
}
