import axios from 'axios';
import type { AxiosRequestConfig, AxiosResponse } from 'axios';
import { FetchError, HttpStatusError, errorMessage } from '../../errors';
import { silentLogger } from '../../logger';
import type { Logger } from '../../logger';
import { DEFAULT_RETRY_POLICY, RetryExhaustedError, withRetry } from './retry';
import type { RetryHooks, RetryPolicy } from './retry';

// Enough of a desktop browser to get past basic bot filters.
export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  'Connection': 'keep-alive',
};

export const DEFAULT_TIMEOUT_MS = 30000;

/** The slice of axios the fetcher needs; tests hand in a stub. */
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
}

export function createHttpClient(timeoutMs: number = DEFAULT_TIMEOUT_MS): HttpClient {
  return axios.create({
    timeout: timeoutMs,
    headers: BROWSER_HEADERS,
    responseType: 'text',
    // Status is checked by the fetcher so non-2xx can be classified as retryable.
    validateStatus: () => true,
  });
}

export interface PageFetcherOptions {
  http?: HttpClient;
  retryPolicy?: RetryPolicy;
  timeoutMs?: number;
  logger?: Logger;
  hooks?: Omit<RetryHooks, 'onRetry'>;
}

export class PageFetcher {
  private readonly http: HttpClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly hooks: Omit<RetryHooks, 'onRetry'>;

  constructor({ http, retryPolicy, timeoutMs, logger, hooks }: PageFetcherOptions = {}) {
    this.timeoutMs = timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = http ?? createHttpClient(this.timeoutMs);
    this.retryPolicy = retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.log = (logger ?? silentLogger).child({ component: 'fetcher' });
    this.hooks = hooks ?? {};
  }

  /** GET `url` and return the body; rejects with FetchError once retries are spent. */
  async fetchHtml(url: string): Promise<string> {
    try {
      return await withRetry((attempt) => this.fetchOnce(url, attempt), this.retryPolicy, {
        ...this.hooks,
        onRetry: ({ attempt, delayMs, error }) => {
          this.log.warn({ url, attempt, delayMs, err: errorMessage(error) }, 'Fetch failed, retrying');
        },
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        const last = err.lastError;
        const status = last instanceof HttpStatusError ? last.status : axios.isAxiosError(last) ? last.response?.status ?? null : null;
        this.log.error({ url, attempts: err.attempts, status }, 'Fetch attempts exhausted');
        throw new FetchError(url, err.attempts, status, last);
      }
      throw err;
    }
  }

  private async fetchOnce(url: string, attempt: number): Promise<string> {
    this.log.info({ url, attempt }, 'Fetching');
    const resp = await this.http.get(url, { timeout: this.timeoutMs, headers: BROWSER_HEADERS });
    if (resp.status < 200 || resp.status >= 300) throw new HttpStatusError(url, resp.status);
    this.log.debug({ url, status: resp.status, headers: resp.headers }, 'Response received');
    return typeof resp.data === 'string' ? resp.data : JSON.stringify(resp.data);
  }
}
