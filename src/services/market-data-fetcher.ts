// market-data-fetcher.ts
// Fetches current central market price and stock for a set of items from the Arsha v2 API

import type { MarketDataProvider, MarketEntry, MarketSnapshot, Region, VendorCatalog } from '../types';
import { ARSHA_BASE_URL, BLACKLISTED_IDS, PROBE_ITEM_ID } from '../constants/markets';
import { DEFAULT_VENDOR_CATALOG } from '../constants/vendor-items';
import {
  parseRateLimitHeaders,
  calculateWaitTime,
  sleep as defaultSleep,
  DEFAULT_RATE_LIMIT_WAIT,
  type RateLimitInfo,
  type Sleep,
} from '../utils/rate-limiter';
import { httpsGet, isHttpError, type HttpGet } from '../utils/https-client';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface FetchConfig {
  batchSize: number;
  batchDelay: number;
  maxRetries: number;
  initialRetryDelay: number;
  maxRetryDelay: number;
  backoffMultiplier: number;
  jitterRange: number;
  requestTimeout: number;
}

export const CONFIG: FetchConfig = {
  batchSize: 20,
  batchDelay: 100,
  maxRetries: 3,
  initialRetryDelay: 1000,
  maxRetryDelay: 30000,
  backoffMultiplier: 2,
  jitterRange: 0.3,
  requestTimeout: 10000,
};

// ============================================================================
// TYPES
// ============================================================================

export interface FetchResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  statusCode?: number;
  retryable?: boolean;
  rateLimitInfo?: RateLimitInfo;
}

export type ProgressCallback = (done: number, total: number, found: number) => void;

export interface ArshaProviderOptions {
  httpGet?: HttpGet;
  sleep?: Sleep;
  config?: Partial<FetchConfig>;
  vendors?: VendorCatalog;
  onProgress?: ProgressCallback;
}

export interface ProbeResult {
  ok: boolean;
  url: string;
  statusCode?: number;
  body: string;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function addJitter(delay: number, jitterRange: number): number {
  const jitter = delay * jitterRange;
  return delay + (Math.random() * 2 - 1) * jitter;
}

export function buildPriceUrl(regionCode: string, itemIds: number[]): string {
  return `${ARSHA_BASE_URL}/${regionCode}/price?id=${itemIds.join(',')}&lang=en`;
}

/**
 * Split ids into fixed-size batches
 */
export function createBatches(itemIds: number[], batchSize: number): number[][] {
  const size = Math.max(1, Math.floor(batchSize));
  const batches: number[][] = [];
  for (let i = 0; i < itemIds.length; i += size) {
    batches.push(itemIds.slice(i, i + size));
  }
  return batches;
}

function toInt(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? Math.trunc(n) : 0;
}

/**
 * Read price records out of a response body. The endpoint answers with a list,
 * or with a bare object when a single id was requested. Returns null when the
 * body isn't a price response at all.
 */
export function parsePriceRecords(data: unknown): Array<[number, MarketEntry]> | null {
  let records: unknown[];
  if (Array.isArray(data)) {
    records = data;
  } else if (typeof data === 'object' && data !== null && 'id' in data) {
    records = [data];
  } else {
    return null;
  }

  const entries: Array<[number, MarketEntry]> = [];
  for (const record of records) {
    if (typeof record !== 'object' || record === null) continue;

    const id = 'id' in record ? toInt(record.id) : 0;
    if (id === 0) continue;

    entries.push([
      id,
      {
        price: 'pricePerOne' in record ? toInt(record.pricePerOne) : 0,
        stock: 'currentStock' in record ? toInt(record.currentStock) : 0,
      },
    ]);
  }
  return entries;
}

// ============================================================================
// PROVIDER
// ============================================================================

export class ArshaMarketProvider implements MarketDataProvider {
  private region: Region;
  private httpGet: HttpGet;
  private sleep: Sleep;
  private config: FetchConfig;
  private vendors: VendorCatalog;
  private onProgress?: ProgressCallback;

  constructor(region: Region, options: ArshaProviderOptions = {}) {
    this.region = region;
    this.httpGet = options.httpGet ?? httpsGet;
    this.sleep = options.sleep ?? defaultSleep;
    this.config = { ...CONFIG, ...options.config };
    this.vendors = options.vendors ?? DEFAULT_VENDOR_CATALOG;
    this.onProgress = options.onProgress;
  }

  /**
   * Ids worth asking for: unique, not vendor items and not known to break the endpoint
   */
  filterRequestableIds(itemIds: Iterable<number>): number[] {
    const ids = new Set<number>();
    for (const id of itemIds) {
      if (BLACKLISTED_IDS.has(id) || this.vendors.isVendorItem(id)) continue;
      ids.add(id);
    }
    return [...ids];
  }

  private async request(url: string): Promise<FetchResult<unknown>> {
    const response = await this.httpGet(url, this.config.requestTimeout);

    if (isHttpError(response)) {
      return { success: false, error: response.error, retryable: true };
    }

    const { statusCode } = response;

    if (statusCode === 200) {
      try {
        return { success: true, data: JSON.parse(response.body), statusCode };
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return { success: false, error: `Parse error: ${message}`, statusCode, retryable: false };
      }
    }

    if (statusCode === 429) {
      return {
        success: false,
        error: 'Rate limited',
        statusCode,
        retryable: true,
        rateLimitInfo: parseRateLimitHeaders(response.headers) ?? undefined,
      };
    }

    if (statusCode >= 500) {
      return { success: false, error: `Server error ${statusCode}`, statusCode, retryable: true };
    }

    return { success: false, error: `HTTP ${statusCode}`, statusCode, retryable: false };
  }

  /**
   * Retry transient failures with exponential backoff. Rate limits wait out the
   * window and don't count as an attempt.
   */
  async fetchWithRetry(url: string): Promise<FetchResult<unknown>> {
    let attempt = 1;

    for (;;) {
      const result = await this.request(url);
      if (result.success) return result;

      const isRateLimited = result.statusCode === 429;
      if (!result.retryable || (!isRateLimited && attempt >= this.config.maxRetries)) {
        return result;
      }

      if (isRateLimited) {
        const waitSeconds = result.rateLimitInfo
          ? calculateWaitTime(result.rateLimitInfo)
          : DEFAULT_RATE_LIMIT_WAIT;
        await this.sleep(waitSeconds * 1000);
      } else {
        const baseDelay =
          this.config.initialRetryDelay * Math.pow(this.config.backoffMultiplier, attempt - 1);
        await this.sleep(addJitter(Math.min(baseDelay, this.config.maxRetryDelay), this.config.jitterRange));
        attempt++;
      }
    }
  }

  /**
   * Fetch one batch. The endpoint has accepted the region code in either case
   * at different times, so try lower case first and fall back to upper case.
   */
  async fetchBatch(batch: number[]): Promise<FetchResult<Array<[number, MarketEntry]>>> {
    let lastError = 'No response';

    for (const regionCode of [this.region.toLowerCase(), this.region.toUpperCase()]) {
      const result = await this.fetchWithRetry(buildPriceUrl(regionCode, batch));

      if (result.success) {
        const entries = parsePriceRecords(result.data);
        if (entries) {
          return { success: true, data: entries, statusCode: result.statusCode };
        }
        lastError = 'Unexpected response body';
      } else {
        lastError = result.error ?? lastError;
      }
    }

    return { success: false, error: lastError };
  }

  /**
   * Price and stock for every requested id the market knows. Failed batches are
   * logged and skipped; the snapshot then simply lacks those ids.
   */
  async lookup(itemIds: Iterable<number>): Promise<MarketSnapshot> {
    const ids = this.filterRequestableIds(itemIds);
    const batches = createBatches(ids, this.config.batchSize);
    const market = new Map<number, MarketEntry>();

    for (let i = 0; i < batches.length; i++) {
      const result = await this.fetchBatch(batches[i]);

      if (result.success && result.data) {
        for (const [id, entry] of result.data) {
          market.set(id, Object.freeze(entry));
        }
      } else {
        console.warn(`\n⚠️  Batch ${i + 1}/${batches.length} failed: ${result.error}`);
      }

      this.onProgress?.(i + 1, batches.length, market.size);

      if (i < batches.length - 1 && this.config.batchDelay > 0) {
        await this.sleep(this.config.batchDelay);
      }
    }

    return market;
  }

  /**
   * Single-item request to check the endpoint is reachable from here at all
   */
  async probe(itemId: number = PROBE_ITEM_ID): Promise<ProbeResult> {
    const url = buildPriceUrl(this.region.toLowerCase(), [itemId]);
    const response = await this.httpGet(url, this.config.requestTimeout);

    if (isHttpError(response)) {
      return { ok: false, url, body: response.error };
    }

    return {
      ok: response.statusCode === 200,
      url,
      statusCode: response.statusCode,
      body: response.body.slice(0, 500),
    };
  }
}

/**
 * Progress line in the style of the other fetchers: "\r   Fetching prices... 40% (2/5)"
 */
export function writeProgress(done: number, total: number, found: number): void {
  const percentComplete = total > 0 ? Math.round((done / total) * 100) : 100;
  process.stdout.write(`\r   Fetching prices... ${percentComplete}% (${done}/${total}) - found ${found} prices`);
}
