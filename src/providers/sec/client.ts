/**
 * SEC EDGAR ticker directory
 * Bulk listing of tickers, legal names and CIKs from company_tickers.json
 */

import { createChildLogger } from '@/utils/logger';
import {
  getTickerDirectoryIfFresh,
  saveTickerDirectory,
} from '@/data/repositories/ticker_directory_repo';
import { validateSecTickers } from '@/validation/ajv_instance';
import type { SecCompanyTickersPayload } from '@/validation/payloads';
import { fetchJson, type FetchLike } from '../http/fetch_json';
import type { RateLimiter } from '../http/rate_limiter';
import {
  ProviderPayloadError,
  toError,
  type DirectoryRecord,
  type TickerDirectoryProvider,
} from '../types';

const logger = createChildLogger('sec');

export interface SecTickerDirectoryOptions {
  userAgent: string;
  url: string;
  /** Snapshot lifetime; 0 disables the SQLite snapshot */
  snapshotTtlSeconds: number;
  limiter?: RateLimiter;
  fetchImpl?: FetchLike;
}

export function padCik(value: number | string): string {
  const raw = String(value ?? '').replace(/\D/g, '');
  return raw.padStart(10, '0');
}

export function toDirectoryRecords(payload: SecCompanyTickersPayload): DirectoryRecord[] {
  const records: DirectoryRecord[] = [];
  for (const row of Object.values(payload)) {
    const ticker = row.ticker.trim().toUpperCase();
    const legalName = row.title.trim();
    if (!ticker || !legalName) {
      continue;
    }
    records.push({ ticker, legalName, identifier: padCik(row.cik_str) });
  }
  return records;
}

export class SecTickerDirectory implements TickerDirectoryProvider {
  private readonly options: SecTickerDirectoryOptions;
  private requestCount = 0;

  constructor(options: SecTickerDirectoryOptions) {
    this.options = options;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  async listEntries(): Promise<DirectoryRecord[]> {
    const snapshot = this.readSnapshot();
    if (snapshot) {
      logger.debug({ count: snapshot.length }, 'Using cached ticker directory');
      return snapshot;
    }

    logger.info({ url: this.options.url }, 'Fetching ticker directory from SEC');
    this.requestCount++;
    const payload = await fetchJson(
      {
        provider: 'sec',
        operation: 'company_tickers',
        url: new URL(this.options.url),
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept-Encoding': 'gzip, deflate',
        },
        limiter: this.options.limiter,
      },
      this.options.fetchImpl
    );

    const validation = validateSecTickers(payload);
    if (!validation.valid) {
      throw new ProviderPayloadError(
        'SEC company_tickers.json did not match the expected shape',
        'sec',
        'company_tickers',
        validation.errors
      );
    }

    const records = toDirectoryRecords(validation.data);
    logger.info({ count: records.length }, 'Loaded ticker directory');
    this.writeSnapshot(records);
    return records;
  }

  private readSnapshot(): DirectoryRecord[] | null {
    if (this.options.snapshotTtlSeconds <= 0) {
      return null;
    }
    try {
      return getTickerDirectoryIfFresh();
    } catch (error) {
      logger.warn({ error: toError(error).message }, 'Ticker directory snapshot unreadable, refetching');
      return null;
    }
  }

  private writeSnapshot(records: DirectoryRecord[]): void {
    if (this.options.snapshotTtlSeconds <= 0 || records.length === 0) {
      return;
    }
    try {
      saveTickerDirectory(records, this.options.snapshotTtlSeconds);
    } catch (error) {
      logger.warn({ error: toError(error).message }, 'Failed to persist ticker directory snapshot');
    }
  }
}
