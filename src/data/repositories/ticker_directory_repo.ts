/**
 * Snapshot of the SEC ticker directory, so restarts within the TTL skip the download
 */

import { getDatabase } from '../db';
import { createChildLogger } from '@/utils/logger';
import type { DirectoryRecord } from '@/providers/types';
import { checkSnapshot, forgetSnapshot, markSnapshotStored } from './snapshot_meta_repo';

const logger = createChildLogger('ticker_directory_repo');

export const TICKER_DIRECTORY_SNAPSHOT_KEY = 'sec:company_tickers';

interface DirectoryRow {
  ticker: string;
  legalName: string;
  identifier: string;
}

export function saveTickerDirectory(
  records: DirectoryRecord[],
  ttlSeconds: number,
  now: number = Date.now()
): void {
  const db = getDatabase();
  const insert = db.prepare(`
    INSERT INTO ticker_directory (position, ticker, legal_name, identifier)
    VALUES (?, ?, ?, ?)
  `);

  const replaceAll = db.transaction((rows: DirectoryRecord[]) => {
    db.prepare('DELETE FROM ticker_directory').run();
    rows.forEach((row, index) => {
      insert.run(index, row.ticker, row.legalName, row.identifier);
    });
    markSnapshotStored(TICKER_DIRECTORY_SNAPSHOT_KEY, ttlSeconds, now);
  });

  replaceAll(records);
  logger.info({ count: records.length }, 'Saved ticker directory snapshot');
}

export function getTickerDirectoryIfFresh(now: number = Date.now()): DirectoryRecord[] | null {
  const { fresh, remainingMs } = checkSnapshot(TICKER_DIRECTORY_SNAPSHOT_KEY, now);
  if (!fresh) {
    logger.debug({ remainingMs }, 'Ticker directory snapshot missing or expired');
    return null;
  }

  const db = getDatabase();
  const rows = db
    .prepare<[], DirectoryRow>(
      `SELECT ticker, legal_name as legalName, identifier
       FROM ticker_directory
       ORDER BY position`
    )
    .all();

  if (rows.length === 0) {
    return null;
  }

  return rows.map((row) => ({
    ticker: row.ticker,
    legalName: row.legalName,
    identifier: row.identifier,
  }));
}

export function clearTickerDirectory(): void {
  const db = getDatabase();
  db.prepare('DELETE FROM ticker_directory').run();
  forgetSnapshot(TICKER_DIRECTORY_SNAPSHOT_KEY);
}
