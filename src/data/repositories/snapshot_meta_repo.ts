/**
 * Freshness bookkeeping for snapshots of remote data kept in SQLite
 */

import { getDatabase } from '../db';

export interface SnapshotMeta {
  key: string;
  storedAt: number;
  ttlSeconds: number;
  reads: number;
}

export interface SnapshotFreshness {
  fresh: boolean;
  /** Milliseconds left before expiry; negative once expired, null if never stored */
  remainingMs: number | null;
}

export function getSnapshotMeta(key: string): SnapshotMeta | null {
  const row = getDatabase()
    .prepare<[string], SnapshotMeta>(
      `SELECT key, stored_at AS storedAt, ttl_seconds AS ttlSeconds, reads
       FROM snapshot_meta
       WHERE key = ?`
    )
    .get(key);
  return row ?? null;
}

export function markSnapshotStored(key: string, ttlSeconds: number, now: number = Date.now()): void {
  getDatabase()
    .prepare(
      `INSERT INTO snapshot_meta (key, stored_at, ttl_seconds, reads)
       VALUES (?, ?, ?, 0)
       ON CONFLICT(key) DO UPDATE SET
         stored_at = excluded.stored_at,
         ttl_seconds = excluded.ttl_seconds,
         reads = 0`
    )
    .run(key, now, ttlSeconds);
}

/** Freshness at `now`; a fresh check counts as a read */
export function checkSnapshot(key: string, now: number = Date.now()): SnapshotFreshness {
  const meta = getSnapshotMeta(key);
  if (!meta) {
    return { fresh: false, remainingMs: null };
  }

  const remainingMs = meta.storedAt + meta.ttlSeconds * 1000 - now;
  const fresh = remainingMs > 0;
  if (fresh) {
    getDatabase().prepare('UPDATE snapshot_meta SET reads = reads + 1 WHERE key = ?').run(key);
  }
  return { fresh, remainingMs };
}

export function forgetSnapshot(key: string): void {
  getDatabase().prepare('DELETE FROM snapshot_meta WHERE key = ?').run(key);
}
