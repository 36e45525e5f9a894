import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type { MarketSnapshot, SnapshotRow } from '../types/index.js';

type SnapshotDbRow = {
  market_id: string;
  ts: string;
  last_price: number | null;
  yes_bid: number | null;
  yes_ask: number | null;
  volume: number | null;
  open_interest: number | null;
};

function rowToSnapshot(r: SnapshotDbRow): SnapshotRow {
  return {
    marketId: r.market_id,
    timestamp: r.ts,
    lastPrice: r.last_price,
    yesBid: r.yes_bid,
    yesAsk: r.yes_ask,
    volume: r.volume,
    openInterest: r.open_interest
  };
}

export interface SnapshotHistory {
  record(snapshot: MarketSnapshot): void;
  /** a bare price observation, as the watcher sees it */
  recordTick(marketId: string, price: number, at: Date): void;
  recent(marketId: string, windowMinutes: number, now?: Date): SnapshotRow[];
}

// Past observations per market, read by the history-based tools. Insert-only.
export class SnapshotStore implements SnapshotHistory {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS market_snapshots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        market_id TEXT NOT NULL,
        ts TEXT NOT NULL,
        ts_ms INTEGER NOT NULL,
        last_price REAL,
        yes_bid REAL,
        yes_ask REAL,
        volume REAL,
        open_interest REAL
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_market_ts ON market_snapshots(market_id, ts_ms);
    `);
  }

  record(snapshot: MarketSnapshot): void {
    this.insert({
      marketId: snapshot.marketId,
      timestamp: snapshot.timestamp,
      lastPrice: snapshot.price,
      yesBid: snapshot.yesBid,
      yesAsk: snapshot.yesAsk,
      volume: snapshot.volume,
      openInterest: snapshot.openInterest
    });
  }

  recordTick(marketId: string, price: number, at: Date): void {
    this.insert({
      marketId,
      timestamp: at.toISOString(),
      lastPrice: price,
      yesBid: null,
      yesAsk: null,
      volume: null,
      openInterest: null
    });
  }

  private insert(row: SnapshotRow): void {
    const tsMs = Date.parse(row.timestamp);
    if (!Number.isFinite(tsMs)) throw new Error(`Invalid snapshot timestamp: ${row.timestamp}`);

    this.db
      .prepare(
        `INSERT INTO market_snapshots (market_id, ts, ts_ms, last_price, yes_bid, yes_ask, volume, open_interest)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(row.marketId, row.timestamp, tsMs, row.lastPrice, row.yesBid, row.yesAsk, row.volume, row.openInterest);
  }

  recent(marketId: string, windowMinutes: number, now: Date = new Date()): SnapshotRow[] {
    const since = now.getTime() - windowMinutes * 60_000;
    const rows = this.db
      .prepare<[string, number], SnapshotDbRow>(
        `SELECT market_id, ts, last_price, yes_bid, yes_ask, volume, open_interest
         FROM market_snapshots WHERE market_id = ? AND ts_ms >= ? ORDER BY ts_ms ASC, id ASC`
      )
      .all(marketId, since);
    return rows.map(rowToSnapshot);
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM market_snapshots').get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
