import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { Decimal } from "decimal.js";
import type { PriceObservation, PriceStore } from "@crypto-analyzer/price-stats";
import type { ApiConfig } from "./config";
import { logger } from "./logger";

// Database instance (singleton)
let db: Database.Database | null = null;

/**
 * One CSV row / one table row. Prices stay decimal strings so nothing is lost
 * to floating point on the way in or out.
 */
export interface PriceRecord {
  symbol: string;
  timestamp: number;
  price: string;
}

/**
 * Open a database file (or ":memory:") and make sure the schema exists
 */
export function openDatabase(filename: string): Database.Database {
  const database = new Database(filename);

  database.pragma("journal_mode = WAL");
  database.pragma("synchronous = NORMAL");

  createTables(database);
  return database;
}

/**
 * Initialize the shared connection from config
 */
export function initDatabase(
  config: Pick<ApiConfig, "DATA_DIR" | "DB_FILE">,
): Database.Database {
  if (db) return db;

  let dbPath = config.DB_FILE;
  if (dbPath !== ":memory:") {
    fs.mkdirSync(config.DATA_DIR, { recursive: true });
    dbPath = path.join(config.DATA_DIR, config.DB_FILE);
  }

  db = openDatabase(dbPath);
  logger.info({ dbPath }, "Database initialized");
  return db;
}

export function closeDatabase(): void {
  if (!db) return;
  db.close();
  db = null;
}

function createTables(database: Database.Database): void {
  // (symbol, timestamp) is the identity of an observation; re-imports update the price
  database.exec(`
    CREATE TABLE IF NOT EXISTS prices (
      symbol TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      price TEXT NOT NULL,
      PRIMARY KEY (symbol, timestamp)
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_prices_timestamp ON prices(timestamp);
  `);
}

// ============================================================================
// Price Operations
// ============================================================================

/**
 * Insert or update prices in one transaction
 */
export function upsertPrices(
  database: Database.Database,
  records: PriceRecord[],
): number {
  if (records.length === 0) return 0;

  const upsert = database.prepare<[string, number, string]>(`
    INSERT INTO prices (symbol, timestamp, price)
    VALUES (?, ?, ?)
    ON CONFLICT(symbol, timestamp) DO UPDATE SET price = excluded.price
  `);

  const upsertMany = database.transaction((items: PriceRecord[]) => {
    let written = 0;
    for (const item of items) {
      written += upsert.run(item.symbol, item.timestamp, item.price).changes;
    }
    return written;
  });

  const written = upsertMany(records);
  logger.debug({ written, total: records.length }, "Upserted prices");
  return written;
}

export function findPricesBySymbol(
  database: Database.Database,
  symbol: string,
): PriceObservation[] {
  return database
    .prepare<[string], PriceRecord>(
      "SELECT symbol, timestamp, price FROM prices WHERE symbol = ? ORDER BY timestamp",
    )
    .all(symbol)
    .map(toObservation);
}

/**
 * Both bounds inclusive
 */
export function findPricesBetween(
  database: Database.Database,
  start: number,
  end: number,
): PriceObservation[] {
  return database
    .prepare<[number, number], PriceRecord>(`
      SELECT symbol, timestamp, price FROM prices
      WHERE timestamp BETWEEN ? AND ?
      ORDER BY timestamp, symbol
    `)
    .all(start, end)
    .map(toObservation);
}

export function findAllPrices(database: Database.Database): PriceObservation[] {
  return database
    .prepare<[], PriceRecord>(
      "SELECT symbol, timestamp, price FROM prices ORDER BY timestamp, symbol",
    )
    .all()
    .map(toObservation);
}

export function countPrices(database: Database.Database): number {
  const row = database
    .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM prices")
    .get();
  return row?.count ?? 0;
}

export function listSymbols(database: Database.Database): string[] {
  return database
    .prepare<[], { symbol: string }>(
      "SELECT DISTINCT symbol FROM prices ORDER BY symbol",
    )
    .all()
    .map((row) => row.symbol);
}

export function createPriceStore(database: Database.Database): PriceStore {
  return {
    findBySymbol: (symbol) => findPricesBySymbol(database, symbol),
    findByTimestampRange: (start, end) => findPricesBetween(database, start, end),
    findAll: () => findAllPrices(database),
  };
}

function toObservation(row: PriceRecord): PriceObservation {
  return {
    symbol: row.symbol,
    timestamp: row.timestamp,
    price: new Decimal(row.price),
  };
}
