import fs from "node:fs";
import path from "node:path";
import type Database from "better-sqlite3";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { type PriceRecord, upsertPrices } from "./db";
import { logger } from "./logger";

/** BTC_values.csv, ETH_values.csv, ... */
export const PRICE_FILE_PATTERN = /^[A-Za-z0-9]+_values\.csv$/;

// Columns are read by position: timestamp, symbol, price
const priceRowSchema = z
  .tuple([
    z
      .string()
      .regex(/^\d+$/, "timestamp must be a non-negative integer")
      .transform(Number)
      .pipe(z.number().safe()),
    z.string().min(1, "symbol must not be empty"),
    z.string().regex(/^\d+(\.\d+)?$/, "price must be a non-negative decimal"),
  ])
  .rest(z.string())
  .transform(([timestamp, symbol, price]): PriceRecord => ({ timestamp, symbol, price }));

export interface ParsedPrices {
  records: PriceRecord[];
  skipped: number;
}

export interface LoadSummary {
  files: number;
  upserted: number;
  skipped: number;
  failed: string[];
}

/**
 * Parse `timestamp,symbol,price` CSV content. The first line is a header and
 * is skipped whatever it says; invalid rows are skipped and counted.
 */
export function parsePriceCsv(content: string, source: string): ParsedPrices {
  const rows: unknown[] = parse(content, {
    bom: true,
    from_line: 2,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  const records: PriceRecord[] = [];
  let skipped = 0;

  rows.forEach((row, index) => {
    const result = priceRowSchema.safeParse(row);
    if (result.success) {
      records.push(result.data);
      return;
    }
    skipped++;
    logger.warn(
      { source, record: index + 1, issues: result.error.issues.map((i) => i.message) },
      "Skipping invalid price row",
    );
  });

  return { records, skipped };
}

export async function loadPriceFile(filePath: string): Promise<ParsedPrices> {
  const content = await fs.promises.readFile(filePath, "utf-8");
  return parsePriceCsv(content, path.basename(filePath));
}

/**
 * Load every `<SYMBOL>_values.csv` in a directory and upsert it. A file that
 * cannot be read or parsed is reported in `failed` and the rest still load.
 */
export async function loadPriceDirectory(
  database: Database.Database,
  dir: string,
): Promise<LoadSummary> {
  const summary: LoadSummary = { files: 0, upserted: 0, skipped: 0, failed: [] };

  let entries: string[];
  try {
    entries = await fs.promises.readdir(dir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.warn({ dir }, "Prices directory not found, nothing loaded");
      return summary;
    }
    throw error;
  }

  const files = entries.filter((name) => PRICE_FILE_PATTERN.test(name)).sort();

  for (const file of files) {
    try {
      const { records, skipped } = await loadPriceFile(path.join(dir, file));
      summary.upserted += upsertPrices(database, records);
      summary.skipped += skipped;
      summary.files++;
      logger.info({ file, records: records.length, skipped }, "Loaded price file");
    } catch (error) {
      summary.failed.push(file);
      logger.error({ error, file }, "Failed to load price file");
    }
  }

  logger.info(summary, "Price load completed");
  return summary;
}
