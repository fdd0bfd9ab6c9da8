import fs from 'fs';
import path from 'path';
import { normalizeDate } from '../core/time';
import { PriceBar } from './marketData.types';

export const splitCsvLine = (line: string): string[] =>
  line.split(',').map((cell) => cell.trim().replace(/^"(.*)"$/, '$1'));

const findColumn = (header: string[], names: string[]): number => {
  const lower = header.map((h) => h.toLowerCase());
  for (const name of names) {
    const idx = lower.indexOf(name);
    if (idx !== -1) return idx;
  }
  return -1;
};

/**
 * Parses daily OHLCV text with a header row. Needs a Date (or Timestamp)
 * column and a Close (or Adj Close) column; rows whose close is blank or
 * non-numeric are skipped.
 */
export const parseBarsCsv = (text: string, source = 'csv'): PriceBar[] => {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (!lines.length) return [];
  const header = splitCsvLine(lines[0]);
  const dateIdx = findColumn(header, ['date', 'timestamp', 'datetime']);
  const closeIdx = findColumn(header, ['close', 'adj close', 'adj_close']);
  if (dateIdx === -1 || closeIdx === -1) {
    throw new Error(`${source}: header needs Date and Close columns, got "${lines[0]}"`);
  }
  const bars: PriceBar[] = [];
  for (const line of lines.slice(1)) {
    const cells = splitCsvLine(line);
    const rawClose = cells[closeIdx] ?? '';
    const close = rawClose === '' ? NaN : Number(rawClose);
    if (!Number.isFinite(close) || close <= 0) continue;
    bars.push({ date: normalizeDate(cells[dateIdx] ?? ''), close });
  }
  return bars;
};

export interface CsvLoadResult {
  bars: Record<string, PriceBar[]>;
  missing: string[];
}

// Reads <dir>/<SYMBOL>.csv for each symbol.
export const loadBarsFromCsvDir = (dir: string, symbols: string[]): CsvLoadResult => {
  const bars: Record<string, PriceBar[]> = {};
  const missing: string[] = [];
  for (const symbol of symbols) {
    const filePath = path.join(dir, `${symbol}.csv`);
    if (!fs.existsSync(filePath)) {
      missing.push(symbol);
      continue;
    }
    bars[symbol] = parseBarsCsv(fs.readFileSync(filePath, 'utf-8'), filePath);
  }
  return { bars, missing };
};
