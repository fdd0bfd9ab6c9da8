import fs from 'fs';
import { normalizeDate } from '../core/time';
import { splitCsvLine } from '../data/csvBars';
import { DailySelection } from '../backtest/backtest';

// date -> sorted symbols held that day
export type GroundTruth = Record<string, string[]>;

const IGNORED_COLUMNS = new Set(['day traded']);
const NOT_HELD = new Set(['', '-', '—']);

const parseAllocationCell = (raw: string, where: string): number => {
  const cleaned = raw.replace(/%$/, '').trim();
  if (NOT_HELD.has(cleaned)) return 0;
  const value = Number(cleaned);
  if (!Number.isFinite(value)) {
    throw new Error(`${where}: cannot read allocation "${raw}"`);
  }
  return value;
};

/**
 * Reads a dated allocation table: first column a date, remaining columns
 * ticker symbols with percentage strings ("25.0%") or "-" for not held.
 */
export const parseGroundTruthCsv = (text: string): GroundTruth => {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (!lines.length) return {};
  const header = splitCsvLine(lines[0]);
  const tickerColumns = header
    .map((name, idx) => ({ name, idx }))
    .filter(({ name, idx }) => idx > 0 && name !== '' && !IGNORED_COLUMNS.has(name.toLowerCase()));

  const truth: GroundTruth = {};
  lines.slice(1).forEach((line, row) => {
    const cells = splitCsvLine(line);
    const date = normalizeDate(cells[0] ?? '');
    truth[date] = tickerColumns
      .filter(({ name, idx }) => parseAllocationCell(cells[idx] ?? '', `row ${row + 2} ${name}`) > 0)
      .map(({ name }) => name)
      .sort();
  });
  return truth;
};

export const loadGroundTruth = (filePath: string): GroundTruth => parseGroundTruthCsv(fs.readFileSync(filePath, 'utf-8'));

export interface SelectionMismatch {
  date: string;
  expected: string[];
  actual: string[];
}

export interface AccuracyReport {
  comparedDays: number;
  matches: number;
  accuracy: number;
  unevaluatedDays: string[];
  mismatches: SelectionMismatch[];
}

const sameSet = (a: string[], b: string[]) => a.length === b.length && a.every((s) => b.includes(s));

// Set equality of held symbols on every date present in both inputs.
export const compareSelections = (selections: DailySelection[], truth: GroundTruth): AccuracyReport => {
  let comparedDays = 0;
  let matches = 0;
  const mismatches: SelectionMismatch[] = [];
  const unevaluatedDays: string[] = [];
  for (const selection of selections) {
    const expected = truth[selection.date];
    if (!expected) continue;
    if (selection.error) {
      unevaluatedDays.push(selection.date);
      continue;
    }
    comparedDays++;
    if (sameSet(selection.selected, expected)) {
      matches++;
    } else {
      mismatches.push({ date: selection.date, expected, actual: selection.selected });
    }
  }
  return {
    comparedDays,
    matches,
    accuracy: comparedDays ? matches / comparedDays : 0,
    unevaluatedDays,
    mismatches
  };
};
