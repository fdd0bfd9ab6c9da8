import { IndicatorKind, IndicatorRef } from '../core/types';
import { computeIndicator } from './indicators';
import { MarketDataAccessor, PriceBar } from './marketData.types';
import { indicatorKey, warmupBars } from '../dsl/analyzer';

interface SymbolSeries {
  dates: string[];
  closes: number[];
  indicators: Map<string, number[]>;
}

export interface AnalysisWindow {
  start: string;
  end: string;
  warmupBars: number;
}

/**
 * In-memory daily close series per symbol. Indicator columns are computed
 * once per (kind, window) and cached; lookups resolve to the latest bar on
 * or before the requested date.
 */
export class SeriesStore implements MarketDataAccessor {
  private readonly series = new Map<string, SymbolSeries>();

  constructor(bars: Record<string, PriceBar[]> = {}, indicators: IndicatorRef[] = []) {
    for (const [symbol, symbolBars] of Object.entries(bars)) {
      this.addSeries(symbol, symbolBars);
    }
    this.precompute(indicators);
  }

  addSeries(symbol: string, bars: PriceBar[]) {
    const byDate = new Map<string, number>();
    for (const bar of bars) {
      if (!Number.isFinite(bar.close) || bar.close <= 0) {
        throw new Error(`Invalid close ${bar.close} for ${symbol} on ${bar.date}`);
      }
      byDate.set(bar.date, bar.close);
    }
    const dates = Array.from(byDate.keys()).sort();
    this.series.set(symbol, {
      dates,
      closes: dates.map((d) => byDate.get(d) ?? NaN),
      indicators: new Map()
    });
  }

  precompute(indicators: IndicatorRef[]) {
    for (const symbol of this.series.keys()) {
      for (const ref of indicators) {
        this.column(symbol, ref.kind, ref.window);
      }
    }
  }

  has(symbol: string): boolean {
    return this.series.has(symbol);
  }

  symbols(): string[] {
    return Array.from(this.series.keys()).sort();
  }

  dates(symbol: string): string[] {
    return this.series.get(symbol)?.dates.slice() ?? [];
  }

  // Sorted union of bar dates for the given symbols, clipped to [start, end].
  tradingDays(symbols: string[], start?: string, end?: string): string[] {
    const all = new Set<string>();
    for (const symbol of symbols) {
      for (const date of this.series.get(symbol)?.dates ?? []) {
        if ((!start || date >= start) && (!end || date <= end)) all.add(date);
      }
    }
    return Array.from(all).sort();
  }

  close(symbol: string, date: string): number | undefined {
    const s = this.series.get(symbol);
    if (!s) return undefined;
    const idx = asOfIndex(s.dates, date);
    return idx < 0 ? undefined : s.closes[idx];
  }

  indicator(symbol: string, kind: IndicatorKind, window: number, date: string): number | undefined {
    const s = this.series.get(symbol);
    if (!s) return undefined;
    const idx = asOfIndex(s.dates, date);
    if (idx < 0) return undefined;
    const value = this.column(symbol, kind, window)[idx];
    return Number.isFinite(value) ? value : undefined;
  }

  /**
   * Common date range across `symbols`, starting at the first date on which
   * every symbol has enough history for every indicator.
   */
  analysisWindow(symbols: string[], indicators: IndicatorRef[]): AnalysisWindow {
    const missing = symbols.filter((s) => !this.series.get(s)?.dates.length);
    if (missing.length) {
      throw new Error(`No price history for ${missing.join(', ')}`);
    }
    const warmup = warmupBars(indicators);
    let start = '';
    let end = '';
    for (const symbol of symbols) {
      const { dates } = this.series.get(symbol) ?? { dates: [] };
      if (dates.length < warmup) {
        throw new Error(`${symbol} has ${dates.length} bars; indicators need ${warmup}`);
      }
      const first = dates[Math.max(warmup - 1, 0)];
      const last = dates[dates.length - 1];
      if (!start || first > start) start = first;
      if (!end || last < end) end = last;
    }
    if (!start || start > end) {
      throw new Error(`Price histories do not overlap after a ${warmup}-bar warmup`);
    }
    return { start, end, warmupBars: warmup };
  }

  private column(symbol: string, kind: IndicatorKind, window: number): number[] {
    const s = this.series.get(symbol);
    if (!s) return [];
    const key = indicatorKey({ kind, window });
    const cached = s.indicators.get(key);
    if (cached) return cached;
    const values = computeIndicator(kind, s.closes, window);
    s.indicators.set(key, values);
    return values;
  }
}

// Index of the last date <= target, or -1.
const asOfIndex = (dates: string[], target: string): number => {
  let lo = 0;
  let hi = dates.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (dates[mid] <= target) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
};
