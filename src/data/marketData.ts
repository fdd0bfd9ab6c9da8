import { IndicatorRef } from '../core/types';
import { loadBarsFromCsvDir } from './csvBars';
import { buildSyntheticHistory } from './marketData.stub';
import { SeriesStore } from './seriesStore';

export type PriceSource = { kind: 'csv'; dataDir: string } | { kind: 'synthetic'; start: string; end: string };

export interface LoadedMarketData {
  store: SeriesStore;
  missing: string[];
}

export const loadMarketData = (source: PriceSource, symbols: string[], indicators: IndicatorRef[]): LoadedMarketData => {
  if (source.kind === 'synthetic') {
    return { store: new SeriesStore(buildSyntheticHistory(symbols, source.start, source.end), indicators), missing: [] };
  }
  const { bars, missing } = loadBarsFromCsvDir(source.dataDir, symbols);
  return { store: new SeriesStore(bars, indicators), missing };
};
