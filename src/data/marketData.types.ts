import { IndicatorKind } from '../core/types';

export interface PriceBar {
  date: string;
  close: number;
}

/**
 * Read-only view of fully materialized daily data. Both lookups use as-of
 * semantics (latest bar on or before `date`) and return undefined when
 * nothing is known yet.
 */
export interface MarketDataAccessor {
  close(symbol: string, date: string): number | undefined;
  indicator(symbol: string, kind: IndicatorKind, window: number, date: string): number | undefined;
}
