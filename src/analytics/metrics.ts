import { DailyValuation } from '../core/types';
import { average, sampleStdev } from '../core/utils';

export const TRADING_DAYS_PER_YEAR = 252;

export interface SummaryMetrics {
  startValue: number;
  finalValue: number;
  tradingDays: number;
  totalReturn: number;
  cagr: number;
  annualizedVolatility: number;
  // null when there are fewer than two returns or they have no variance
  sharpeRatio: number | null;
  maxDrawdown: number;
}

export const computeDailyReturns = (points: DailyValuation[]): number[] => {
  const returns: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1].value;
    returns.push(prev > 0 ? points[i].value / prev - 1 : 0);
  }
  return returns;
};

// Most negative peak-to-trough decline as a fraction (0 when never below a prior peak).
export const computeMaxDrawdown = (points: DailyValuation[]): number => {
  let peak = -Infinity;
  let worst = 0;
  for (const p of points) {
    peak = Math.max(peak, p.value);
    if (peak > 0) {
      worst = Math.min(worst, (p.value - peak) / peak);
    }
  }
  return worst;
};

export const computeSharpeRatio = (returns: number[]): number | null => {
  if (returns.length < 2) return null;
  const stdev = sampleStdev(returns);
  if (!(stdev > 1e-12)) return null;
  return (average(returns) / stdev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
};

export const computeSummaryMetrics = (points: DailyValuation[]): SummaryMetrics => {
  if (!points.length) {
    return {
      startValue: 0,
      finalValue: 0,
      tradingDays: 0,
      totalReturn: 0,
      cagr: 0,
      annualizedVolatility: 0,
      sharpeRatio: null,
      maxDrawdown: 0
    };
  }
  const startValue = points[0].value;
  const finalValue = points[points.length - 1].value;
  const totalReturn = startValue > 0 ? finalValue / startValue - 1 : 0;
  const periods = points.length - 1;
  const cagr =
    periods > 0 && startValue > 0 && finalValue > 0
      ? Math.pow(finalValue / startValue, TRADING_DAYS_PER_YEAR / periods) - 1
      : totalReturn;
  const returns = computeDailyReturns(points);
  return {
    startValue,
    finalValue,
    tradingDays: points.length,
    totalReturn,
    cagr,
    annualizedVolatility: sampleStdev(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR),
    sharpeRatio: computeSharpeRatio(returns),
    maxDrawdown: computeMaxDrawdown(points)
  };
};
