import { IndicatorKind } from '../core/types';

type Series = number[];

// Simple moving average; NaN until `period` values are available.
export const SMA = (series: Series, period: number): Series => {
  const result: number[] = Array(series.length).fill(NaN);
  if (period <= 0) return result;
  let sum = 0;
  for (let i = 0; i < series.length; i++) {
    sum += series[i];
    if (i >= period) {
      sum -= series[i - period];
    }
    if (i >= period - 1) {
      result[i] = sum / period;
    }
  }
  return result;
};

// Wilder-smoothed RSI; the first value lands on index `period`.
export const RSI = (series: Series, period: number): Series => {
  const result: number[] = Array(series.length).fill(NaN);
  if (period <= 0 || series.length <= period) return result;
  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = series[i] - series[i - 1];
    avgGain += Math.max(0, change);
    avgLoss += Math.max(0, -change);
  }
  avgGain /= period;
  avgLoss /= period;
  result[period] = rsiFromAverages(avgGain, avgLoss);
  for (let i = period + 1; i < series.length; i++) {
    const change = series[i] - series[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(0, change)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(0, -change)) / period;
    result[i] = rsiFromAverages(avgGain, avgLoss);
  }
  return result;
};

const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
};

export const computeIndicator = (kind: IndicatorKind, closes: Series, window: number): Series =>
  kind === 'rsi' ? RSI(closes, window) : SMA(closes, window);
