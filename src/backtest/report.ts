import { DailyValuation, ExecutedOrder } from '../core/types';
import { AccuracyReport } from '../validation/accuracy';
import { BacktestResult } from './backtest';

export const valuationsToCsv = (valuations: DailyValuation[]): string => {
  const lines = ['date,value,drawdown'];
  let peak = 0;
  for (const v of valuations) {
    peak = Math.max(peak, v.value);
    const drawdown = peak > 0 ? (v.value - peak) / peak : 0;
    lines.push([v.date, v.value.toFixed(2), drawdown.toFixed(4)].join(','));
  }
  return lines.join('\n');
};

export const ordersToCsv = (orders: ExecutedOrder[]): string => {
  const lines = ['date,symbol,side,shares,price,executionPrice,notional,fee,reason'];
  for (const o of orders) {
    lines.push(
      [
        o.date,
        o.symbol,
        o.side,
        o.shares.toFixed(6),
        o.price.toFixed(4),
        o.executionPrice.toFixed(4),
        o.notional.toFixed(2),
        o.fee.toFixed(2),
        o.reason
      ].join(',')
    );
  }
  return lines.join('\n');
};

const pct = (value: number) => `${(value * 100).toFixed(2)}%`;

export const formatSummary = (result: BacktestResult, accuracy?: AccuracyReport): string[] => {
  const { metrics } = result;
  const lines = [
    `Strategy: ${result.strategy}`,
    `Trading days: ${metrics.tradingDays} (rebalances: ${result.rebalanceCount}, orders: ${result.orders.length})`,
    `Final value: ${metrics.finalValue.toFixed(2)}`,
    `Total return: ${pct(metrics.totalReturn)}`,
    `CAGR: ${pct(metrics.cagr)}`,
    `Sharpe ratio: ${metrics.sharpeRatio === null ? 'N/A' : metrics.sharpeRatio.toFixed(2)}`,
    `Max drawdown: ${pct(metrics.maxDrawdown)}`,
    `Skipped days: ${result.skippedDays.length}`
  ];
  for (const [kind, count] of Object.entries(result.skippedByKind)) {
    lines.push(`  ${kind}: ${count}`);
  }
  if (accuracy) {
    lines.push(`Selection accuracy: ${pct(accuracy.accuracy)} (${accuracy.matches}/${accuracy.comparedDays} days)`);
  }
  return lines;
};
