import { loadMarketData } from '../src/data/marketData';
import { buildSyntheticHistory, syntheticBars } from '../src/data/marketData.stub';

describe('synthetic market data', () => {
  const dates = ['2024-01-02', '2024-01-03', '2024-01-04'];

  it('is deterministic per symbol', () => {
    expect(syntheticBars('SPY', dates)).toEqual(syntheticBars('SPY', dates));
    expect(syntheticBars('SPY', dates)).not.toEqual(syntheticBars('QQQ', dates));
  });

  it('produces positive closes on weekdays only', () => {
    const history = buildSyntheticHistory(['SPY'], '2024-01-05', '2024-01-09');
    expect(history.SPY.map((b) => b.date)).toEqual(['2024-01-05', '2024-01-08', '2024-01-09']);
    expect(history.SPY.every((b) => b.close >= 1)).toBe(true);
  });

  it('loads a synthetic store with indicators available after warmup', () => {
    const { store, missing } = loadMarketData({ kind: 'synthetic', start: '2024-01-01', end: '2024-01-31' }, ['SPY'], [
      { kind: 'sma', window: 5 }
    ]);
    expect(missing).toEqual([]);
    expect(store.indicator('SPY', 'sma', 5, '2024-01-04')).toBeUndefined();
    expect(store.indicator('SPY', 'sma', 5, '2024-01-05')).toBeGreaterThan(0);
  });
});
