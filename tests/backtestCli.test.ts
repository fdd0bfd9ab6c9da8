import fs from 'fs';
import os from 'os';
import path from 'path';
import { weekdaysBetween } from '../src/core/time';
import { resolveConfig, runBacktestCommand } from '../src/cli/backtest';
import { scanStrategy } from '../src/cli/scan';
import { getRunStatus } from '../src/ledger/ledger';
import { readRunArtifact, readRunEvents } from '../src/ledger/storage';

const STRATEGY = `
; hold SPY while it trades above its 3-day average
(defsymphony "Trend" {:rebalance-frequency :daily}
  (if (> (current-price "SPY") (moving-average-price "SPY" {:window 3}))
    [(asset "SPY")]
    [(asset "TLT")]))
`;

const CONFIG = {
  initialCapital: 10000,
  transactionCostPct: 0,
  slippagePct: 0,
  minTradeSize: 0,
  rebalanceFrequencyDays: 1
};

const csvFor = (dates: string[], close: (i: number) => number) =>
  ['Date,Open,High,Low,Close,Volume', ...dates.map((d, i) => `${d},0,0,0,${close(i)},0`)].join('\n');

describe('backtest command', () => {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'backtest-cli-'));
  const dataDir = path.join(tmp, 'data');
  const outDir = path.join(tmp, 'runs');
  const strategyFile = path.join(tmp, 'trend.edn');
  const configFile = path.join(tmp, 'config.json');
  const truthFile = path.join(tmp, 'truth.csv');
  const dates = weekdaysBetween('2024-01-01', '2024-01-12');

  beforeAll(() => {
    fs.mkdirSync(dataDir);
    fs.writeFileSync(path.join(dataDir, 'SPY.csv'), csvFor(dates, (i) => 100 + i));
    fs.writeFileSync(path.join(dataDir, 'TLT.csv'), csvFor(dates, () => 50));
    fs.writeFileSync(strategyFile, STRATEGY);
    fs.writeFileSync(configFile, JSON.stringify(CONFIG));
    fs.writeFileSync(truthFile, 'Date,SPY,TLT\n2024-01-03,100%,-\n2024-01-04,100%,-\n');
  });

  afterAll(() => fs.rmSync(tmp, { recursive: true, force: true }));

  it('runs a strategy over CSV prices and writes its artifacts', () => {
    const { runId, runDir, result, accuracy, summary } = runBacktestCommand({
      strategy: strategyFile,
      config: configFile,
      data: dataDir,
      groundTruth: truthFile,
      out: outDir,
      runId: 'test-run'
    });

    expect(runId).toBe('test-run');
    expect(runDir).toBe(path.join(outDir, 'test-run'));
    // three bars of warmup for the 3-day average
    expect(result.valuations.map((v) => v.date)).toEqual(dates.slice(2));
    expect(result.dailySelections.every((s) => s.selected.join() === 'SPY')).toBe(true);
    expect(result.orders).toHaveLength(1);
    expect(result.orders[0]).toMatchObject({ date: '2024-01-03', symbol: 'SPY', side: 'BUY', price: 102 });
    expect(result.metrics.finalValue).toBeCloseTo((10000 / 102) * 109, 6);
    expect(accuracy).toMatchObject({ comparedDays: 2, matches: 2, accuracy: 1 });
    expect(summary).toContain('Selection accuracy: 100.00% (2/2 days)');

    for (const file of ['summary.json', 'selections.json', 'flags.json', 'valuations.csv', 'orders.csv', 'accuracy.json']) {
      expect(fs.existsSync(path.join(runDir, file))).toBe(true);
    }
    expect(readRunArtifact(outDir, 'test-run', 'flags.json')).toEqual([]);
    expect(fs.readFileSync(path.join(runDir, 'orders.csv'), 'utf-8').split('\n')).toEqual([
      'date,symbol,side,shares,price,executionPrice,notional,fee,reason',
      '2024-01-03,SPY,BUY,98.039216,102.0000,102.0000,10000.00,0.00,REBALANCE'
    ]);
    expect(readRunEvents(outDir, 'test-run').map((e) => e.type)).toEqual(['RUN_STARTED', 'RUN_COMPLETED']);
    expect(getRunStatus(outDir, 'test-run')).toBe('COMPLETED');
  });

  it('applies command line overrides on top of the config file', () => {
    const config = resolveConfig({ strategy: strategyFile, config: configFile, capital: '5000', start: '1/8/2024' });
    expect(config).toEqual({ ...CONFIG, initialCapital: 5000, startDate: '2024-01-08' });
    expect(() => resolveConfig({ strategy: strategyFile, config: configFile, cost: 'abc' })).toThrow(
      '--cost must be numeric, got "abc"'
    );
  });

  it('needs a price source', () => {
    expect(() => runBacktestCommand({ strategy: strategyFile, config: configFile, out: outDir })).toThrow(
      'Provide --data <dir> with <SYMBOL>.csv files, or --synthetic'
    );
  });

  it('scans a strategy for its data needs', () => {
    expect(scanStrategy(strategyFile)).toEqual({
      name: 'Trend',
      tickers: ['SPY', 'TLT'],
      indicators: [{ kind: 'sma', window: 3 }],
      warmupBars: 3
    });
  });
});
