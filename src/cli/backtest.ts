import 'dotenv/config';
/* eslint-disable no-console */
import { Command } from 'commander';
import path from 'path';
import { validateSimulationConfig } from '../core/schema';
import { addDays, formatISODate, parseDateArg, runIdFor } from '../core/time';
import { Dialect, SimulationConfig } from '../core/types';
import { loadSimulationConfig } from '../core/utils';
import { analyzeStrategy, warmupBars } from '../dsl/analyzer';
import { loadStrategyFile } from '../dsl/loadStrategy';
import { loadMarketData, PriceSource } from '../data/marketData';
import { BacktestResult, runBacktest } from '../backtest/backtest';
import { formatSummary, ordersToCsv, valuationsToCsv } from '../backtest/report';
import { AccuracyReport, compareSelections, loadGroundTruth } from '../validation/accuracy';
import { appendEvent, makeEvent } from '../ledger/ledger';
import { DEFAULT_OUT_DIR, writeRunArtifact, writeRunText } from '../ledger/storage';

export interface BacktestOptions {
  strategy: string;
  dialect?: Dialect;
  config?: string;
  data?: string;
  synthetic?: boolean;
  start?: string;
  end?: string;
  capital?: string;
  cost?: string;
  slippage?: string;
  minTrade?: string;
  rebalanceDays?: string;
  groundTruth?: string;
  out?: string;
  runId?: string;
}

export interface BacktestCommandResult {
  runId: string;
  runDir: string;
  result: BacktestResult;
  accuracy?: AccuracyReport;
  summary: string[];
}

const numericOverride = (value: string | undefined, flag: string): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`${flag} must be numeric, got "${value}"`);
  }
  return parsed;
};

export const resolveConfig = (opts: BacktestOptions): SimulationConfig => {
  const configPath = path.resolve(opts.config ?? path.join(process.cwd(), 'src/config/default.json'));
  const base = loadSimulationConfig(configPath);
  const merged = {
    ...base,
    initialCapital: numericOverride(opts.capital, '--capital') ?? base.initialCapital,
    transactionCostPct: numericOverride(opts.cost, '--cost') ?? base.transactionCostPct,
    slippagePct: numericOverride(opts.slippage, '--slippage') ?? base.slippagePct,
    minTradeSize: numericOverride(opts.minTrade, '--min-trade') ?? base.minTradeSize,
    rebalanceFrequencyDays: numericOverride(opts.rebalanceDays, '--rebalance-days') ?? base.rebalanceFrequencyDays,
    startDate: parseDateArg(opts.start) ?? base.startDate,
    endDate: parseDateArg(opts.end) ?? base.endDate
  };
  const checked = validateSimulationConfig(merged);
  if (!checked.success) {
    throw new Error(`Invalid options: ${checked.errors.join('; ')}`);
  }
  return checked.value;
};

const priceSourceFor = (opts: BacktestOptions, config: SimulationConfig, warmup: number): PriceSource => {
  if (opts.data && !opts.synthetic) {
    return { kind: 'csv', dataDir: path.resolve(opts.data) };
  }
  if (!opts.synthetic) {
    throw new Error('Provide --data <dir> with <SYMBOL>.csv files, or --synthetic');
  }
  const end = config.endDate ?? formatISODate(new Date());
  const start = config.startDate ?? addDays(end, -365);
  // weekday bars: reach back far enough for the warmup plus a week of slack
  return { kind: 'synthetic', start: addDays(start, -(Math.ceil((warmup * 7) / 5) + 7)), end };
};

export const runBacktestCommand = (opts: BacktestOptions): BacktestCommandResult => {
  const config = resolveConfig(opts);
  const program = loadStrategyFile(path.resolve(opts.strategy), opts.dialect);
  const { tickers, indicators } = analyzeStrategy(program.root);
  const symbols = Array.from(tickers).sort();
  const warmup = warmupBars(indicators);

  const { store, missing } = loadMarketData(priceSourceFor(opts, config, warmup), symbols, indicators);
  if (missing.length) {
    console.warn(`No price file for ${missing.join(', ')}; days that need them will be skipped`);
  }
  const available = symbols.filter((s) => store.has(s));
  const window = store.analysisWindow(available, indicators);
  const start = config.startDate && config.startDate > window.start ? config.startDate : window.start;
  const end = config.endDate && config.endDate < window.end ? config.endDate : window.end;
  const tradingDays = store.tradingDays(available, start, end);

  const outDir = path.resolve(opts.out ?? process.env.BACKTEST_OUT_DIR ?? DEFAULT_OUT_DIR);
  const runId = opts.runId ?? runIdFor();
  appendEvent(
    outDir,
    makeEvent(runId, 'RUN_STARTED', { strategy: program.name, start, end, symbols, config: { ...config } })
  );

  let result: BacktestResult;
  try {
    result = runBacktest({ program, accessor: store, tradingDays, config: { ...config, startDate: start, endDate: end } });
  } catch (err) {
    appendEvent(outDir, makeEvent(runId, 'RUN_FAILED', { error: err instanceof Error ? err.message : String(err) }));
    throw err;
  }
  for (const day of result.skippedDays) {
    appendEvent(outDir, makeEvent(runId, 'DAY_SKIPPED', { date: day.date, kind: day.kind, message: day.message }));
  }

  const accuracy = opts.groundTruth
    ? compareSelections(result.dailySelections, loadGroundTruth(path.resolve(opts.groundTruth)))
    : undefined;

  writeRunArtifact(outDir, runId, 'summary.json', {
    strategy: program.name,
    window: { start, end },
    config,
    metrics: result.metrics,
    skippedDays: result.skippedDays,
    skippedByKind: result.skippedByKind,
    finalState: result.finalState
  });
  writeRunArtifact(outDir, runId, 'selections.json', result.dailySelections);
  writeRunArtifact(outDir, runId, 'flags.json', result.flags);
  writeRunText(outDir, runId, 'valuations.csv', valuationsToCsv(result.valuations));
  writeRunText(outDir, runId, 'orders.csv', ordersToCsv(result.orders));
  if (accuracy) writeRunArtifact(outDir, runId, 'accuracy.json', accuracy);
  appendEvent(outDir, makeEvent(runId, 'RUN_COMPLETED', { finalValue: result.metrics.finalValue }));

  return { runId, runDir: path.join(outDir, runId), result, accuracy, summary: formatSummary(result, accuracy) };
};

const cli = new Command();

cli
  .name('strategy-backtest')
  .requiredOption('--strategy <file>', 'strategy program (list form, s-expression or incantation JSON)')
  .option('--dialect <dialect>', 'composer | quantmage (detected when omitted)')
  .option('--config <file>', 'simulation config JSON (default src/config/default.json)')
  .option('--data <dir>', 'directory of <SYMBOL>.csv daily bars')
  .option('--synthetic', 'use deterministic synthetic prices', false)
  .option('--start <date>', 'first trading day (YYYY-MM-DD)')
  .option('--end <date>', 'last trading day (YYYY-MM-DD)')
  .option('--capital <usd>', 'initial capital')
  .option('--cost <fraction>', 'transaction cost rate, e.g. 0.001')
  .option('--slippage <fraction>', 'slippage rate, e.g. 0.0005')
  .option('--min-trade <usd>', 'minimum trade notional')
  .option('--rebalance-days <n>', 'trade every n days')
  .option('--ground-truth <csv>', 'dated allocation table to compare selections against')
  .option('--out <dir>', 'output directory for run artifacts');

const parseDialect = (value: unknown): Dialect | undefined => {
  if (value === undefined) return undefined;
  if (value === 'composer' || value === 'quantmage') return value;
  throw new Error(`--dialect must be composer or quantmage, got "${String(value)}"`);
};

const optionalString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const main = () => {
  const opts = cli.parse(process.argv).opts();
  const { runDir, result, accuracy, summary } = runBacktestCommand({
    strategy: String(opts.strategy),
    dialect: parseDialect(opts.dialect),
    config: optionalString(opts.config),
    data: optionalString(opts.data),
    synthetic: opts.synthetic === true,
    start: optionalString(opts.start),
    end: optionalString(opts.end),
    capital: optionalString(opts.capital),
    cost: optionalString(opts.cost),
    slippage: optionalString(opts.slippage),
    minTrade: optionalString(opts.minTrade),
    rebalanceDays: optionalString(opts.rebalanceDays),
    groundTruth: optionalString(opts.groundTruth),
    out: optionalString(opts.out)
  });
  summary.forEach((line) => console.log(line));
  for (const day of result.skippedDays) {
    console.warn(`Skipped ${day.date}: ${day.kind} ${day.message}`);
  }
  for (const mismatch of accuracy?.mismatches ?? []) {
    console.log(`Mismatch ${mismatch.date}: expected [${mismatch.expected.join(', ')}] got [${mismatch.actual.join(', ')}]`);
  }
  console.log(`Artifacts written to ${runDir}`);
};

if (require.main === module) {
  try {
    main();
  } catch (err) {
    console.error('Backtest failed', err);
    process.exitCode = 1;
  }
}
