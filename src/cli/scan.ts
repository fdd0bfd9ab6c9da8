/* eslint-disable no-console */
import { Command } from 'commander';
import path from 'path';
import { Dialect, IndicatorRef } from '../core/types';
import { analyzeStrategy, warmupBars } from '../dsl/analyzer';
import { loadStrategyFile } from '../dsl/loadStrategy';

export interface ScanReport {
  name: string;
  tickers: string[];
  indicators: IndicatorRef[];
  warmupBars: number;
}

export const scanStrategy = (filePath: string, dialect?: Dialect): ScanReport => {
  const program = loadStrategyFile(path.resolve(filePath), dialect);
  const { tickers, indicators } = analyzeStrategy(program.root);
  return { name: program.name, tickers: Array.from(tickers).sort(), indicators, warmupBars: warmupBars(indicators) };
};

const cli = new Command();

cli
  .name('strategy-scan')
  .argument('<file>', 'strategy program to inspect')
  .option('--dialect <dialect>', 'composer | quantmage (detected when omitted)')
  .option('--json', 'print the report as JSON', false);

if (require.main === module) {
  try {
    cli.parse(process.argv);
    const opts = cli.opts();
    const dialect: unknown = opts.dialect;
    const report = scanStrategy(cli.args[0], dialect === 'composer' || dialect === 'quantmage' ? dialect : undefined);
    if (opts.json === true) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(`Strategy: ${report.name}`);
      console.log(`Tickers (${report.tickers.length}): ${report.tickers.join(', ')}`);
      console.log(`Indicators: ${report.indicators.map((i) => `${i.kind}(${i.window})`).join(', ') || 'none'}`);
      console.log(`Warmup bars: ${report.warmupBars}`);
    }
  } catch (err) {
    console.error('Scan failed', err);
    process.exitCode = 1;
  }
}
