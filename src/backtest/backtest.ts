import { EvaluationErrorKind, isRecoverableDayError } from '../core/errors';
import {
  DailyValuation,
  DiagnosticFlag,
  ExecutedOrder,
  PortfolioState,
  SimulationConfig,
  StrategyProgram,
  TargetAllocation
} from '../core/types';
import { MarketDataAccessor } from '../data/marketData.types';
import { createTrace, evaluateStrategy, selectedSymbols } from '../dsl/evaluator';
import { createSimulatorState, stepPortfolio } from '../execution/portfolioSimulator';
import { computeSummaryMetrics, SummaryMetrics } from '../analytics/metrics';

export interface SkippedDay {
  date: string;
  kind: EvaluationErrorKind;
  message: string;
  symbol?: string;
}

export interface DailySelection {
  date: string;
  allocation: TargetAllocation;
  selected: string[];
  error?: string;
}

export interface BacktestInput {
  program: StrategyProgram;
  accessor: MarketDataAccessor;
  tradingDays: string[];
  config: SimulationConfig;
}

export interface BacktestResult {
  strategy: string;
  dailySelections: DailySelection[];
  valuations: DailyValuation[];
  orders: ExecutedOrder[];
  skippedDays: SkippedDay[];
  skippedByKind: Partial<Record<EvaluationErrorKind, number>>;
  flags: DiagnosticFlag[];
  rebalanceCount: number;
  finalState: PortfolioState;
  metrics: SummaryMetrics;
}

const assertAscending = (dates: string[]) => {
  for (let i = 1; i < dates.length; i++) {
    if (dates[i] <= dates[i - 1]) {
      throw new Error(`Trading days must be strictly ascending: ${dates[i - 1]} then ${dates[i]}`);
    }
  }
};

export const clipDates = (dates: string[], start?: string, end?: string): string[] =>
  dates.filter((d) => (!start || d >= start) && (!end || d <= end));

/**
 * Runs the program day by day through the portfolio simulator. Days whose
 * evaluation fails on missing data or a malformed node are recorded and
 * skipped for trading; valuation and cadence still advance. Other errors
 * propagate.
 */
export const runBacktest = (input: BacktestInput): BacktestResult => {
  const { program, accessor, config } = input;
  const days = clipDates(input.tradingDays, config.startDate, config.endDate);
  assertAscending(days);

  let state = createSimulatorState(config.initialCapital);
  const dailySelections: DailySelection[] = [];
  const valuations: DailyValuation[] = [];
  const orders: ExecutedOrder[] = [];
  const skippedDays: SkippedDay[] = [];
  const flags: DiagnosticFlag[] = [];

  for (const date of days) {
    let target: TargetAllocation | undefined;
    const trace = createTrace();
    try {
      target = evaluateStrategy(program.root, date, accessor, trace);
      dailySelections.push({ date, allocation: target, selected: selectedSymbols(target) });
    } catch (err) {
      if (!isRecoverableDayError(err)) throw err;
      skippedDays.push({ date, kind: err.kind, message: err.message, symbol: err.symbol });
      flags.push({ code: `EVALUATION_${err.kind.toUpperCase()}`, severity: 'warn', message: err.message, date });
    }
    flags.push(...trace.flags);

    const step = stepPortfolio({
      state,
      date,
      target,
      frictions: config,
      rebalanceFrequencyDays: config.rebalanceFrequencyDays,
      prices: accessor
    });
    state = step.state;
    valuations.push(step.valuation);
    orders.push(...step.orders);
    flags.push(...step.flags);
  }

  const skippedByKind: Partial<Record<EvaluationErrorKind, number>> = {};
  for (const day of skippedDays) {
    skippedByKind[day.kind] = (skippedByKind[day.kind] ?? 0) + 1;
  }

  return {
    strategy: program.name,
    dailySelections,
    valuations,
    orders,
    skippedDays,
    skippedByKind,
    flags,
    rebalanceCount: state.rebalanceCount,
    finalState: state.portfolio,
    metrics: computeSummaryMetrics(valuations)
  };
};

// Evaluates every date without trading; failures are reported per date.
export const getDailySelections = (
  program: StrategyProgram,
  accessor: MarketDataAccessor,
  dates: string[]
): DailySelection[] =>
  dates.map((date) => {
    try {
      const allocation = evaluateStrategy(program.root, date, accessor);
      return { date, allocation, selected: selectedSymbols(allocation) };
    } catch (err) {
      if (!isRecoverableDayError(err)) throw err;
      return { date, allocation: {}, selected: [], error: err.message };
    }
  });
