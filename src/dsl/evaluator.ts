import { EvaluationError } from '../core/errors';
import {
  Comparator,
  DiagnosticFlag,
  FilterNode,
  IndicatorRef,
  StrategyNode,
  TargetAllocation,
  ValueExpr
} from '../core/types';
import { MarketDataAccessor } from '../data/marketData.types';

export interface ConditionOutcome {
  description: string;
  lhs: number;
  rhs: number;
  result: boolean;
}

// Optional sink for what an evaluation did; evaluation itself never prints.
export interface EvaluationTrace {
  path: string[];
  conditions: ConditionOutcome[];
  flags: DiagnosticFlag[];
}

export const createTrace = (): EvaluationTrace => ({ path: [], conditions: [], flags: [] });

const describeValue = (value: ValueExpr): string => {
  switch (value.kind) {
    case 'literal':
      return String(value.value);
    case 'current-price':
      return `price(${value.symbol})`;
    case 'moving-average-price':
      return `sma(${value.symbol},${value.window})`;
    case 'rsi':
      return `rsi(${value.symbol},${value.window})`;
  }
};

const requireFinite = (value: number | undefined, symbol: string, indicator: string, date: string): number => {
  if (value === undefined || !Number.isFinite(value)) {
    throw EvaluationError.dataUnavailable(symbol, indicator, date);
  }
  return value;
};

export const resolveValue = (value: ValueExpr, date: string, accessor: MarketDataAccessor): number => {
  switch (value.kind) {
    case 'literal':
      return value.value;
    case 'current-price':
      return requireFinite(accessor.close(value.symbol, date), value.symbol, 'close', date);
    case 'moving-average-price':
      return requireFinite(
        accessor.indicator(value.symbol, 'sma', value.window, date),
        value.symbol,
        `sma(${value.window})`,
        date
      );
    case 'rsi':
      return requireFinite(
        accessor.indicator(value.symbol, 'rsi', value.window, date),
        value.symbol,
        `rsi(${value.window})`,
        date
      );
  }
};

const compare = (op: Comparator, lhs: number, rhs: number): boolean => {
  switch (op) {
    case '>':
      return lhs > rhs;
    case '<':
      return lhs < rhs;
    case '>=':
      return lhs >= rhs;
    case '<=':
      return lhs <= rhs;
    case '=':
      return lhs === rhs;
  }
};

const addInto = (target: TargetAllocation, symbol: string, weight: number) => {
  target[symbol] = (target[symbol] ?? 0) + weight;
};

// Scales to a unit sum and drops zero weights; an all-zero map becomes {}.
export const normalizeAllocation = (allocation: TargetAllocation): TargetAllocation => {
  const entries = Object.entries(allocation).filter(([, w]) => w > 0);
  const total = entries.reduce((acc, [, w]) => acc + w, 0);
  if (!(total > 0)) return {};
  const out: TargetAllocation = {};
  for (const [symbol, weight] of entries) {
    out[symbol] = weight / total;
  }
  return out;
};

const indicatorLabel = (ref: IndicatorRef) => `${ref.kind}(${ref.window})`;

type Evaluator = (node: StrategyNode) => TargetAllocation;

const evaluateFilter = (
  node: FilterNode,
  date: string,
  accessor: MarketDataAccessor,
  evaluateChild: Evaluator,
  trace?: EvaluationTrace
): TargetAllocation => {
  const symbols: string[] = [];
  for (const candidate of node.candidates) {
    for (const symbol of Object.keys(evaluateChild(candidate))) {
      if (!symbols.includes(symbol)) symbols.push(symbol);
    }
  }

  const scored: Array<{ symbol: string; value: number }> = [];
  const dropped: string[] = [];
  for (const symbol of symbols) {
    const value = accessor.indicator(symbol, node.indicator.kind, node.indicator.window, date);
    if (value === undefined || !Number.isFinite(value)) {
      dropped.push(symbol);
    } else {
      scored.push({ symbol, value });
    }
  }
  if (dropped.length && trace) {
    trace.flags.push({
      code: 'FILTER_CANDIDATE_DROPPED',
      severity: 'info',
      message: `No ${indicatorLabel(node.indicator)} for ${dropped.join(', ')}`,
      date,
      symbols: dropped
    });
  }
  if (!scored.length) return {};

  // Array.prototype.sort is stable, so ties keep candidate order
  const direction = node.select.mode === 'top' ? -1 : 1;
  scored.sort((a, b) => direction * (a.value - b.value));
  const selected = scored.slice(0, node.select.count);
  const weight = 1 / selected.length;
  const out: TargetAllocation = {};
  selected.forEach(({ symbol }) => {
    out[symbol] = weight;
  });
  trace?.path.push(`filter ${node.select.mode} ${node.select.count} by ${indicatorLabel(node.indicator)}: ${selected.map((s) => s.symbol).join(', ')}`);
  return out;
};

const evaluateNode = (
  node: StrategyNode,
  date: string,
  accessor: MarketDataAccessor,
  trace?: EvaluationTrace
): TargetAllocation => {
  const recurse: Evaluator = (child) => evaluateNode(child, date, accessor, trace);

  switch (node.kind) {
    case 'asset':
      return { [node.symbol]: 1 };
    case 'group':
      trace?.path.push(`group ${node.label}`);
      return recurse(node.body);
    case 'if': {
      const { op, lhs, rhs } = node.condition;
      const left = resolveValue(lhs, date, accessor);
      const right = resolveValue(rhs, date, accessor);
      const result = compare(op, left, right);
      const description = `${describeValue(lhs)} ${op} ${describeValue(rhs)}`;
      trace?.conditions.push({ description, lhs: left, rhs: right, result });
      trace?.path.push(`if ${description} -> ${result ? 'then' : 'else'}`);
      return recurse(result ? node.thenBranch : node.elseBranch);
    }
    case 'weight-equal': {
      const combined: TargetAllocation = {};
      for (const branch of node.branches) {
        for (const [symbol, weight] of Object.entries(recurse(branch))) {
          addInto(combined, symbol, weight);
        }
      }
      return normalizeAllocation(combined);
    }
    case 'weight-specified': {
      const combined: TargetAllocation = {};
      for (const pair of node.pairs) {
        if (!Number.isFinite(pair.weight) || pair.weight < 0) {
          throw EvaluationError.malformed(`Invalid weight ${pair.weight} in weight-specified`);
        }
        for (const symbol of Object.keys(recurse(pair.node))) {
          addInto(combined, symbol, pair.weight);
        }
      }
      return normalizeAllocation(combined);
    }
    case 'filter':
      if (!Number.isInteger(node.select.count) || node.select.count < 1) {
        throw EvaluationError.malformed(`Filter count must be a positive integer, got ${node.select.count}`);
      }
      return evaluateFilter(node, date, accessor, recurse, trace);
    default: {
      const unknown: never = node;
      throw EvaluationError.unknownOperator(JSON.stringify(unknown));
    }
  }
};

/**
 * Evaluates a strategy tree for one date and returns weights summing to 1,
 * or {} for an all-cash outcome. Pure in (root, date, accessor); throws
 * EvaluationError when a condition cannot be resolved.
 */
export const evaluateStrategy = (
  root: StrategyNode,
  date: string,
  accessor: MarketDataAccessor,
  trace?: EvaluationTrace
): TargetAllocation => normalizeAllocation(evaluateNode(root, date, accessor, trace));

export const selectedSymbols = (allocation: TargetAllocation): string[] =>
  Object.entries(allocation)
    .filter(([, weight]) => weight > 0)
    .map(([symbol]) => symbol)
    .sort();
