import { IndicatorKind, IndicatorRef, StrategyNode, ValueExpr } from '../core/types';

export interface StrategyRequirements {
  tickers: Set<string>;
  indicators: IndicatorRef[];
}

export const indicatorKey = (ref: IndicatorRef): string => `${ref.kind}:${ref.window}`;

const valueRequirement = (value: ValueExpr): { symbol?: string; indicator?: IndicatorRef } => {
  switch (value.kind) {
    case 'literal':
      return {};
    case 'current-price':
      return { symbol: value.symbol };
    case 'moving-average-price':
      return { symbol: value.symbol, indicator: { kind: 'sma', window: value.window } };
    case 'rsi':
      return { symbol: value.symbol, indicator: { kind: 'rsi', window: value.window } };
  }
};

const KIND_ORDER: Record<IndicatorKind, number> = { rsi: 0, sma: 1 };

/**
 * Collects every ticker a program can touch (including the members named in
 * group labels) and the distinct indicator/window pairs it reads, so the data
 * layer knows what to load and precompute before a run.
 */
export const analyzeStrategy = (root: StrategyNode): StrategyRequirements => {
  const tickers = new Set<string>();
  const indicators = new Map<string, IndicatorRef>();

  const addIndicator = (ref: IndicatorRef) => {
    indicators.set(indicatorKey(ref), ref);
  };

  const addValue = (value: ValueExpr) => {
    const req = valueRequirement(value);
    if (req.symbol) tickers.add(req.symbol);
    if (req.indicator) addIndicator(req.indicator);
  };

  const walk = (node: StrategyNode) => {
    switch (node.kind) {
      case 'asset':
        tickers.add(node.symbol);
        return;
      case 'group':
        node.label
          .split('+')
          .map((token) => token.trim())
          .filter((token) => token.length > 0)
          .forEach((token) => tickers.add(token));
        walk(node.body);
        return;
      case 'if':
        addValue(node.condition.lhs);
        addValue(node.condition.rhs);
        walk(node.thenBranch);
        walk(node.elseBranch);
        return;
      case 'weight-equal':
        node.branches.forEach(walk);
        return;
      case 'weight-specified':
        node.pairs.forEach((pair) => walk(pair.node));
        return;
      case 'filter':
        addIndicator(node.indicator);
        node.candidates.forEach(walk);
        return;
    }
  };

  walk(root);
  const sorted = Array.from(indicators.values()).sort(
    (a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || a.window - b.window
  );
  return { tickers, indicators: sorted };
};

// Bars needed before every indicator in the list has a value.
export const warmupBars = (indicators: IndicatorRef[]): number =>
  indicators.reduce((max, ref) => Math.max(max, ref.kind === 'rsi' ? ref.window + 1 : ref.window), 0);
