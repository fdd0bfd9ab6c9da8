export type Comparator = '>' | '<' | '>=' | '<=' | '=';

export type IndicatorKind = 'rsi' | 'sma';

export interface IndicatorRef {
  kind: IndicatorKind;
  window: number;
}

export type ValueExpr =
  | { kind: 'literal'; value: number }
  | { kind: 'current-price'; symbol: string }
  | { kind: 'moving-average-price'; symbol: string; window: number }
  | { kind: 'rsi'; symbol: string; window: number };

export interface Condition {
  op: Comparator;
  lhs: ValueExpr;
  rhs: ValueExpr;
}

export type SelectMode = 'top' | 'bottom';

export interface AssetNode {
  kind: 'asset';
  symbol: string;
  name?: string;
}

export interface GroupNode {
  kind: 'group';
  label: string;
  body: StrategyNode;
}

export interface IfNode {
  kind: 'if';
  condition: Condition;
  thenBranch: StrategyNode;
  elseBranch: StrategyNode;
}

export interface WeightEqualNode {
  kind: 'weight-equal';
  branches: StrategyNode[];
}

export interface WeightedBranch {
  weight: number;
  node: StrategyNode;
}

export interface WeightSpecifiedNode {
  kind: 'weight-specified';
  pairs: WeightedBranch[];
}

export interface FilterNode {
  kind: 'filter';
  indicator: IndicatorRef;
  select: { mode: SelectMode; count: number };
  candidates: StrategyNode[];
}

export type StrategyNode = AssetNode | GroupNode | IfNode | WeightEqualNode | WeightSpecifiedNode | FilterNode;

export interface StrategyProgram {
  name: string;
  description: string;
  root: StrategyNode;
}

export type Dialect = 'composer' | 'quantmage';

// symbol -> weight; empty means fully in cash
export type TargetAllocation = Record<string, number>;

export interface PortfolioState {
  cash: number;
  holdings: Record<string, number>;
}

export interface DailyValuation {
  date: string;
  value: number;
}

export type TradeSide = 'BUY' | 'SELL';

export interface ExecutedOrder {
  date: string;
  symbol: string;
  side: TradeSide;
  shares: number;
  price: number;
  executionPrice: number;
  notional: number;
  fee: number;
  reason: 'LIQUIDATE' | 'REBALANCE';
}

export interface Frictions {
  transactionCostPct: number;
  slippagePct: number;
  minTradeSize: number;
}

export interface SimulationConfig extends Frictions {
  initialCapital: number;
  rebalanceFrequencyDays: number;
  startDate?: string;
  endDate?: string;
}

export type DiagnosticSeverity = 'info' | 'warn' | 'error';

export interface DiagnosticFlag {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  date?: string;
  symbols?: string[];
  observed?: Record<string, unknown> | string | number | string[];
}

export type RunEventType = 'RUN_STARTED' | 'DAY_SKIPPED' | 'RUN_COMPLETED' | 'RUN_FAILED';

export interface RunEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: RunEventType;
  details?: Record<string, unknown>;
}
