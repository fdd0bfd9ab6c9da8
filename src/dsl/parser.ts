import { EvaluationError } from '../core/errors';
import {
  Comparator,
  Condition,
  IndicatorRef,
  SelectMode,
  StrategyNode,
  StrategyProgram,
  ValueExpr,
  WeightedBranch
} from '../core/types';

export const DEFAULT_RSI_WINDOW = 10;
export const DEFAULT_MA_WINDOW = 20;

const COMPARATORS: readonly Comparator[] = ['>', '<', '>=', '<=', '='];
const VALUE_OPERATORS = new Set(['current-price', 'moving-average-price', 'rsi', 'relative-strength-index']);
const PROGRAM_HEADS = new Set(['defsymphony', 'symphony']);
const NODE_OPERATORS = new Set(['asset', 'group', 'if', 'weight-equal', 'weight-specified', 'filter']);

const isList = (value: unknown): value is unknown[] => Array.isArray(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isComparator = (value: unknown): value is Comparator =>
  typeof value === 'string' && COMPARATORS.some((c) => c === value);

const preview = (value: unknown): string => {
  const text = value === undefined ? 'nothing' : JSON.stringify(value);
  return text.length > 80 ? `${text.slice(0, 77)}...` : text;
};

const requireString = (value: unknown, what: string): string => {
  if (typeof value !== 'string' || value.trim() === '') {
    throw EvaluationError.malformed(`${what} must be a non-empty string, got ${preview(value)}`);
  }
  return value.trim();
};

const requireNumber = (value: unknown, what: string): number => {
  const num = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof num !== 'number' || !Number.isFinite(num)) {
    throw EvaluationError.malformed(`${what} must be a number, got ${preview(value)}`);
  }
  return num;
};

const requirePositiveInt = (value: unknown, what: string): number => {
  const num = requireNumber(value, what);
  if (!Number.isInteger(num) || num < 1) {
    throw EvaluationError.malformed(`${what} must be a positive integer, got ${preview(value)}`);
  }
  return num;
};

const requireArity = (expr: unknown[], arity: number, operator: string) => {
  if (expr.length !== arity) {
    throw EvaluationError.malformed(`'${operator}' takes ${arity - 1} arguments, got ${expr.length - 1}`);
  }
};

// Parameter blocks come as {":window": 10} or as a flat [":window", 10] list.
export const parseWindow = (params: unknown, fallback: number): number => {
  if (params === undefined || params === null) return fallback;
  if (isRecord(params)) {
    const raw = params[':window'] ?? params.window;
    return raw === undefined ? fallback : requirePositiveInt(raw, 'window');
  }
  if (isList(params)) {
    const idx = params.findIndex((p) => p === ':window' || p === 'window');
    if (idx === -1) return fallback;
    if (idx + 1 >= params.length) {
      throw EvaluationError.malformed('window keyword without a value');
    }
    return requirePositiveInt(params[idx + 1], 'window');
  }
  throw EvaluationError.malformed(`Invalid indicator parameters ${preview(params)}`);
};

export const parseValueExpr = (expr: unknown): ValueExpr => {
  if (!isList(expr)) {
    return { kind: 'literal', value: requireNumber(expr, 'Comparison operand') };
  }
  const [head, symbolArg, params] = expr;
  if (typeof head !== 'string') {
    throw EvaluationError.malformed(`Value expression needs an operator name, got ${preview(expr)}`);
  }
  if (!VALUE_OPERATORS.has(head)) {
    throw EvaluationError.unknownOperator(head);
  }
  if (expr.length > 3) {
    throw EvaluationError.malformed(`'${head}' takes at most 2 arguments, got ${expr.length - 1}`);
  }
  const symbol = requireString(symbolArg, `'${head}' symbol`);
  switch (head) {
    case 'current-price':
      if (expr.length !== 2) {
        throw EvaluationError.malformed(`'current-price' takes 1 argument, got ${expr.length - 1}`);
      }
      return { kind: 'current-price', symbol };
    case 'moving-average-price':
      return { kind: 'moving-average-price', symbol, window: parseWindow(params, DEFAULT_MA_WINDOW) };
    default:
      return { kind: 'rsi', symbol, window: parseWindow(params, DEFAULT_RSI_WINDOW) };
  }
};

export const parseCondition = (expr: unknown): Condition => {
  if (!isList(expr) || expr.length !== 3) {
    throw EvaluationError.malformed(`Condition must be [op, lhs, rhs], got ${preview(expr)}`);
  }
  const [op, lhs, rhs] = expr;
  if (!isComparator(op)) {
    if (typeof op === 'string') throw EvaluationError.unknownOperator(op);
    throw EvaluationError.malformed(`Condition operator must be a string, got ${preview(op)}`);
  }
  return { op, lhs: parseValueExpr(lhs), rhs: parseValueExpr(rhs) };
};

const parseIndicatorRef = (expr: unknown): IndicatorRef => {
  if (!isList(expr) || expr.length === 0 || typeof expr[0] !== 'string') {
    throw EvaluationError.malformed(`Filter indicator must be [name, params], got ${preview(expr)}`);
  }
  const [name, ...rest] = expr;
  // a symbol argument may sit before the params; filters rank their candidates instead
  const params = rest.find((item) => isRecord(item) || isList(item));
  switch (name) {
    case 'rsi':
    case 'relative-strength-index':
      return { kind: 'rsi', window: parseWindow(params, DEFAULT_RSI_WINDOW) };
    case 'moving-average-price':
      return { kind: 'sma', window: parseWindow(params, DEFAULT_MA_WINDOW) };
    default:
      throw EvaluationError.unknownOperator(name);
  }
};

const parseSelector = (expr: unknown): { mode: SelectMode; count: number } => {
  if (!isList(expr) || expr.length !== 2) {
    throw EvaluationError.malformed(`Filter selector must be [select-top|select-bottom, n], got ${preview(expr)}`);
  }
  const [mode, count] = expr;
  if (mode === 'select-top') return { mode: 'top', count: requirePositiveInt(count, 'select-top count') };
  if (mode === 'select-bottom') return { mode: 'bottom', count: requirePositiveInt(count, 'select-bottom count') };
  if (typeof mode === 'string') throw EvaluationError.unknownOperator(mode);
  throw EvaluationError.malformed(`Filter selector mode must be a string, got ${preview(mode)}`);
};

const parseWeightPairs = (args: unknown[]): WeightedBranch[] => {
  const first = args[0];
  const flat = args.length === 1 && isList(first) && typeof first[0] === 'number' ? first : args;
  if (flat.length % 2 !== 0) {
    throw EvaluationError.malformed(`'weight-specified' needs weight/expression pairs, got ${flat.length} items`);
  }
  const pairs: WeightedBranch[] = [];
  for (let i = 0; i < flat.length; i += 2) {
    const weight = requireNumber(flat[i], 'weight-specified weight');
    if (weight < 0) {
      throw EvaluationError.malformed(`'weight-specified' weights must be non-negative, got ${weight}`);
    }
    pairs.push({ weight, node: parseNode(flat[i + 1]) });
  }
  return pairs;
};

const parseCandidates = (expr: unknown): StrategyNode[] => {
  if (!isList(expr)) {
    throw EvaluationError.malformed(`Filter candidates must be a list, got ${preview(expr)}`);
  }
  if (typeof expr[0] === 'string') return [parseNode(expr)];
  return expr.map((item) => parseNode(item));
};

export const parseNode = (expr: unknown): StrategyNode => {
  if (!isList(expr)) {
    throw EvaluationError.malformed(`Expected an expression list, got ${preview(expr)}`);
  }
  if (expr.length === 0) {
    throw EvaluationError.malformed('Empty expression');
  }
  const head = expr[0];

  // [[...], [...]] wraps one or more expressions without an operator
  if (isList(head)) {
    const items = expr.map((item) => parseNode(item));
    return items.length === 1 ? items[0] : { kind: 'weight-equal', branches: items };
  }
  if (typeof head !== 'string') {
    throw EvaluationError.malformed(`Operator must be a string, got ${preview(head)}`);
  }

  switch (head) {
    case 'asset': {
      if (expr.length < 2 || expr.length > 3) {
        throw EvaluationError.malformed(`'asset' takes a symbol and an optional name, got ${expr.length - 1} arguments`);
      }
      const symbol = requireString(expr[1], 'Asset symbol');
      const name = expr[2];
      return typeof name === 'string' ? { kind: 'asset', symbol, name } : { kind: 'asset', symbol };
    }
    case 'group':
      requireArity(expr, 3, head);
      return { kind: 'group', label: requireString(expr[1], 'Group label'), body: parseNode(expr[2]) };
    case 'if':
      requireArity(expr, 4, head);
      return {
        kind: 'if',
        condition: parseCondition(expr[1]),
        thenBranch: parseNode(expr[2]),
        elseBranch: parseNode(expr[3])
      };
    case 'weight-equal':
      return { kind: 'weight-equal', branches: expr.slice(1).map((branch) => parseNode(branch)) };
    case 'weight-specified':
      return { kind: 'weight-specified', pairs: parseWeightPairs(expr.slice(1)) };
    case 'filter':
      requireArity(expr, 4, head);
      return {
        kind: 'filter',
        indicator: parseIndicatorRef(expr[1]),
        select: parseSelector(expr[2]),
        candidates: parseCandidates(expr[3])
      };
    default:
      if (isComparator(head) || VALUE_OPERATORS.has(head)) {
        throw EvaluationError.malformed(`'${head}' cannot be used where an allocation is expected`);
      }
      throw EvaluationError.unknownOperator(head);
  }
};

const isNodeExpression = (value: unknown[]): boolean => {
  const head = value[0];
  return isList(head) || (typeof head === 'string' && NODE_OPERATORS.has(head));
};

/**
 * Builds a program from a read document. Accepted shapes:
 * `[name, description, root]`, `["defsymphony", name, params?, root]`, or a bare root expression.
 */
export const parseProgram = (doc: unknown): StrategyProgram => {
  if (!isList(doc) || doc.length === 0) {
    throw EvaluationError.malformed(`Program must be a non-empty list, got ${preview(doc)}`);
  }
  const head = doc[0];
  if (typeof head === 'string' && PROGRAM_HEADS.has(head)) {
    const label = doc[1];
    const name = typeof label === 'string' ? label : 'unnamed';
    const roots = doc.slice(2).filter((item) => !isRecord(item));
    if (roots.length !== 1) {
      throw EvaluationError.malformed(`'${head}' must contain exactly one root expression, got ${roots.length}`);
    }
    return { name, description: '', root: parseNode(roots[0]) };
  }
  if (isNodeExpression(doc)) {
    return { name: 'unnamed', description: '', root: parseNode(doc) };
  }
  const description = doc[1];
  if (doc.length !== 3) {
    throw EvaluationError.malformed(`Program must be [name, description, root], got ${doc.length} elements`);
  }
  return {
    name: requireString(doc[0], 'Program name'),
    description: typeof description === 'string' ? description : '',
    root: parseNode(doc[2])
  };
};
