import { EvaluationError } from '../core/errors';
import { DialectCondition, DialectIndicator, Incantation, validateDialectDocument } from '../core/schema';
import { Condition, IndicatorRef, StrategyNode, StrategyProgram, ValueExpr } from '../core/types';
import { DEFAULT_MA_WINDOW, DEFAULT_RSI_WINDOW } from './parser';

const toValueExpr = (indicator: DialectIndicator, symbol: string): ValueExpr => {
  switch (indicator.type) {
    case 'RelativeStrengthIndex':
      return { kind: 'rsi', symbol, window: indicator.window ?? DEFAULT_RSI_WINDOW };
    case 'MovingAverage':
      return { kind: 'moving-average-price', symbol, window: indicator.window ?? DEFAULT_MA_WINDOW };
    case 'CurrentPrice':
      return { kind: 'current-price', symbol };
    default:
      throw EvaluationError.unknownOperator(indicator.type);
  }
};

const toIndicatorRef = (indicator: DialectIndicator): IndicatorRef => {
  switch (indicator.type) {
    case 'RelativeStrengthIndex':
      return { kind: 'rsi', window: indicator.window ?? DEFAULT_RSI_WINDOW };
    case 'MovingAverage':
      return { kind: 'sma', window: indicator.window ?? DEFAULT_MA_WINDOW };
    default:
      throw EvaluationError.unknownOperator(indicator.type);
  }
};

const toCondition = (condition: DialectCondition): Condition => {
  if (condition.condition_type !== 'SingleCondition') {
    throw EvaluationError.unknownOperator(condition.condition_type);
  }
  const lhs = toValueExpr(condition.lh_indicator, condition.lh_ticker_symbol);
  let rhs: ValueExpr;
  if (condition.rh_indicator) {
    rhs = toValueExpr(condition.rh_indicator, condition.rh_ticker_symbol ?? condition.lh_ticker_symbol);
  } else if (condition.rh_value !== undefined) {
    rhs = { kind: 'literal', value: condition.rh_value };
  } else {
    throw EvaluationError.malformed('Condition needs rh_indicator or rh_value');
  }
  return { op: condition.greater_than ? '>' : '<', lhs, rhs };
};

const toNode = (incantation: Incantation): StrategyNode => {
  switch (incantation.incantation_type) {
    case 'Ticker':
      return incantation.name
        ? { kind: 'asset', symbol: incantation.symbol, name: incantation.name }
        : { kind: 'asset', symbol: incantation.symbol };
    case 'Weighted': {
      const children = incantation.incantations.map(toNode);
      const { weights } = incantation;
      if (weights) {
        if (weights.length !== children.length) {
          throw EvaluationError.malformed(`Weighted has ${children.length} children but ${weights.length} weights`);
        }
        return { kind: 'weight-specified', pairs: children.map((node, i) => ({ weight: weights[i], node })) };
      }
      return children.length === 1 ? children[0] : { kind: 'weight-equal', branches: children };
    }
    case 'IfElse':
      return {
        kind: 'if',
        condition: toCondition(incantation.condition),
        thenBranch: toNode(incantation.then_incantation),
        elseBranch: toNode(incantation.else_incantation)
      };
    case 'Filtered':
      return {
        kind: 'filter',
        indicator: toIndicatorRef(incantation.sort_indicator),
        select: { mode: incantation.bottom ? 'bottom' : 'top', count: incantation.count },
        candidates: incantation.incantations.map(toNode)
      };
  }
};

/**
 * Converts the alternate `{ name, description, incantation }` JSON format
 * into the same program tree the list format produces.
 */
export const normalizeDialectDocument = (doc: unknown): StrategyProgram => {
  const result = validateDialectDocument(doc);
  if (!result.success) {
    throw EvaluationError.malformed(`Invalid strategy document: ${result.errors.join('; ')}`);
  }
  const { name, description, incantation } = result.value;
  return { name, description: description ?? '', root: toNode(incantation) };
};
