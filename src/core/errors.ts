export type EvaluationErrorKind = 'DataUnavailable' | 'MalformedExpression' | 'UnknownOperator';

export class EvaluationError extends Error {
  readonly kind: EvaluationErrorKind;
  readonly symbol?: string;
  readonly indicator?: string;

  constructor(kind: EvaluationErrorKind, message: string, details: { symbol?: string; indicator?: string } = {}) {
    super(message);
    this.name = 'EvaluationError';
    this.kind = kind;
    this.symbol = details.symbol;
    this.indicator = details.indicator;
  }

  static dataUnavailable(symbol: string, indicator: string, date: string): EvaluationError {
    return new EvaluationError('DataUnavailable', `No ${indicator} for ${symbol} on or before ${date}`, {
      symbol,
      indicator
    });
  }

  static malformed(message: string): EvaluationError {
    return new EvaluationError('MalformedExpression', message);
  }

  static unknownOperator(operator: string): EvaluationError {
    return new EvaluationError('UnknownOperator', `Unknown operator: ${operator}`);
  }
}

export const isEvaluationError = (err: unknown): err is EvaluationError => err instanceof EvaluationError;

// Day-level failures the backtest loop skips over; anything else aborts the run.
export const isRecoverableDayError = (err: unknown): err is EvaluationError =>
  isEvaluationError(err) && (err.kind === 'DataUnavailable' || err.kind === 'MalformedExpression');
