import { EvaluationError, EvaluationErrorKind } from '../src/core/errors';
import { parseNode, parseProgram, parseWindow } from '../src/dsl/parser';
import { parseStrategyText } from '../src/dsl/loadStrategy';

const errorKind = (fn: () => unknown): EvaluationErrorKind | undefined => {
  try {
    fn();
  } catch (err) {
    if (err instanceof EvaluationError) return err.kind;
    throw err;
  }
  return undefined;
};

describe('parseProgram', () => {
  it('reads a defsymphony list with wrapped branches', () => {
    const program = parseProgram([
      'defsymphony',
      'Trend Follow',
      [
        'if',
        ['>', ['current-price', 'SPY'], ['moving-average-price', 'SPY', { ':window': 200 }]],
        [['asset', 'TQQQ', 'Leveraged Nasdaq']],
        [['asset', 'SPY']]
      ]
    ]);
    expect(program.name).toBe('Trend Follow');
    expect(program.root).toEqual({
      kind: 'if',
      condition: {
        op: '>',
        lhs: { kind: 'current-price', symbol: 'SPY' },
        rhs: { kind: 'moving-average-price', symbol: 'SPY', window: 200 }
      },
      thenBranch: { kind: 'asset', symbol: 'TQQQ', name: 'Leveraged Nasdaq' },
      elseBranch: { kind: 'asset', symbol: 'SPY' }
    });
  });

  it('reads the [name, description, root] form', () => {
    const program = parseProgram(['Balanced', 'Two funds', ['weight-equal', [['asset', 'SPY'], ['asset', 'TLT']]]]);
    expect(program).toEqual({
      name: 'Balanced',
      description: 'Two funds',
      root: {
        kind: 'weight-equal',
        branches: [
          {
            kind: 'weight-equal',
            branches: [
              { kind: 'asset', symbol: 'SPY' },
              { kind: 'asset', symbol: 'TLT' }
            ]
          }
        ]
      }
    });
  });

  it('accepts a bare root expression', () => {
    expect(parseProgram(['asset', 'SPY']).root).toEqual({ kind: 'asset', symbol: 'SPY' });
  });

  it('rejects a defsymphony with two root expressions', () => {
    expect(errorKind(() => parseProgram(['defsymphony', 'x', ['asset', 'A'], ['asset', 'B']]))).toBe(
      'MalformedExpression'
    );
  });
});

describe('parseNode', () => {
  it('parses filters with selectors and candidate lists', () => {
    expect(
      parseNode(['filter', ['rsi', { ':window': 14 }], ['select-bottom', 2], [['asset', 'A'], ['asset', 'B'], ['asset', 'C']]])
    ).toEqual({
      kind: 'filter',
      indicator: { kind: 'rsi', window: 14 },
      select: { mode: 'bottom', count: 2 },
      candidates: [
        { kind: 'asset', symbol: 'A' },
        { kind: 'asset', symbol: 'B' },
        { kind: 'asset', symbol: 'C' }
      ]
    });
  });

  it('parses weight-specified pairs', () => {
    expect(parseNode(['weight-specified', 0.7, ['asset', 'SPY'], 0.3, [['asset', 'TLT']]])).toEqual({
      kind: 'weight-specified',
      pairs: [
        { weight: 0.7, node: { kind: 'asset', symbol: 'SPY' } },
        { weight: 0.3, node: { kind: 'asset', symbol: 'TLT' } }
      ]
    });
  });

  it('parses groups', () => {
    expect(parseNode(['group', 'SPY+TLT', [['asset', 'SPY']]])).toEqual({
      kind: 'group',
      label: 'SPY+TLT',
      body: { kind: 'asset', symbol: 'SPY' }
    });
  });

  it('reports structural problems as malformed', () => {
    expect(errorKind(() => parseNode(['weight-specified', 0.5, ['asset', 'A'], 0.5]))).toBe('MalformedExpression');
    expect(errorKind(() => parseNode(['if', ['>', 1, 2], ['asset', 'A']]))).toBe('MalformedExpression');
    expect(errorKind(() => parseNode(['filter', ['rsi'], ['select-top', 0], [['asset', 'A']]]))).toBe(
      'MalformedExpression'
    );
    expect(errorKind(() => parseNode([]))).toBe('MalformedExpression');
    expect(errorKind(() => parseNode(['>', 1, 2]))).toBe('MalformedExpression');
    expect(errorKind(() => parseNode(['weight-specified', -1, ['asset', 'A']]))).toBe('MalformedExpression');
  });

  it('reports unrecognized operator names', () => {
    expect(errorKind(() => parseNode(['weight-inverse-volatility', ['asset', 'A']]))).toBe('UnknownOperator');
    expect(errorKind(() => parseNode(['if', ['and', 1, 2], ['asset', 'A'], ['asset', 'B']]))).toBe('UnknownOperator');
    expect(errorKind(() => parseNode(['filter', ['cumulative-return'], ['select-top', 1], [['asset', 'A']]]))).toBe(
      'UnknownOperator'
    );
    expect(errorKind(() => parseNode(['filter', ['rsi'], ['select-middle', 1], [['asset', 'A']]]))).toBe(
      'UnknownOperator'
    );
  });
});

describe('parseWindow', () => {
  it('reads object and flat keyword params, falling back to the default', () => {
    expect(parseWindow({ ':window': 14 }, 10)).toBe(14);
    expect(parseWindow({ window: 5 }, 10)).toBe(5);
    expect(parseWindow([':window', 30], 20)).toBe(30);
    expect(parseWindow(undefined, 20)).toBe(20);
    expect(parseWindow({}, 10)).toBe(10);
  });

  it('applies indicator defaults inside conditions', () => {
    const node = parseNode(['if', ['<', ['rsi', 'SPY'], ['moving-average-price', 'SPY']], ['asset', 'A'], ['asset', 'B']]);
    expect(node.kind === 'if' && node.condition).toEqual({
      op: '<',
      lhs: { kind: 'rsi', symbol: 'SPY', window: 10 },
      rhs: { kind: 'moving-average-price', symbol: 'SPY', window: 20 }
    });
  });
});

describe('parseStrategyText', () => {
  it('reads the s-expression form', () => {
    const text = `
      ; RSI guard
      (defsymphony "Guarded Nasdaq" {:rebalance-frequency :daily}
        (weight-equal
          [(if (> (rsi "QQQ" {:window 10}) 79)
             [(asset "BIL")]
             [(asset "QQQ")])]))`;
    const program = parseStrategyText(text);
    expect(program.name).toBe('Guarded Nasdaq');
    expect(program.root).toEqual({
      kind: 'weight-equal',
      branches: [
        {
          kind: 'if',
          condition: { op: '>', lhs: { kind: 'rsi', symbol: 'QQQ', window: 10 }, rhs: { kind: 'literal', value: 79 } },
          thenBranch: { kind: 'asset', symbol: 'BIL' },
          elseBranch: { kind: 'asset', symbol: 'QQQ' }
        }
      ]
    });
  });

  it('reads JSON documents', () => {
    const program = parseStrategyText(JSON.stringify(['One', '', ['asset', 'VTI']]));
    expect(program.root).toEqual({ kind: 'asset', symbol: 'VTI' });
  });
});
