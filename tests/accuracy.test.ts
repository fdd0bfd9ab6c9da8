import { compareSelections, parseGroundTruthCsv } from '../src/validation/accuracy';
import { DailySelection } from '../src/backtest/backtest';

const TABLE = [
  'Date,Day Traded,SPY,TLT,QQQ',
  '2024-01-02,Yes,50.0%,50.0%,-',
  '1/3/2024,Yes,100%,—,',
  '2024-01-04,No,-,-,-',
  ''
].join('\n');

const selection = (date: string, selected: string[], error?: string): DailySelection => ({
  date,
  allocation: Object.fromEntries(selected.map((s) => [s, 1 / selected.length])),
  selected,
  error
});

describe('parseGroundTruthCsv', () => {
  it('reads held symbols per date', () => {
    expect(parseGroundTruthCsv(TABLE)).toEqual({
      '2024-01-02': ['SPY', 'TLT'],
      '2024-01-03': ['SPY'],
      '2024-01-04': []
    });
  });

  it('rejects unreadable cells', () => {
    expect(() => parseGroundTruthCsv('Date,SPY\n2024-01-02,lots')).toThrow('row 2 SPY: cannot read allocation "lots"');
  });

  it('returns nothing for empty input', () => {
    expect(parseGroundTruthCsv('')).toEqual({});
  });
});

describe('compareSelections', () => {
  const truth = parseGroundTruthCsv(TABLE);

  it('scores set equality on shared dates', () => {
    const report = compareSelections(
      [
        selection('2024-01-02', ['SPY', 'TLT']),
        selection('2024-01-03', ['QQQ']),
        selection('2024-01-04', []),
        selection('2024-01-05', ['SPY'])
      ],
      truth
    );
    expect(report.comparedDays).toBe(3);
    expect(report.matches).toBe(2);
    expect(report.accuracy).toBeCloseTo(2 / 3, 12);
    expect(report.mismatches).toEqual([{ date: '2024-01-03', expected: ['SPY'], actual: ['QQQ'] }]);
    expect(report.unevaluatedDays).toEqual([]);
  });

  it('leaves errored days out of the score', () => {
    const report = compareSelections(
      [selection('2024-01-02', [], 'No rsi(10) for SPY on or before 2024-01-02'), selection('2024-01-03', ['SPY'])],
      truth
    );
    expect(report).toEqual({
      comparedDays: 1,
      matches: 1,
      accuracy: 1,
      unevaluatedDays: ['2024-01-02'],
      mismatches: []
    });
  });
});
