import { SeriesStore } from '../src/data/seriesStore';

const bars = (closes: number[], dates: string[]) => closes.map((close, i) => ({ date: dates[i], close }));

describe('SeriesStore', () => {
  const dates = ['2024-01-02', '2024-01-03', '2024-01-04', '2024-01-05'];
  const store = new SeriesStore(
    {
      AAA: bars([10, 11, 12, 13], dates),
      // out of order on purpose
      BBB: [
        { date: '2024-01-05', close: 40 },
        { date: '2024-01-03', close: 20 },
        { date: '2024-01-04', close: 30 }
      ]
    },
    [{ kind: 'sma', window: 2 }]
  );

  it('returns the latest close on or before the date', () => {
    expect(store.close('AAA', '2024-01-03')).toBe(11);
    expect(store.close('AAA', '2024-01-07')).toBe(13);
    expect(store.close('AAA', '2024-01-01')).toBeUndefined();
    expect(store.close('ZZZ', '2024-01-03')).toBeUndefined();
  });

  it('sorts bars by date', () => {
    expect(store.dates('BBB')).toEqual(['2024-01-03', '2024-01-04', '2024-01-05']);
    expect(store.close('BBB', '2024-01-04')).toBe(30);
  });

  it('hides indicator values during warmup', () => {
    expect(store.indicator('AAA', 'sma', 2, '2024-01-02')).toBeUndefined();
    expect(store.indicator('AAA', 'sma', 2, '2024-01-03')).toBe(10.5);
    expect(store.indicator('BBB', 'sma', 3, '2024-01-06')).toBe(30);
  });

  it('lists trading days across symbols within bounds', () => {
    expect(store.tradingDays(['AAA', 'BBB'], '2024-01-03')).toEqual(['2024-01-03', '2024-01-04', '2024-01-05']);
    expect(store.tradingDays(['BBB'], undefined, '2024-01-04')).toEqual(['2024-01-03', '2024-01-04']);
  });

  it('finds the common window after indicator warmup', () => {
    expect(store.analysisWindow(['AAA', 'BBB'], [{ kind: 'sma', window: 2 }])).toEqual({
      start: '2024-01-04',
      end: '2024-01-05',
      warmupBars: 2
    });
  });

  it('rejects windows that cannot be satisfied', () => {
    expect(() => store.analysisWindow(['AAA', 'CCC'], [])).toThrow('No price history for CCC');
    expect(() => store.analysisWindow(['BBB'], [{ kind: 'rsi', window: 5 }])).toThrow('BBB has 3 bars; indicators need 6');
  });

  it('rejects non-positive closes', () => {
    expect(() => new SeriesStore({ BAD: [{ date: '2024-01-02', close: 0 }] })).toThrow('Invalid close 0 for BAD on 2024-01-02');
  });
});
