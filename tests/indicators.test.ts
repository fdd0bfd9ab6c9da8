import { RSI, SMA } from '../src/data/indicators';

describe('SMA', () => {
  it('averages the trailing window once it is full', () => {
    const result = SMA([1, 2, 3, 4], 2);
    expect(result[0]).toBeNaN();
    expect(result.slice(1)).toEqual([1.5, 2.5, 3.5]);
  });

  it('is all NaN when the window exceeds the series', () => {
    expect(SMA([1, 2], 3).every((v) => Number.isNaN(v))).toBe(true);
  });
});

describe('RSI', () => {
  it('applies Wilder smoothing after the seed window', () => {
    const result = RSI([1, 2, 1, 2, 1], 2);
    expect(result[0]).toBeNaN();
    expect(result[1]).toBeNaN();
    expect(result[2]).toBeCloseTo(50, 10);
    expect(result[3]).toBeCloseTo(75, 10);
    expect(result[4]).toBeCloseTo(37.5, 10);
  });

  it('pins to 100 for a steady rise and 50 for a flat series', () => {
    expect(RSI([1, 2, 3, 4], 3)[3]).toBe(100);
    expect(RSI([5, 5, 5, 5], 3)[3]).toBe(50);
  });
});
