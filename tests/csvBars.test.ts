import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadBarsFromCsvDir, parseBarsCsv } from '../src/data/csvBars';

describe('parseBarsCsv', () => {
  it('reads Date and Close columns and skips unusable rows', () => {
    const text = [
      'Date,Open,High,Low,Close,Adj Close,Volume',
      '2024-01-02,10,11,9,10.5,10.4,1000',
      '2024-01-03,null,null,null,null,null,0',
      '1/4/2024,10,12,10,11.25,11.2,1200',
      ''
    ].join('\n');
    expect(parseBarsCsv(text)).toEqual([
      { date: '2024-01-02', close: 10.5 },
      { date: '2024-01-04', close: 11.25 }
    ]);
  });

  it('requires a date and a close column', () => {
    expect(() => parseBarsCsv('Day,Price\n2024-01-02,1', 'x.csv')).toThrow('x.csv: header needs Date and Close columns, got "Day,Price"');
  });
});

describe('loadBarsFromCsvDir', () => {
  it('loads one file per symbol and reports the missing ones', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bars-'));
    fs.writeFileSync(path.join(dir, 'SPY.csv'), 'date,close\n2024-01-02,470\n');
    const result = loadBarsFromCsvDir(dir, ['SPY', 'TLT']);
    expect(result.bars).toEqual({ SPY: [{ date: '2024-01-02', close: 470 }] });
    expect(result.missing).toEqual(['TLT']);
  });
});
