import { hashString, mulberry32 } from '../core/utils';
import { weekdaysBetween } from '../core/time';
import { PriceBar } from './marketData.types';

const basePriceForSymbol = (symbol: string): number => {
  const rng = mulberry32(hashString(symbol));
  return 20 + rng() * 280;
};

// Annualized drift in [-5%, +15%] and daily volatility in [0.5%, 3%] per symbol.
const profileForSymbol = (symbol: string) => {
  const rng = mulberry32(hashString(`${symbol}-profile`));
  return { dailyDrift: (rng() * 0.2 - 0.05) / 252, dailyVol: 0.005 + rng() * 0.025 };
};

/**
 * Deterministic random-walk closes for one symbol on the given dates.
 * The same symbol and dates always produce the same series.
 */
export const syntheticBars = (symbol: string, dates: string[]): PriceBar[] => {
  const { dailyDrift, dailyVol } = profileForSymbol(symbol);
  const rng = mulberry32(hashString(`${symbol}-walk`));
  let price = basePriceForSymbol(symbol);
  return dates.map((date) => {
    // two uniforms summed and centred give a cheap bell-shaped shock in [-1, 1]
    const shock = rng() + rng() - 1;
    price = Math.max(1, price * (1 + dailyDrift + shock * dailyVol * Math.sqrt(6)));
    return { date, close: Number(price.toFixed(4)) };
  });
};

export const buildSyntheticHistory = (symbols: string[], start: string, end: string): Record<string, PriceBar[]> => {
  const dates = weekdaysBetween(start, end);
  const out: Record<string, PriceBar[]> = {};
  for (const symbol of symbols) {
    out[symbol] = syntheticBars(symbol, dates);
  }
  return out;
};
