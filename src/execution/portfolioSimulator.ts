import {
  DailyValuation,
  DiagnosticFlag,
  ExecutedOrder,
  Frictions,
  PortfolioState,
  TargetAllocation
} from '../core/types';
import { MarketDataAccessor } from '../data/marketData.types';

export const CASH_EPSILON = 1e-6;
const SHARE_EPSILON = 1e-9;

export interface SimulatorState {
  portfolio: PortfolioState;
  daysSinceRebalance: number;
  rebalanceCount: number;
}

export type StepStatus = 'REBALANCED' | 'SKIPPED_CADENCE' | 'SKIPPED_NO_TARGET';

export interface StepInput {
  state: SimulatorState;
  date: string;
  // undefined when no allocation could be produced for the day
  target?: TargetAllocation;
  frictions: Frictions;
  rebalanceFrequencyDays: number;
  prices: Pick<MarketDataAccessor, 'close'>;
}

export interface StepResult {
  state: SimulatorState;
  status: StepStatus;
  orders: ExecutedOrder[];
  valuation: DailyValuation;
  flags: DiagnosticFlag[];
}

export const createSimulatorState = (initialCapital: number): SimulatorState => ({
  portfolio: { cash: initialCapital, holdings: {} },
  daysSinceRebalance: 0,
  rebalanceCount: 0
});

export const assertPortfolioInvariants = (portfolio: PortfolioState, context: string) => {
  if (!Number.isFinite(portfolio.cash) || portfolio.cash < -CASH_EPSILON) {
    throw new Error(`Cash invariant violated ${context}: cash=${portfolio.cash}`);
  }
  for (const [symbol, shares] of Object.entries(portfolio.holdings)) {
    if (!Number.isFinite(shares) || shares < 0) {
      throw new Error(`Holding invariant violated ${context}: ${symbol}=${shares}`);
    }
  }
};

export const markToMarket = (
  portfolio: PortfolioState,
  date: string,
  prices: Pick<MarketDataAccessor, 'close'>,
  flags: DiagnosticFlag[] = []
): number => {
  let value = portfolio.cash;
  for (const [symbol, shares] of Object.entries(portfolio.holdings)) {
    const price = prices.close(symbol, date);
    if (price === undefined) {
      flags.push({
        code: 'UNPRICED_HOLDING',
        severity: 'warn',
        message: `No price for held ${symbol}; excluded from valuation`,
        date,
        symbols: [symbol],
        observed: shares
      });
      continue;
    }
    value += shares * price;
  }
  return value;
};

// Implied weights of the current holdings at `date` prices.
export const impliedWeights = (
  portfolio: PortfolioState,
  date: string,
  prices: Pick<MarketDataAccessor, 'close'>
): TargetAllocation => {
  const value = markToMarket(portfolio, date, prices);
  const weights: TargetAllocation = {};
  if (value <= 0) return weights;
  for (const [symbol, shares] of Object.entries(portfolio.holdings)) {
    const price = prices.close(symbol, date);
    if (price !== undefined) weights[symbol] = (shares * price) / value;
  }
  return weights;
};

class OrderBook {
  readonly orders: ExecutedOrder[] = [];

  constructor(
    private readonly portfolio: PortfolioState,
    private readonly date: string,
    private readonly frictions: Frictions
  ) {}

  sell(symbol: string, shares: number, price: number, reason: ExecutedOrder['reason']) {
    const held = this.portfolio.holdings[symbol] ?? 0;
    const qty = Math.min(shares, held);
    if (qty <= 0) return;
    const executionPrice = price * (1 - this.frictions.slippagePct);
    const notional = qty * executionPrice;
    const fee = notional * this.frictions.transactionCostPct;
    this.portfolio.cash += notional - fee;
    const remaining = held - qty;
    if (remaining <= SHARE_EPSILON) {
      delete this.portfolio.holdings[symbol];
    } else {
      this.portfolio.holdings[symbol] = remaining;
    }
    this.record({ symbol, side: 'SELL', shares: qty, price, executionPrice, notional, fee, reason });
  }

  // Returns the shares actually bought after capping to available cash.
  buy(symbol: string, shares: number, price: number): number {
    const executionPrice = price * (1 + this.frictions.slippagePct);
    const costPerShare = executionPrice * (1 + this.frictions.transactionCostPct);
    const affordable = Math.max(0, this.portfolio.cash) / costPerShare;
    const qty = Math.min(shares, affordable);
    if (qty <= SHARE_EPSILON) return 0;
    const notional = qty * executionPrice;
    const fee = notional * this.frictions.transactionCostPct;
    this.portfolio.cash -= notional + fee;
    if (this.portfolio.cash < 0 && this.portfolio.cash > -CASH_EPSILON) {
      this.portfolio.cash = 0;
    }
    this.portfolio.holdings[symbol] = (this.portfolio.holdings[symbol] ?? 0) + qty;
    this.record({ symbol, side: 'BUY', shares: qty, price, executionPrice, notional, fee, reason: 'REBALANCE' });
    return qty;
  }

  private record(order: Omit<ExecutedOrder, 'date'>) {
    this.orders.push({ date: this.date, ...order });
    assertPortfolioInvariants(this.portfolio, `after ${order.side} ${order.symbol} on ${this.date}`);
  }
}

/**
 * Advances the portfolio by one trading day: value the book, then (on a
 * rebalance day with a target) liquidate dropped symbols and trade toward
 * the target, sells before buys. The input state is not mutated.
 */
export const stepPortfolio = (input: StepInput): StepResult => {
  const { date, target, frictions, prices } = input;
  const flags: DiagnosticFlag[] = [];
  const portfolio: PortfolioState = {
    cash: input.state.portfolio.cash,
    holdings: { ...input.state.portfolio.holdings }
  };
  const daysSinceRebalance = input.state.daysSinceRebalance + 1;
  const preTradeValue = markToMarket(portfolio, date, prices, flags);
  const valuation: DailyValuation = { date, value: preTradeValue };

  const isFirstRebalance = input.state.rebalanceCount === 0;
  const due = isFirstRebalance || daysSinceRebalance >= input.rebalanceFrequencyDays;
  if (!due || !target) {
    return {
      state: { portfolio, daysSinceRebalance, rebalanceCount: input.state.rebalanceCount },
      status: due ? 'SKIPPED_NO_TARGET' : 'SKIPPED_CADENCE',
      orders: [],
      valuation,
      flags
    };
  }

  const book = new OrderBook(portfolio, date, frictions);

  for (const symbol of Object.keys(portfolio.holdings)) {
    if ((target[symbol] ?? 0) > 0) continue;
    const price = prices.close(symbol, date);
    if (price === undefined) {
      flags.push({
        code: 'LIQUIDATION_UNPRICED',
        severity: 'warn',
        message: `Cannot liquidate ${symbol}: no price on or before ${date}`,
        date,
        symbols: [symbol]
      });
      continue;
    }
    book.sell(symbol, portfolio.holdings[symbol] ?? 0, price, 'LIQUIDATE');
  }

  const buys: Array<{ symbol: string; shares: number; price: number }> = [];
  for (const [symbol, weight] of Object.entries(target)) {
    if (!(weight > 0)) continue;
    const price = prices.close(symbol, date);
    if (price === undefined) {
      flags.push({
        code: 'TARGET_UNPRICED',
        severity: 'warn',
        message: `Skipping ${symbol}: no price on or before ${date}`,
        date,
        symbols: [symbol]
      });
      continue;
    }
    const targetShares = (preTradeValue * weight) / price;
    const delta = targetShares - (portfolio.holdings[symbol] ?? 0);
    if (Math.abs(delta) <= SHARE_EPSILON) continue;
    if (!isFirstRebalance && Math.abs(delta * price) < frictions.minTradeSize) continue;
    if (delta < 0) {
      book.sell(symbol, -delta, price, 'REBALANCE');
    } else {
      buys.push({ symbol, shares: delta, price });
    }
  }

  for (const { symbol, shares, price } of buys) {
    const bought = book.buy(symbol, shares, price);
    if (bought < shares - SHARE_EPSILON) {
      flags.push({
        code: 'BUY_CAPPED_BY_CASH',
        severity: 'info',
        message: `Bought ${bought.toFixed(6)} of ${shares.toFixed(6)} ${symbol} shares`,
        date,
        symbols: [symbol],
        observed: { requested: shares, filled: bought }
      });
    }
  }

  return {
    state: { portfolio, daysSinceRebalance: 0, rebalanceCount: input.state.rebalanceCount + 1 },
    status: 'REBALANCED',
    orders: book.orders,
    valuation,
    flags
  };
};
