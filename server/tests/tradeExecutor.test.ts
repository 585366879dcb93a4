import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { StateStore, createDefaultState, parseState } from '../services/stateStore';
import { TradeExecutor, applyTradeOutcome, size } from '../services/tradeExecutor';
import { ExecutionError } from '../middleware/errorHandler';
import { Opportunity, TechnicalAnalysis } from '../utils/types';
import { FakeMarket, FakeNotifier, MemoryActivityLog, makeTempDir, sentiment } from './helpers/fakes';

const NOW = new Date('2024-03-05T10:00:00.000Z');

function opportunity(overrides: Partial<Opportunity> = {}): Opportunity {
  const technical: TechnicalAnalysis = {
    signal: 'buy',
    confidence: 0.9,
    indicators: { rsi: 28, macd: 0.001, macdSignal: 0.0005, bbUpper: 1.11, bbMiddle: 1.1, bbLower: 1.09, atr: 0.002, close: 1.1 },
  };
  return {
    instrument: 'EUR_USD',
    direction: 'buy',
    confidence: 0.75,
    price: 1.1001,
    technical,
    sentiment: sentiment(0.3, 0.2),
    ...overrides,
  };
}

describe('size', () => {
  it('caps the position at a tenth of the balance', () => {
    // 2% of 10000 over 50 pips of 0.0001 is 40000, above the 1000 cap
    expect(size(10000, 2, 50, 'EUR_USD')).toBe(1000);
  });

  it('uses the JPY pip size for yen pairs', () => {
    // 200 / (50 * 0.01)
    expect(size(10000, 2, 50, 'USD_JPY')).toBe(400);
  });

  it('never goes below the minimum order size', () => {
    expect(size(0.05, 2, 50, 'EUR_USD')).toBe(0.01);
    expect(size(0, 2, 50, 'EUR_USD')).toBe(0.01);
  });

  it('takes the defaults for risk and stop distance', () => {
    expect(size(100000, undefined, undefined, 'USD_JPY')).toBe(4000);
  });
});

describe('applyTradeOutcome', () => {
  it('books a win and clears the loss streak', () => {
    const state = createDefaultState(NOW);
    state.consecutiveLosses = 2;

    applyTradeOutcome(state, 12.5);

    expect(state.winCount).toBe(1);
    expect(state.lossCount).toBe(0);
    expect(state.consecutiveLosses).toBe(0);
    expect(state.dailyPnl).toBe(12.5);
    expect(state.totalPnl).toBe(12.5);
  });

  it('books a loss and extends the streak', () => {
    const state = createDefaultState(NOW);
    state.consecutiveLosses = 1;

    applyTradeOutcome(state, -8);

    expect(state.lossCount).toBe(1);
    expect(state.consecutiveLosses).toBe(2);
    expect(state.totalPnl).toBe(-8);
  });

  it('counts a flat trade as a loss without extending the streak', () => {
    const state = createDefaultState(NOW);
    state.consecutiveLosses = 2;

    applyTradeOutcome(state, 0);

    expect(state.lossCount).toBe(1);
    expect(state.winCount).toBe(0);
    expect(state.consecutiveLosses).toBe(0);
  });
});

describe('TradeExecutor', () => {
  let dir: string;
  let market: FakeMarket;
  let notifier: FakeNotifier;
  let activityLog: MemoryActivityLog;
  let store: StateStore;
  let executor: TradeExecutor;

  beforeEach(async () => {
    dir = await makeTempDir();
    market = new FakeMarket();
    notifier = new FakeNotifier();
    activityLog = new MemoryActivityLog(() => NOW);
    store = new StateStore(path.join(dir, 'state.json'), createDefaultState(NOW));
    executor = new TradeExecutor({ market, notifier, store, activityLog });
    market.prices.EUR_USD = { bid: 1.1, ask: 1.1001, timestamp: NOW.toISOString() };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('places a sized order and records the trade', async () => {
    const result = await executor.execute(opportunity(), 10000, NOW);

    expect(result.ok).toBe(true);
    expect(market.orders).toEqual([{ instrument: 'EUR_USD', units: 1000, side: 'buy' }]);
    expect(store.state.dailyTrades).toBe(1);
    expect(store.state.lastTradeTime).toBe('2024-03-05T10:00:00.000Z');
    expect(store.state.trades).toEqual([
      {
        instrument: 'EUR_USD',
        side: 'buy',
        units: 1000,
        price: 1.1001,
        confidence: 0.75,
        timestamp: '2024-03-05T10:00:00.000Z',
        orderId: '1',
      },
    ]);
    expect(notifier.alerts).toHaveLength(1);
    expect(activityLog.actions()).toEqual(['Trade executed']);
  });

  it('persists the fill before returning', async () => {
    await executor.execute(opportunity(), 10000, NOW);

    const onDisk = parseState(await fs.readFile(store.path, 'utf8'));
    expect(onDisk?.dailyTrades).toBe(1);
    expect(onDisk?.trades[0].orderId).toBe('1');
    expect(store.isDirty).toBe(false);
  });

  it('sells with negative units', async () => {
    market.prices.USD_JPY = { bid: 150, ask: 150.02, timestamp: NOW.toISOString() };

    await executor.execute(opportunity({ instrument: 'USD_JPY', direction: 'sell', price: 150.02 }), 10000, NOW);

    expect(market.orders).toEqual([{ instrument: 'USD_JPY', units: -400, side: 'sell' }]);
    expect(store.state.trades[0].units).toBe(-400);
  });

  it('leaves state untouched when the order is rejected', async () => {
    market.orderError = new ExecutionError('MARKET_HALTED');

    const result = await executor.execute(opportunity(), 10000, NOW);

    expect(result.ok).toBe(false);
    expect(store.state.dailyTrades).toBe(0);
    expect(store.state.lastTradeTime).toBeNull();
    expect(store.state.trades).toEqual([]);
    expect(notifier.alerts).toEqual([]);
    expect(activityLog.actions()).toEqual(['Trade failed']);
  });

  it('refuses to trade below the minimum balance', async () => {
    const result = await executor.execute(opportunity(), 99.99, NOW);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Insufficient balance for trading');
    expect(market.orders).toEqual([]);
  });

  it('refuses a neutral opportunity', async () => {
    const result = await executor.execute(opportunity({ direction: 'neutral' }), 10000, NOW);

    expect(result.ok).toBe(false);
    expect(market.orders).toEqual([]);
  });

  it('keeps the trade when the alert cannot be delivered', async () => {
    notifier.sendError = new Error('429 Too Many Requests');

    const result = await executor.execute(opportunity(), 10000, NOW);

    expect(result.ok).toBe(true);
    expect(store.state.dailyTrades).toBe(1);
  });

  it('stages trade outcomes for the next flush', () => {
    executor.recordTradeOutcome(-3);

    expect(store.state.consecutiveLosses).toBe(1);
    expect(store.state.totalPnl).toBe(-3);
    expect(store.isDirty).toBe(true);
  });

  describe('closeAllPositions', () => {
    beforeEach(() => {
      market.positions = [
        { instrument: 'EUR_USD', units: 1000, side: 'long', unrealizedPnl: 4 },
        { instrument: 'GBP_USD', units: -500, side: 'short', unrealizedPnl: -6 },
      ];
      store.stage((draft) => {
        draft.openPositions = market.positions.map((p) => ({ ...p }));
      });
    });

    it('closes every position and books the outcomes', async () => {
      const result = await executor.closeAllPositions();

      expect(result).toEqual({ closed: ['EUR_USD', 'GBP_USD'], failed: [] });
      expect(market.positions).toEqual([]);
      expect(store.state.openPositions).toEqual([]);
      expect(store.state.totalPnl).toBe(-2);
      expect(store.state.winCount).toBe(1);
      expect(store.state.lossCount).toBe(1);
      expect(activityLog.entries[0].level).toBe('INFO');
    });

    it('reports positions the broker refused to close', async () => {
      market.closeFailures.add('GBP_USD');

      const result = await executor.closeAllPositions();

      expect(result).toEqual({ closed: ['EUR_USD'], failed: ['GBP_USD'] });
      expect(store.state.openPositions.map((p) => p.instrument)).toEqual(['GBP_USD']);
      expect(activityLog.entries[0].level).toBe('WARNING');
    });

    it('does nothing when positions cannot be listed', async () => {
      market.positionsError = new Error('ETIMEDOUT');

      const result = await executor.closeAllPositions();

      expect(result).toEqual({ closed: [], failed: [] });
      expect(activityLog.entries).toEqual([]);
    });
  });
});
