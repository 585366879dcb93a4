import { SCHEDULER, SIZING } from '../utils/constants';
import { loggers } from '../utils/logger';
import { boundedResult } from '../utils/retryPolicy';
import { recordTradeExecuted } from '../utils/metrics';
import { ActivityLog } from '../utils/activityLog';
import { ExecutionError } from '../middleware/errorHandler';
import { BotState, Opportunity, OrderSide, Result, TradeRecord, fail, ok } from '../utils/types';
import { MarketDataClient, pipSize } from './marketDataService';
import { Notifier } from './telegramNotifier';
import { StateStore } from './stateStore';

const log = loggers.execution;

/**
 * Risk-based position size, clamped to [MIN_UNITS, MAX_BALANCE_FRACTION * balance]
 */
export function size(
  balance: number,
  riskPct: number = SIZING.RISK_PCT,
  stopLossPips: number = SIZING.STOP_LOSS_PIPS,
  instrument: string
): number {
  const riskAmount = balance * (riskPct / 100);
  const raw = riskAmount / (stopLossPips * pipSize(instrument));
  return Math.max(SIZING.MIN_UNITS, Math.min(raw, balance * SIZING.MAX_BALANCE_FRACTION));
}

/**
 * Apply a closed trade's P&L to the running counters. A flat trade resets the
 * loss streak but is counted with the losses.
 */
export function applyTradeOutcome(state: BotState, pnl: number): void {
  state.dailyPnl += pnl;
  state.totalPnl += pnl;

  if (pnl < 0) {
    state.consecutiveLosses += 1;
  } else {
    state.consecutiveLosses = 0;
  }

  if (pnl > 0) {
    state.winCount += 1;
  } else {
    state.lossCount += 1;
  }
}

export interface CloseAllResult {
  closed: string[];
  failed: string[];
}

export interface TradeExecutorOptions {
  market: MarketDataClient;
  notifier: Notifier;
  store: StateStore;
  activityLog: ActivityLog;
  callTimeoutMs?: number;
}

export class TradeExecutor {
  private readonly market: MarketDataClient;
  private readonly notifier: Notifier;
  private readonly store: StateStore;
  private readonly activityLog: ActivityLog;
  private readonly callTimeoutMs: number;

  constructor(options: TradeExecutorOptions) {
    this.market = options.market;
    this.notifier = options.notifier;
    this.store = options.store;
    this.activityLog = options.activityLog;
    this.callTimeoutMs = options.callTimeoutMs ?? SCHEDULER.COLLABORATOR_TIMEOUT_MS;
  }

  size(balance: number, instrument: string, riskPct?: number, stopLossPips?: number): number {
    return size(balance, riskPct, stopLossPips, instrument);
  }

  /**
   * Place the order for an opportunity and commit it to state.
   *
   * Nothing in state changes unless the order fills. The fill is persisted
   * before the alert goes out; a failed alert does not undo the trade.
   */
  async execute(opportunity: Opportunity, balance: number, now: Date): Promise<Result<TradeRecord>> {
    const { instrument, direction } = opportunity;

    let side: OrderSide;
    if (direction === 'buy') side = 'buy';
    else if (direction === 'sell') side = 'sell';
    else {
      log.warn('Refusing to execute a neutral opportunity', { instrument });
      return fail(new ExecutionError(`No tradable direction for ${instrument}`, { instrument, direction }));
    }

    if (balance < SIZING.MIN_BALANCE) {
      log.warn('Balance below trading minimum', { balance, minimum: SIZING.MIN_BALANCE });
      return fail(new ExecutionError('Insufficient balance for trading', { balance }));
    }

    const positionSize = this.size(balance, instrument);
    const units = side === 'buy' ? positionSize : -positionSize;

    const fill = await boundedResult(
      this.market.placeOrder(instrument, units, side),
      this.callTimeoutMs,
      `placeOrder ${instrument}`
    );
    if (!fill.ok) {
      log.error('Order failed, opportunity discarded', fill.error, { instrument, units });
      await this.activityLog.record('Trade failed', { instrument, side, error: fill.error.message }, 'ERROR');
      return fail(fill.error);
    }

    const record: TradeRecord = {
      instrument,
      side,
      units,
      price: fill.value.price,
      confidence: opportunity.confidence,
      timestamp: now.toISOString(),
      orderId: fill.value.orderId,
    };

    const apply = (draft: BotState) => {
      draft.dailyTrades += 1;
      draft.lastTradeTime = now.toISOString();
      draft.trades.push(record);
    };

    try {
      await this.store.commit(apply);
    } catch (error) {
      // The order is live; keep it in memory so the tick-end flush retries the write
      log.error('Failed to persist executed trade', error, { instrument });
      this.store.stage(apply);
    }

    recordTradeExecuted(instrument, side);
    log.order('executed', instrument, side, {
      units,
      price: record.price,
      confidence: record.confidence,
      orderId: record.orderId,
    });
    await this.activityLog.record('Trade executed', {
      instrument,
      side,
      units,
      price: record.price,
      confidence: record.confidence,
    });

    const alert = await boundedResult(this.notifier.sendTradeAlert(record), this.callTimeoutMs, 'sendTradeAlert');
    if (!alert.ok) {
      log.warn('Trade alert not delivered', { instrument, error: alert.error.message });
    }

    return ok(record);
  }

  /**
   * Book the P&L of a position that has closed
   */
  recordTradeOutcome(pnl: number): void {
    this.store.stage((draft) => applyTradeOutcome(draft, pnl));
    log.info('Trade outcome recorded', { pnl });
  }

  /**
   * Close every open position at the broker. Closed positions are booked and
   * removed from the cached position list.
   */
  async closeAllPositions(): Promise<CloseAllResult> {
    const result: CloseAllResult = { closed: [], failed: [] };

    const positions = await boundedResult(this.market.getPositions(), this.callTimeoutMs, 'getPositions');
    if (!positions.ok) {
      log.error('Could not list positions to close', positions.error);
      return result;
    }

    for (const position of positions.value) {
      const closed = await boundedResult(
        this.market.closePosition(position.instrument),
        this.callTimeoutMs,
        `closePosition ${position.instrument}`
      );
      if (!closed.ok) {
        log.error('Failed to close position', closed.error, { instrument: position.instrument });
        result.failed.push(position.instrument);
        continue;
      }

      result.closed.push(position.instrument);
      this.store.stage((draft) => {
        applyTradeOutcome(draft, position.unrealizedPnl);
        draft.openPositions = draft.openPositions.filter((p) => p.instrument !== position.instrument);
      });
    }

    if (result.closed.length > 0 || result.failed.length > 0) {
      await this.activityLog.record(
        'Positions closed',
        { closed: result.closed, failed: result.failed },
        result.failed.length > 0 ? 'WARNING' : 'INFO'
      );
    }
    return result;
  }
}
