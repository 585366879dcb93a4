import { ACTIVITY_LOG, SCHEDULER, SIZING } from '../utils/constants';
import { loggers, createTimer } from '../utils/logger';
import { CancellationToken, sleep } from '../utils/cancellation';
import { boundedResult, withTimeout } from '../utils/retryPolicy';
import { recordScanCycle, updateTradingEnabled } from '../utils/metrics';
import { utcDateKey } from '../utils/formatting';
import { ConflictError, toError } from '../middleware/errorHandler';
import { OpenPosition, TradeRecord } from '../utils/types';
import type { BotContext } from '../context';
import { GateVerdict, evaluate } from './riskGate';
import { clearsThreshold, executionThreshold } from './signalAggregator';
import { createDefaultState } from './stateStore';

const log = loggers.scheduler;

export type SchedulerActivity = 'idle' | 'scraping' | 'scanning' | 'gating' | 'trading' | 'stopping';

export type ControlCommand =
  | { type: 'halt' }
  | { type: 'resume' }
  | { type: 'close_all'; halt: boolean }
  | { type: 'reset' }
  | { type: 'toggle_mode' }
  | { type: 'manual_trade' };

export interface CommandResult {
  success: boolean;
  message: string;
  trade?: TradeRecord;
  closed?: string[];
  failed?: string[];
}

interface QueuedCommand {
  command: ControlCommand;
  resolve: (result: CommandResult) => void;
  reject: (error: Error) => void;
}

export function isDue(lastRun: string | null, intervalMs: number, now: Date): boolean {
  if (!lastRun) return true;
  const last = Date.parse(lastRun);
  return Number.isNaN(last) || now.getTime() - last >= intervalMs;
}

/**
 * Cooperative trading loop.
 *
 * Each tick runs the due periodic tasks, applies queued operator commands,
 * then gates, scans and possibly executes one trade. Ticks never overlap and
 * staged state is flushed before the next tick starts. An exception escaping
 * a tick ends `run()` so the supervisor can count it.
 */
export class TradingScheduler {
  private currentActivity: SchedulerActivity = 'idle';
  private running = false;
  private readonly queue: QueuedCommand[] = [];
  private lastVerdict: GateVerdict | null = null;
  private marketError: string | null = null;
  private ticks = 0;

  constructor(private readonly ctx: BotContext) {}

  get activity(): SchedulerActivity {
    return this.currentActivity;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pendingCommands(): number {
    return this.queue.length;
  }

  get lastGateVerdict(): GateVerdict | null {
    return this.lastVerdict;
  }

  get lastMarketError(): string | null {
    return this.marketError;
  }

  get tickCount(): number {
    return this.ticks;
  }

  /**
   * Queue a mutating command; resolves once the next tick has applied it
   */
  submit(command: ControlCommand): Promise<CommandResult> {
    if (!this.running) {
      return Promise.reject(new ConflictError('Trading loop is not running'));
    }
    return new Promise((resolve, reject) => {
      this.queue.push({ command, resolve, reject });
    });
  }

  /**
   * Run ticks until the token is cancelled
   */
  async run(token: CancellationToken): Promise<void> {
    this.running = true;
    log.info('Trading loop started', { pairs: this.ctx.config.tradingPairs.length });

    try {
      while (!token.isCancellationRequested) {
        await this.tick(token);
        const completed = await sleep(SCHEDULER.TICK_INTERVAL_MS, token);
        if (!completed) break;
      }
    } finally {
      this.running = false;
      this.currentActivity = token.isCancellationRequested ? 'stopping' : 'idle';
      this.rejectPending(token.cancellationReason ?? 'Trading loop stopped');
      log.info('Trading loop exited', { cancelled: token.isCancellationRequested });
    }

    await this.ctx.store.flush();
  }

  /**
   * One full scheduler cycle
   */
  async tick(token?: CancellationToken): Promise<void> {
    const now = this.ctx.clock();
    this.ticks += 1;

    await this.runDailyReset(now);
    await this.runPeriodicTasks(now, token);
    await this.drainCommands(now);

    if (!token?.isCancellationRequested) {
      await this.runTradingCycle(now, token);
    }

    this.currentActivity = 'idle';
    await this.ctx.store.flush();
  }

  // ==========================================================================
  // PERIODIC TASKS
  // ==========================================================================

  /**
   * Reset daily counters once per UTC day
   */
  async runDailyReset(now: Date): Promise<boolean> {
    const today = utcDateKey(now);
    const previous = this.ctx.store.state.lastDailyReset;
    if (previous === today) return false;

    this.ctx.store.stage((draft) => {
      draft.dailyTrades = 0;
      draft.dailyPnl = 0;
      draft.consecutiveLosses = 0;
      draft.lastDailyReset = today;
    });

    if (previous !== null) {
      log.info('Daily reset completed', { day: today });
      await this.ctx.activityLog.record('Daily reset completed', { day: today });
    }
    return true;
  }

  private async runPeriodicTasks(now: Date, token?: CancellationToken): Promise<void> {
    const state = this.ctx.store.state;

    if (isDue(state.lastNewsScrape, SCHEDULER.NEWS_REFRESH_INTERVAL_MS, now)) {
      await this.refreshNews(now);
    }
    if (token?.isCancellationRequested) return;

    if (isDue(state.lastPriceScan, SCHEDULER.PRICE_SCAN_INTERVAL_MS, now)) {
      await this.scanPrices(now);
    }
    if (token?.isCancellationRequested) return;

    if (isDue(state.lastHeartbeat, SCHEDULER.HEARTBEAT_INTERVAL_MS, now)) {
      await this.sendHeartbeat(now);
    }

    if (isDue(state.lastLogCleanup, SCHEDULER.LOG_CLEANUP_INTERVAL_MS, now)) {
      await this.cleanupLogs(now);
    }
  }

  async refreshNews(now: Date): Promise<void> {
    this.currentActivity = 'scraping';
    try {
      const sentiment = await withTimeout(
        this.ctx.sentiment.analyzeNewsSentiment(),
        SCHEDULER.COLLABORATOR_TIMEOUT_MS,
        'analyzeNewsSentiment'
      );
      this.ctx.store.stage((draft) => {
        draft.sentiment = sentiment;
      });
      await this.ctx.activityLog.record('News scraping completed', {
        sentiment: sentiment.sentiment,
        score: sentiment.score,
        volatilityScore: sentiment.volatilityScore,
        articlesAnalyzed: sentiment.articlesAnalyzed,
      });
    } catch (error) {
      this.countError();
      log.warn('News refresh failed', { error: toError(error).message });
      await this.ctx.activityLog.record('News scraping failed', { error: toError(error).message }, 'ERROR');
    }
    this.ctx.store.stage((draft) => {
      draft.lastNewsScrape = now.toISOString();
    });
  }

  /**
   * Refresh the cached position list. A position that disappeared since the
   * previous scan has closed at the broker; its last unrealized P&L is booked.
   */
  async scanPrices(now: Date): Promise<void> {
    const { market, store, config, executor } = this.ctx;

    const prices = await boundedResult(
      market.getPrices(config.tradingPairs),
      SCHEDULER.COLLABORATOR_TIMEOUT_MS,
      'getPrices'
    );
    const positions = await boundedResult(market.getPositions(), SCHEDULER.COLLABORATOR_TIMEOUT_MS, 'getPositions');

    if (!prices.ok || !positions.ok) {
      const error = !prices.ok ? prices.error : !positions.ok ? positions.error : null;
      this.marketError = error?.message ?? 'unknown';
      this.countError();
      log.warn('Price scan failed', { error: this.marketError });
    } else {
      this.marketError = null;
      const closed = closedSince(store.state.openPositions, positions.value);
      for (const position of closed) {
        log.info('Position closed at broker', { instrument: position.instrument, pnl: position.unrealizedPnl });
        executor.recordTradeOutcome(position.unrealizedPnl);
      }
      store.stage((draft) => {
        draft.openPositions = positions.value;
      });
      log.debug('Price scan completed', {
        pairsScanned: Object.keys(prices.value).length,
        openPositions: positions.value.length,
      });
    }

    store.stage((draft) => {
      draft.lastPriceScan = now.toISOString();
    });
  }

  async sendHeartbeat(now: Date): Promise<void> {
    const lines = [`💓 Bot Heartbeat - ${now.toISOString().slice(11, 19)} UTC`];
    if (this.marketError) {
      lines.push(`⚠️ Market data degraded: ${this.marketError}`);
    }
    if (!this.ctx.store.state.isTrading) {
      lines.push('🛑 Trading halted');
    }

    const sent = await boundedResult(
      this.ctx.notifier.sendNotification(lines.join('\n')),
      SCHEDULER.COLLABORATOR_TIMEOUT_MS,
      'heartbeat'
    );
    if (!sent.ok) {
      log.warn('Heartbeat not delivered', { error: sent.error.message });
    }

    this.ctx.store.stage((draft) => {
      draft.lastHeartbeat = now.toISOString();
    });
  }

  async cleanupLogs(now: Date): Promise<void> {
    try {
      const removed = await this.ctx.activityLog.cleanup(ACTIVITY_LOG.MAX_AGE_HOURS);
      await this.ctx.activityLog.record('Log cleanup completed', { removed });
    } catch (error) {
      this.countError();
      log.error('Log cleanup failed', error);
    }
    this.ctx.store.stage((draft) => {
      draft.lastLogCleanup = now.toISOString();
    });
  }

  private countError(): void {
    this.ctx.store.stage((draft) => {
      draft.errorCount += 1;
    });
  }

  // ==========================================================================
  // TRADING CYCLE
  // ==========================================================================

  /**
   * Gate, scan and execute at most one trade
   */
  async runTradingCycle(now: Date, token?: CancellationToken): Promise<void> {
    const { store, market, aggregator, executor, config } = this.ctx;
    const timer = createTimer();

    this.currentActivity = 'gating';
    const state = store.state;
    const verdict = evaluate(state, now, state.sentiment);
    this.lastVerdict = verdict;
    updateTradingEnabled(state.isTrading);

    if (!verdict.eligible) {
      recordScanCycle('gated');
      return;
    }

    const account = await boundedResult(market.getAccountInfo(), SCHEDULER.COLLABORATOR_TIMEOUT_MS, 'getAccountInfo');
    if (!account.ok) {
      this.marketError = account.error.message;
      recordScanCycle('failed');
      log.warn('Account info unavailable, skipping cycle', { error: account.error.message });
      return;
    }
    if (account.value.balance < SIZING.MIN_BALANCE) {
      recordScanCycle('gated');
      log.debug('Balance below trading minimum', { balance: account.value.balance });
      return;
    }

    this.currentActivity = 'scanning';
    const opportunity = await aggregator.scan(config.tradingPairs, state.sentiment, token);
    if (!opportunity) {
      recordScanCycle('no_opportunity', timer.elapsed());
      return;
    }

    const threshold = executionThreshold(state.currentMode, 'auto');
    if (!clearsThreshold(opportunity, threshold)) {
      recordScanCycle('below_threshold', timer.elapsed());
      log.debug('Best opportunity below threshold', {
        instrument: opportunity.instrument,
        confidence: opportunity.confidence,
        threshold,
      });
      return;
    }

    if (token?.isCancellationRequested) return;

    this.currentActivity = 'trading';
    const result = await executor.execute(opportunity, account.value.balance, now);
    recordScanCycle(result.ok ? 'executed' : 'failed', timer.elapsed());
    timer.log(log, `Scan cycle ${result.ok ? 'executed' : 'failed'} on ${opportunity.instrument}`);
  }

  // ==========================================================================
  // OPERATOR COMMANDS
  // ==========================================================================

  private async drainCommands(now: Date): Promise<void> {
    while (this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;

      try {
        const result = await this.apply(next.command, now);
        next.resolve(result);
      } catch (error) {
        log.error(`Command ${next.command.type} failed`, error);
        next.reject(toError(error));
      }
    }
  }

  private async apply(command: ControlCommand, now: Date): Promise<CommandResult> {
    const { store, executor, activityLog } = this.ctx;

    switch (command.type) {
      case 'halt':
        store.stage((draft) => {
          draft.isTrading = false;
        });
        await activityLog.record('Trading halted', {}, 'WARNING');
        return { success: true, message: '🛑 Trading halted' };

      case 'resume':
        store.stage((draft) => {
          draft.isTrading = true;
        });
        await activityLog.record('Trading resumed');
        return { success: true, message: '▶️ Trading resumed' };

      case 'close_all': {
        this.currentActivity = 'trading';
        const { closed, failed } = await executor.closeAllPositions();
        if (command.halt) {
          store.stage((draft) => {
            draft.isTrading = false;
          });
        }
        const lines: string[] = [];
        if (closed.length === 0 && failed.length === 0) {
          lines.push('✅ No open positions to close');
        } else {
          lines.push(`✅ Closed ${closed.length} position(s)`);
          if (failed.length > 0) lines.push(`❌ Failed to close: ${failed.join(', ')}`);
        }
        if (command.halt) lines.push('🛑 Trading halted');
        return { success: failed.length === 0, message: lines.join('\n'), closed, failed };
      }

      case 'reset': {
        this.currentActivity = 'trading';
        const { closed, failed } = await executor.closeAllPositions();
        const fresh = createDefaultState(now);
        fresh.lastDailyReset = utcDateKey(now);
        store.stage((draft) => {
          Object.assign(draft, fresh);
        });
        await activityLog.record('Bot reset', { closed, failed }, 'WARNING');
        return {
          success: failed.length === 0,
          message: '🔄 Bot reset completed\nAll positions closed\nState reset',
          closed,
          failed,
        };
      }

      case 'toggle_mode': {
        const mode = store.state.currentMode === 'aggressive' ? 'safe' : 'aggressive';
        store.stage((draft) => {
          draft.currentMode = mode;
        });
        await activityLog.record('Trading mode changed', { mode });
        return { success: true, message: `🔄 Trading mode: ${mode.toUpperCase()}` };
      }

      case 'manual_trade':
        return this.manualTrade(now);
    }
  }

  /**
   * Operator-triggered scan. Passes the same risk gate as an automatic
   * trade; only the confidence threshold is lower.
   */
  private async manualTrade(now: Date): Promise<CommandResult> {
    const { market, aggregator, executor, config, store } = this.ctx;

    this.currentActivity = 'gating';
    const verdict = evaluate(store.state, now, store.state.sentiment);
    this.lastVerdict = verdict;
    if (!verdict.eligible) {
      log.info('Manual trade refused', { reason: verdict.reason });
      return { success: false, message: `❌ ${verdict.detail ?? verdict.reason}` };
    }

    const account = await boundedResult(market.getAccountInfo(), SCHEDULER.COLLABORATOR_TIMEOUT_MS, 'getAccountInfo');
    if (!account.ok) {
      return { success: false, message: '❌ Unable to reach the trading account' };
    }
    if (account.value.balance < SIZING.MIN_BALANCE) {
      return { success: false, message: '❌ Insufficient balance for trading' };
    }

    this.currentActivity = 'scanning';
    const opportunity = await aggregator.scan(config.tradingPairs, store.state.sentiment);
    const threshold = executionThreshold(store.state.currentMode, 'manual');
    if (!opportunity || !clearsThreshold(opportunity, threshold)) {
      return { success: false, message: '❌ No suitable trading opportunities found' };
    }

    this.currentActivity = 'trading';
    const result = await executor.execute(opportunity, account.value.balance, now);
    if (!result.ok) {
      return { success: false, message: `❌ Failed to place trade: ${result.error.message}` };
    }

    const trade = result.value;
    await this.ctx.activityLog.record('Manual trade executed', { instrument: trade.instrument, side: trade.side });
    return {
      success: true,
      message: [
        '🎯 TRADE EXECUTED!',
        '',
        `📊 Instrument: ${trade.instrument}`,
        `📈 Direction: ${trade.side.toUpperCase()}`,
        `💰 Units: ${trade.units}`,
        `💵 Price: ${trade.price}`,
        `🎯 Confidence: ${(trade.confidence * 100).toFixed(2)}%`,
      ].join('\n'),
      trade,
    };
  }

  private rejectPending(reason: string): void {
    const pending = this.queue.splice(0, this.queue.length);
    for (const item of pending) {
      item.reject(new ConflictError(`Command ${item.command.type} not applied: ${reason}`));
    }
  }
}

/**
 * Positions present in `previous` but gone from `current`
 */
export function closedSince(previous: OpenPosition[], current: OpenPosition[]): OpenPosition[] {
  const open = new Set(current.map((p) => p.instrument));
  return previous.filter((p) => !open.has(p.instrument));
}
