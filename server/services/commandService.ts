/**
 * Operator Command Service
 * Answers chat commands. Read-only commands build their reply from the
 * current state; anything that mutates state goes through the scheduler queue.
 */

import { ACTIVITY_LOG, RISK, SCHEDULER } from '../utils/constants';
import { loggers } from '../utils/logger';
import { boundedResult } from '../utils/retryPolicy';
import { calculateWinRate, formatCurrency, formatPercentage, getMarketSession } from '../utils/formatting';
import { ActivityEntry, ActivityLevel, BotState, OpenPosition } from '../utils/types';
import type { BotContext } from '../context';
import { formatSentimentSummary } from './sentimentService';
import { IncomingCommand } from './telegramNotifier';
import { ControlCommand, CommandResult, SchedulerActivity } from './tradingScheduler';
import { GateVerdict } from './riskGate';

const log = loggers.commands;

export const COMMAND_DESCRIPTIONS: Record<string, string> = {
  '/status': 'Full diagnostic: trades, win/loss, P&L, open positions, news impact',
  '/maketrade': 'Scan now and place the best trade above the manual threshold',
  '/whatyoudoin': 'Shows current action: scraping, scanning, idle, trading, etc.',
  '/canceltrade': 'Instantly closes all open positions and halts trading',
  '/showlog': 'Sends the most recent actions (trades, signals, scrapes, errors)',
  '/togglemode': 'Switch between aggressive/safe trading logic',
  '/resetbot': 'Closes all positions and fully resets the bot state',
  '/pnl': 'Instantly return profit/loss',
  '/openpositions': 'Show all open positions',
  '/strategystats': 'Strategy performance summary',
};

/**
 * The slice of the scheduler the command surface relies on
 */
export interface CommandQueue {
  readonly activity: SchedulerActivity;
  readonly isRunning: boolean;
  readonly lastGateVerdict: GateVerdict | null;
  submit(command: ControlCommand): Promise<CommandResult>;
}

export interface StrategyStats {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  totalPnl: number;
  dailyPnl: number;
  averagePnl: number;
  dailyTrades: number;
  consecutiveLosses: number;
  mode: BotState['currentMode'];
}

export function strategyStats(state: Readonly<BotState>): StrategyStats {
  const closed = state.winCount + state.lossCount;
  return {
    totalTrades: state.trades.length,
    wins: state.winCount,
    losses: state.lossCount,
    winRate: calculateWinRate(state.winCount, state.lossCount),
    totalPnl: state.totalPnl,
    dailyPnl: state.dailyPnl,
    averagePnl: closed > 0 ? state.totalPnl / closed : 0,
    dailyTrades: state.dailyTrades,
    consecutiveLosses: state.consecutiveLosses,
    mode: state.currentMode,
  };
}

const LEVEL_EMOJI: Record<ActivityLevel, string> = {
  INFO: '🟢',
  WARNING: '🟡',
  ERROR: '🔴',
};

function clockTime(timestamp: string): string {
  const parsed = new Date(timestamp);
  return Number.isNaN(parsed.getTime()) ? timestamp : parsed.toISOString().slice(11, 19);
}

export function formatLogEntries(entries: ActivityEntry[]): string {
  if (entries.length === 0) return '📝 No recent logs available';
  const lines = entries.map((entry) => `${LEVEL_EMOJI[entry.level]} ${clockTime(entry.timestamp)}: ${entry.action}`);
  return ['📝 Recent Bot Activity:', '', ...lines].join('\n');
}

export function formatPositions(positions: OpenPosition[]): string {
  if (positions.length === 0) return '📊 No open positions';
  const blocks = positions.map((position) =>
    [
      `${position.unrealizedPnl > 0 ? '🟢' : '🔴'} ${position.side === 'long' ? '📈' : '📉'} ${position.instrument}`,
      `   Units: ${position.units}`,
      `   P&L: ${formatCurrency(position.unrealizedPnl)}`,
    ].join('\n')
  );
  return ['📊 Open Positions:', '', blocks.join('\n\n')].join('\n');
}

export function formatHelp(title: string): string {
  const lines = Object.entries(COMMAND_DESCRIPTIONS).map(([command, description]) => `${command} - ${description}`);
  return [title, '', 'Available commands:', ...lines].join('\n');
}

export class CommandService {
  constructor(private readonly ctx: BotContext, private readonly queue: CommandQueue) {}

  /**
   * Dispatch a chat command and build the reply text
   */
  async handle(incoming: IncomingCommand): Promise<string> {
    log.info('Command received', { command: incoming.command });

    switch (incoming.command) {
      case '/start':
        return formatHelp('🤖 Forex Trading Bot Started!');
      case '/help':
        return formatHelp('🤖 Forex Trading Bot Help');
      case '/status':
        return this.status();
      case '/pnl':
        return this.pnl();
      case '/openpositions':
        return this.openPositions();
      case '/showlog':
        return this.showLog();
      case '/whatyoudoin':
        return this.whatYouDoin();
      case '/strategystats':
        return this.strategyStats();
      case '/canceltrade':
        return this.control({ type: 'close_all', halt: true });
      case '/togglemode':
        return this.control({ type: 'toggle_mode' });
      case '/resetbot':
        return this.control({ type: 'reset' });
      case '/maketrade':
        return this.control({ type: 'manual_trade' });
      default:
        return `❓ Unknown command ${incoming.command}. Send /help for the list.`;
    }
  }

  async status(): Promise<string> {
    const { market, store, activityLog } = this.ctx;
    const state = store.snapshot();
    const lines = ['📊 BOT STATUS REPORT', ''];

    const account = await boundedResult(market.getAccountInfo(), SCHEDULER.COLLABORATOR_TIMEOUT_MS, 'getAccountInfo');
    if (account.ok) {
      lines.push(
        `💰 Account Balance: ${formatCurrency(account.value.balance, account.value.currency)}`,
        `📈 Unrealized P&L: ${formatCurrency(account.value.unrealizedPnl, account.value.currency)}`,
        `💵 Realized P&L: ${formatCurrency(account.value.realizedPnl, account.value.currency)}`
      );
    } else {
      lines.push(`⚠️ Account unavailable: ${account.error.message}`);
    }

    lines.push(
      `📊 Open Positions: ${state.openPositions.length}`,
      `🎯 Win Rate: ${formatPercentage(calculateWinRate(state.winCount, state.lossCount))}`,
      `🔁 Trades Today: ${state.dailyTrades}/${RISK.MAX_TRADES_PER_DAY}`,
      `⚙️ Mode: ${state.currentMode.toUpperCase()} | Trading: ${state.isTrading ? 'ON' : 'HALTED'}`,
      '',
      '📰 NEWS SENTIMENT:',
      formatSentimentSummary(state.sentiment)
    );

    const recent = await activityLog.recent(5);
    if (recent.length > 0) {
      lines.push('', '🔄 Recent Activity:');
      for (const entry of recent.slice(-3)) {
        lines.push(`• ${entry.action} (${entry.timestamp})`);
      }
    }

    return lines.join('\n');
  }

  async pnl(): Promise<string> {
    const account = await boundedResult(
      this.ctx.market.getAccountInfo(),
      SCHEDULER.COLLABORATOR_TIMEOUT_MS,
      'getAccountInfo'
    );
    if (!account.ok) {
      return `❌ P&L error: ${account.error.message}`;
    }

    const { balance, unrealizedPnl, realizedPnl, currency } = account.value;
    return [
      '💰 P&L Summary',
      '',
      `💵 Balance: ${formatCurrency(balance, currency)}`,
      `📈 Unrealized P&L: ${formatCurrency(unrealizedPnl, currency)}`,
      `💵 Realized P&L: ${formatCurrency(realizedPnl, currency)}`,
      `📊 Total P&L: ${formatCurrency(unrealizedPnl + realizedPnl, currency)}`,
    ].join('\n');
  }

  async openPositions(): Promise<string> {
    const positions = await boundedResult(
      this.ctx.market.getPositions(),
      SCHEDULER.COLLABORATOR_TIMEOUT_MS,
      'getPositions'
    );
    if (!positions.ok) {
      return `❌ Open positions error: ${positions.error.message}`;
    }
    return formatPositions(positions.value);
  }

  async showLog(): Promise<string> {
    const entries = await this.ctx.activityLog.recent(ACTIVITY_LOG.SHOWLOG_READ);
    return formatLogEntries(entries.slice(-ACTIVITY_LOG.SHOWLOG_DISPLAY));
  }

  whatYouDoin(): string {
    const now = this.ctx.clock();
    const last = this.ctx.activityLog.last;
    const verdict = this.queue.lastGateVerdict;

    const lines = [
      '🤖 Current Bot Status:',
      '',
      `💻 Activity: ${this.queue.isRunning ? this.queue.activity : 'stopped'}`,
      last ? `🔄 Last Action: ${last.action} (${clockTime(last.timestamp)})` : '🔄 Last Action: none yet',
      `📊 Market Session: ${getMarketSession(now)}`,
    ];
    if (verdict && !verdict.eligible && verdict.detail) {
      lines.push(`⏸️ Waiting: ${verdict.detail}`);
    }
    return lines.join('\n');
  }

  strategyStats(): string {
    const stats = strategyStats(this.ctx.store.snapshot());
    return [
      '📊 Strategy Performance',
      '',
      `🎯 Win Rate: ${formatPercentage(stats.winRate)} (${stats.wins}W / ${stats.losses}L)`,
      `💰 Total P&L: ${formatCurrency(stats.totalPnl)}`,
      `📈 Average P&L per closed trade: ${formatCurrency(stats.averagePnl)}`,
      `📅 Today: ${stats.dailyTrades} trades, ${formatCurrency(stats.dailyPnl)}`,
      `🔄 Total Trades: ${stats.totalTrades}`,
      `📉 Loss Streak: ${stats.consecutiveLosses}`,
      `⚙️ Mode: ${stats.mode.toUpperCase()}`,
    ].join('\n');
  }

  private async control(command: ControlCommand): Promise<string> {
    const result = await this.queue.submit(command);
    return result.message;
  }
}
