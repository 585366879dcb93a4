import { RISK } from '../utils/constants';
import { BotState, SentimentAnalysis } from '../utils/types';
import { shouldAvoidTrading } from './sentimentService';

/**
 * Risk Gate
 *
 * Pure eligibility predicate. Every condition must hold for a scan cycle to
 * proceed; `evaluate` also names the first one that failed.
 */

export type GateCondition =
  | 'trading_disabled'
  | 'daily_limit'
  | 'loss_streak'
  | 'news_risk'
  | 'outside_hours'
  | 'cooldown';

export interface GateVerdict {
  eligible: boolean;
  reason?: GateCondition;
  detail?: string;
}

export type GateState = Pick<BotState, 'isTrading' | 'dailyTrades' | 'consecutiveLosses' | 'lastTradeTime'>;

export function isWithinTradingHours(now: Date): boolean {
  const hour = now.getUTCHours();
  return hour >= RISK.TRADING_HOUR_START_UTC && hour < RISK.TRADING_HOUR_END_UTC;
}

/**
 * Seconds left before another trade is allowed; 0 when none is pending
 */
export function cooldownRemaining(lastTradeTime: string | null, now: Date): number {
  if (!lastTradeTime) return 0;
  const last = Date.parse(lastTradeTime);
  if (Number.isNaN(last)) return 0;
  const elapsed = (now.getTime() - last) / 1000;
  return Math.max(0, RISK.TRADE_COOLDOWN_SECONDS - elapsed);
}

export function evaluate(state: GateState, now: Date, sentiment: SentimentAnalysis | null): GateVerdict {
  if (!state.isTrading) {
    return { eligible: false, reason: 'trading_disabled', detail: 'Trading is halted' };
  }

  if (state.dailyTrades >= RISK.MAX_TRADES_PER_DAY) {
    return {
      eligible: false,
      reason: 'daily_limit',
      detail: `Daily trade limit reached (${state.dailyTrades}/${RISK.MAX_TRADES_PER_DAY})`,
    };
  }

  if (state.consecutiveLosses >= RISK.MAX_LOSS_STREAK) {
    return {
      eligible: false,
      reason: 'loss_streak',
      detail: `Paused after ${state.consecutiveLosses} consecutive losses`,
    };
  }

  if (shouldAvoidTrading(sentiment)) {
    return { eligible: false, reason: 'news_risk', detail: 'High-impact news backdrop' };
  }

  if (!isWithinTradingHours(now)) {
    return {
      eligible: false,
      reason: 'outside_hours',
      detail: `Low liquidity hours (outside ${RISK.TRADING_HOUR_START_UTC}-${RISK.TRADING_HOUR_END_UTC} UTC)`,
    };
  }

  const remaining = cooldownRemaining(state.lastTradeTime, now);
  if (remaining > 0) {
    return { eligible: false, reason: 'cooldown', detail: `Cooldown, ${Math.ceil(remaining)}s left` };
  }

  return { eligible: true };
}

export function eligible(state: GateState, now: Date, sentiment: SentimentAnalysis | null): boolean {
  return evaluate(state, now, sentiment).eligible;
}
