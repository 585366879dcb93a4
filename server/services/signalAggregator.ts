import { SCHEDULER, SIGNAL } from '../utils/constants';
import { loggers } from '../utils/logger';
import { boundedResult } from '../utils/retryPolicy';
import { CancellationToken } from '../utils/cancellation';
import { DataInsufficientError } from '../middleware/errorHandler';
import {
  CombinedSignal,
  Opportunity,
  SentimentAnalysis,
  TechnicalAnalysis,
  TradingMode,
} from '../utils/types';
import { MarketDataClient, isQuoteSpreadAcceptable } from './marketDataService';
import { TechnicalAnalyzer } from './technicalAnalysis';
import { NEUTRAL_SENTIMENT } from './sentimentService';

const log = loggers.signal;

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}

/**
 * Weighted confidence of a technical reading and the news backdrop.
 * A neutral technical signal always yields a neutral result.
 */
export function combine(technical: TechnicalAnalysis, sentiment: SentimentAnalysis): CombinedSignal {
  const confidence = clamp01(
    SIGNAL.TECHNICAL_WEIGHT * technical.confidence +
      SIGNAL.SENTIMENT_WEIGHT * Math.abs(sentiment.score) +
      SIGNAL.VOLATILITY_WEIGHT * sentiment.volatilityScore
  );

  return {
    direction: technical.signal,
    confidence,
  };
}

export type TradeTrigger = 'auto' | 'manual';

/**
 * Confidence an opportunity must exceed before it is executed
 */
export function executionThreshold(mode: TradingMode, trigger: TradeTrigger): number {
  if (trigger === 'manual') return SIGNAL.MANUAL_TRADE_THRESHOLD;
  return mode === 'safe' ? SIGNAL.SAFE_MODE_THRESHOLD : SIGNAL.AUTO_TRADE_THRESHOLD;
}

export function clearsThreshold(opportunity: Opportunity, threshold: number): boolean {
  return opportunity.confidence > threshold;
}

export interface SignalAggregatorOptions {
  market: MarketDataClient;
  technical: TechnicalAnalyzer;
  callTimeoutMs?: number;
}

export class SignalAggregator {
  private readonly market: MarketDataClient;
  private readonly technical: TechnicalAnalyzer;
  private readonly callTimeoutMs: number;

  constructor(options: SignalAggregatorOptions) {
    this.market = options.market;
    this.technical = options.technical;
    this.callTimeoutMs = options.callTimeoutMs ?? SCHEDULER.COLLABORATOR_TIMEOUT_MS;
  }

  combine(technical: TechnicalAnalysis, sentiment: SentimentAnalysis): CombinedSignal {
    return combine(technical, sentiment);
  }

  /**
   * Score every instrument and return the strongest non-neutral opportunity.
   * Instruments without a quote, with a wide spread or with too little history
   * are skipped. Ties keep the earlier instrument.
   */
  async scan(
    instruments: string[],
    sentiment: SentimentAnalysis | null,
    token?: CancellationToken
  ): Promise<Opportunity | null> {
    const backdrop = sentiment ?? NEUTRAL_SENTIMENT;

    const prices = await boundedResult(this.market.getPrices(instruments), this.callTimeoutMs, 'getPrices');
    if (!prices.ok) {
      log.warn('Price fetch failed, skipping scan', { error: prices.error.message });
      return null;
    }

    let best: Opportunity | null = null;

    for (const instrument of instruments) {
      if (token?.isCancellationRequested) break;

      const quote = prices.value[instrument];
      if (!quote) {
        log.debug('No quote, skipping', { instrument });
        continue;
      }

      if (!isQuoteSpreadAcceptable(instrument, quote, SIGNAL.MAX_SPREAD_PIPS)) {
        log.debug('Spread too wide, skipping', { instrument, bid: quote.bid, ask: quote.ask });
        continue;
      }

      const candles = await boundedResult(
        this.market.getCandles(instrument, SIGNAL.CANDLE_GRANULARITY, SIGNAL.CANDLE_COUNT),
        this.callTimeoutMs,
        `getCandles ${instrument}`
      );
      if (!candles.ok) {
        log.warn('Candle fetch failed, skipping', { instrument, error: candles.error.message });
        continue;
      }

      if (candles.value.close.length < SIGNAL.MIN_CANDLES) {
        const insufficient = new DataInsufficientError(instrument, candles.value.close.length, SIGNAL.MIN_CANDLES);
        log.debug(insufficient.message);
        continue;
      }

      const technical = this.technical.getComprehensiveAnalysis(candles.value);
      const combined = combine(technical, backdrop);
      if (combined.direction === 'neutral') continue;

      log.signal(instrument, combined.direction, combined.confidence, {
        technical: technical.confidence,
        rsi: technical.indicators.rsi,
      });

      if (best === null || combined.confidence > best.confidence) {
        best = {
          instrument,
          direction: combined.direction,
          confidence: combined.confidence,
          price: quote.ask,
          technical,
          sentiment: backdrop,
        };
      }
    }

    return best;
  }
}
