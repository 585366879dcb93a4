import { Candles, Direction, TechnicalAnalysis, TechnicalIndicators } from '../utils/types';

/**
 * Technical Analysis Service
 *
 * MACD(12, 26, 9), RSI(14), Bollinger Bands(20, 2) and ATR(14) over completed
 * candles. A trade signal needs all three indicators to agree; confidence is
 * the indicator vote mapped onto [0, 1].
 */

export interface TechnicalAnalyzer {
  getComprehensiveAnalysis(candles: Candles): TechnicalAnalysis;
}

/**
 * Exponential moving average series seeded with the first price
 */
export function emaSeries(prices: number[], period: number): number[] {
  if (prices.length === 0) return [];
  const multiplier = 2 / (period + 1);
  const series = [prices[0]];
  for (let i = 1; i < prices.length; i++) {
    series.push((prices[i] - series[i - 1]) * multiplier + series[i - 1]);
  }
  return series;
}

/**
 * Calculate RSI from the simple average of the last `period` changes
 */
export function calculateRSI(prices: number[], period: number = 14): number {
  if (prices.length < period + 1) return 50;

  const changes: number[] = [];
  for (let i = prices.length - period; i < prices.length; i++) {
    changes.push(prices[i] - prices[i - 1]);
  }

  const avgGain = changes.filter((c) => c > 0).reduce((a, b) => a + b, 0) / period;
  const avgLoss = changes.filter((c) => c < 0).reduce((a, b) => a - b, 0) / period;

  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Calculate MACD line and its signal line at the last bar
 */
export function calculateMACD(
  prices: number[],
  fast: number = 12,
  slow: number = 26,
  signalPeriod: number = 9
): { macd: number; signal: number } {
  if (prices.length === 0) return { macd: 0, signal: 0 };

  const fastEma = emaSeries(prices, fast);
  const slowEma = emaSeries(prices, slow);
  const macdLine = fastEma.map((value, i) => value - slowEma[i]);
  const signalLine = emaSeries(macdLine, signalPeriod);

  return {
    macd: macdLine[macdLine.length - 1],
    signal: signalLine[signalLine.length - 1],
  };
}

/**
 * Bollinger Bands on the last `period` closes, sample standard deviation
 */
export function calculateBollinger(
  prices: number[],
  period: number = 20,
  width: number = 2
): { upper: number; middle: number; lower: number } {
  const window = prices.slice(-period);
  if (window.length === 0) return { upper: 0, middle: 0, lower: 0 };

  const middle = window.reduce((a, b) => a + b, 0) / window.length;
  const variance =
    window.length > 1
      ? window.reduce((sum, p) => sum + (p - middle) ** 2, 0) / (window.length - 1)
      : 0;
  const deviation = Math.sqrt(variance);

  return {
    upper: middle + width * deviation,
    middle,
    lower: middle - width * deviation,
  };
}

/**
 * Average true range over the last `period` bars
 */
export function calculateATR(candles: Candles, period: number = 14): number {
  const { high, low, close } = candles;
  const ranges: number[] = [];
  for (let i = 1; i < close.length; i++) {
    ranges.push(
      Math.max(high[i] - low[i], Math.abs(high[i] - close[i - 1]), Math.abs(low[i] - close[i - 1]))
    );
  }
  const window = ranges.slice(-period);
  return window.length > 0 ? window.reduce((a, b) => a + b, 0) / window.length : 0;
}

/**
 * Vote of the three indicators: +1 bullish, -1 bearish per indicator
 */
export function signalStrength(indicators: TechnicalIndicators): number {
  let strength = indicators.macd > indicators.macdSignal ? 1 : -1;

  if (indicators.rsi < 30) strength += 1;
  else if (indicators.rsi > 70) strength -= 1;

  if (indicators.close < indicators.bbLower) strength += 1;
  else if (indicators.close > indicators.bbUpper) strength -= 1;

  return strength;
}

/**
 * Vote balance (-3..3) mapped onto 0..1. The scale is bullish: a unanimous
 * sell scores 0, so a sell's combined confidence is only its sentiment share
 * and never clears the automatic threshold.
 */
export function confidenceFromStrength(strength: number): number {
  return Math.min(Math.max((strength + 3) / 6, 0), 1);
}

export function signalDirection(indicators: TechnicalIndicators): Direction {
  const { macd, macdSignal, rsi, close, bbLower, bbUpper } = indicators;
  if (macd > macdSignal && rsi < 30 && close < bbLower) return 'buy';
  if (macd < macdSignal && rsi > 70 && close > bbUpper) return 'sell';
  return 'neutral';
}

export class TechnicalAnalysisService implements TechnicalAnalyzer {
  computeIndicators(candles: Candles): TechnicalIndicators {
    const closes = candles.close;
    const { macd, signal } = calculateMACD(closes);
    const bands = calculateBollinger(closes);

    return {
      rsi: calculateRSI(closes),
      macd,
      macdSignal: signal,
      bbUpper: bands.upper,
      bbMiddle: bands.middle,
      bbLower: bands.lower,
      atr: calculateATR(candles),
      close: closes.length > 0 ? closes[closes.length - 1] : 0,
    };
  }

  getComprehensiveAnalysis(candles: Candles): TechnicalAnalysis {
    const indicators = this.computeIndicators(candles);
    const confidence = confidenceFromStrength(signalStrength(indicators));

    return {
      signal: signalDirection(indicators),
      confidence,
      indicators,
    };
  }
}

