/**
 * Trading Bot Type Definitions
 *
 * Fixed-shape records shared by the engine, its collaborators and the
 * operator surfaces.
 */

// ============================================================================
// RESULT TYPES
// ============================================================================

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: Error): Result<T> {
  return { ok: false, error };
}

// ============================================================================
// SIGNAL TYPES
// ============================================================================

export type Direction = 'buy' | 'sell' | 'neutral';
export type SentimentLabel = 'positive' | 'negative' | 'neutral';
export type TradingMode = 'aggressive' | 'safe';

export interface TechnicalIndicators {
  rsi: number;
  macd: number;
  macdSignal: number;
  bbUpper: number;
  bbMiddle: number;
  bbLower: number;
  atr: number;
  close: number;
}

export interface TechnicalAnalysis {
  signal: Direction;
  confidence: number;
  indicators: TechnicalIndicators;
}

export interface SentimentAnalysis {
  sentiment: SentimentLabel;
  score: number;
  confidence: number;
  volatilityScore: number;
  articlesAnalyzed: number;
  analyzedAt?: string;
}

export interface CombinedSignal {
  direction: Direction;
  confidence: number;
}

export interface Opportunity {
  instrument: string;
  direction: Direction;
  confidence: number;
  price: number;
  technical: TechnicalAnalysis;
  sentiment: SentimentAnalysis;
}

// ============================================================================
// MARKET TYPES
// ============================================================================

export type OrderSide = 'buy' | 'sell';
export type PositionSide = 'long' | 'short';

export interface AccountInfo {
  balance: number;
  currency: string;
  marginRate: number;
  unrealizedPnl: number;
  realizedPnl: number;
}

export interface Quote {
  bid: number;
  ask: number;
  timestamp: string;
}

export type PriceMap = Record<string, Quote>;

export interface Candles {
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  volume: number[];
}

export interface OrderFill {
  orderId: string;
  instrument: string;
  units: number;
  side: OrderSide;
  price: number;
  timestamp: string;
}

export interface CloseFill {
  instrument: string;
  unitsClosed: number;
  price: number;
  timestamp: string;
}

export interface OpenPosition {
  instrument: string;
  units: number;
  side: PositionSide;
  unrealizedPnl: number;
}

// ============================================================================
// STATE TYPES
// ============================================================================

export interface TradeRecord {
  readonly instrument: string;
  readonly side: OrderSide;
  readonly units: number;
  readonly price: number;
  readonly confidence: number;
  readonly timestamp: string;
  readonly realizedPnl?: number;
  readonly orderId?: string;
}

export interface BotState {
  trades: TradeRecord[];
  openPositions: OpenPosition[];
  totalPnl: number;
  dailyPnl: number;
  winCount: number;
  lossCount: number;
  isTrading: boolean;
  currentMode: TradingMode;
  lastNewsScrape: string | null;
  lastPriceScan: string | null;
  lastHeartbeat: string | null;
  lastLogCleanup: string | null;
  lastTradeTime: string | null;
  /** UTC date (YYYY-MM-DD) of the most recent daily counter reset */
  lastDailyReset: string | null;
  dailyTrades: number;
  consecutiveLosses: number;
  errorCount: number;
  startTime: string;
  sentiment: SentimentAnalysis | null;
}

// ============================================================================
// HEALTH TYPES
// ============================================================================

export interface HealthStatus {
  timestamp: string;
  botRunning: boolean;
  tasksActive: number;
  consecutiveFailures: number;
  connectivity: {
    market: boolean;
    notifier: boolean;
  };
  accountBalance?: number;
  marketError?: string;
  notifierError?: string;
}

// ============================================================================
// ACTIVITY LOG TYPES
// ============================================================================

export type ActivityLevel = 'INFO' | 'WARNING' | 'ERROR';

export interface ActivityEntry {
  timestamp: string;
  action: string;
  level: ActivityLevel;
  details?: Record<string, unknown>;
}
