/**
 * Trading Bot Constants
 *
 * Centralized configuration for all magic numbers and thresholds.
 * Modify these values to tune bot behavior without changing code.
 */

// ============================================================================
// RISK GATE
// ============================================================================

export const RISK = {
  /** Maximum executed trades per UTC day */
  MAX_TRADES_PER_DAY: 15,

  /** Trading pauses after this many losing trades in a row */
  MAX_LOSS_STREAK: 3,

  /** Minimum seconds between two executed trades */
  TRADE_COOLDOWN_SECONDS: 300,

  /** First UTC hour (inclusive) in which trading is allowed */
  TRADING_HOUR_START_UTC: 2,

  /** UTC hour (exclusive) after which trading stops */
  TRADING_HOUR_END_UTC: 22,

  /** Sentiment volatility above which trading is avoided */
  AVOID_VOLATILITY_SCORE: 0.7,

  /** Negative sentiment score below which trading is avoided */
  AVOID_NEGATIVE_SCORE: -0.3,
} as const;

// ============================================================================
// SIGNAL AGGREGATION
// ============================================================================

export const SIGNAL = {
  /** Weight of the technical confidence in the combined score */
  TECHNICAL_WEIGHT: 0.4,

  /** Weight of |sentiment score| in the combined score */
  SENTIMENT_WEIGHT: 0.3,

  /** Weight of the sentiment volatility score in the combined score */
  VOLATILITY_WEIGHT: 0.3,

  /** Minimum completed bars required before an instrument is analysed */
  MIN_CANDLES: 50,

  /** Candle granularity and count requested per instrument */
  CANDLE_GRANULARITY: 'M5',
  CANDLE_COUNT: 100,

  /** Maximum acceptable spread in pips */
  MAX_SPREAD_PIPS: 5,

  /** Automatic scan cycles execute only above this confidence */
  AUTO_TRADE_THRESHOLD: 0.7,

  /**
   * Automatic threshold while the bot runs in safe mode. Stricter than the
   * regular 0.7 bar; aggressive mode uses AUTO_TRADE_THRESHOLD.
   */
  SAFE_MODE_THRESHOLD: 0.8,

  /** Operator-triggered trades use their own, lower bar */
  MANUAL_TRADE_THRESHOLD: 0.6,
} as const;

// ============================================================================
// POSITION SIZING
// ============================================================================

export const SIZING = {
  /** Percent of balance put at risk per trade */
  RISK_PCT: 2,

  /** Stop distance used for sizing */
  STOP_LOSS_PIPS: 50,

  /** Pip size for JPY-quoted pairs */
  PIP_VALUE_JPY: 0.01,

  /** Pip size for every other pair */
  PIP_VALUE_DEFAULT: 0.0001,

  /** Smallest order size */
  MIN_UNITS: 0.01,

  /** Largest order size as a fraction of balance */
  MAX_BALANCE_FRACTION: 0.1,

  /** Accounts below this balance never trade */
  MIN_BALANCE: 100,
} as const;

// ============================================================================
// SCHEDULER
// ============================================================================

export const SCHEDULER = {
  /** Loop cadence */
  TICK_INTERVAL_MS: 1000,

  /** News refresh (12 minutes) */
  NEWS_REFRESH_INTERVAL_MS: 12 * 60 * 1000,

  /** Price scan (7 seconds) */
  PRICE_SCAN_INTERVAL_MS: 7 * 1000,

  /** Heartbeat notification (5 minutes) */
  HEARTBEAT_INTERVAL_MS: 5 * 60 * 1000,

  /** Activity log cleanup (60 minutes) */
  LOG_CLEANUP_INTERVAL_MS: 60 * 60 * 1000,

  /** Upper bound for any single collaborator call */
  COLLABORATOR_TIMEOUT_MS: 15000,
} as const;

// ============================================================================
// RECOVERY SUPERVISOR
// ============================================================================

export const SUPERVISOR = {
  /** Loop failures tolerated before a full shutdown */
  MAX_CONSECUTIVE_FAILURES: 3,

  /** Wait before restarting a failed loop */
  RESTART_BACKOFF_MS: 10000,

  /** Health probe cadence */
  HEALTH_PROBE_INTERVAL_MS: 10000,

  /** Full health check cadence */
  HEALTH_CHECK_INTERVAL_MS: 60000,

  /** Wait after a health probe error */
  HEALTH_PROBE_ERROR_BACKOFF_MS: 30000,
} as const;

// ============================================================================
// MARKET API
// ============================================================================

export const MARKET_API = {
  /** Maximum retry attempts for idempotent reads */
  MAX_RETRIES: 3,

  /** Base delay for exponential backoff in milliseconds */
  RETRY_BASE_DELAY_MS: 1000,

  /** Maximum delay between retries in milliseconds */
  MAX_RETRY_DELAY_MS: 8000,

  /** Request timeout in milliseconds */
  REQUEST_TIMEOUT_MS: 10000,

  /** Requests per second allowed by the practice API */
  MAX_REQUESTS_PER_SECOND: 25,
} as const;

// ============================================================================
// NEWS SENTIMENT
// ============================================================================

export const SENTIMENT = {
  /** Cached sentiment is reused for this long */
  CACHE_TTL_MS: 10 * 60 * 1000,

  /** Scores above / below these bounds are positive / negative */
  POSITIVE_BOUND: 0.1,
  NEGATIVE_BOUND: -0.1,

  /** Volatility added per matched keyword */
  VOLATILITY_PER_KEYWORD: 0.1,

  /** Article count at which confidence saturates */
  FULL_CONFIDENCE_ARTICLES: 10,

  /** Headlines kept per source */
  MAX_ARTICLES_PER_SOURCE: 10,

  /** Headlines shorter than this are ignored */
  MIN_TITLE_LENGTH: 10,

  /** Request timeout for a news page */
  REQUEST_TIMEOUT_MS: 10000,
} as const;

// ============================================================================
// TELEGRAM
// ============================================================================

export const TELEGRAM = {
  /** Timeout for sendMessage and getMe */
  REQUEST_TIMEOUT_MS: 10000,

  /** getUpdates long-poll window */
  LONG_POLL_SECONDS: 25,

  /** Wait after a failed poll */
  POLL_ERROR_BACKOFF_MS: 5000,
} as const;

// ============================================================================
// ACTIVITY LOG
// ============================================================================

export const ACTIVITY_LOG = {
  /** Entries older than this are dropped by the cleanup task */
  MAX_AGE_HOURS: 24,

  /** Entries read for /showlog */
  SHOWLOG_READ: 20,

  /** Entries shown by /showlog */
  SHOWLOG_DISPLAY: 10,
} as const;

// ============================================================================
// LOGGING
// ============================================================================

export const LOGGING = {
  /** Log level used when LOG_LEVEL is unset */
  DEFAULT_LEVEL: 'info' as const,

  /** Enable console output */
  ENABLE_CONSOLE: true,
} as const;
