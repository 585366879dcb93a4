/**
 * Display helpers shared by notifications, commands and the control API
 */

export type MarketSession = 'Asia' | 'London' | 'New York' | 'Off Hours';

/**
 * Trading session for a UTC hour. London takes precedence over the
 * London/New York overlap.
 */
export function getMarketSession(now: Date): MarketSession {
  const hour = now.getUTCHours();
  if (hour < 8) return 'Asia';
  if (hour < 16) return 'London';
  if (hour < 21) return 'New York';
  return 'Off Hours';
}

/**
 * Win rate as a percentage rounded to two decimals; 0 when nothing closed yet
 */
export function calculateWinRate(wins: number, losses: number): number {
  const total = wins + losses;
  return total > 0 ? Math.round((wins / total) * 10000) / 100 : 0;
}

export function formatCurrency(amount: number, currency: string = 'USD'): string {
  return `${amount.toFixed(2)} ${currency}`;
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(2)}%`;
}

/**
 * UTC calendar date key, e.g. 2024-03-05
 */
export function utcDateKey(now: Date): string {
  return now.toISOString().slice(0, 10);
}
