import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { BotConfig } from '../../config/env';
import { BotContext, createContext } from '../../context';
import { ActivityLog } from '../../utils/activityLog';
import { StateStore } from '../../services/stateStore';
import { MarketDataClient } from '../../services/marketDataService';
import { Notifier } from '../../services/telegramNotifier';
import { SentimentSource } from '../../services/sentimentService';
import { TechnicalAnalyzer } from '../../services/technicalAnalysis';
import { TransientIOError, ExecutionError } from '../../middleware/errorHandler';
import {
  AccountInfo,
  ActivityEntry,
  ActivityLevel,
  Candles,
  CloseFill,
  OpenPosition,
  OrderFill,
  OrderSide,
  PriceMap,
  Result,
  SentimentAnalysis,
  TechnicalAnalysis,
  TradeRecord,
  Direction,
  fail,
  ok,
} from '../../utils/types';

export class FakeClock {
  constructor(public current: Date) {}

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface PlacedOrder {
  instrument: string;
  units: number;
  side: OrderSide;
}

/**
 * In-process stand-in for the broker
 */
export class FakeMarket implements MarketDataClient {
  balance = 10000;
  accountError: Error | null = null;
  prices: PriceMap = {};
  pricesError: Error | null = null;
  candles: Record<string, Candles> = {};
  positions: OpenPosition[] = [];
  positionsError: Error | null = null;
  orderError: Error | null = null;
  closeFailures = new Set<string>();
  orders: PlacedOrder[] = [];
  closed: string[] = [];
  accountCalls = 0;

  async getAccountInfo(): Promise<Result<AccountInfo>> {
    this.accountCalls += 1;
    if (this.accountError) return fail(this.accountError);
    return ok({ balance: this.balance, currency: 'USD', marginRate: 0.02, unrealizedPnl: 5, realizedPnl: 20 });
  }

  async getPrices(instruments: string[]): Promise<Result<PriceMap>> {
    if (this.pricesError) return fail(this.pricesError);
    const subset: PriceMap = {};
    for (const instrument of instruments) {
      const quote = this.prices[instrument];
      if (quote) subset[instrument] = quote;
    }
    return ok(subset);
  }

  async getCandles(instrument: string): Promise<Result<Candles>> {
    const candles = this.candles[instrument];
    if (!candles) return fail(new TransientIOError('Fake', `no candles for ${instrument}`));
    return ok(candles);
  }

  async placeOrder(instrument: string, units: number, side: OrderSide): Promise<Result<OrderFill>> {
    if (this.orderError) return fail(this.orderError);
    this.orders.push({ instrument, units, side });
    const quote = this.prices[instrument];
    return ok({
      orderId: String(this.orders.length),
      instrument,
      units,
      side,
      price: quote ? quote.ask : 1,
      timestamp: '2024-03-05T10:00:00.000Z',
    });
  }

  async closePosition(instrument: string): Promise<Result<CloseFill>> {
    if (this.closeFailures.has(instrument)) {
      return fail(new ExecutionError(`close rejected for ${instrument}`));
    }
    const position = this.positions.find((p) => p.instrument === instrument);
    if (!position) return fail(new ExecutionError(`No open position on ${instrument}`));
    this.positions = this.positions.filter((p) => p.instrument !== instrument);
    this.closed.push(instrument);
    return ok({ instrument, unitsClosed: Math.abs(position.units), price: 1, timestamp: '2024-03-05T10:00:00.000Z' });
  }

  async getPositions(): Promise<Result<OpenPosition[]>> {
    if (this.positionsError) return fail(this.positionsError);
    return ok(this.positions.map((p) => ({ ...p })));
  }

  async isSpreadAcceptable(): Promise<boolean> {
    return true;
  }
}

export class FakeNotifier implements Notifier {
  messages: string[] = [];
  alerts: TradeRecord[] = [];
  sendError: Error | null = null;
  pingError: Error | null = null;

  async sendNotification(text: string): Promise<Result<void>> {
    if (this.sendError) return fail(this.sendError);
    this.messages.push(text);
    return ok(undefined);
  }

  async sendTradeAlert(record: TradeRecord): Promise<Result<void>> {
    if (this.sendError) return fail(this.sendError);
    this.alerts.push(record);
    return ok(undefined);
  }

  async ping(): Promise<Result<void>> {
    return this.pingError ? fail(this.pingError) : ok(undefined);
  }
}

export class FakeSentiment implements SentimentSource {
  calls = 0;
  error: Error | null = null;

  constructor(public result: SentimentAnalysis) {}

  async analyzeNewsSentiment(): Promise<SentimentAnalysis> {
    this.calls += 1;
    if (this.error) throw this.error;
    return this.result;
  }

  getCached(): SentimentAnalysis | null {
    return this.calls > 0 ? this.result : null;
  }
}

/**
 * Returns a fixed reading per final close price, so each instrument's
 * candles select its own analysis
 */
export class StubAnalyzer implements TechnicalAnalyzer {
  readonly readings = new Map<number, TechnicalAnalysis>();

  set(lastClose: number, signal: Direction, confidence: number): void {
    this.readings.set(lastClose, {
      signal,
      confidence,
      indicators: { rsi: 50, macd: 0, macdSignal: 0, bbUpper: 0, bbMiddle: 0, bbLower: 0, atr: 0, close: lastClose },
    });
  }

  getComprehensiveAnalysis(candles: Candles): TechnicalAnalysis {
    const last = candles.close[candles.close.length - 1];
    const reading = this.readings.get(last);
    if (!reading) throw new Error(`no stubbed reading for close ${last}`);
    return reading;
  }
}

/**
 * Activity log that keeps entries in memory
 */
export class MemoryActivityLog extends ActivityLog {
  entries: ActivityEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {
    super('unused.jsonl', now);
  }

  override get last(): ActivityEntry | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  override async record(action: string, details?: Record<string, unknown>, level: ActivityLevel = 'INFO'): Promise<void> {
    this.entries.push({ timestamp: this.now().toISOString(), action, level, details: details ?? {} });
  }

  actions(): string[] {
    return this.entries.map((entry) => entry.action);
  }

  override async recent(count: number): Promise<ActivityEntry[]> {
    return this.entries.slice(-count);
  }

  override async cleanup(): Promise<number> {
    return 0;
  }
}

export function flatCandles(count: number, lastClose: number): Candles {
  const close = Array.from({ length: count }, () => lastClose);
  return { open: [...close], high: [...close], low: [...close], close, volume: close.map(() => 100) };
}

export function sentiment(score: number, volatilityScore: number): SentimentAnalysis {
  return {
    sentiment: score > 0.1 ? 'positive' : score < -0.1 ? 'negative' : 'neutral',
    score,
    confidence: 1,
    volatilityScore,
    articlesAnalyzed: 12,
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'fx-engine-'));
}

export function testConfig(dir: string, tradingPairs: string[] = ['EUR_USD', 'USD_JPY']): BotConfig {
  return {
    nodeEnv: 'test',
    oanda: { apiKey: 'test-secret', accountId: '000-000-0000000-000', baseUrl: 'http://oanda.test' },
    telegram: { botToken: 'test-token', chatId: '42', apiUrl: 'http://telegram.test' },
    tradingPairs,
    newsSources: ['http://news.test/latest'],
    stateFile: path.join(dir, 'state.json'),
    activityLogFile: path.join(dir, 'activity.jsonl'),
    controlPort: 0,
    logLevel: 'error',
  };
}

export interface TestHarness {
  ctx: BotContext;
  market: FakeMarket;
  notifier: FakeNotifier;
  news: FakeSentiment;
  technical: StubAnalyzer;
  clock: FakeClock;
  activityLog: MemoryActivityLog;
  store: StateStore;
}

/**
 * Context wired to in-process fakes; state is written under `dir`
 */
export function makeHarness(dir: string, start: Date = new Date('2024-03-05T10:00:00.000Z')): TestHarness {
  const clock = new FakeClock(start);
  const market = new FakeMarket();
  const notifier = new FakeNotifier();
  const news = new FakeSentiment(sentiment(0, 0));
  const technical = new StubAnalyzer();
  const activityLog = new MemoryActivityLog(clock.now);
  const config = testConfig(dir);
  const store = new StateStore(config.stateFile);

  const ctx = createContext(config, {
    store,
    activityLog,
    market,
    sentiment: news,
    technical,
    notifier,
    clock: clock.now,
  });
  return { ctx, market, notifier, news, technical, clock, activityLog, store };
}
