import axios, { AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import { z } from 'zod';
import { MARKET_API, SIGNAL, SIZING } from '../utils/constants';
import { loggers } from '../utils/logger';
import { recordApiCall } from '../utils/metrics';
import { RetryPolicy } from '../utils/retryPolicy';
import { ExecutionError, TransientIOError, toError } from '../middleware/errorHandler';
import {
  AccountInfo,
  Candles,
  CloseFill,
  OpenPosition,
  OrderFill,
  OrderSide,
  PriceMap,
  Quote,
  Result,
  fail,
  ok,
} from '../utils/types';

const log = loggers.market;

// ============================================================================
// CLIENT INTERFACE
// ============================================================================

/**
 * Market data and execution service. Every call resolves to a Result;
 * nothing here throws to the caller.
 */
export interface MarketDataClient {
  getAccountInfo(): Promise<Result<AccountInfo>>;
  getPrices(instruments: string[]): Promise<Result<PriceMap>>;
  getCandles(instrument: string, granularity?: string, count?: number): Promise<Result<Candles>>;
  placeOrder(
    instrument: string,
    units: number,
    side: OrderSide,
    stopLoss?: number,
    takeProfit?: number
  ): Promise<Result<OrderFill>>;
  closePosition(instrument: string, units?: number): Promise<Result<CloseFill>>;
  getPositions(): Promise<Result<OpenPosition[]>>;
  isSpreadAcceptable(instrument: string, maxSpreadPips?: number): Promise<boolean>;
}

// ============================================================================
// SPREAD HELPERS
// ============================================================================

export function pipSize(instrument: string): number {
  return instrument.includes('JPY') ? SIZING.PIP_VALUE_JPY : SIZING.PIP_VALUE_DEFAULT;
}

export function spreadInPips(instrument: string, quote: Quote): number {
  return (quote.ask - quote.bid) / pipSize(instrument);
}

export function isQuoteSpreadAcceptable(
  instrument: string,
  quote: Quote,
  maxSpreadPips: number = SIGNAL.MAX_SPREAD_PIPS
): boolean {
  return spreadInPips(instrument, quote) <= maxSpreadPips;
}

// ============================================================================
// RESPONSE SCHEMAS (OANDA v20)
// ============================================================================

const numeric = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  if (Number.isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const AccountResponse = z.object({
  account: z.object({
    balance: numeric,
    currency: z.string(),
    marginRate: numeric,
    unrealizedPL: numeric,
    pl: numeric.optional(),
    realizedPL: numeric.optional(),
  }),
});

const PricingResponse = z.object({
  prices: z.array(
    z.object({
      instrument: z.string(),
      time: z.string(),
      bids: z.array(z.object({ price: numeric })).min(1),
      asks: z.array(z.object({ price: numeric })).min(1),
    })
  ),
});

const CandlesResponse = z.object({
  candles: z.array(
    z.object({
      complete: z.boolean(),
      volume: z.number(),
      mid: z.object({ o: numeric, h: numeric, l: numeric, c: numeric }),
    })
  ),
});

const FillTransaction = z.object({
  id: z.string(),
  price: numeric,
  time: z.string(),
  units: numeric.optional(),
});

const OrderResponse = z.object({
  orderFillTransaction: FillTransaction.optional(),
  orderCancelTransaction: z.object({ reason: z.string() }).optional(),
});

const PositionSideSchema = z.object({ units: numeric, unrealizedPL: numeric });

const PositionsResponse = z.object({
  positions: z.array(
    z.object({
      instrument: z.string(),
      long: PositionSideSchema,
      short: PositionSideSchema,
    })
  ),
});

const ClosePositionResponse = z.object({
  longOrderFillTransaction: FillTransaction.optional(),
  shortOrderFillTransaction: FillTransaction.optional(),
});

// ============================================================================
// OANDA SERVICE
// ============================================================================

export interface MarketDataServiceOptions {
  apiKey: string;
  accountId: string;
  baseUrl: string;
  retryPolicy?: RetryPolicy;
  client?: AxiosInstance;
}

function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  const status = error.response?.status;
  // Network errors and timeouts carry no response
  return status === undefined || status === 429 || status >= 500;
}

function describeFailure(error: unknown): { message: string; status?: number } {
  if (axios.isAxiosError(error)) {
    return { message: error.message, status: error.response?.status };
  }
  return { message: toError(error).message };
}

export class MarketDataService implements MarketDataClient {
  private readonly accountId: string;
  private readonly client: AxiosInstance;
  private readonly retryPolicy: RetryPolicy;

  // Practice API allows 25 requests/second
  private readonly limiter: Bottleneck;

  constructor(options: MarketDataServiceOptions) {
    this.accountId = options.accountId;
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: MARKET_API.REQUEST_TIMEOUT_MS,
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
        },
      });
    this.retryPolicy =
      options.retryPolicy ??
      new RetryPolicy({
        maxRetries: MARKET_API.MAX_RETRIES,
        baseDelayMs: MARKET_API.RETRY_BASE_DELAY_MS,
        maxDelayMs: MARKET_API.MAX_RETRY_DELAY_MS,
      });
    this.limiter = new Bottleneck({
      maxConcurrent: 5,
      minTime: Math.ceil(1000 / MARKET_API.MAX_REQUESTS_PER_SECOND),
    });
  }

  private get accountPath(): string {
    return `/v3/accounts/${this.accountId}`;
  }

  /**
   * Rate-limited GET with retries for transient failures, parsed with `schema`
   */
  private async read<S extends z.ZodTypeAny>(
    endpoint: string,
    path: string,
    schema: S,
    params?: Record<string, string | number>
  ): Promise<Result<z.output<S>>> {
    try {
      const data = await this.retryPolicy.run(
        () => this.limiter.schedule(async () => (await this.client.get<unknown>(path, { params })).data),
        { description: `GET ${endpoint}`, logger: log, shouldRetry: isRetryable }
      );
      recordApiCall(endpoint, 'ok');
      return this.parse(endpoint, schema, data);
    } catch (error) {
      recordApiCall(endpoint, 'error');
      const { message, status } = describeFailure(error);
      log.warn(`${endpoint} request failed`, { status, error: message });
      return fail(new TransientIOError('OANDA', `${endpoint}: ${message}`, { status }));
    }
  }

  /**
   * Rate-limited write. Never retried: an order must not be sent twice.
   */
  private async write<S extends z.ZodTypeAny>(
    endpoint: string,
    method: 'post' | 'put',
    path: string,
    body: Record<string, unknown>,
    schema: S
  ): Promise<Result<z.output<S>>> {
    try {
      const response = await this.limiter.schedule(() =>
        method === 'post' ? this.client.post<unknown>(path, body) : this.client.put<unknown>(path, body)
      );
      recordApiCall(endpoint, 'ok');
      return this.parse(endpoint, schema, response.data);
    } catch (error) {
      recordApiCall(endpoint, 'error');
      const { message, status } = describeFailure(error);
      log.error(`${endpoint} request failed`, error, { status });
      return fail(new ExecutionError(`${endpoint}: ${message}`, { status }));
    }
  }

  private parse<S extends z.ZodTypeAny>(endpoint: string, schema: S, data: unknown): Result<z.output<S>> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      log.warn(`${endpoint} returned an unexpected payload`, { issue: issue?.message, path: issue?.path.join('.') });
      return fail(new TransientIOError('OANDA', `${endpoint}: unexpected response shape`));
    }
    return ok(parsed.data);
  }

  /**
   * Get account information
   */
  async getAccountInfo(): Promise<Result<AccountInfo>> {
    const result = await this.read('account', this.accountPath, AccountResponse);
    if (!result.ok) return result;

    const { account } = result.value;
    return ok({
      balance: account.balance,
      currency: account.currency,
      marginRate: account.marginRate,
      unrealizedPnl: account.unrealizedPL,
      realizedPnl: account.realizedPL ?? account.pl ?? 0,
    });
  }

  /**
   * Get current bid/ask for instruments
   */
  async getPrices(instruments: string[]): Promise<Result<PriceMap>> {
    const result = await this.read('pricing', `${this.accountPath}/pricing`, PricingResponse, {
      instruments: instruments.join(','),
    });
    if (!result.ok) return result;

    const prices: PriceMap = {};
    for (const price of result.value.prices) {
      prices[price.instrument] = {
        bid: price.bids[0].price,
        ask: price.asks[0].price,
        timestamp: price.time,
      };
    }
    return ok(prices);
  }

  /**
   * Get completed candles (incomplete bars are dropped)
   */
  async getCandles(
    instrument: string,
    granularity: string = SIGNAL.CANDLE_GRANULARITY,
    count: number = SIGNAL.CANDLE_COUNT
  ): Promise<Result<Candles>> {
    const result = await this.read('candles', `/v3/instruments/${instrument}/candles`, CandlesResponse, {
      granularity,
      count,
      price: 'M',
    });
    if (!result.ok) return result;

    const candles: Candles = { open: [], high: [], low: [], close: [], volume: [] };
    for (const candle of result.value.candles) {
      if (!candle.complete) continue;
      candles.open.push(candle.mid.o);
      candles.high.push(candle.mid.h);
      candles.low.push(candle.mid.l);
      candles.close.push(candle.mid.c);
      candles.volume.push(candle.volume);
    }
    return ok(candles);
  }

  /**
   * Place a market order; `units` is signed (negative sells)
   */
  async placeOrder(
    instrument: string,
    units: number,
    side: OrderSide,
    stopLoss?: number,
    takeProfit?: number
  ): Promise<Result<OrderFill>> {
    const order: Record<string, unknown> = {
      type: 'MARKET',
      instrument,
      units: String(units),
      timeInForce: 'FOK',
      positionFill: 'DEFAULT',
    };
    if (stopLoss !== undefined) {
      order.stopLossOnFill = { price: String(stopLoss) };
    }
    if (takeProfit !== undefined) {
      order.takeProfitOnFill = { price: String(takeProfit) };
    }

    const result = await this.write('orders', 'post', `${this.accountPath}/orders`, { order }, OrderResponse);
    if (!result.ok) return result;

    const { orderFillTransaction: fill, orderCancelTransaction: cancel } = result.value;
    if (!fill) {
      const reason = cancel?.reason ?? 'no fill transaction';
      log.warn('Order not filled', { instrument, units, reason });
      return fail(new ExecutionError(`Order for ${instrument} not filled: ${reason}`, { instrument, units }));
    }

    log.order('filled', instrument, side, { units, price: fill.price, orderId: fill.id });
    return ok({
      orderId: fill.id,
      instrument,
      units,
      side,
      price: fill.price,
      timestamp: fill.time,
    });
  }

  /**
   * Close an open position, fully unless `units` is given
   */
  async closePosition(instrument: string, units?: number): Promise<Result<CloseFill>> {
    const positions = await this.getPositions();
    if (!positions.ok) return positions;

    const position = positions.value.find((p) => p.instrument === instrument);
    if (!position) {
      return fail(new ExecutionError(`No open position on ${instrument}`, { instrument }));
    }

    const amount = units !== undefined ? String(Math.abs(units)) : 'ALL';
    const body = position.side === 'long' ? { longUnits: amount } : { shortUnits: amount };
    const result = await this.write(
      'positions.close',
      'put',
      `${this.accountPath}/positions/${instrument}/close`,
      body,
      ClosePositionResponse
    );
    if (!result.ok) return result;

    const fill = result.value.longOrderFillTransaction ?? result.value.shortOrderFillTransaction;
    if (!fill) {
      return fail(new ExecutionError(`Close of ${instrument} returned no fill`, { instrument }));
    }

    log.order('closed', instrument, position.side, { units: position.units, price: fill.price });
    return ok({
      instrument,
      unitsClosed: units !== undefined ? Math.abs(units) : Math.abs(position.units),
      price: fill.price,
      timestamp: fill.time,
    });
  }

  /**
   * Get open positions (flat instruments are omitted)
   */
  async getPositions(): Promise<Result<OpenPosition[]>> {
    const result = await this.read('positions', `${this.accountPath}/openPositions`, PositionsResponse);
    if (!result.ok) return result;

    const positions: OpenPosition[] = [];
    for (const position of result.value.positions) {
      if (position.long.units > 0) {
        positions.push({
          instrument: position.instrument,
          units: position.long.units,
          side: 'long',
          unrealizedPnl: position.long.unrealizedPL,
        });
      } else if (position.short.units !== 0) {
        positions.push({
          instrument: position.instrument,
          units: position.short.units,
          side: 'short',
          unrealizedPnl: position.short.unrealizedPL,
        });
      }
    }
    return ok(positions);
  }

  /**
   * Check if spread is acceptable for trading. Unknown quotes are not.
   */
  async isSpreadAcceptable(instrument: string, maxSpreadPips: number = SIGNAL.MAX_SPREAD_PIPS): Promise<boolean> {
    const prices = await this.getPrices([instrument]);
    if (!prices.ok) return false;
    const quote = prices.value[instrument];
    return quote !== undefined && isQuoteSpreadAcceptable(instrument, quote, maxSpreadPips);
  }
}
