import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { loggers } from '../utils/logger';
import { BotState } from '../utils/types';

const log = loggers.state;

// ============================================================================
// SCHEMA
// ============================================================================

const TradeRecordSchema = z.object({
  instrument: z.string(),
  side: z.enum(['buy', 'sell']),
  units: z.number(),
  price: z.number(),
  confidence: z.number().min(0).max(1),
  timestamp: z.string(),
  realizedPnl: z.number().optional(),
  orderId: z.string().optional(),
});

const OpenPositionSchema = z.object({
  instrument: z.string(),
  units: z.number(),
  side: z.enum(['long', 'short']),
  unrealizedPnl: z.number(),
});

const SentimentSchema = z.object({
  sentiment: z.enum(['positive', 'negative', 'neutral']),
  score: z.number(),
  confidence: z.number(),
  volatilityScore: z.number(),
  articlesAnalyzed: z.number().int().min(0),
  analyzedAt: z.string().optional(),
});

const nullableTimestamp = z.string().nullable().default(null);

export const BotStateSchema = z.object({
  trades: z.array(TradeRecordSchema).default([]),
  openPositions: z.array(OpenPositionSchema).default([]),
  totalPnl: z.number().default(0),
  dailyPnl: z.number().default(0),
  winCount: z.number().int().min(0).default(0),
  lossCount: z.number().int().min(0).default(0),
  isTrading: z.boolean().default(true),
  currentMode: z.enum(['aggressive', 'safe']).default('aggressive'),
  lastNewsScrape: nullableTimestamp,
  lastPriceScan: nullableTimestamp,
  lastHeartbeat: nullableTimestamp,
  lastLogCleanup: nullableTimestamp,
  lastTradeTime: nullableTimestamp,
  lastDailyReset: nullableTimestamp,
  dailyTrades: z.number().int().min(0).default(0),
  consecutiveLosses: z.number().int().min(0).default(0),
  errorCount: z.number().int().min(0).default(0),
  startTime: z.string(),
  sentiment: SentimentSchema.nullable().default(null),
});

/**
 * Fresh state used on first start, after /resetbot, and whenever the state
 * file cannot be read
 */
export function createDefaultState(now: Date = new Date()): BotState {
  return {
    trades: [],
    openPositions: [],
    totalPnl: 0,
    dailyPnl: 0,
    winCount: 0,
    lossCount: 0,
    isTrading: true,
    currentMode: 'aggressive',
    lastNewsScrape: null,
    lastPriceScan: null,
    lastHeartbeat: null,
    lastLogCleanup: null,
    lastTradeTime: null,
    lastDailyReset: null,
    dailyTrades: 0,
    consecutiveLosses: 0,
    errorCount: 0,
    startTime: now.toISOString(),
    sentiment: null,
  };
}

/**
 * Parse a state document; `null` when it does not describe a BotState
 */
export function parseState(raw: string): BotState | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = BotStateSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// ============================================================================
// STATE STORE
// ============================================================================

export type StateMutator = (draft: BotState) => void;

/**
 * Durable owner of the single BotState document.
 *
 * Two ways to change state:
 * - `stage()` mutates the in-memory copy; `flush()` writes it at the end of a tick.
 * - `commit()` applies the change to a copy, writes it, and only then swaps it in.
 *
 * Every write goes to a temp file that is renamed over the target.
 */
export class StateStore {
  private current: BotState;
  private dirty = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string, initial?: BotState) {
    this.current = initial ?? createDefaultState();
  }

  get path(): string {
    return this.filePath;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  /**
   * Load state from disk. A missing or corrupt file yields the default state.
   */
  async load(): Promise<BotState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        log.info('No state file found, starting from default state', { file: this.filePath });
      } else {
        log.warn('State file unreadable, starting from default state', {
          file: this.filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      this.current = createDefaultState();
      this.dirty = true;
      return this.snapshot();
    }

    const parsed = parseState(raw);
    if (!parsed) {
      log.warn('State file is corrupt, starting from default state', { file: this.filePath });
      this.current = createDefaultState();
      this.dirty = true;
      return this.snapshot();
    }

    this.current = parsed;
    this.dirty = false;
    log.info('State loaded', {
      trades: parsed.trades.length,
      dailyTrades: parsed.dailyTrades,
      isTrading: parsed.isTrading,
    });
    return this.snapshot();
  }

  /**
   * Consistent deep copy for readers outside the scheduler
   */
  snapshot(): BotState {
    return structuredClone(this.current);
  }

  /**
   * Live state for the scheduler that owns it. Never hand this to other activities.
   */
  get state(): Readonly<BotState> {
    return this.current;
  }

  /**
   * Apply a change in memory; persisted by the next `flush()`
   */
  stage(mutator: StateMutator): void {
    mutator(this.current);
    this.dirty = true;
  }

  /**
   * Apply a change and persist it before returning.
   * On a write failure the in-memory state is left untouched.
   */
  async commit(mutator: StateMutator): Promise<BotState> {
    const next = structuredClone(this.current);
    mutator(next);
    await this.write(next);
    this.current = next;
    this.dirty = false;
    return this.snapshot();
  }

  /**
   * Persist staged changes, if any
   */
  async flush(): Promise<void> {
    if (!this.dirty) return;
    await this.write(this.current);
    this.dirty = false;
  }

  private write(state: BotState): Promise<void> {
    const payload = JSON.stringify(state, null, 2);
    const run = async () => {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      const tmp = `${this.filePath}.${process.pid}.tmp`;
      await fs.writeFile(tmp, payload, 'utf8');
      await fs.rename(tmp, this.filePath);
    };
    // Serialize writers so renames land in call order
    const result = this.writeChain.then(run, run);
    this.writeChain = result.catch(() => undefined);
    return result;
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
