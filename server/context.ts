import { BotConfig } from './config/env';
import { ActivityLog } from './utils/activityLog';
import { StateStore } from './services/stateStore';
import { MarketDataClient, MarketDataService } from './services/marketDataService';
import { SentimentService, SentimentSource } from './services/sentimentService';
import { TechnicalAnalysisService, TechnicalAnalyzer } from './services/technicalAnalysis';
import { Notifier, TelegramNotifier } from './services/telegramNotifier';
import { SignalAggregator } from './services/signalAggregator';
import { TradeExecutor } from './services/tradeExecutor';

/**
 * Everything a tick, a command or a route needs, passed explicitly
 */
export interface BotContext {
  config: BotConfig;
  store: StateStore;
  activityLog: ActivityLog;
  market: MarketDataClient;
  sentiment: SentimentSource;
  technical: TechnicalAnalyzer;
  notifier: Notifier;
  aggregator: SignalAggregator;
  executor: TradeExecutor;
  clock: () => Date;
}

export interface ContextOverrides {
  store?: StateStore;
  activityLog?: ActivityLog;
  market?: MarketDataClient;
  sentiment?: SentimentSource;
  technical?: TechnicalAnalyzer;
  notifier?: Notifier;
  clock?: () => Date;
}

/**
 * Build the production collaborators from config. Tests swap any of them
 * for in-process fakes.
 */
export function createContext(config: BotConfig, overrides: ContextOverrides = {}): BotContext {
  const clock = overrides.clock ?? (() => new Date());
  const store = overrides.store ?? new StateStore(config.stateFile);
  const activityLog = overrides.activityLog ?? new ActivityLog(config.activityLogFile, clock);
  const market = overrides.market ?? new MarketDataService(config.oanda);
  const sentiment = overrides.sentiment ?? new SentimentService(config.newsSources, undefined, clock);
  const technical = overrides.technical ?? new TechnicalAnalysisService();
  const notifier = overrides.notifier ?? new TelegramNotifier(config.telegram);

  return {
    config,
    store,
    activityLog,
    market,
    sentiment,
    technical,
    notifier,
    aggregator: new SignalAggregator({ market, technical }),
    executor: new TradeExecutor({ market, notifier, store, activityLog }),
    clock,
  };
}
