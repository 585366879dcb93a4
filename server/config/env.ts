/**
 * Environment Variable Validation
 *
 * Validates all required environment variables at boot time.
 * Missing or malformed values raise a ValidationError before any tick runs.
 *
 * Usage:
 *   import { loadConfig } from './config/env';
 *
 *   const config = loadConfig();
 *   config.oanda.accountId; // Validated and type-safe
 */

import { cleanEnv, str, port, url, makeValidator, EnvError } from 'envalid';
import { ValidationError } from '../middleware/errorHandler';

const INSTRUMENT_PATTERN = /^[A-Z]{3}_[A-Z]{3}$/;

export const DEFAULT_TRADING_PAIRS = [
  'EUR_USD', 'GBP_USD', 'USD_JPY', 'USD_CHF', 'AUD_USD',
  'USD_CAD', 'NZD_USD', 'EUR_GBP', 'EUR_JPY', 'GBP_JPY',
];

export const DEFAULT_NEWS_SOURCES = [
  'https://www.fxstreet.com/news',
  'https://www.forexlive.com',
  'https://www.dailyfx.com/news',
];

function splitList(input: string): string[] {
  return input
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const instrumentList = makeValidator<string[]>((input) => {
  const pairs = splitList(input);
  if (pairs.length === 0) {
    throw new EnvError('At least one trading pair is required');
  }
  const invalid = pairs.filter((pair) => !INSTRUMENT_PATTERN.test(pair));
  if (invalid.length > 0) {
    throw new EnvError(`Instruments must look like EUR_USD: ${invalid.join(', ')}`);
  }
  return pairs;
});

const urlList = makeValidator<string[]>((input) => {
  const urls = splitList(input);
  for (const candidate of urls) {
    try {
      new URL(candidate);
    } catch {
      throw new EnvError(`Invalid news source URL: ${candidate}`);
    }
  }
  return urls;
});

export interface BotConfig {
  nodeEnv: 'development' | 'production' | 'test';
  oanda: {
    apiKey: string;
    accountId: string;
    baseUrl: string;
  };
  telegram: {
    botToken: string;
    chatId: string;
    apiUrl: string;
  };
  tradingPairs: string[];
  newsSources: string[];
  stateFile: string;
  activityLogFile: string;
  controlPort: number;
  logLevel: string;
}

/**
 * Validate the environment and build the typed configuration
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): BotConfig {
  const env = cleanEnv(
    source,
    {
      // ===== Runtime =====
      NODE_ENV: str({
        choices: ['development', 'production', 'test'],
        default: 'development',
        desc: 'Node environment',
      }),

      LOG_LEVEL: str({
        choices: ['debug', 'info', 'warn', 'error', 'crit'],
        default: 'info',
        desc: 'Minimum log level',
      }),

      CONTROL_PORT: port({
        default: 3000,
        desc: 'Port of the HTTP control API',
      }),

      // ===== Market / execution service =====
      OANDA_API_KEY: str({
        desc: 'OANDA v20 API token',
      }),

      OANDA_ACCOUNT_ID: str({
        desc: 'OANDA account id',
        example: '101-004-1234567-001',
      }),

      OANDA_BASE_URL: url({
        default: 'https://api-fxpractice.oanda.com',
        desc: 'OANDA REST endpoint (practice by default)',
      }),

      // ===== Notification / command channel =====
      TELEGRAM_BOT_TOKEN: str({
        desc: 'Telegram bot token',
      }),

      TELEGRAM_CHAT_ID: str({
        desc: 'Chat that receives notifications and may issue commands',
      }),

      TELEGRAM_API_URL: url({
        default: 'https://api.telegram.org',
        desc: 'Telegram Bot API endpoint',
      }),

      // ===== Trading =====
      TRADING_PAIRS: instrumentList({
        default: DEFAULT_TRADING_PAIRS,
        desc: 'Comma-separated instruments to scan',
      }),

      NEWS_SOURCES: urlList({
        default: DEFAULT_NEWS_SOURCES,
        desc: 'Comma-separated headline pages used for sentiment',
      }),

      // ===== Files =====
      STATE_FILE: str({
        default: 'bot_state.json',
        desc: 'Path of the persisted bot state',
      }),

      ACTIVITY_LOG_FILE: str({
        default: 'trading_log.jsonl',
        desc: 'Path of the operator activity log',
      }),
    },
    {
      reporter: ({ errors }) => {
        const problems = Object.entries(errors)
          .filter((entry): entry is [string, Error] => entry[1] instanceof Error)
          .map(([name, error]) => `${name}: ${error.message}`);
        if (problems.length > 0) {
          throw new ValidationError(`Invalid configuration - ${problems.join('; ')}`, {
            variables: Object.keys(errors),
          });
        }
      },
    }
  );

  return {
    nodeEnv: env.NODE_ENV,
    oanda: {
      apiKey: env.OANDA_API_KEY,
      accountId: env.OANDA_ACCOUNT_ID,
      baseUrl: env.OANDA_BASE_URL,
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
      apiUrl: env.TELEGRAM_API_URL,
    },
    tradingPairs: env.TRADING_PAIRS,
    newsSources: env.NEWS_SOURCES,
    stateFile: env.STATE_FILE,
    activityLogFile: env.ACTIVITY_LOG_FILE,
    controlPort: env.CONTROL_PORT,
    logLevel: env.LOG_LEVEL,
  };
}
