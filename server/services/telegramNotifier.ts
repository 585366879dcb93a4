/**
 * Telegram Notification Service
 * Sends alerts to the operator chat and long-polls it for commands
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { TELEGRAM } from '../utils/constants';
import { loggers } from '../utils/logger';
import { CancellationToken, sleep } from '../utils/cancellation';
import { formatPercentage } from '../utils/formatting';
import { toError, TransientIOError } from '../middleware/errorHandler';
import { Result, TradeRecord, fail, ok } from '../utils/types';

const log = loggers.telegram;

export interface Notifier {
  sendNotification(text: string): Promise<Result<void>>;
  sendTradeAlert(record: TradeRecord): Promise<Result<void>>;
  /** Connectivity check used by the health probe */
  ping(): Promise<Result<void>>;
}

export interface IncomingCommand {
  command: string;
  args: string[];
  chatId: string;
}

export type CommandHandler = (command: IncomingCommand) => Promise<string>;

const UpdatesResponse = z.object({
  ok: z.boolean(),
  result: z.array(
    z.object({
      update_id: z.number(),
      message: z
        .object({
          text: z.string().optional(),
          chat: z.object({ id: z.union([z.number(), z.string()]) }),
        })
        .optional(),
    })
  ),
});

/**
 * Split "/status@my_bot extra args" into command and arguments
 */
export function parseCommand(text: string): { command: string; args: string[] } | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) return null;
  const [head, ...args] = trimmed.split(/\s+/);
  const command = head.split('@')[0].toLowerCase();
  return command.length > 1 ? { command, args } : null;
}

export function formatTradeAlert(record: TradeRecord): string {
  return [
    '🎯 TRADE ALERT!',
    '',
    `📊 ${record.instrument}`,
    `📈 ${record.side.toUpperCase()}`,
    `💰 ${record.units} units`,
    `💵 Price: ${record.price}`,
    `🎯 Confidence: ${formatPercentage(record.confidence * 100)}`,
  ].join('\n');
}

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  apiUrl: string;
  client?: AxiosInstance;
}

export class TelegramNotifier implements Notifier {
  private readonly chatId: string;
  private readonly client: AxiosInstance;
  private offset = 0;

  constructor(options: TelegramNotifierOptions) {
    this.chatId = options.chatId;
    this.client =
      options.client ??
      axios.create({
        baseURL: `${options.apiUrl}/bot${options.botToken}`,
        timeout: TELEGRAM.REQUEST_TIMEOUT_MS,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  /**
   * Send a message to the operator chat
   */
  async sendNotification(text: string): Promise<Result<void>> {
    return this.sendTo(this.chatId, text);
  }

  /**
   * Send trade alert
   */
  async sendTradeAlert(record: TradeRecord): Promise<Result<void>> {
    return this.sendNotification(formatTradeAlert(record));
  }

  async ping(): Promise<Result<void>> {
    try {
      await this.client.get('/getMe');
      return ok(undefined);
    } catch (error) {
      return fail(new TransientIOError('Telegram', toError(error).message));
    }
  }

  private async sendTo(chatId: string, text: string): Promise<Result<void>> {
    try {
      await this.client.post('/sendMessage', { chat_id: chatId, text });
      log.debug('Message sent', { chatId, preview: text.slice(0, 50) });
      return ok(undefined);
    } catch (error) {
      log.warn('Failed to send Telegram message', { error: toError(error).message });
      return fail(new TransientIOError('Telegram', toError(error).message));
    }
  }

  /**
   * Fetch one batch of updates, waiting up to the long-poll timeout.
   * Commands from chats other than the configured one are dropped.
   */
  async fetchCommands(token?: CancellationToken): Promise<IncomingCommand[]> {
    const controller = new AbortController();
    const unsubscribe = token?.onCancelled(() => controller.abort());

    try {
      const response = await this.client.get<unknown>('/getUpdates', {
        params: { offset: this.offset, timeout: TELEGRAM.LONG_POLL_SECONDS },
        timeout: (TELEGRAM.LONG_POLL_SECONDS + 10) * 1000,
        signal: controller.signal,
      });

      const parsed = UpdatesResponse.safeParse(response.data);
      if (!parsed.success) {
        throw new TransientIOError('Telegram', 'unexpected getUpdates payload');
      }

      const commands: IncomingCommand[] = [];
      for (const update of parsed.data.result) {
        this.offset = Math.max(this.offset, update.update_id + 1);

        const message = update.message;
        if (!message?.text) continue;

        const chatId = String(message.chat.id);
        if (chatId !== this.chatId) {
          log.warn('Ignoring command from unknown chat', { chatId });
          continue;
        }

        const command = parseCommand(message.text);
        if (command) commands.push({ ...command, chatId });
      }
      return commands;
    } finally {
      unsubscribe?.();
    }
  }

  /**
   * Cooperative polling task. Runs until the token is cancelled; errors back off
   * and retry.
   */
  async poll(handler: CommandHandler, token: CancellationToken): Promise<void> {
    log.info('Telegram command polling started');

    while (!token.isCancellationRequested) {
      let commands: IncomingCommand[];
      try {
        commands = await this.fetchCommands(token);
      } catch (error) {
        if (token.isCancellationRequested) break;
        log.warn('Polling failed, backing off', {
          error: toError(error).message,
          backoffMs: TELEGRAM.POLL_ERROR_BACKOFF_MS,
        });
        await sleep(TELEGRAM.POLL_ERROR_BACKOFF_MS, token);
        continue;
      }

      for (const command of commands) {
        if (token.isCancellationRequested) break;
        let reply: string;
        try {
          reply = await handler(command);
        } catch (error) {
          log.error(`Command ${command.command} failed`, error);
          reply = `❌ ${command.command} failed: ${toError(error).message}`;
        }
        await this.sendTo(command.chatId, reply);
      }
    }

    log.info('Telegram command polling stopped');
  }
}
