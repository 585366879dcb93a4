/**
 * Health Check Service
 * Watches the supervised loop and external connectivity, and clears the
 * failure counter once the bot is demonstrably healthy again
 */

import { SCHEDULER, SUPERVISOR } from '../utils/constants';
import { loggers } from '../utils/logger';
import { CancellationToken, sleep } from '../utils/cancellation';
import { boundedResult } from '../utils/retryPolicy';
import { HealthStatus } from '../utils/types';
import { MarketDataClient } from './marketDataService';
import { Notifier } from './telegramNotifier';

const log = loggers.health;

export type SupervisorState = 'running' | 'restarting' | 'stopping' | 'stopped';

/**
 * What the health check needs to see of the supervisor
 */
export interface HealthProbe {
  readonly state: SupervisorState;
  readonly tasksActive: number;
  readonly consecutiveFailures: number;
  resetFailures(): void;
}

export interface HealthCheckOptions {
  market: MarketDataClient;
  notifier: Notifier;
  clock?: () => Date;
  callTimeoutMs?: number;
}

export function formatHealthReport(status: HealthStatus): string {
  const lines = [
    `🏥 Health Check - ${status.timestamp.slice(11, 19)} UTC`,
    `Bot: ${status.botRunning ? '✅' : '❌'}`,
    `Tasks: ${status.tasksActive}`,
    `Failures: ${status.consecutiveFailures}`,
    `Market API: ${status.connectivity.market ? '✅' : '❌'}`,
  ];
  if (status.accountBalance !== undefined) {
    lines.push(`Balance: ${status.accountBalance.toFixed(2)}`);
  }
  return lines.join('\n');
}

export class HealthCheckService {
  private readonly market: MarketDataClient;
  private readonly notifier: Notifier;
  private readonly clock: () => Date;
  private readonly callTimeoutMs: number;
  private lastHealthStatus: HealthStatus | null = null;
  private lastFullCheck = 0;

  constructor(options: HealthCheckOptions) {
    this.market = options.market;
    this.notifier = options.notifier;
    this.clock = options.clock ?? (() => new Date());
    this.callTimeoutMs = options.callTimeoutMs ?? SCHEDULER.COLLABORATOR_TIMEOUT_MS;
  }

  get lastStatus(): HealthStatus | null {
    return this.lastHealthStatus;
  }

  /**
   * Probe until cancelled. The first full check runs immediately, later ones
   * once per check interval.
   */
  async run(probe: HealthProbe, token: CancellationToken): Promise<void> {
    log.info('Starting periodic health checks');

    while (!token.isCancellationRequested) {
      let delay: number = SUPERVISOR.HEALTH_PROBE_INTERVAL_MS;
      try {
        const now = this.clock().getTime();
        if (this.lastFullCheck === 0 || now - this.lastFullCheck >= SUPERVISOR.HEALTH_CHECK_INTERVAL_MS) {
          this.lastFullCheck = now;
          await this.check(probe);
        }
      } catch (error) {
        log.error('Health probe failed', error);
        delay = SUPERVISOR.HEALTH_PROBE_ERROR_BACKOFF_MS;
      }
      await sleep(delay, token);
    }

    log.info('Health checks stopped');
  }

  /**
   * Run one full check, report it, and reset the supervisor's failure
   * counter when the loop is running and the market API answers.
   */
  async check(probe: HealthProbe): Promise<HealthStatus> {
    const failuresAtStart = probe.consecutiveFailures;
    const status: HealthStatus = {
      timestamp: this.clock().toISOString(),
      botRunning: probe.state === 'running',
      tasksActive: probe.tasksActive,
      consecutiveFailures: probe.consecutiveFailures,
      connectivity: { market: false, notifier: false },
    };

    const account = await boundedResult(this.market.getAccountInfo(), this.callTimeoutMs, 'health getAccountInfo');
    if (account.ok) {
      status.connectivity.market = true;
      status.accountBalance = account.value.balance;
    } else {
      status.marketError = account.error.message;
    }

    const ping = await boundedResult(this.notifier.ping(), this.callTimeoutMs, 'health ping');
    if (ping.ok) {
      status.connectivity.notifier = true;
    } else {
      status.notifierError = ping.error.message;
    }

    // The loop may have failed while the calls were in flight
    status.botRunning = probe.state === 'running';
    status.tasksActive = probe.tasksActive;
    status.consecutiveFailures = probe.consecutiveFailures;
    this.lastHealthStatus = status;

    const failedMeanwhile = probe.consecutiveFailures > failuresAtStart;
    if (status.botRunning && status.connectivity.market && !failedMeanwhile) {
      if (probe.consecutiveFailures > 0) {
        log.info('Bot healthy again, clearing failure count', { failures: probe.consecutiveFailures });
      }
      probe.resetFailures();
    } else {
      log.warn('Health check degraded', {
        botRunning: status.botRunning,
        failedMeanwhile,
        market: status.connectivity.market,
        notifier: status.connectivity.notifier,
        marketError: status.marketError,
      });
    }

    const sent = await boundedResult(
      this.notifier.sendNotification(formatHealthReport(status)),
      this.callTimeoutMs,
      'health report'
    );
    if (!sent.ok) {
      log.debug('Health report not delivered', { error: sent.error.message });
    }

    return status;
  }
}
