/**
 * Recovery Supervisor
 *
 * Owns the trading loop and the side tasks (command polling, health checks).
 * A failed loop is restarted after a back-off; too many failures in a row
 * stop the bot. Every exit path closes positions, flushes state and tells
 * the operator.
 */

import { SCHEDULER, SUPERVISOR } from '../utils/constants';
import { loggers } from '../utils/logger';
import { CancellationSource, CancellationToken, sleep } from '../utils/cancellation';
import { boundedResult } from '../utils/retryPolicy';
import { updateSupervisorFailures } from '../utils/metrics';
import { ActivityLog } from '../utils/activityLog';
import { SupervisorExhaustedError, toError } from '../middleware/errorHandler';
import { StateStore } from './stateStore';
import { Notifier } from './telegramNotifier';
import { CloseAllResult } from './tradeExecutor';
import { HealthCheckService, HealthProbe, SupervisorState } from './healthCheckService';

const log = loggers.supervisor;

export type SupervisedTask = (token: CancellationToken) => Promise<void>;

export interface TradingLoop {
  run(token: CancellationToken): Promise<void>;
}

export interface PositionCloser {
  closeAllPositions(): Promise<CloseAllResult>;
}

export interface RecoverySupervisorOptions {
  loop: TradingLoop;
  executor: PositionCloser;
  store: StateStore;
  notifier: Notifier;
  activityLog: ActivityLog;
  health?: HealthCheckService;
  maxFailures?: number;
  restartBackoffMs?: number;
}

export interface SupervisorOutcome {
  reason: string;
  failures: number;
  exhausted: SupervisorExhaustedError | null;
}

export class RecoverySupervisor implements HealthProbe {
  private readonly loop: TradingLoop;
  private readonly executor: PositionCloser;
  private readonly store: StateStore;
  private readonly notifier: Notifier;
  private readonly activityLog: ActivityLog;
  private readonly health: HealthCheckService | undefined;
  private readonly maxFailures: number;
  private readonly restartBackoffMs: number;

  private readonly root = new CancellationSource();
  private readonly sideTasks = new Map<string, SupervisedTask>();
  private readonly active = new Set<string>();
  private readonly pending: Promise<void>[] = [];
  private currentState: SupervisorState = 'stopped';
  private failures = 0;
  private restarts = 0;
  private completion: Promise<SupervisorOutcome> | null = null;

  constructor(options: RecoverySupervisorOptions) {
    this.loop = options.loop;
    this.executor = options.executor;
    this.store = options.store;
    this.notifier = options.notifier;
    this.activityLog = options.activityLog;
    this.health = options.health;
    this.maxFailures = options.maxFailures ?? SUPERVISOR.MAX_CONSECUTIVE_FAILURES;
    this.restartBackoffMs = options.restartBackoffMs ?? SUPERVISOR.RESTART_BACKOFF_MS;
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get tasksActive(): number {
    return this.active.size;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get restartCount(): number {
    return this.restarts;
  }

  get token(): CancellationToken {
    return this.root.token;
  }

  resetFailures(): void {
    if (this.failures === 0) return;
    this.failures = 0;
    updateSupervisorFailures(0);
  }

  /**
   * Register a side task started alongside the loop. Side task failures are
   * logged; they never count against the loop's failure budget.
   */
  addTask(name: string, task: SupervisedTask): void {
    if (this.completion) {
      throw new Error(`Cannot add task ${name} after start`);
    }
    this.sideTasks.set(name, task);
  }

  /**
   * Start supervising. The returned promise settles once the bot has fully
   * stopped.
   */
  start(): Promise<SupervisorOutcome> {
    if (this.completion) return this.completion;

    this.currentState = 'running';
    log.info('Supervisor starting', { tasks: [...this.sideTasks.keys()] });

    const health = this.health;
    if (health) {
      this.spawn('health', (token) => health.run(this, token));
    }
    for (const [name, task] of this.sideTasks) {
      this.spawn(name, task);
    }

    this.completion = this.supervise();
    return this.completion;
  }

  /**
   * Request shutdown and wait for it to finish
   */
  stop(reason: string = 'shutdown requested'): Promise<SupervisorOutcome> {
    log.info('Stop requested', { reason });
    this.root.cancel(reason);
    return this.completion ?? this.start();
  }

  private spawn(name: string, task: SupervisedTask): void {
    this.active.add(name);
    const running = task(this.root.token)
      .catch((error: unknown) => {
        log.error(`Task ${name} failed`, error);
      })
      .finally(() => {
        this.active.delete(name);
      });
    this.pending.push(running);
  }

  /**
   * Run the loop once; resolves with the error that ended it, or null when it
   * stopped because shutdown was requested
   */
  private async runLoopOnce(): Promise<Error | null> {
    this.active.add('trading-loop');
    try {
      await this.loop.run(this.root.token);
      return this.root.token.isCancellationRequested ? null : new Error('Trading loop exited unexpectedly');
    } catch (error) {
      return this.root.token.isCancellationRequested ? null : toError(error);
    } finally {
      this.active.delete('trading-loop');
    }
  }

  private async supervise(): Promise<SupervisorOutcome> {
    let exhausted: SupervisorExhaustedError | null = null;

    while (!this.root.token.isCancellationRequested) {
      this.currentState = 'running';
      const error = await this.runLoopOnce();
      if (!error) break;

      this.failures += 1;
      updateSupervisorFailures(this.failures);
      log.error('Trading loop failed', error, { failures: this.failures, maxFailures: this.maxFailures });
      await this.activityLog.record(
        'Bot error',
        { error: error.message, consecutiveFailures: this.failures },
        'ERROR'
      );

      if (this.failures >= this.maxFailures) {
        exhausted = new SupervisorExhaustedError(this.failures, error);
        log.critical('Failure budget exhausted, stopping bot', exhausted);
        break;
      }

      this.currentState = 'restarting';
      log.warn('Restarting trading loop after back-off', { backoffMs: this.restartBackoffMs });
      const waited = await sleep(this.restartBackoffMs, this.root.token);
      if (!waited) break;
      this.restarts += 1;
    }

    const reason = exhausted ? exhausted.message : this.root.token.cancellationReason ?? 'stopped';
    this.currentState = 'stopping';
    this.root.cancel(reason);
    await Promise.allSettled(this.pending);

    await this.finalize(reason, exhausted);
    this.currentState = 'stopped';
    log.info('Supervisor stopped', { reason, failures: this.failures });

    return { reason, failures: this.failures, exhausted };
  }

  private async finalize(reason: string, exhausted: SupervisorExhaustedError | null): Promise<void> {
    let closed: string[] = [];
    let failed: string[] = [];
    try {
      ({ closed, failed } = await this.executor.closeAllPositions());
    } catch (error) {
      log.error('Closing positions during shutdown failed', error);
    }

    try {
      await this.store.flush();
    } catch (error) {
      log.error('Final state save failed', error);
    }

    await this.activityLog.record('Bot stopped', { reason, closed, failed }, exhausted ? 'ERROR' : 'WARNING');

    const lines = exhausted
      ? [`🚨 Bot stopped after ${this.failures} consecutive failures`]
      : ['🛑 Trading bot stopped'];
    lines.push(`Reason: ${reason}`);
    if (closed.length > 0) lines.push(`Closed: ${closed.join(', ')}`);
    if (failed.length > 0) lines.push(`⚠️ Still open: ${failed.join(', ')}`);

    const sent = await boundedResult(
      this.notifier.sendNotification(lines.join('\n')),
      SCHEDULER.COLLABORATOR_TIMEOUT_MS,
      'shutdown notification'
    );
    if (!sent.ok) {
      log.warn('Shutdown notification not delivered', { error: sent.error.message });
    }
  }
}
