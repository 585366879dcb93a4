import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, TransientIOError, ValidationError } from '../middleware/errorHandler';
import { SCHEDULER } from '../utils/constants';
import { boundedResult } from '../utils/retryPolicy';
import { getMarketSession } from '../utils/formatting';
import type { BotContext } from '../context';
import { CommandQueue, strategyStats } from '../services/commandService';
import { HealthCheckService, HealthProbe } from '../services/healthCheckService';

const LogQuery = z.object({
  count: z.coerce.number().int().min(1).max(500).default(20),
});

export interface StatusRouterDeps {
  ctx: BotContext;
  queue: CommandQueue;
  probe: HealthProbe;
  health?: HealthCheckService;
}

/**
 * Read-only views of the running bot
 */
export function createStatusRouter({ ctx, queue, probe, health }: StatusRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/health
   * 200 while the loop is supervised and running, 503 otherwise
   */
  router.get('/health', (_req: Request, res: Response) => {
    const running = probe.state === 'running';
    res.status(running ? 200 : 503).json({
      success: running,
      data: {
        state: probe.state,
        tasksActive: probe.tasksActive,
        consecutiveFailures: probe.consecutiveFailures,
        lastCheck: health?.lastStatus ?? null,
        timestamp: ctx.clock().toISOString(),
      },
    });
  });

  /**
   * GET /api/status
   */
  router.get('/status', (_req: Request, res: Response) => {
    const state = ctx.store.snapshot();
    res.json({
      success: true,
      data: {
        isTrading: state.isTrading,
        mode: state.currentMode,
        activity: queue.isRunning ? queue.activity : 'stopped',
        gate: queue.lastGateVerdict,
        lastAction: ctx.activityLog.last,
        session: getMarketSession(ctx.clock()),
        sentiment: state.sentiment,
        stats: strategyStats(state),
        errorCount: state.errorCount,
        startTime: state.startTime,
      },
    });
  });

  /**
   * GET /api/pnl
   */
  router.get(
    '/pnl',
    asyncHandler(async (_req: Request, res: Response) => {
      const account = await boundedResult(ctx.market.getAccountInfo(), SCHEDULER.COLLABORATOR_TIMEOUT_MS, 'getAccountInfo');
      if (!account.ok) {
        throw new TransientIOError('Market', account.error.message);
      }
      const state = ctx.store.snapshot();
      res.json({
        success: true,
        data: {
          balance: account.value.balance,
          currency: account.value.currency,
          unrealizedPnl: account.value.unrealizedPnl,
          realizedPnl: account.value.realizedPnl,
          totalPnl: account.value.unrealizedPnl + account.value.realizedPnl,
          botTotalPnl: state.totalPnl,
          botDailyPnl: state.dailyPnl,
        },
      });
    })
  );

  /**
   * GET /api/positions
   */
  router.get(
    '/positions',
    asyncHandler(async (_req: Request, res: Response) => {
      const positions = await boundedResult(ctx.market.getPositions(), SCHEDULER.COLLABORATOR_TIMEOUT_MS, 'getPositions');
      if (!positions.ok) {
        throw new TransientIOError('Market', positions.error.message);
      }
      res.json({ success: true, data: positions.value });
    })
  );

  /**
   * GET /api/log?count=20
   */
  router.get(
    '/log',
    asyncHandler(async (req: Request, res: Response) => {
      const query = LogQuery.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError('Invalid log query', { issues: query.error.issues.map((issue) => issue.message) });
      }
      const entries = await ctx.activityLog.recent(query.data.count);
      res.json({ success: true, data: entries });
    })
  );

  return router;
}
