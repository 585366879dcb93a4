import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { loggers } from '../utils/logger';
import { ControlCommand } from '../services/tradingScheduler';
import { CommandQueue } from '../services/commandService';

const log = loggers.app.child('Control');

/**
 * Mutating operator actions. Each one is queued on the scheduler and answered
 * once the next tick has applied it; 409 when the loop is not running.
 */
export function createControlRouter(queue: CommandQueue): Router {
  const router = Router();

  const submit = (command: ControlCommand) =>
    asyncHandler(async (_req: Request, res: Response) => {
      log.info('Control command received', { command: command.type });
      const result = await queue.submit(command);
      const { success, message, ...data } = result;
      res.status(success ? 200 : 422).json({ success, message, data });
    });

  /**
   * POST /api/control/halt
   * Stop opening new trades (positions stay open)
   */
  router.post('/halt', submit({ type: 'halt' }));

  /**
   * POST /api/control/resume
   */
  router.post('/resume', submit({ type: 'resume' }));

  /**
   * POST /api/control/close-all
   * Close every position and halt trading
   */
  router.post('/close-all', submit({ type: 'close_all', halt: true }));

  /**
   * POST /api/control/reset
   * Close every position and reset the persisted state
   */
  router.post('/reset', submit({ type: 'reset' }));

  /**
   * POST /api/control/toggle-mode
   */
  router.post('/toggle-mode', submit({ type: 'toggle_mode' }));

  /**
   * POST /api/control/manual-trade
   * Scan now and trade the best opportunity above the manual threshold
   */
  router.post('/manual-trade', submit({ type: 'manual_trade' }));

  return router;
}
