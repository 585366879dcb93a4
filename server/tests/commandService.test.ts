import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { promises as fs } from 'fs';
import {
  CommandQueue,
  CommandService,
  formatHelp,
  formatLogEntries,
  formatPositions,
  strategyStats,
} from '../services/commandService';
import { CommandResult, ControlCommand, SchedulerActivity } from '../services/tradingScheduler';
import { GateVerdict } from '../services/riskGate';
import { createDefaultState } from '../services/stateStore';
import { TestHarness, makeHarness, makeTempDir } from './helpers/fakes';

class QueueStub implements CommandQueue {
  activity: SchedulerActivity = 'idle';
  isRunning = true;
  lastGateVerdict: GateVerdict | null = null;
  submitted: ControlCommand[] = [];

  async submit(command: ControlCommand): Promise<CommandResult> {
    this.submitted.push(command);
    return { success: true, message: `done: ${command.type}` };
  }
}

function incoming(command: string) {
  return { command, args: [], chatId: '42' };
}

describe('CommandService', () => {
  let dir: string;
  let harness: TestHarness;
  let queue: QueueStub;
  let service: CommandService;

  beforeEach(async () => {
    dir = await makeTempDir();
    harness = makeHarness(dir);
    queue = new QueueStub();
    service = new CommandService(harness.ctx, queue);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists the commands on /help', async () => {
    const reply = await service.handle(incoming('/help'));

    const lines = reply.split('\n');
    expect(lines.slice(0, 3)).toEqual(['🤖 Forex Trading Bot Help', '', 'Available commands:']);
    expect(lines).toContain('/pnl - Instantly return profit/loss');
  });

  it('answers unknown commands', async () => {
    expect(await service.handle(incoming('/moon'))).toBe('❓ Unknown command /moon. Send /help for the list.');
  });

  it('routes state changes through the scheduler queue', async () => {
    expect(await service.handle(incoming('/canceltrade'))).toBe('done: close_all');
    await service.handle(incoming('/togglemode'));
    await service.handle(incoming('/resetbot'));
    await service.handle(incoming('/maketrade'));

    expect(queue.submitted).toEqual([
      { type: 'close_all', halt: true },
      { type: 'toggle_mode' },
      { type: 'reset' },
      { type: 'manual_trade' },
    ]);
  });

  it('does not queue read-only commands', async () => {
    const submit = vi.spyOn(queue, 'submit');

    await service.handle(incoming('/status'));
    await service.handle(incoming('/strategystats'));

    expect(submit).not.toHaveBeenCalled();
  });

  it('reports P&L from the account', async () => {
    expect(await service.handle(incoming('/pnl'))).toBe(
      [
        '💰 P&L Summary',
        '',
        '💵 Balance: 10000.00 USD',
        '📈 Unrealized P&L: 5.00 USD',
        '💵 Realized P&L: 20.00 USD',
        '📊 Total P&L: 25.00 USD',
      ].join('\n')
    );
  });

  it('reports a failed account lookup', async () => {
    harness.market.accountError = new Error('ECONNRESET');

    expect(await service.handle(incoming('/pnl'))).toBe('❌ P&L error: ECONNRESET');
  });

  it('lists open positions from the broker', async () => {
    harness.market.positions = [{ instrument: 'EUR_USD', units: 1000, side: 'long', unrealizedPnl: 4.5 }];

    expect(await service.handle(incoming('/openpositions'))).toBe(
      '📊 Open Positions:\n\n🟢 📈 EUR_USD\n   Units: 1000\n   P&L: 4.50 USD'
    );
  });

  it('shows the last ten activity entries', async () => {
    for (let i = 1; i <= 12; i++) {
      await harness.activityLog.record(`action ${i}`);
    }

    const lines = (await service.handle(incoming('/showlog'))).split('\n');

    expect(lines[0]).toBe('📝 Recent Bot Activity:');
    expect(lines).toHaveLength(12);
    expect(lines[2]).toBe('🟢 10:00:00: action 3');
    expect(lines[11]).toBe('🟢 10:00:00: action 12');
  });

  it('describes what the loop is doing', async () => {
    queue.activity = 'scanning';
    queue.lastGateVerdict = { eligible: false, reason: 'cooldown', detail: 'Cooldown, 42s left' };
    await harness.activityLog.record('Trade executed');

    expect(await service.handle(incoming('/whatyoudoin'))).toBe(
      [
        '🤖 Current Bot Status:',
        '',
        '💻 Activity: scanning',
        '🔄 Last Action: Trade executed (10:00:00)',
        '📊 Market Session: London',
        '⏸️ Waiting: Cooldown, 42s left',
      ].join('\n')
    );
  });

  it('reports a stopped loop', async () => {
    queue.isRunning = false;

    const reply = await service.handle(incoming('/whatyoudoin'));

    expect(reply.split('\n')[2]).toBe('💻 Activity: stopped');
  });

  it('summarises strategy performance', async () => {
    harness.store.stage((draft) => {
      draft.winCount = 3;
      draft.lossCount = 1;
      draft.totalPnl = 40;
      draft.dailyPnl = 12;
      draft.dailyTrades = 2;
    });

    const lines = (await service.handle(incoming('/strategystats'))).split('\n');

    expect(lines[2]).toBe('🎯 Win Rate: 75.00% (3W / 1L)');
    expect(lines[3]).toBe('💰 Total P&L: 40.00 USD');
    expect(lines[4]).toBe('📈 Average P&L per closed trade: 10.00 USD');
    expect(lines[5]).toBe('📅 Today: 2 trades, 12.00 USD');
    expect(lines[8]).toBe('⚙️ Mode: AGGRESSIVE');
  });

  it('builds the status report', async () => {
    const lines = (await service.handle(incoming('/status'))).split('\n');

    expect(lines[0]).toBe('📊 BOT STATUS REPORT');
    expect(lines).toContain('💰 Account Balance: 10000.00 USD');
    expect(lines).toContain('🔁 Trades Today: 0/15');
    expect(lines).toContain('⚙️ Mode: AGGRESSIVE | Trading: ON');
    expect(lines).toContain('➡️ News Sentiment: not yet analysed');
  });

  it('reports the state as it was when the status was requested', async () => {
    harness.store.stage((draft) => {
      draft.dailyTrades = 4;
      draft.winCount = 3;
      draft.lossCount = 1;
    });
    vi.spyOn(harness.market, 'getAccountInfo').mockImplementation(async () => {
      harness.store.stage((draft) => {
        Object.assign(draft, createDefaultState(new Date('2024-03-05T10:00:00.000Z')));
        draft.isTrading = false;
      });
      return { ok: true, value: { balance: 10000, currency: 'USD', marginRate: 0.02, unrealizedPnl: 0, realizedPnl: 0 } };
    });

    const lines = (await service.handle(incoming('/status'))).split('\n');

    expect(lines).toContain('🎯 Win Rate: 75.00%');
    expect(lines).toContain('🔁 Trades Today: 4/15');
    expect(lines).toContain('⚙️ Mode: AGGRESSIVE | Trading: ON');
    expect(harness.store.state.dailyTrades).toBe(0);
  });
});

describe('strategyStats', () => {
  it('averages P&L over closed trades only', () => {
    const state = createDefaultState(new Date('2024-03-05T00:00:00.000Z'));
    state.winCount = 1;
    state.lossCount = 2;
    state.totalPnl = -9;

    const stats = strategyStats(state);

    expect(stats.winRate).toBe(33.33);
    expect(stats.averagePnl).toBe(-3);
  });

  it('is zero before anything closed', () => {
    const stats = strategyStats(createDefaultState(new Date('2024-03-05T00:00:00.000Z')));

    expect(stats.winRate).toBe(0);
    expect(stats.averagePnl).toBe(0);
  });
});

describe('formatters', () => {
  it('marks activity levels', () => {
    const text = formatLogEntries([
      { timestamp: '2024-03-05T09:15:00.000Z', action: 'News scraping failed', level: 'WARNING', details: {} },
      { timestamp: '2024-03-05T09:16:30.000Z', action: 'Trade failed', level: 'ERROR', details: {} },
    ]);

    expect(text).toBe('📝 Recent Bot Activity:\n\n🟡 09:15:00: News scraping failed\n🔴 09:16:30: Trade failed');
  });

  it('says when the log is empty', () => {
    expect(formatLogEntries([])).toBe('📝 No recent logs available');
  });

  it('marks losing short positions', () => {
    expect(formatPositions([{ instrument: 'USD_JPY', units: -400, side: 'short', unrealizedPnl: -1.25 }])).toBe(
      '📊 Open Positions:\n\n🔴 📉 USD_JPY\n   Units: -400\n   P&L: -1.25 USD'
    );
  });

  it('says when nothing is open', () => {
    expect(formatPositions([])).toBe('📊 No open positions');
  });

  it('starts the help with its title', () => {
    expect(formatHelp('Title').split('\n')[0]).toBe('Title');
  });
});
