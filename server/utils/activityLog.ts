import { promises as fs } from 'fs';
import path from 'path';
import { loggers } from './logger';
import { ActivityEntry, ActivityLevel } from './types';

const log = loggers.app.child('ActivityLog');

function isActivityEntry(value: unknown): value is ActivityEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('timestamp' in value) || !('action' in value) || !('level' in value)) return false;
  return (
    typeof value.timestamp === 'string' &&
    typeof value.action === 'string' &&
    (value.level === 'INFO' || value.level === 'WARNING' || value.level === 'ERROR')
  );
}

function parseLines(content: string): ActivityEntry[] {
  const entries: ActivityEntry[] = [];
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (isActivityEntry(parsed)) entries.push(parsed);
    } catch {
      continue;
    }
  }
  return entries;
}

/**
 * Operator-facing action history kept as JSON lines.
 *
 * Backs /showlog, /status and /whatyoudoin. Writes are best-effort: a failed
 * append is logged and never interrupts trading.
 */
export class ActivityLog {
  private lastEntry: ActivityEntry | null = null;

  constructor(private readonly filePath: string, private readonly clock: () => Date = () => new Date()) {}

  get path(): string {
    return this.filePath;
  }

  /** Most recent entry written by this process */
  get last(): ActivityEntry | null {
    return this.lastEntry;
  }

  async record(action: string, details?: Record<string, unknown>, level: ActivityLevel = 'INFO'): Promise<void> {
    const entry: ActivityEntry = {
      timestamp: this.clock().toISOString(),
      action,
      level,
      details: details ?? {},
    };
    this.lastEntry = entry;

    try {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      await fs.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf8');
    } catch (error) {
      log.error('Failed to append activity entry', error, { action });
    }
  }

  /**
   * Last `count` entries in file order. A missing file reads as empty.
   */
  async recent(count: number): Promise<ActivityEntry[]> {
    const content = await this.read();
    if (content === null) return [];
    const entries = parseLines(content);
    return count > 0 ? entries.slice(-count) : [];
  }

  /**
   * Drop entries older than `maxAgeHours`. Unparseable lines are dropped too.
   * Returns the number of entries removed.
   */
  async cleanup(maxAgeHours: number): Promise<number> {
    const content = await this.read();
    if (content === null) return 0;

    const cutoff = this.clock().getTime() - maxAgeHours * 60 * 60 * 1000;
    const lines = content.split('\n').filter((line) => line.trim().length > 0);
    const kept = parseLines(content).filter((entry) => {
      const time = Date.parse(entry.timestamp);
      return !Number.isNaN(time) && time > cutoff;
    });

    const tmp = `${this.filePath}.${process.pid}.tmp`;
    const body = kept.map((entry) => JSON.stringify(entry)).join('\n');
    await fs.writeFile(tmp, kept.length > 0 ? `${body}\n` : '', 'utf8');
    await fs.rename(tmp, this.filePath);

    const removed = lines.length - kept.length;
    if (removed > 0) {
      log.info('Activity log cleaned', { removed, kept: kept.length });
    }
    return removed;
  }

  private async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
