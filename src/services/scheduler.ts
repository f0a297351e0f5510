import cron, { ScheduledTask } from 'node-cron';
import { BroadcastTime } from '../types/index';
import { formatClockTime, getZonedClock, log } from '../utils/helpers';

export interface SchedulerOptions {
  targets: BroadcastTime[];
  timezone: string;
  pollIntervalSeconds: number;
  broadcast: () => Promise<void>;
}

// Sent markers live in memory only; a restart forgets them
export class BroadcastScheduler {
  private sentToday = new Set<string>();
  private task: ScheduledTask | null = null;
  private options: SchedulerOptions;

  constructor(options: SchedulerOptions) {
    if (options.pollIntervalSeconds < 1 || options.pollIntervalSeconds > 59) {
      throw new Error(`Poll interval must be between 1 and 59 seconds, got ${options.pollIntervalSeconds}`);
    }
    this.options = options;
  }

  start(): void {
    if (this.task) return;

    this.task = cron.schedule(`*/${this.options.pollIntervalSeconds} * * * * *`, () => {
      this.tick().catch(err =>
        log('error', 'Scheduler tick error', { error: String(err) })
      );
    }, { timezone: this.options.timezone });

    log('info', `Broadcasts scheduled at ${this.describeTargets()} (${this.options.timezone})`);
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
  }

  async tick(now: Date = new Date()): Promise<number> {
    const clock = getZonedClock(now, this.options.timezone);
    let sent = 0;

    for (const target of this.options.targets) {
      if (clock.hour !== target.hour || clock.minute !== target.minute) continue;

      const key = `${clock.date}|${target.hour}|${target.minute}`;
      if (this.sentToday.has(key)) continue;

      // Claimed before the await so an overlapping tick cannot send it again
      this.sentToday.add(key);
      try {
        await this.options.broadcast();
        sent++;
        log('info', `Scheduled broadcast sent for ${formatClockTime(target.hour, target.minute)}`);
      } catch (error) {
        this.sentToday.delete(key);
        log('error', `Scheduled broadcast for ${formatClockTime(target.hour, target.minute)} failed`, {
          error: String(error),
        });
      }
    }

    if (clock.hour === 0 && clock.minute === 0) {
      this.clearPreviousDays(clock.date);
    }

    return sent;
  }

  // Keeps today's markers so a 00:00 target is not sent twice
  private clearPreviousDays(today: string): void {
    let removed = 0;
    for (const key of this.sentToday) {
      if (!key.startsWith(`${today}|`)) {
        this.sentToday.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      log('info', `Cleared ${removed} scheduled broadcast marker(s) from previous days`);
    }
  }

  get markerCount(): number {
    return this.sentToday.size;
  }

  hasSent(date: string, target: BroadcastTime): boolean {
    return this.sentToday.has(`${date}|${target.hour}|${target.minute}`);
  }

  describeTargets(): string {
    return this.options.targets.map(t => formatClockTime(t.hour, t.minute)).join(', ');
  }
}
