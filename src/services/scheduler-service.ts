import { addDays, format, getDay, setHours, setMinutes, startOfDay } from 'date-fns';
import { Schedule } from '../types/models/config';

/**
 * Next run strictly after `from`, in the process's local time zone
 * @throws Error when the schedule has no run days
 */
export function computeNextRun(from: Date, schedule: Schedule): Date {
  // A full week plus today always reaches every weekday once
  for (let offset = 0; offset <= 7; offset++) {
    const day = startOfDay(addDays(from, offset));
    const candidate = setMinutes(setHours(day, schedule.hour), schedule.minute);

    if (candidate.getTime() > from.getTime() && schedule.days.includes(getDay(candidate))) {
      return candidate;
    }
  }
  throw new Error('Schedule has no run days');
}

export interface SchedulerOptions {
  runOnStart?: boolean;
}

/**
 * Long-running scheduler for production mode. Keeps one pending timer and
 * skips a run while the previous one is still in progress.
 */
export class SchedulerService {
  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private isRunning = false;
  private nextRunAt: Date | null = null;

  constructor(
    private readonly task: () => Promise<unknown>,
    private readonly schedule: Schedule,
    private readonly options: SchedulerOptions = {},
  ) {}

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    console.log(
      `Market research scheduler started (${String(this.schedule.hour).padStart(2, '0')}:` +
        `${String(this.schedule.minute).padStart(2, '0')} on days ${this.schedule.days.join(',')})`,
    );

    if (this.options.runOnStart) {
      void this.execute();
    }
    this.scheduleNext();
  }

  stop(): void {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
    console.log('Market research scheduler stopped');
  }

  getNextRunAt(): Date | null {
    return this.nextRunAt;
  }

  isTaskRunning(): boolean {
    return this.isRunning;
  }

  private scheduleNext(): void {
    if (!this.started) {
      return;
    }

    const now = new Date();
    // Timers may fire a few milliseconds early; never schedule the same slot twice
    const from = this.nextRunAt && this.nextRunAt > now ? this.nextRunAt : now;
    const next = computeNextRun(from, this.schedule);
    this.nextRunAt = next;

    console.log(`Next market research run scheduled for ${format(next, 'yyyy-MM-dd HH:mm:ss')}`);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.execute();
      this.scheduleNext();
    }, next.getTime() - now.getTime());
  }

  /**
   * Runs the task once. Never rejects: failures are logged.
   */
  async execute(): Promise<void> {
    if (this.isRunning) {
      console.warn('Market research run already in progress, skipping');
      return;
    }

    this.isRunning = true;
    try {
      await this.task();
    } catch (error) {
      console.error('Scheduled market research run failed:', error);
    } finally {
      this.isRunning = false;
    }
  }
}
