import { formatDateInTimezone } from "../helpers/date-helpers.js";
import { nextTriggerAt } from "../helpers/reminder-schedule.js";
import type { ScheduledUser } from "../helpers/settings-helpers.js";
import type { AutoprogressionEngine, RunReport } from "../plan/autoprogression-engine.js";
import type { Clock } from "../plan/clock.js";

export interface DailyTriggerOptions {
  engine: AutoprogressionEngine;
  clock: Clock;
  listUsers: () => Promise<ScheduledUser[]>;
  /** HH:MM */
  runTime: string;
  defaultTimezone: string;
}

export interface TriggerSummary {
  users: number;
  applied: number;
  failed: number;
  errors: Array<{ user_id: number; message: string }>;
}

/**
 * Runs autoprogression for every user once a day at `runTime` in the default
 * zone. Each user's "today" is taken in their own zone. Running twice for the
 * same day applies nothing new.
 */
export class DailyTrigger {
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;

  constructor(private readonly options: DailyTriggerOptions) {}

  async runAll(now: Date = this.options.clock.now()): Promise<TriggerSummary> {
    const users = await this.options.listUsers();
    const summary: TriggerSummary = { users: users.length, applied: 0, failed: 0, errors: [] };

    for (const user of users) {
      const today = formatDateInTimezone(now, user.timezone ?? this.options.defaultTimezone);
      try {
        const report: RunReport = await this.options.engine.runOnce(user.id, today);
        summary.applied += report.applied.length;
        summary.failed += report.failed.length;
        if (report.applied.length > 0 || report.failed.length > 0) {
          console.log(
            `[autoprog] user=${user.id} today=${today} applied=${report.applied.length} skipped=${report.skipped.length} failed=${report.failed.length}`
          );
        }
        for (const failure of report.failed) {
          console.error(`[autoprog] user=${user.id} rule=${failure.rule_id} failed: ${failure.error}`);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        summary.errors.push({ user_id: user.id, message });
        console.error(`[autoprog] user=${user.id} run failed:`, err instanceof Error ? err.stack : err);
      }
    }
    return summary;
  }

  /** Next run instant strictly after `now`. */
  nextRunAt(now: Date = this.options.clock.now()): Date | null {
    return nextTriggerAt(
      { time: this.options.runTime, enabled: true },
      this.options.defaultTimezone,
      now,
    );
  }

  start(): void {
    this.stopped = false;
    this.arm();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private arm(): void {
    if (this.stopped) return;
    const now = this.options.clock.now();
    const next = this.nextRunAt(now);
    if (!next) {
      console.error(`[autoprog] Could not compute next run for ${this.options.runTime} ${this.options.defaultTimezone}`);
      return;
    }
    const delay = Math.max(0, next.getTime() - now.getTime());
    console.log(`[autoprog] Next run at ${next.toISOString()}`);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runAll()
        .then(summary => {
          console.log(
            `[autoprog] Daily run done: users=${summary.users} applied=${summary.applied} failed=${summary.failed + summary.errors.length}`
          );
        })
        .catch(err => {
          console.error("[autoprog] Daily run failed:", err instanceof Error ? err.stack : err);
        })
        .finally(() => this.arm());
    }, delay);
    this.timer.unref();
  }
}
