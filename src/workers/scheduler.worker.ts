import moment from 'moment-timezone';
import { AppConfig } from '../config/config';
import logger from '../common/utils/logger';
import { DispatcherService } from '../modules/dispatcher/dispatcher.service';

export type JobRule =
  | { kind: 'daily'; at: string } // HH:mm
  | { kind: 'hourly'; minute: number }
  | { kind: 'every'; minutes: number };

export interface ScheduledJob {
  name: string;
  rule: JobRule;
  run: () => Promise<unknown>;
}

interface SchedulerOptions {
  timezone: string;
  pollMs: number;
  clock?: () => Date;
}

/**
 * Next time `rule` fires strictly after `from`, in the scheduler's timezone.
 */
export const nextRunAfter = (rule: JobRule, from: Date, timezone: string): Date => {
  const local = moment.tz(from, timezone);

  switch (rule.kind) {
    case 'every':
      return local.clone().add(rule.minutes, 'minutes').toDate();
    case 'hourly': {
      const candidate = local.clone().minute(rule.minute).second(0).millisecond(0);
      if (candidate.valueOf() <= from.getTime()) candidate.add(1, 'hour');
      return candidate.toDate();
    }
    case 'daily': {
      const [hour, minute] = rule.at.split(':').map(Number);
      const candidate = local.clone().hour(hour).minute(minute).second(0).millisecond(0);
      if (candidate.valueOf() <= from.getTime()) candidate.add(1, 'day');
      return candidate.toDate();
    }
  }
};

/**
 * Single polling loop. Each tick runs every due job one after another; a tick
 * that arrives while the previous one is still running is dropped.
 */
export class SchedulerWorker {
  private readonly jobs: ScheduledJob[];
  private readonly timezone: string;
  private readonly pollMs: number;
  private readonly clock: () => Date;
  private readonly nextRun = new Map<string, Date>();
  private timer: NodeJS.Timeout | null = null;
  private busy = false;

  constructor(jobs: ScheduledJob[], options: SchedulerOptions) {
    this.jobs = jobs;
    this.timezone = options.timezone;
    this.pollMs = options.pollMs;
    this.clock = options.clock ?? (() => new Date());

    const now = this.clock();
    for (const job of jobs) {
      this.nextRun.set(job.name, nextRunAfter(job.rule, now, this.timezone));
    }
  }

  nextRunOf(name: string): Date | undefined {
    return this.nextRun.get(name);
  }

  async tick(): Promise<string[]> {
    if (this.busy) return [];
    this.busy = true;
    const ran: string[] = [];

    try {
      for (const job of this.jobs) {
        const now = this.clock();
        const due = this.nextRun.get(job.name);
        if (!due || now.getTime() < due.getTime()) continue;

        try {
          await job.run();
        } catch (error) {
          logger.error({ err: error, job: job.name }, 'Scheduled job failed');
        }
        ran.push(job.name);
        this.nextRun.set(job.name, nextRunAfter(job.rule, this.clock(), this.timezone));
      }
    } finally {
      this.busy = false;
    }

    return ran;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((error) => logger.error({ err: error }, 'Scheduler tick failed'));
    }, this.pollMs);
    logger.info({ jobs: this.jobs.map((j) => j.name), pollMs: this.pollMs }, 'Scheduler started');
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Scheduler stopped');
    }
  }
}

export const buildJobs = (dispatcher: DispatcherService, config: AppConfig): ScheduledJob[] => [
  { name: 'morning-activation', rule: { kind: 'daily', at: config.schedule.morningTime }, run: () => dispatcher.runMorningActivation() },
  { name: 'heartbeat', rule: { kind: 'every', minutes: config.schedule.heartbeatMinutes }, run: () => dispatcher.runHeartbeat() },
  { name: 'signal-scan', rule: { kind: 'hourly', minute: 0 }, run: () => dispatcher.runSignalScan() },
  { name: 'monthly-reset', rule: { kind: 'daily', at: config.schedule.resetCheckTime }, run: () => dispatcher.runMonthlyReset() },
];

export const startSchedulerWorker = (dispatcher: DispatcherService, config: AppConfig) => {
  const worker = new SchedulerWorker(buildJobs(dispatcher, config), {
    timezone: config.market.timezone,
    pollMs: config.schedule.pollMs,
  });
  worker.start();
  return worker;
};
