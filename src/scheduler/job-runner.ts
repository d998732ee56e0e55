import schedule from "node-schedule";

export interface ScheduledJob {
  cancel(): void;
}

/** "Run this callback on this cron schedule", in local wall-clock time. */
export interface Scheduler {
  schedule(name: string, cron: string, callback: () => Promise<void>): ScheduledJob;
}

export class NodeScheduler implements Scheduler {
  schedule(name: string, cron: string, callback: () => Promise<void>): ScheduledJob {
    const job = schedule.scheduleJob(name, cron, () => {
      callback().catch((err) => {
        console.error(`[jobs] ${name} rejected:`, err);
      });
    });
    // node-schedule hands back null for an expression it cannot parse
    if (!job) {
      throw new Error(`Invalid cron expression for ${name}: "${cron}"`);
    }
    return {
      cancel: () => {
        job.cancel();
      },
    };
  }
}

export interface JobDefinition {
  name: string;
  cron: string;
  run: () => Promise<void>;
}

/**
 * Registers fixed-schedule jobs and keeps them alive: a job that throws is
 * logged and left scheduled for its next tick.
 */
export class JobRunner {
  private scheduler: Scheduler;
  private jobs: JobDefinition[];
  private handles = new Map<string, ScheduledJob>();

  constructor(scheduler: Scheduler, jobs: JobDefinition[]) {
    this.scheduler = scheduler;
    this.jobs = jobs;
  }

  start(): void {
    for (const job of this.jobs) {
      if (this.handles.has(job.name)) continue;
      const handle = this.scheduler.schedule(job.name, job.cron, () => this.runJob(job));
      this.handles.set(job.name, handle);
      console.log(`[jobs] Scheduled ${job.name} (${job.cron})`);
    }
  }

  stop(): void {
    for (const [name, handle] of this.handles) {
      handle.cancel();
      console.log(`[jobs] Cancelled ${name}`);
    }
    this.handles.clear();
  }

  /** Number of jobs currently scheduled. */
  jobCount(): number {
    return this.handles.size;
  }

  private async runJob(job: JobDefinition): Promise<void> {
    try {
      await job.run();
    } catch (err) {
      console.error(`[jobs] ${job.name} failed:`, err);
    }
  }
}
