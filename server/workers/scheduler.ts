/**
 * Scheduler for automated updates
 *
 * Runs the cascade and the lighter top-level tasks on cron intervals. Only one run touches
 * the store at a time: a tick that fires while another run is in progress is skipped.
 */

import cron from "node-cron";
import { ConfigError, errorMessage } from "../_core/errors";
import { createLogger } from "../_core/logger";
import type { RunReport } from "./orchestrator";

const log = createLogger("scheduler");

export type JobName = "cascade" | "matches" | "general";

export interface JobConfig {
  interval: string;
  description: string;
}

/**
 * Execution intervals:
 * - cascade: every day at 03:00 (full refresh)
 * - matches: every 30 minutes (today's results)
 * - general: every 6 hours (countries and aggregate stats)
 */
export const SCHEDULER_CONFIG: Readonly<Record<JobName, JobConfig>> = {
  cascade: {
    interval: "0 3 * * *",
    description: "Cascading update of every resource",
  },
  matches: {
    interval: "*/30 * * * *",
    description: "Today's matches",
  },
  general: {
    interval: "0 */6 * * *",
    description: "Countries, matches and aggregate stats",
  },
};

export type JobRunner = () => Promise<RunReport>;

export interface ScheduledRun {
  job: JobName;
  status: "completed" | "failed" | "skipped";
  durationMs: number;
  report?: RunReport;
  error?: string;
}

/** The slice of node-cron the scheduler uses. */
export interface CronApi {
  schedule(expression: string, task: () => void): { stop(): void };
  validate(expression: string): boolean;
}

const nodeCron: CronApi = {
  schedule: (expression, task) => cron.schedule(expression, task),
  validate: expression => cron.validate(expression),
};

const JOB_NAMES: readonly JobName[] = ["cascade", "matches", "general"];

export class Scheduler {
  private readonly scheduled: { stop(): void }[] = [];
  private active: JobName | null = null;
  private current: Promise<ScheduledRun> | null = null;

  constructor(
    private readonly jobs: Readonly<Record<JobName, JobRunner>>,
    private readonly config: Readonly<Record<JobName, JobConfig>> = SCHEDULER_CONFIG,
    private readonly cronApi: CronApi = nodeCron
  ) {}

  get started(): boolean {
    return this.scheduled.length > 0;
  }

  /** Name of the job currently running, if any. */
  get running(): JobName | null {
    return this.active;
  }

  start(): void {
    if (this.started) {
      log.warn("Scheduler already started");
      return;
    }

    for (const name of JOB_NAMES) {
      const { interval } = this.config[name];
      if (!this.cronApi.validate(interval)) {
        throw new ConfigError(`Invalid cron expression for ${name}: '${interval}'`);
      }
    }

    log.info("Starting scheduler...");
    for (const name of JOB_NAMES) {
      const { interval, description } = this.config[name];
      log.info(`Scheduling ${name}: ${description} (${interval})`);

      this.scheduled.push(
        this.cronApi.schedule(interval, async () => {
          log.info(`Triggering scheduled job: ${name}`);
          await this.execute(name);
        })
      );
    }
    log.info("Scheduler started");
  }

  /** Stops the cron tasks, then waits for a run already in progress to settle. */
  async stop(): Promise<void> {
    for (const task of this.scheduled.splice(0)) {
      task.stop();
    }
    if (this.current) {
      log.info(`Waiting for ${this.active ?? "the running job"} to finish`);
      await this.current;
    }
    log.info("Scheduler stopped");
  }

  /**
   * Runs one job now. Never rejects: failures are logged and reported in the result.
   */
  async execute(name: JobName): Promise<ScheduledRun> {
    if (this.active) {
      log.warn(`Skipping ${name}: ${this.active} is still running`);
      return { job: name, status: "skipped", durationMs: 0 };
    }

    this.active = name;
    const run = this.run(name);
    this.current = run;
    try {
      return await run;
    } finally {
      this.active = null;
      this.current = null;
    }
  }

  private async run(name: JobName): Promise<ScheduledRun> {
    const startTime = Date.now();
    log.info(`Executing job: ${name}`);

    try {
      const report = await this.jobs[name]();
      const durationMs = Date.now() - startTime;
      log.info(`Job ${name} completed in ${durationMs}ms`, { ...report.counts });
      return { job: name, status: "completed", durationMs, report };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      log.error(`Job ${name} failed after ${durationMs}ms`, error);
      return { job: name, status: "failed", durationMs, error: errorMessage(error) };
    }
  }
}
